'use client'

import React, { useState } from 'react'
import { useRouter } from 'next/navigation'
import { Lock } from 'lucide-react'
import { toast } from 'sonner'

import { Button } from '@/components/ui/button'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { Input } from '@/components/ui/input'
import { Label } from '@/components/ui/label'
import { PasswordInput } from '@/components/ui/password-input'
import { unlockSection } from '@/lib/auth'
import type { ProtectedSection } from '@/lib/types'

/** Password re-entry for a protected section; it stays open until sign out. */
export function UnlockSection({ section, title }: { section: ProtectedSection; title: string }) {
  const router = useRouter()
  const [username, setUsername] = useState('')
  const [password, setPassword] = useState('')
  const [loading, setLoading] = useState(false)

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault()
    setLoading(true)

    try {
      const result = await unlockSection({ section, username, password })
      if (!result.success) {
        toast.error('Could not unlock', { description: result.error.message })
        setPassword('')
        return
      }

      toast.success(`${title} unlocked`)
      router.refresh()
    } finally {
      setLoading(false)
    }
  }

  return (
    <Card className="mx-auto max-w-md">
      <CardHeader className="space-y-2">
        <div className="flex h-10 w-10 items-center justify-center rounded-xl bg-accent text-accent-foreground">
          <Lock className="h-5 w-5" />
        </div>
        <CardTitle>{title}</CardTitle>
        <CardDescription>Confirm your username and password to open this section.</CardDescription>
      </CardHeader>
      <CardContent>
        <form onSubmit={handleSubmit} className="space-y-4">
          <div>
            <Label htmlFor={`${section}-username`}>Username</Label>
            <Input
              id={`${section}-username`}
              autoComplete="username"
              value={username}
              onChange={(e) => setUsername(e.target.value)}
              disabled={loading}
            />
          </div>
          <div>
            <Label htmlFor={`${section}-password`}>Password</Label>
            <PasswordInput
              id={`${section}-password`}
              autoComplete="current-password"
              value={password}
              onChange={(e) => setPassword(e.target.value)}
              disabled={loading}
            />
          </div>
          <Button type="submit" className="w-full" disabled={loading}>
            {loading ? 'Checking...' : 'Unlock'}
          </Button>
        </form>
      </CardContent>
    </Card>
  )
}
