'use client'

import React, { useEffect, useState } from 'react'
import { Database, KeyRound } from 'lucide-react'
import { toast } from 'sonner'

import { Badge } from '@/components/ui/badge'
import { Button } from '@/components/ui/button'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { Label } from '@/components/ui/label'
import { PasswordInput } from '@/components/ui/password-input'
import { changePassword, getSettingsInfo } from '@/lib/actions/settings'
import type { SystemInfo } from '@/lib/services/settings'
import type { CurrentUser } from '@/lib/types'

const EMPTY_FORM = { currentPassword: '', newPassword: '', confirmPassword: '' }

export function SettingsManager({ user }: { user: Pick<CurrentUser, 'username' | 'name' | 'email' | 'role'> }) {
  const [info, setInfo] = useState<SystemInfo | null>(null)
  const [form, setForm] = useState(EMPTY_FORM)
  const [saving, setSaving] = useState(false)

  useEffect(() => {
    const load = async () => {
      const result = await getSettingsInfo()
      if (!result.success) {
        toast.error('Failed to load system info', { description: result.error.message })
        return
      }
      setInfo(result.info)
    }
    void load()
  }, [])

  const handleChangePassword = async (e: React.FormEvent) => {
    e.preventDefault()
    setSaving(true)

    try {
      const result = await changePassword(form)
      if (!result.success) {
        toast.error('Password not changed', { description: result.error.message })
        return
      }
      toast.success(result.message)
      setForm(EMPTY_FORM)
    } finally {
      setSaving(false)
    }
  }

  return (
    <div className="grid gap-6 xl:grid-cols-2">
      <Card>
        <CardHeader>
          <CardTitle className="flex items-center gap-2">
            <KeyRound className="h-5 w-5" /> Change password
          </CardTitle>
          <CardDescription>
            Signed in as <span className="font-medium text-foreground">{user.name || user.username}</span> ({user.email})
          </CardDescription>
        </CardHeader>
        <CardContent>
          <form onSubmit={handleChangePassword} className="space-y-4">
            <div>
              <Label htmlFor="current-password">Current password</Label>
              <PasswordInput
                id="current-password"
                autoComplete="current-password"
                value={form.currentPassword}
                onChange={(e) => setForm((prev) => ({ ...prev, currentPassword: e.target.value }))}
              />
            </div>
            <div>
              <Label htmlFor="new-password">New password</Label>
              <PasswordInput
                id="new-password"
                autoComplete="new-password"
                value={form.newPassword}
                onChange={(e) => setForm((prev) => ({ ...prev, newPassword: e.target.value }))}
              />
              <p className="mt-1 text-xs text-muted-foreground">At least 8 characters.</p>
            </div>
            <div>
              <Label htmlFor="confirm-password">Confirm new password</Label>
              <PasswordInput
                id="confirm-password"
                autoComplete="new-password"
                value={form.confirmPassword}
                onChange={(e) => setForm((prev) => ({ ...prev, confirmPassword: e.target.value }))}
              />
            </div>
            <Button type="submit" disabled={saving}>
              {saving ? 'Saving...' : 'Update password'}
            </Button>
          </form>
        </CardContent>
      </Card>

      <Card>
        <CardHeader>
          <CardTitle className="flex items-center gap-2">
            <Database className="h-5 w-5" /> System
          </CardTitle>
          <CardDescription>
            {user.role === 'admin' ? 'Counts cover every teacher.' : 'Counts cover the students you manage.'}
          </CardDescription>
        </CardHeader>
        <CardContent className="space-y-3 text-sm">
          {info ? (
            <>
              <div className="flex items-center justify-between">
                <span className="text-muted-foreground">Storage</span>
                <Badge variant={info.backend === 'mongo' ? 'default' : 'secondary'}>
                  {info.backend === 'mongo' ? 'MongoDB' : 'JSON files'}
                </Badge>
              </div>
              <div className="flex items-center justify-between">
                <span className="text-muted-foreground">Students</span>
                <span className="font-medium">{info.students}</span>
              </div>
              <div className="flex items-center justify-between">
                <span className="text-muted-foreground">Attendance records</span>
                <span className="font-medium">{info.attendanceRecords}</span>
              </div>
              {info.backend === 'json' && (
                <p className="text-xs text-muted-foreground">
                  MongoDB was not reachable at startup, so data is kept in JSON files on the server.
                </p>
              )}
            </>
          ) : (
            <p className="text-muted-foreground">Loading...</p>
          )}
        </CardContent>
      </Card>
    </div>
  )
}
