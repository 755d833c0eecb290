'use client'

import React, { useState } from 'react'
import { useRouter } from 'next/navigation'
import { toast } from 'sonner'

import { Button } from '@/components/ui/button'
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from '@/components/ui/card'
import { Input } from '@/components/ui/input'
import { Label } from '@/components/ui/label'
import { PasswordInput } from '@/components/ui/password-input'
import { Tabs, TabsContent, TabsList, TabsTrigger } from '@/components/ui/tabs'
import { requestPasswordReset, signIn, signUp } from '@/lib/auth'

function errorMessage(error: unknown) {
  return error instanceof Error && error.message ? error.message : 'An unexpected error occurred'
}

export default function AuthPage() {
  const router = useRouter()
  const [loading, setLoading] = useState(false)
  const [activeTab, setActiveTab] = useState('login')

  const [loginUsername, setLoginUsername] = useState('')
  const [loginPassword, setLoginPassword] = useState('')

  const [signupUsername, setSignupUsername] = useState('')
  const [signupName, setSignupName] = useState('')
  const [signupEmail, setSignupEmail] = useState('')
  const [signupPassword, setSignupPassword] = useState('')
  const [signupConfirmPassword, setSignupConfirmPassword] = useState('')

  const [resetUsername, setResetUsername] = useState('')
  const [resetLink, setResetLink] = useState<{ url: string; expiresAt: string } | null>(null)

  const handleSignIn = async (e: React.FormEvent) => {
    e.preventDefault()
    setLoading(true)

    try {
      if (!loginUsername || !loginPassword) {
        toast.error('Missing credentials', { description: 'Please enter both username and password' })
        return
      }

      const result = await signIn(loginUsername, loginPassword)
      if (!result.success) {
        toast.error('Sign in failed', { description: result.error.message })
        return
      }

      toast.success(`Welcome back, ${result.user.name || result.user.username}!`)
      router.push('/dashboard')
    } catch (error) {
      toast.error('Error signing in', { description: errorMessage(error) })
    } finally {
      setLoading(false)
    }
  }

  const handleSignUp = async (e: React.FormEvent) => {
    e.preventDefault()
    setLoading(true)

    try {
      if (!signupUsername || !signupEmail || !signupPassword) {
        toast.error('Incomplete form', { description: 'Username, email and password are required' })
        return
      }

      if (signupPassword !== signupConfirmPassword) {
        toast.error('Passwords do not match', {
          description: 'Please make sure your password confirmation matches',
        })
        return
      }

      const result = await signUp({
        username: signupUsername,
        name: signupName,
        email: signupEmail,
        password: signupPassword,
        confirmPassword: signupConfirmPassword,
      })

      if (!result.success) {
        toast.error('Sign up failed', { description: result.error.message })
        return
      }

      toast.success('Account created successfully!', {
        description:
          result.role === 'admin'
            ? 'You are the first user and have been made an admin.'
            : 'Sign in with your new account.',
      })
      setActiveTab('login')
      setLoginUsername(result.user.username)
      setSignupUsername('')
      setSignupName('')
      setSignupEmail('')
      setSignupPassword('')
      setSignupConfirmPassword('')
    } catch (error) {
      toast.error('Error creating account', { description: errorMessage(error) })
    } finally {
      setLoading(false)
    }
  }

  const handleResetRequest = async (e: React.FormEvent) => {
    e.preventDefault()
    setLoading(true)
    setResetLink(null)

    try {
      const result = await requestPasswordReset(resetUsername)
      if (!result.success) {
        toast.error('Could not create reset link', { description: result.error.message })
        return
      }

      // No mail is sent; the link is shown here for the user to open
      setResetLink({ url: result.url, expiresAt: result.expiresAt })
    } catch (error) {
      toast.error('Error requesting reset', { description: errorMessage(error) })
    } finally {
      setLoading(false)
    }
  }

  return (
    <div className="flex min-h-screen items-center justify-center bg-gradient-to-br from-slate-900 to-slate-800 p-4">
      <Card className="w-full max-w-md">
        <CardHeader className="space-y-2">
          <CardTitle className="text-2xl font-bold">Attendance Tracker</CardTitle>
          <CardDescription>Sign in to take and review attendance</CardDescription>
        </CardHeader>
        <CardContent>
          <Tabs value={activeTab} onValueChange={setActiveTab} className="w-full">
            <TabsList className="grid w-full grid-cols-3">
              <TabsTrigger value="login">Sign In</TabsTrigger>
              <TabsTrigger value="signup">Sign Up</TabsTrigger>
              <TabsTrigger value="reset">Forgot</TabsTrigger>
            </TabsList>

            <TabsContent value="login" className="mt-4 space-y-4">
              <form onSubmit={handleSignIn} className="space-y-4">
                <div>
                  <Label htmlFor="login-username">Username</Label>
                  <Input
                    id="login-username"
                    autoComplete="username"
                    value={loginUsername}
                    onChange={(e) => setLoginUsername(e.target.value)}
                    disabled={loading}
                  />
                </div>
                <div>
                  <Label htmlFor="login-password">Password</Label>
                  <PasswordInput
                    id="login-password"
                    autoComplete="current-password"
                    value={loginPassword}
                    onChange={(e) => setLoginPassword(e.target.value)}
                    disabled={loading}
                  />
                </div>
                <Button type="submit" className="w-full" disabled={loading}>
                  {loading ? 'Signing in...' : 'Sign In'}
                </Button>
              </form>
            </TabsContent>

            <TabsContent value="signup" className="mt-4 space-y-4">
              <form onSubmit={handleSignUp} className="space-y-4">
                <div className="grid grid-cols-2 gap-3">
                  <div>
                    <Label htmlFor="signup-username">Username</Label>
                    <Input
                      id="signup-username"
                      value={signupUsername}
                      onChange={(e) => setSignupUsername(e.target.value)}
                      disabled={loading}
                    />
                  </div>
                  <div>
                    <Label htmlFor="signup-name">Full name</Label>
                    <Input
                      id="signup-name"
                      value={signupName}
                      onChange={(e) => setSignupName(e.target.value)}
                      disabled={loading}
                    />
                  </div>
                </div>
                <div>
                  <Label htmlFor="signup-email">Email</Label>
                  <Input
                    id="signup-email"
                    type="email"
                    placeholder="you@example.com"
                    value={signupEmail}
                    onChange={(e) => setSignupEmail(e.target.value)}
                    disabled={loading}
                  />
                </div>
                <div>
                  <Label htmlFor="signup-password">Password</Label>
                  <PasswordInput
                    id="signup-password"
                    autoComplete="new-password"
                    value={signupPassword}
                    onChange={(e) => setSignupPassword(e.target.value)}
                    disabled={loading}
                  />
                  <p className="mt-1 text-xs text-muted-foreground">
                    At least 8 characters with upper and lower case letters, a number and one of @$!%*?&
                  </p>
                </div>
                <div>
                  <Label htmlFor="confirm-password">Confirm Password</Label>
                  <PasswordInput
                    id="confirm-password"
                    autoComplete="new-password"
                    value={signupConfirmPassword}
                    onChange={(e) => setSignupConfirmPassword(e.target.value)}
                    disabled={loading}
                  />
                </div>
                <Button type="submit" className="w-full" disabled={loading}>
                  {loading ? 'Creating account...' : 'Create Account'}
                </Button>
              </form>
            </TabsContent>

            <TabsContent value="reset" className="mt-4 space-y-4">
              <form onSubmit={handleResetRequest} className="space-y-4">
                <div>
                  <Label htmlFor="reset-username">Username</Label>
                  <Input
                    id="reset-username"
                    value={resetUsername}
                    onChange={(e) => setResetUsername(e.target.value)}
                    disabled={loading}
                  />
                </div>
                <Button type="submit" className="w-full" disabled={loading}>
                  {loading ? 'Creating link...' : 'Create reset link'}
                </Button>
              </form>
              {resetLink && (
                <div className="rounded-xl border border-border/60 bg-muted/50 p-3 text-sm">
                  <p className="font-medium">Open this link to choose a new password:</p>
                  <a href={resetLink.url} className="mt-1 block break-all text-primary underline">
                    {resetLink.url}
                  </a>
                  <p className="mt-2 text-xs text-muted-foreground">
                    Valid until {new Date(resetLink.expiresAt).toLocaleString()}
                  </p>
                </div>
              )}
            </TabsContent>
          </Tabs>
        </CardContent>
      </Card>
    </div>
  )
}
