'use client'

import React, { useCallback, useEffect, useMemo, useState } from 'react'
import { toast } from 'sonner'
import { LockOpen, Plus, Shield, ShieldOff, Trash2, UserCheck, UserX } from 'lucide-react'

import { createUser, deleteUser, getUsers, setUserRole, setUserStatus, unlockUser } from '@/lib/actions/users'
import type { UserRole, UserStatus } from '@/lib/db/schema'
import type { PublicUser } from '@/lib/types'

import { Badge } from '@/components/ui/badge'
import { Button } from '@/components/ui/button'
import { Input } from '@/components/ui/input'
import { Label } from '@/components/ui/label'
import { PasswordInput } from '@/components/ui/password-input'
import { Select } from '@/components/ui/select'
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from '@/components/ui/table'

type StatusFilter = UserStatus | 'all'

const EMPTY_FORM: { username: string; name: string; email: string; password: string; role: UserRole } = {
  username: '',
  name: '',
  email: '',
  password: '',
  role: 'teacher',
}

function isStatusFilter(value: string): value is StatusFilter {
  return value === 'all' || value === 'active' || value === 'inactive'
}

function isUserRole(value: string): value is UserRole {
  return value === 'admin' || value === 'teacher'
}

export function UsersManager({ currentUsername }: { currentUsername: string }) {
  const [loading, setLoading] = useState(true)
  const [query, setQuery] = useState('')
  const [status, setStatus] = useState<StatusFilter>('all')
  const [users, setUsers] = useState<PublicUser[]>([])
  const [workingUser, setWorkingUser] = useState<string | null>(null)

  const [createOpen, setCreateOpen] = useState(false)
  const [creating, setCreating] = useState(false)
  const [createForm, setCreateForm] = useState(EMPTY_FORM)

  const load = useCallback(async () => {
    setLoading(true)
    const result = await getUsers()
    if (!result.success) {
      toast.error('Failed to load users', { description: result.error.message })
      setUsers([])
      setLoading(false)
      return
    }
    setUsers(result.users)
    setLoading(false)
  }, [])

  useEffect(() => {
    void load()
  }, [load])

  const visible = useMemo(() => {
    const needle = query.trim().toLowerCase()
    return users.filter((user) => {
      if (status !== 'all' && user.status !== status) return false
      if (!needle) return true
      return [user.username, user.name, user.email].some((field) => field.toLowerCase().includes(needle))
    })
  }, [users, query, status])

  const runForUser = async (
    username: string,
    action: () => Promise<{ success: true } | { success: false; error: { message: string } }>,
    successMessage: string
  ) => {
    setWorkingUser(username)
    const result = await action()
    setWorkingUser(null)
    if (!result.success) {
      toast.error('Update failed', { description: result.error.message })
      return
    }
    toast.success(successMessage)
    await load()
  }

  const handleDelete = async (username: string) => {
    const confirmation = window.prompt(`Type "${username}" to delete this account. Their students and records stay.`)
    if (confirmation === null) return
    await runForUser(username, () => deleteUser(username, confirmation), 'User deleted')
  }

  const handleCreate = async (e: React.FormEvent) => {
    e.preventDefault()

    if (!createForm.username.trim() || !createForm.email.trim() || !createForm.password) {
      toast.error('Please fill in username, email and password')
      return
    }
    if (createForm.password.length < 8) {
      toast.error('Password must be at least 8 characters')
      return
    }

    setCreating(true)
    const result = await createUser({
      username: createForm.username.trim(),
      name: createForm.name.trim() || undefined,
      email: createForm.email.trim(),
      password: createForm.password,
      role: createForm.role,
    })
    setCreating(false)

    if (!result.success) {
      toast.error('Create failed', { description: result.error.message })
      return
    }

    toast.success('User created', { description: `${result.user.username} can now sign in.` })
    setCreateOpen(false)
    setCreateForm(EMPTY_FORM)
    await load()
  }

  return (
    <div className="space-y-5">
      <div className="rounded-2xl border border-border/60 bg-card/70 p-4">
        <div className="flex flex-col gap-4 lg:flex-row lg:items-end lg:justify-between">
          <div className="flex flex-1 flex-col gap-3 lg:flex-row lg:items-end">
            <div className="flex-1">
              <Label htmlFor="users-search">Search</Label>
              <Input
                id="users-search"
                placeholder="Search by username, name or email..."
                value={query}
                onChange={(e) => setQuery(e.target.value)}
              />
            </div>
            <div className="w-full lg:w-44">
              <Label htmlFor="users-status">Status</Label>
              <Select
                id="users-status"
                value={status}
                onChange={(e) => {
                  if (isStatusFilter(e.target.value)) setStatus(e.target.value)
                }}
              >
                <option value="all">All</option>
                <option value="active">Active</option>
                <option value="inactive">Inactive</option>
              </Select>
            </div>
          </div>

          <div className="flex flex-wrap items-center gap-2">
            <Button onClick={() => setCreateOpen((open) => !open)}>
              <Plus className="mr-2 h-4 w-4" />
              Add user
            </Button>
            <Button variant="outline" onClick={() => void load()} disabled={loading}>
              Refresh
            </Button>
          </div>
        </div>

        {createOpen && (
          <form
            onSubmit={handleCreate}
            className="mt-4 grid gap-3 rounded-xl border border-border/60 bg-background/60 p-4 sm:grid-cols-2 lg:grid-cols-5"
          >
            <div>
              <Label htmlFor="create-username">Username</Label>
              <Input
                id="create-username"
                value={createForm.username}
                onChange={(e) => setCreateForm((p) => ({ ...p, username: e.target.value }))}
                disabled={creating}
              />
            </div>
            <div>
              <Label htmlFor="create-name">Full name</Label>
              <Input
                id="create-name"
                value={createForm.name}
                onChange={(e) => setCreateForm((p) => ({ ...p, name: e.target.value }))}
                disabled={creating}
              />
            </div>
            <div>
              <Label htmlFor="create-email">Email</Label>
              <Input
                id="create-email"
                type="email"
                value={createForm.email}
                onChange={(e) => setCreateForm((p) => ({ ...p, email: e.target.value }))}
                disabled={creating}
              />
            </div>
            <div>
              <Label htmlFor="create-password">Temporary password</Label>
              <PasswordInput
                id="create-password"
                autoComplete="new-password"
                value={createForm.password}
                onChange={(e) => setCreateForm((p) => ({ ...p, password: e.target.value }))}
                disabled={creating}
              />
            </div>
            <div>
              <Label htmlFor="create-role">Role</Label>
              <Select
                id="create-role"
                value={createForm.role}
                onChange={(e) => {
                  const role = e.target.value
                  if (isUserRole(role)) setCreateForm((p) => ({ ...p, role }))
                }}
              >
                <option value="teacher">Teacher</option>
                <option value="admin">Admin</option>
              </Select>
            </div>
            <div className="flex gap-2 sm:col-span-2 lg:col-span-5">
              <Button type="submit" disabled={creating}>
                {creating ? 'Creating...' : 'Create'}
              </Button>
              <Button type="button" variant="outline" onClick={() => setCreateOpen(false)} disabled={creating}>
                Cancel
              </Button>
            </div>
          </form>
        )}

        <div className="mt-3 flex flex-wrap items-center gap-2 rounded-xl border border-border/60 bg-muted/30 px-3 py-2 text-xs">
          <Badge variant="secondary">{users.length} users</Badge>
          {status !== 'all' ? <Badge variant="outline">Status: {status}</Badge> : null}
        </div>
      </div>

      {loading ? (
        <div className="rounded-2xl border border-border/60 bg-card/70 py-10 text-center text-muted-foreground">
          Loading users...
        </div>
      ) : visible.length === 0 ? (
        <div className="rounded-2xl border border-dashed border-border/70 bg-card/40 py-12 text-center">
          <p className="text-sm text-muted-foreground">No users found.</p>
        </div>
      ) : (
        <div className="overflow-hidden rounded-2xl border border-border/60 bg-card/80">
          <Table>
            <TableHeader>
              <TableRow>
                <TableHead>User</TableHead>
                <TableHead>Role</TableHead>
                <TableHead>Status</TableHead>
                <TableHead>Last login</TableHead>
                <TableHead className="text-right">Actions</TableHead>
              </TableRow>
            </TableHeader>
            <TableBody>
              {visible.map((u) => {
                const busy = workingUser === u.username
                const isSelf = u.username === currentUsername
                return (
                  <TableRow key={u.username}>
                    <TableCell className="font-medium">
                      <div className="flex flex-col">
                        <span>
                          {u.name || u.username}
                          {isSelf ? <span className="ml-2 text-xs text-muted-foreground">(you)</span> : null}
                        </span>
                        <span className="text-xs text-muted-foreground">
                          {u.username} · {u.email}
                        </span>
                      </div>
                    </TableCell>
                    <TableCell>
                      <Badge variant={u.role === 'admin' ? 'default' : 'secondary'}>{u.role}</Badge>
                    </TableCell>
                    <TableCell>
                      <div className="flex flex-wrap gap-1">
                        <Badge variant={u.status === 'active' ? 'outline' : 'destructive'}>{u.status}</Badge>
                        {u.is_locked ? <Badge variant="destructive">locked</Badge> : null}
                      </div>
                    </TableCell>
                    <TableCell className="text-sm text-muted-foreground">
                      {u.last_login ? new Date(u.last_login).toLocaleString() : 'Never'}
                    </TableCell>
                    <TableCell className="space-x-1 text-right">
                      {u.is_locked ? (
                        <Button
                          size="icon"
                          variant="ghost"
                          title="Unlock account"
                          disabled={busy}
                          onClick={() => void runForUser(u.username, () => unlockUser(u.username), 'Account unlocked')}
                        >
                          <LockOpen className="h-4 w-4" />
                        </Button>
                      ) : null}
                      <Button
                        size="icon"
                        variant="ghost"
                        title={u.role === 'admin' ? 'Make teacher' : 'Make admin'}
                        disabled={busy || isSelf}
                        onClick={() =>
                          void runForUser(
                            u.username,
                            () => setUserRole(u.username, u.role === 'admin' ? 'teacher' : 'admin'),
                            'Role updated'
                          )
                        }
                      >
                        {u.role === 'admin' ? <ShieldOff className="h-4 w-4" /> : <Shield className="h-4 w-4" />}
                      </Button>
                      <Button
                        size="icon"
                        variant="ghost"
                        title={u.status === 'active' ? 'Deactivate' : 'Activate'}
                        disabled={busy || isSelf}
                        onClick={() =>
                          void runForUser(
                            u.username,
                            () => setUserStatus(u.username, u.status === 'active' ? 'inactive' : 'active'),
                            'Status updated'
                          )
                        }
                      >
                        {u.status === 'active' ? <UserX className="h-4 w-4" /> : <UserCheck className="h-4 w-4" />}
                      </Button>
                      <Button
                        size="icon"
                        variant="ghost"
                        title="Delete"
                        className="text-destructive"
                        disabled={busy || isSelf}
                        onClick={() => void handleDelete(u.username)}
                      >
                        <Trash2 className="h-4 w-4" />
                      </Button>
                    </TableCell>
                  </TableRow>
                )
              })}
            </TableBody>
          </Table>
        </div>
      )}
    </div>
  )
}
