import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import type { Database } from '@/lib/db'
import { UserManager } from '@/lib/users/user-manager'

import { listAuditLogs, recordAudit } from './audit'
import { admin, alice, contextFor, createClock, createTestDatabase, type TestClock } from './testing'
import { createUserAsAdmin, deleteUser, listUsers, setUserRole, setUserStatus, unlockUser } from './users'

const PASSWORD = 'Passw0rd!'

describe('users service', () => {
  let clock: TestClock
  let db: Database
  let cleanup: () => Promise<void>
  let manager: UserManager

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    clock = createClock(new Date(2025, 2, 10, 9, 0, 0))
    ;({ db, cleanup } = await createTestDatabase(clock))
    manager = new UserManager(db.users, { bcryptRounds: 4, clock: clock.now })

    await manager.createUser({ username: 'admin', password: PASSWORD, email: 'admin@example.com', role: 'admin' })
    await manager.createUser({ username: 'alice', password: PASSWORD, email: 'alice@example.com' })
  })

  afterEach(async () => {
    await cleanup()
    vi.restoreAllMocks()
  })

  it('is for admins only', async () => {
    await expect(listUsers(contextFor(db, alice, clock))).rejects.toMatchObject({
      code: 'forbidden',
      message: 'Admin access required.',
    })
  })

  it('creates accounts and lists them without secrets', async () => {
    const ctx = contextFor(db, admin, clock)
    const created = await createUserAsAdmin(ctx, manager, {
      username: 'bob',
      password: PASSWORD,
      email: 'bob@example.com',
      role: 'admin',
    })

    expect(created).toMatchObject({ username: 'bob', role: 'admin' })
    const users = await listUsers(ctx)
    expect(users.map((user) => user.username)).toEqual(['admin', 'alice', 'bob'])
    expect(users[0]).not.toHaveProperty('password')

    await expect(
      createUserAsAdmin(ctx, manager, { username: 'bob', password: PASSWORD, email: 'other@example.com' })
    ).rejects.toMatchObject({ code: 'duplicate', message: 'Username already exists' })

    expect(await db.auditLogs.findOne({ action: 'users:create' })).toMatchObject({
      actor: 'admin',
      resource_id: 'bob',
      changes: { role: 'admin', email: 'bob@example.com' },
    })
  })

  it('unlocks a locked account', async () => {
    for (let attempt = 0; attempt < 5; attempt++) await manager.authenticate('alice', 'Wrong0ne!')
    expect(await db.users.findOne({ username: 'alice' })).toMatchObject({ is_locked: true })

    await unlockUser(contextFor(db, admin, clock), 'alice')

    expect(await manager.authenticate('alice', PASSWORD)).toMatchObject({ success: true })
  })

  describe('roles', () => {
    it('promotes and demotes other users', async () => {
      const ctx = contextFor(db, admin, clock)
      await setUserRole(ctx, 'alice', 'admin')
      expect((await db.users.findOne({ username: 'alice' }))?.role).toBe('admin')

      await setUserRole(ctx, 'alice', 'teacher')
      expect((await db.users.findOne({ username: 'alice' }))?.role).toBe('teacher')
      expect(await db.auditLogs.countDocuments({ action: 'users:set_role' })).toBe(2)
    })

    it('keeps at least one admin and refuses self changes', async () => {
      await expect(setUserRole(contextFor(db, admin, clock), 'admin', 'teacher')).rejects.toMatchObject({
        message: 'You cannot change your own role.',
      })

      // A second admin acting on the only remaining one
      const other = { username: 'root', role: 'admin' as const }
      await expect(setUserRole(contextFor(db, other, clock), 'admin', 'teacher')).rejects.toMatchObject({
        message: 'At least one admin account is required.',
      })
    })
  })

  it('deactivates accounts and ends their sessions', async () => {
    await db.authSessions.insertOne({
      token: 'session-token',
      username: 'alice',
      created_at: clock.now().toISOString(),
      expires_at: new Date(2025, 2, 11).toISOString(),
      unlocked: [],
    })

    await setUserStatus(contextFor(db, admin, clock), 'alice', 'inactive')

    expect(await manager.getActiveUser('alice')).toBeNull()
    expect(await db.authSessions.countDocuments({ username: 'alice' })).toBe(0)
    await expect(setUserStatus(contextFor(db, admin, clock), 'admin', 'inactive')).rejects.toMatchObject({
      code: 'forbidden',
    })
  })

  describe('deleteUser', () => {
    it('requires the username as confirmation', async () => {
      await expect(deleteUser(contextFor(db, admin, clock), 'alice', 'alicia')).rejects.toMatchObject({
        code: 'invalid_input',
        message: 'Type "alice" to confirm deletion.',
      })

      await deleteUser(contextFor(db, admin, clock), 'alice', 'alice')
      expect(await db.users.findOne({ username: 'alice' })).toBeNull()
    })

    it('protects the signed-in and last admin accounts', async () => {
      await expect(deleteUser(contextFor(db, admin, clock), 'admin', 'admin')).rejects.toMatchObject({
        message: 'You cannot delete your own account.',
      })
      const other = { username: 'root', role: 'admin' as const }
      await expect(deleteUser(contextFor(db, other, clock), 'admin', 'admin')).rejects.toMatchObject({
        message: 'Cannot delete the last admin account.',
      })
    })

    it('reports unknown users', async () => {
      await expect(deleteUser(contextFor(db, admin, clock), 'nobody', 'nobody')).rejects.toMatchObject({
        code: 'not_found',
      })
    })
  })
})

describe('audit log', () => {
  let clock: TestClock
  let db: Database
  let cleanup: () => Promise<void>

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    clock = createClock(new Date(2025, 2, 10, 9, 0, 0))
    ;({ db, cleanup } = await createTestDatabase(clock))
  })

  afterEach(async () => {
    await cleanup()
    vi.restoreAllMocks()
  })

  it('lists the newest entries first within the limit', async () => {
    const ctx = contextFor(db, alice, clock)
    for (const action of ['students:create', 'students:update', 'students:delete']) {
      await recordAudit(ctx, { action, resource_type: 'students', resource_id: 'S1' })
      clock.advanceMinutes(1)
    }

    const logs = await listAuditLogs(contextFor(db, admin, clock), { limit: 2 })
    expect(logs.map((log) => log.action)).toEqual(['students:delete', 'students:update'])
    expect(logs[0]).toMatchObject({ actor: 'alice', resource_type: 'students', changes: {} })

    expect(await listAuditLogs(contextFor(db, admin, clock), { limit: 0 })).toHaveLength(1)
    expect(await listAuditLogs(contextFor(db, admin, clock), { limit: Number.NaN })).toHaveLength(3)
    await expect(listAuditLogs(ctx)).rejects.toMatchObject({ code: 'forbidden' })
  })
})
