import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import type { Database } from '@/lib/db'
import { UserManager } from '@/lib/users/user-manager'

import {
  createPasswordResetLink,
  endSession,
  isProtectedSection,
  resetPasswordWithToken,
  resolveSessionUser,
  signInWithPassword,
  signUpAccount,
  unlockSectionWithPassword,
} from './auth'
import { changeOwnPassword, getSystemInfo } from './settings'
import { alice, contextFor, createClock, createTestDatabase, TEST_BASE_URL, type TestClock } from './testing'

const PASSWORD = 'Passw0rd!'

describe('auth service', () => {
  let clock: TestClock
  let db: Database
  let cleanup: () => Promise<void>
  let manager: UserManager

  const signIn = (username: string, password = PASSWORD) =>
    signInWithPassword(db, manager, { now: clock.now(), ttlHours: 12 }, { username, password })

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    clock = createClock(new Date(2025, 2, 10, 9, 0, 0))
    ;({ db, cleanup } = await createTestDatabase(clock))
    manager = new UserManager(db.users, { bcryptRounds: 4, clock: clock.now })
  })

  afterEach(async () => {
    await cleanup()
    vi.restoreAllMocks()
  })

  it('makes the first account an admin and later ones teachers', async () => {
    const first = await signUpAccount(manager, { username: 'admin', password: PASSWORD, email: 'admin@example.com' })
    const second = await signUpAccount(manager, { username: 'alice', password: PASSWORD, email: 'alice@example.com' })

    expect(first.role).toBe('admin')
    expect(second.role).toBe('teacher')
    await expect(
      signUpAccount(manager, { username: 'carol', password: 'short', email: 'carol@example.com' })
    ).rejects.toMatchObject({ code: 'invalid_input', message: 'Password must be at least 8 characters' })
  })

  it('keeps a single admin when the first sign-ups arrive together', async () => {
    const [alicia, bruno] = await Promise.all([
      signUpAccount(manager, { username: 'alicia', password: PASSWORD, email: 'alicia@example.com' }),
      signUpAccount(manager, { username: 'bruno', password: PASSWORD, email: 'bruno@example.com' }),
    ])

    expect([alicia.role, bruno.role].sort()).toEqual(['admin', 'teacher'])
    expect(await db.users.countDocuments({ role: 'admin' })).toBe(1)
    expect(await db.users.findOne({ username: 'alicia' })).toMatchObject({ role: alicia.role })
    expect(await db.users.findOne({ username: 'bruno' })).toMatchObject({ role: bruno.role })
  })

  describe('sessions', () => {
    beforeEach(async () => {
      await signUpAccount(manager, { username: 'alice', password: PASSWORD, email: 'alice@example.com', name: 'Alice' })
    })

    it('signs in and resolves the session back to the user', async () => {
      const { session, user } = await signIn('alice')

      expect(user).toEqual({ username: 'alice', role: 'admin', name: 'Alice', email: 'alice@example.com' })
      expect(session.token).toMatch(/^[A-Za-z0-9]{48}$/)
      expect(session.expires_at).toBe(new Date(2025, 2, 10, 21, 0, 0).toISOString())

      expect(await resolveSessionUser(db, manager, session.token)).toEqual({ ...user, unlocked: [] })
      expect(await resolveSessionUser(db, manager, 'unknown')).toBeNull()
      expect(await resolveSessionUser(db, manager, null)).toBeNull()
    })

    it('rejects wrong passwords with the lockout rules', async () => {
      await expect(signIn('alice', 'Wrong0ne!')).rejects.toMatchObject({
        code: 'invalid_credentials',
        message: 'Invalid password',
      })
    })

    it('forgets the session on sign out and after it expires', async () => {
      const first = await signIn('alice')
      await endSession(db, first.session.token)
      expect(await resolveSessionUser(db, manager, first.session.token)).toBeNull()

      const second = await signIn('alice')
      clock.advanceMinutes(12 * 60 + 1)
      expect(await resolveSessionUser(db, manager, second.session.token)).toBeNull()
    })

    it('stops resolving deactivated accounts', async () => {
      const { session } = await signIn('alice')
      await db.users.updateOne({ username: 'alice' }, { $set: { status: 'inactive' } })

      expect(await resolveSessionUser(db, manager, session.token)).toBeNull()
    })

    it('unlocks protected sections with the signed-in account only', async () => {
      const { session } = await signIn('alice')
      const unlock = (username: string, password: string) =>
        unlockSectionWithPassword(db, manager, session.token, { section: 'manual', username, password })

      await expect(unlock('bob', PASSWORD)).rejects.toMatchObject({
        code: 'invalid_credentials',
        message: 'Username does not match the signed-in account.',
      })
      await expect(unlock('alice', 'Wrong0ne!')).rejects.toMatchObject({ code: 'invalid_credentials' })
      expect((await db.users.findOne({ username: 'alice' }))?.failed_attempts).toBe(1)

      expect(await unlock('alice', PASSWORD)).toEqual(['manual'])
      expect(await unlock('alice', PASSWORD)).toEqual(['manual'])
      expect((await resolveSessionUser(db, manager, session.token))?.unlocked).toEqual(['manual'])
    })
  })

  describe('password reset', () => {
    beforeEach(async () => {
      await signUpAccount(manager, { username: 'alice', password: PASSWORD, email: 'alice@example.com' })
    })

    it('issues a reset link and accepts a new password through it', async () => {
      const { url, expiresAt } = await createPasswordResetLink(manager, TEST_BASE_URL, ' alice ')
      expect(url).toMatch(/^http:\/\/attendance\.test\/reset-password\?token=[A-Za-z0-9]{32}$/)
      expect(expiresAt).toBe(new Date(2025, 2, 11, 9, 0, 0).toISOString())

      const token = new URL(url).searchParams.get('token') ?? ''
      await expect(
        resetPasswordWithToken(manager, { token, password: 'Reset1pass!', confirmPassword: 'Reset1pass?' })
      ).rejects.toMatchObject({ message: 'Passwords do not match' })

      expect(
        await resetPasswordWithToken(manager, { token, password: 'Reset1pass!', confirmPassword: 'Reset1pass!' })
      ).toBe('Password reset successfully')
      await expect(signIn('alice', 'Reset1pass!')).resolves.toMatchObject({ user: { username: 'alice' } })
    })

    it('reports unknown usernames', async () => {
      await expect(createPasswordResetLink(manager, TEST_BASE_URL, 'nobody')).rejects.toMatchObject({
        code: 'not_found',
      })
    })
  })

  it('recognises protected sections', () => {
    expect(isProtectedSection('bulk')).toBe(true)
    expect(isProtectedSection('students')).toBe(false)
  })
})

describe('settings service', () => {
  let clock: TestClock
  let db: Database
  let cleanup: () => Promise<void>
  let manager: UserManager

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    clock = createClock(new Date(2025, 2, 10, 9, 0, 0))
    ;({ db, cleanup } = await createTestDatabase(clock))
    manager = new UserManager(db.users, { bcryptRounds: 4, clock: clock.now })
    await manager.createUser({ username: 'alice', password: PASSWORD, email: 'alice@example.com' })
  })

  afterEach(async () => {
    await cleanup()
    vi.restoreAllMocks()
  })

  it('changes the signed-in user\'s password', async () => {
    const ctx = contextFor(db, alice, clock)

    await expect(
      changeOwnPassword(ctx, manager, { currentPassword: PASSWORD, newPassword: 'Newpass1!', confirmPassword: 'Newpass2!' })
    ).rejects.toMatchObject({ message: 'New passwords do not match' })
    await expect(
      changeOwnPassword(ctx, manager, { currentPassword: 'Wrong0ne!', newPassword: 'Newpass1!', confirmPassword: 'Newpass1!' })
    ).rejects.toMatchObject({ code: 'invalid_credentials', message: 'Current password is incorrect' })

    expect(
      await changeOwnPassword(ctx, manager, {
        currentPassword: PASSWORD,
        newPassword: 'Newpass1!',
        confirmPassword: 'Newpass1!',
      })
    ).toBe('Password updated successfully')
  })

  it('reports the backend and the actor\'s counts', async () => {
    expect(await getSystemInfo(contextFor(db, alice, clock))).toEqual({
      backend: 'json',
      students: 0,
      attendanceRecords: 0,
    })
  })
})
