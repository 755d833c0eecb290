import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import type { Database } from '@/lib/db'
import { createClock, createTestDatabase, type TestClock } from '@/lib/services/testing'

import { UserManager } from './user-manager'

const PASSWORD = 'Passw0rd!'

describe('UserManager', () => {
  let clock: TestClock
  let db: Database
  let cleanup: () => Promise<void>
  let manager: UserManager

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

  describe('validation', () => {
    it('checks email format', () => {
      expect(manager.validateEmail('teacher@example.com')).toBe(true)
      expect(manager.validateEmail('teacher@example')).toBe(false)
    })

    it('requires length and every character class', () => {
      expect(manager.validatePassword('')).toEqual({ valid: false, message: 'Password cannot be empty' })
      expect(manager.validatePassword('Ab1!')).toEqual({
        valid: false,
        message: 'Password must be at least 8 characters',
      })
      expect(manager.validatePassword('password1!').valid).toBe(false)
      expect(manager.validatePassword('Password1#').valid).toBe(false)
      expect(manager.validatePassword(PASSWORD)).toEqual({ valid: true })
    })
  })

  describe('createUser', () => {
    it('stores a hashed password and hides it from the result', async () => {
      const result = await manager.createUser({ username: 'alice', password: PASSWORD, email: 'Alice@Example.com' })

      expect(result).toMatchObject({ success: true, user: { username: 'alice', email: 'alice@example.com', role: 'teacher' } })
      if (result.success) expect(result.user).not.toHaveProperty('password')

      const stored = await db.users.findOne({ username: 'alice' })
      expect(stored?.password).not.toBe(PASSWORD)
      expect(stored?.name).toBe('alice')
    })

    it('rejects duplicates and invalid input', async () => {
      await manager.createUser({ username: 'alice', password: PASSWORD, email: 'alice@example.com' })

      expect(await manager.createUser({ username: 'al', password: PASSWORD, email: 'x@example.com' })).toEqual({
        success: false,
        error: { code: 'invalid_input', message: 'Username must be at least 3 characters' },
      })
      expect(await manager.createUser({ username: 'alice', password: PASSWORD, email: 'b@example.com' })).toEqual({
        success: false,
        error: { code: 'duplicate', message: 'Username already exists' },
      })
      expect(await manager.createUser({ username: 'bob', password: PASSWORD, email: 'alice@example.com' })).toEqual({
        success: false,
        error: { code: 'duplicate', message: 'Email already exists' },
      })
    })
  })

  describe('authenticate', () => {
    beforeEach(async () => {
      await manager.createUser({ username: 'alice', password: PASSWORD, email: 'alice@example.com', name: 'Alice' })
    })

    it('signs in and stamps last_login', async () => {
      const result = await manager.authenticate('alice', PASSWORD)

      expect(result).toEqual({
        success: true,
        user: { username: 'alice', role: 'teacher', name: 'Alice', email: 'alice@example.com' },
      })
      expect((await db.users.findOne({ username: 'alice' }))?.last_login).toBe(clock.now().toISOString())
    })

    it('reports unknown users', async () => {
      expect(await manager.authenticate('nobody', PASSWORD)).toEqual({
        success: false,
        error: { code: 'invalid_credentials', message: 'User not found' },
      })
    })

    it('locks the account for 30 minutes after five wrong passwords', async () => {
      for (let attempt = 1; attempt <= 4; attempt++) {
        expect(await manager.authenticate('alice', 'Wrong0ne!')).toEqual({
          success: false,
          error: { code: 'invalid_credentials', message: 'Invalid password' },
        })
      }

      const fifth = await manager.authenticate('alice', 'Wrong0ne!')
      expect(fifth).toEqual({
        success: false,
        error: { code: 'account_locked', message: 'Account locked until 2025-03-10 09:30' },
      })

      // Even the right password is refused while locked
      expect(await manager.authenticate('alice', PASSWORD)).toMatchObject({
        success: false,
        error: { code: 'account_locked' },
      })

      clock.advanceMinutes(31)
      expect(await manager.authenticate('alice', PASSWORD)).toMatchObject({ success: true })
      expect(await db.users.findOne({ username: 'alice' })).toMatchObject({
        is_locked: false,
        failed_attempts: 0,
        lockout_until: null,
      })
    })

    it('starts counting again after a lock expires', async () => {
      for (let attempt = 1; attempt <= 5; attempt++) await manager.authenticate('alice', 'Wrong0ne!')
      clock.advanceMinutes(31)

      expect(await manager.authenticate('alice', 'Wrong0ne!')).toEqual({
        success: false,
        error: { code: 'invalid_credentials', message: 'Invalid password' },
      })
      expect((await db.users.findOne({ username: 'alice' }))?.failed_attempts).toBe(1)
    })

    it('refuses inactive accounts', async () => {
      await db.users.updateOne({ username: 'alice' }, { $set: { status: 'inactive' } })

      expect(await manager.authenticate('alice', PASSWORD)).toEqual({
        success: false,
        error: { code: 'account_inactive', message: 'Account is inactive' },
      })
      expect(await manager.getActiveUser('alice')).toBeNull()
    })
  })

  describe('passwords', () => {
    beforeEach(async () => {
      await manager.createUser({ username: 'alice', password: PASSWORD, email: 'alice@example.com' })
    })

    it('changes the password after checking the current one', async () => {
      expect(await manager.changePassword('alice', 'Wrong0ne!', 'N3w-Pass!')).toEqual({
        success: false,
        error: { code: 'invalid_credentials', message: 'Current password is incorrect' },
      })
      expect(await manager.changePassword('alice', PASSWORD, 'Newpass1!')).toEqual({
        success: true,
        message: 'Password updated successfully',
      })
      expect(await manager.authenticate('alice', 'Newpass1!')).toMatchObject({ success: true })
    })

    it('resets a password with a token valid for 24 hours', async () => {
      const issued = await manager.generateResetToken('alice')
      if (!issued.success) throw new Error(issued.error.message)
      expect(issued.token).toMatch(/^[A-Za-z0-9]{32}$/)

      expect(await manager.resetPassword(issued.token, 'Reset1pass!')).toEqual({
        success: true,
        message: 'Password reset successfully',
      })
      expect(await manager.authenticate('alice', 'Reset1pass!')).toMatchObject({ success: true })

      // Tokens are single use
      expect(await manager.resetPassword(issued.token, 'Again1pass!')).toEqual({
        success: false,
        error: { code: 'expired', message: 'Invalid or expired reset token' },
      })
    })

    it('refuses an expired reset token', async () => {
      const issued = await manager.generateResetToken('alice')
      if (!issued.success) throw new Error(issued.error.message)

      clock.advanceMinutes(24 * 60 + 1)
      expect(await manager.resetPassword(issued.token, 'Reset1pass!')).toMatchObject({
        success: false,
        error: { code: 'expired' },
      })
    })

    it('refuses reset tokens for unknown users', async () => {
      expect(await manager.generateResetToken('nobody')).toEqual({
        success: false,
        error: { code: 'not_found', message: 'User not found' },
      })
    })
  })
})
