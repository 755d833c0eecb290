import bcrypt from 'bcrypt'
import { addHours, addMinutes, format, parseISO } from 'date-fns'

import type { UserDoc, UserRole } from '@/lib/db/schema'
import type { DocumentCollection } from '@/lib/db/types'
import type { ActionResult, ErrorCode } from '@/lib/errors'
import { generateSecureToken } from '@/lib/tokens'
import type { Actor, PublicUser } from '@/lib/types'

export const PASSWORD_MIN_LENGTH = 8
export const MAX_LOGIN_ATTEMPTS = 5
export const LOCKOUT_MINUTES = 30
export const RESET_TOKEN_HOURS = 24

const PASSWORD_PATTERN = /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d)(?=.*[@$!%*?&])[A-Za-z\d@$!%*?&]{8,}$/
const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/

export type AuthenticatedUser = Actor & Pick<UserDoc, 'name' | 'email'>

export type NewUserInput = {
  username: string
  password: string
  email: string
  name?: string
  role?: UserRole
}

type UserManagerOptions = {
  bcryptRounds: number
  clock?: () => Date
}

function fail(code: ErrorCode, message: string) {
  return { success: false as const, error: { code, message } }
}

export function toPublicUser(user: UserDoc): PublicUser {
  const { password: _password, password_reset_token: _token, password_reset_expires: _expires, ...rest } = user
  return rest
}

function toAuthenticated(user: UserDoc): AuthenticatedUser {
  return { username: user.username, role: user.role, name: user.name, email: user.email }
}

function formatLockout(iso: string) {
  return format(parseISO(iso), 'yyyy-MM-dd HH:mm')
}

export class UserManager {
  private readonly clock: () => Date

  constructor(
    private readonly users: DocumentCollection<UserDoc>,
    private readonly options: UserManagerOptions
  ) {
    this.clock = options.clock ?? (() => new Date())
  }

  validateEmail(email: string) {
    return EMAIL_PATTERN.test(email)
  }

  validatePassword(password: string): { valid: true } | { valid: false; message: string } {
    if (!password) return { valid: false, message: 'Password cannot be empty' }
    if (password.length < PASSWORD_MIN_LENGTH) {
      return { valid: false, message: `Password must be at least ${PASSWORD_MIN_LENGTH} characters` }
    }
    if (!PASSWORD_PATTERN.test(password)) {
      return {
        valid: false,
        message:
          'Password must contain at least one uppercase letter, one lowercase letter, one number, and one special character (@$!%*?&)',
      }
    }
    return { valid: true }
  }

  async countUsers() {
    return this.users.countDocuments()
  }

  /** The oldest account; equal timestamps keep insertion order. */
  async earliestUsername(): Promise<string | null> {
    const [first] = await this.users.find({}, { sort: { created_at: 1 }, limit: 1 })
    return first?.username ?? null
  }

  async setRole(username: string, role: UserRole) {
    await this.users.updateOne({ username }, { $set: { role } })
  }

  async createUser(input: NewUserInput): Promise<ActionResult<{ user: PublicUser }>> {
    const username = input.username.trim()
    const email = input.email.trim().toLowerCase()

    if (username.length < 3) return fail('invalid_input', 'Username must be at least 3 characters')
    if (!this.validateEmail(email)) return fail('invalid_input', 'Invalid email format')
    if (await this.users.findOne({ username })) return fail('duplicate', 'Username already exists')
    if (await this.users.findOne({ email })) return fail('duplicate', 'Email already exists')

    const check = this.validatePassword(input.password)
    if (!check.valid) return fail('invalid_input', check.message)

    const user: UserDoc = {
      username,
      password: await bcrypt.hash(input.password, this.options.bcryptRounds),
      email,
      name: input.name?.trim() || username,
      role: input.role ?? 'teacher',
      status: 'active',
      created_at: this.clock().toISOString(),
      last_login: null,
      failed_attempts: 0,
      is_locked: false,
      lockout_until: null,
      password_reset_token: null,
      password_reset_expires: null,
      last_modified: null,
    }

    await this.users.insertOne(user)
    return { success: true, user: toPublicUser(user) }
  }

  /** Password check with failed-attempt counting; five misses lock the account for 30 minutes. */
  async authenticate(username: string, password: string): Promise<ActionResult<{ user: AuthenticatedUser }>> {
    const user = await this.users.findOne({ username: username.trim() })
    if (!user) return fail('invalid_credentials', 'User not found')

    const now = this.clock()
    let failedAttempts = user.failed_attempts

    if (user.is_locked) {
      if (user.lockout_until && user.lockout_until > now.toISOString()) {
        return fail('account_locked', `Account locked until ${formatLockout(user.lockout_until)}`)
      }

      await this.users.updateOne(
        { username: user.username },
        { $set: { is_locked: false, failed_attempts: 0, lockout_until: null } }
      )
      failedAttempts = 0
    }

    if (user.status !== 'active') return fail('account_inactive', 'Account is inactive')

    const matches = await bcrypt.compare(password, user.password)

    if (matches) {
      await this.users.updateOne(
        { username: user.username },
        { $set: { last_login: now.toISOString(), failed_attempts: 0, lockout_until: null } }
      )
      return { success: true, user: toAuthenticated(user) }
    }

    failedAttempts += 1
    const locked = failedAttempts >= MAX_LOGIN_ATTEMPTS
    const lockoutUntil = locked ? addMinutes(now, LOCKOUT_MINUTES).toISOString() : null

    await this.users.updateOne(
      { username: user.username },
      { $set: { failed_attempts: failedAttempts, is_locked: locked, lockout_until: lockoutUntil } }
    )

    return lockoutUntil
      ? fail('account_locked', `Account locked until ${formatLockout(lockoutUntil)}`)
      : fail('invalid_credentials', 'Invalid password')
  }

  /** Session check without a password: the account must exist, be active and not be locked. */
  async getActiveUser(username: string): Promise<AuthenticatedUser | null> {
    const user = await this.users.findOne({ username })
    if (!user || user.status !== 'active') return null
    if (user.is_locked && user.lockout_until && user.lockout_until > this.clock().toISOString()) return null
    return toAuthenticated(user)
  }

  async changePassword(
    username: string,
    currentPassword: string,
    newPassword: string
  ): Promise<ActionResult<{ message: string }>> {
    const auth = await this.authenticate(username, currentPassword)
    if (!auth.success) {
      return auth.error.code === 'account_locked'
        ? auth
        : fail('invalid_credentials', 'Current password is incorrect')
    }

    const check = this.validatePassword(newPassword)
    if (!check.valid) return fail('invalid_input', check.message)

    await this.users.updateOne(
      { username: auth.user.username },
      {
        $set: {
          password: await bcrypt.hash(newPassword, this.options.bcryptRounds),
          last_modified: this.clock().toISOString(),
        },
      }
    )

    return { success: true, message: 'Password updated successfully' }
  }

  async generateResetToken(username: string): Promise<ActionResult<{ token: string; expiresAt: string }>> {
    const token = generateSecureToken()
    const expiresAt = addHours(this.clock(), RESET_TOKEN_HOURS).toISOString()

    const result = await this.users.updateOne(
      { username },
      { $set: { password_reset_token: token, password_reset_expires: expiresAt } }
    )
    if (result.matched === 0) return fail('not_found', 'User not found')

    return { success: true, token, expiresAt }
  }

  async resetPassword(token: string, newPassword: string): Promise<ActionResult<{ message: string }>> {
    const check = this.validatePassword(newPassword)
    if (!check.valid) return fail('invalid_input', check.message)

    const user = token
      ? await this.users.findOne({
          password_reset_token: token,
          password_reset_expires: { $gt: this.clock().toISOString() },
        })
      : null
    if (!user) return fail('expired', 'Invalid or expired reset token')

    await this.users.updateOne(
      { username: user.username },
      {
        $set: {
          password: await bcrypt.hash(newPassword, this.options.bcryptRounds),
          password_reset_token: null,
          password_reset_expires: null,
          failed_attempts: 0,
          is_locked: false,
          lockout_until: null,
          last_modified: this.clock().toISOString(),
        },
      }
    )

    return { success: true, message: 'Password reset successfully' }
  }
}
