import { addHours } from 'date-fns'

import type { Database } from '@/lib/db'
import type { AuthSessionDoc } from '@/lib/db/schema'
import { AppError, fromActionError } from '@/lib/errors'
import { generateSecureToken } from '@/lib/tokens'
import { PROTECTED_SECTIONS, type CurrentUser, type ProtectedSection, type PublicUser } from '@/lib/types'
import type { AuthenticatedUser, NewUserInput, UserManager } from '@/lib/users/user-manager'

export function isProtectedSection(value: string): value is ProtectedSection {
  return PROTECTED_SECTIONS.some((section) => section === value)
}

export async function signUpAccount(manager: UserManager, input: Omit<NewUserInput, 'role'>): Promise<PublicUser> {
  // The first account of an empty system administers it
  const role = (await manager.countUsers()) === 0 ? 'admin' : 'teacher'
  const result = await manager.createUser({ ...input, role })
  if (!result.success) throw fromActionError(result.error)

  // Concurrent sign-ups can both see an empty system; only the earliest keeps admin
  if (role === 'admin' && (await manager.earliestUsername()) !== result.user.username) {
    await manager.setRole(result.user.username, 'teacher')
    return { ...result.user, role: 'teacher' }
  }
  return result.user
}

export async function signInWithPassword(
  db: Database,
  manager: UserManager,
  options: { now: Date; ttlHours: number },
  credentials: { username: string; password: string }
): Promise<{ user: AuthenticatedUser; session: AuthSessionDoc }> {
  const result = await manager.authenticate(credentials.username, credentials.password)
  if (!result.success) throw fromActionError(result.error)

  const session: AuthSessionDoc = {
    token: generateSecureToken(48),
    username: result.user.username,
    created_at: options.now.toISOString(),
    expires_at: addHours(options.now, options.ttlHours).toISOString(),
    unlocked: [],
  }
  await db.authSessions.insertOne(session)

  return { user: result.user, session }
}

export async function endSession(db: Database, token: string | null | undefined): Promise<void> {
  if (!token) return
  await db.authSessions.deleteOne({ token })
}

/** The signed-in user behind a session token, or null when the session or account is no longer valid. */
export async function resolveSessionUser(
  db: Database,
  manager: UserManager,
  token: string | null | undefined
): Promise<CurrentUser | null> {
  if (!token) return null

  const session = await db.authSessions.findOne({ token })
  if (!session) return null

  const user = await manager.getActiveUser(session.username)
  if (!user) return null

  return { ...user, unlocked: session.unlocked }
}

/**
 * Re-authentication for a protected section. The username must be the signed-in
 * one and misses count toward the account lockout.
 */
export async function unlockSectionWithPassword(
  db: Database,
  manager: UserManager,
  token: string,
  input: { section: ProtectedSection; username: string; password: string }
): Promise<string[]> {
  const session = await db.authSessions.findOne({ token })
  if (!session) throw new AppError('not_authenticated', 'Please sign in.')

  if (input.username.trim() !== session.username) {
    throw new AppError('invalid_credentials', 'Username does not match the signed-in account.')
  }

  const result = await manager.authenticate(session.username, input.password)
  if (!result.success) throw fromActionError(result.error)

  const unlocked = session.unlocked.includes(input.section) ? session.unlocked : [...session.unlocked, input.section]
  await db.authSessions.updateOne({ token }, { $set: { unlocked } })
  return unlocked
}

export async function createPasswordResetLink(
  manager: UserManager,
  baseUrl: string,
  username: string
): Promise<{ url: string; expiresAt: string }> {
  const result = await manager.generateResetToken(username.trim())
  if (!result.success) throw fromActionError(result.error)

  return { url: `${baseUrl}/reset-password?token=${result.token}`, expiresAt: result.expiresAt }
}

export async function resetPasswordWithToken(
  manager: UserManager,
  input: { token: string; password: string; confirmPassword: string }
): Promise<string> {
  if (input.password !== input.confirmPassword) throw new AppError('invalid_input', 'Passwords do not match')

  const result = await manager.resetPassword(input.token.trim(), input.password)
  if (!result.success) throw fromActionError(result.error)
  return result.message
}
