'use server'

import { revalidatePath } from 'next/cache'

import { getConfig } from '@/lib/config'
import { getDatabase } from '@/lib/db'
import { AppError, toActionError, type ActionResult } from '@/lib/errors'
import {
  createPasswordResetLink,
  endSession,
  isProtectedSection,
  resetPasswordWithToken,
  resolveSessionUser,
  signInWithPassword,
  signUpAccount,
  unlockSectionWithPassword,
} from '@/lib/services/auth'
import { clearSessionCookie, readSessionToken, writeSessionCookie } from '@/lib/session'
import type { CurrentUser, PublicUser, UserRole } from '@/lib/types'
import { getUserManager, type AuthenticatedUser } from '@/lib/users'

export type SignUpResult = ActionResult<{ user: PublicUser; role: UserRole }>
export type SignInResult = ActionResult<{ user: AuthenticatedUser }>
export type SignOutResult = ActionResult<object>
export type PasswordResetLinkResult = ActionResult<{ url: string; expiresAt: string }>
export type MessageResult = ActionResult<{ message: string }>
export type UnlockResult = ActionResult<{ unlocked: string[] }>

export async function signUp(input: {
  username: string
  email: string
  name?: string
  password: string
  confirmPassword: string
}): Promise<SignUpResult> {
  try {
    if (input.password !== input.confirmPassword) {
      return { success: false, error: { code: 'invalid_input', message: 'Passwords do not match' } }
    }

    const manager = await getUserManager()
    const user = await signUpAccount(manager, {
      username: input.username,
      email: input.email,
      name: input.name,
      password: input.password,
    })

    return { success: true, user, role: user.role }
  } catch (error) {
    console.error('Sign up error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function signIn(username: string, password: string): Promise<SignInResult> {
  try {
    if (!username.trim() || !password) {
      return { success: false, error: { code: 'invalid_input', message: 'Username and password are required.' } }
    }

    const db = await getDatabase()
    const manager = await getUserManager()
    const { user, session } = await signInWithPassword(
      db,
      manager,
      { now: new Date(), ttlHours: getConfig().sessionTtlHours },
      { username, password }
    )

    await writeSessionCookie(session.token, session.expires_at)
    return { success: true, user }
  } catch (error) {
    if (!(error instanceof AppError)) console.error('Sign in error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function signOut(): Promise<SignOutResult> {
  try {
    const db = await getDatabase()
    await endSession(db, await readSessionToken())
    await clearSessionCookie()
    return { success: true } satisfies SignOutResult
  } catch (error) {
    console.error('Sign out error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function getCurrentUser(): Promise<CurrentUser | null> {
  const token = await readSessionToken()
  if (!token) return null

  try {
    const db = await getDatabase()
    const manager = await getUserManager()
    return await resolveSessionUser(db, manager, token)
  } catch (error) {
    console.error('Get current user error:', error)
    return null
  }
}

export async function requestPasswordReset(username: string): Promise<PasswordResetLinkResult> {
  try {
    if (!username.trim()) {
      return { success: false, error: { code: 'invalid_input', message: 'Enter your username.' } }
    }

    const manager = await getUserManager()
    const link = await createPasswordResetLink(manager, getConfig().appBaseUrl, username)
    return { success: true, ...link }
  } catch (error) {
    console.error('Request password reset error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function resetPassword(input: {
  token: string
  password: string
  confirmPassword: string
}): Promise<MessageResult> {
  try {
    const manager = await getUserManager()
    const message = await resetPasswordWithToken(manager, input)
    return { success: true, message }
  } catch (error) {
    console.error('Reset password error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function unlockSection(input: {
  section: string
  username: string
  password: string
}): Promise<UnlockResult> {
  try {
    if (!isProtectedSection(input.section)) {
      return { success: false, error: { code: 'invalid_input', message: 'Unknown section.' } }
    }

    const token = await readSessionToken()
    if (!token) return { success: false, error: { code: 'not_authenticated', message: 'Please sign in.' } }

    const db = await getDatabase()
    const manager = await getUserManager()
    const unlocked = await unlockSectionWithPassword(db, manager, token, {
      section: input.section,
      username: input.username,
      password: input.password,
    })

    revalidatePath(`/dashboard/${input.section}`)
    return { success: true, unlocked }
  } catch (error) {
    if (!(error instanceof AppError)) console.error('Unlock section error:', error)
    return { success: false, error: toActionError(error) }
  }
}
