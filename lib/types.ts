import type { UserDoc, UserRole } from '@/lib/db/schema'

export type { UserRole }

/** The signed-in user every scoped read and write is performed for. */
export type Actor = {
  username: string
  role: UserRole
}

export type CurrentUser = Actor &
  Pick<UserDoc, 'name' | 'email'> & {
    unlocked: string[]
  }

export type PublicUser = Omit<UserDoc, 'password' | 'password_reset_token' | 'password_reset_expires'>

// Sections that ask for the password again once per sign-in
export const PROTECTED_SECTIONS = ['manual', 'bulk', 'links', 'settings', 'teachers'] as const
export type ProtectedSection = (typeof PROTECTED_SECTIONS)[number]

// Read by the middleware as well, so it lives outside the server-only session module
export const SESSION_COOKIE = 'attendance_session'
