// Sign-in cookie for Server Components and Actions
import 'server-only'

import { cookies } from 'next/headers'

import { SESSION_COOKIE } from '@/lib/types'

export async function readSessionToken(): Promise<string | null> {
  const cookieStore = await cookies()
  return cookieStore.get(SESSION_COOKIE)?.value || null
}

// Only Server Actions and Route Handlers may set cookies
export async function writeSessionCookie(token: string, expiresAt: string) {
  const cookieStore = await cookies()
  cookieStore.set(SESSION_COOKIE, token, {
    httpOnly: true,
    sameSite: 'lax',
    secure: process.env.NODE_ENV === 'production',
    path: '/',
    expires: new Date(expiresAt),
  })
}

export async function clearSessionCookie() {
  const cookieStore = await cookies()
  cookieStore.delete(SESSION_COOKIE)
}
