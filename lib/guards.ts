import { getCurrentUser } from '@/lib/auth'
import { getConfig } from '@/lib/config'
import { getDatabase } from '@/lib/db'
import type { ActionError } from '@/lib/errors'
import type { ServiceContext } from '@/lib/services/context'
import type { Actor, CurrentUser, ProtectedSection } from '@/lib/types'

export type AuthResult = { ok: true; user: CurrentUser; ctx: ServiceContext } | { ok: false; error: ActionError }

export async function createServiceContext(actor: Actor | null): Promise<ServiceContext> {
  return {
    db: await getDatabase(),
    actor: actor ? { username: actor.username, role: actor.role } : null,
    now: () => new Date(),
    baseUrl: getConfig().appBaseUrl,
  }
}

export async function requireSignedIn(): Promise<AuthResult> {
  const user = await getCurrentUser()
  if (!user) return { ok: false, error: { code: 'not_authenticated', message: 'Please sign in.' } }
  return { ok: true, user, ctx: await createServiceContext(user) }
}

export async function requireAdmin(): Promise<AuthResult> {
  const auth = await requireSignedIn()
  if (!auth.ok) return auth
  if (auth.user.role !== 'admin') {
    return { ok: false, error: { code: 'forbidden', message: 'Admin access required.' } }
  }
  return auth
}

export function isUnlocked(user: CurrentUser, section: ProtectedSection) {
  return user.unlocked.includes(section)
}

export async function requireUnlocked(section: ProtectedSection, options?: { admin?: boolean }): Promise<AuthResult> {
  const auth = options?.admin ? await requireAdmin() : await requireSignedIn()
  if (!auth.ok) return auth
  if (!isUnlocked(auth.user, section)) {
    return { ok: false, error: { code: 'locked_section', message: 'Confirm your password to open this section.' } }
  }
  return auth
}
