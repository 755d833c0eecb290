import type { Database } from '@/lib/db'
import { AppError } from '@/lib/errors'
import { isAdmin } from '@/lib/scope'
import type { Actor } from '@/lib/types'

/** Everything a service call needs; actions build one per request. */
export type ServiceContext = {
  db: Database
  actor: Actor | null
  now: () => Date
  baseUrl: string
}

export function requireActor(ctx: ServiceContext): Actor {
  if (!ctx.actor) throw new AppError('not_authenticated', 'Please sign in.')
  return ctx.actor
}

export function requireAdminActor(ctx: ServiceContext): Actor {
  const actor = requireActor(ctx)
  if (!isAdmin(actor)) throw new AppError('forbidden', 'Admin access required.')
  return actor
}
