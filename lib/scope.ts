import type { QueryFilter } from '@/lib/db/types'
import type { Actor } from '@/lib/types'

// `$in: []` matches no document in either backend
const MATCH_NOTHING: QueryFilter = { created_by: { $in: [] } }

export function isAdmin(actor: Actor | null | undefined): boolean {
  return actor?.role === 'admin'
}

/** Admins see every record, teachers only the ones they created, anonymous callers nothing. */
export function ownerFilter(actor: Actor | null | undefined): QueryFilter {
  if (!actor) return MATCH_NOTHING
  if (isAdmin(actor)) return {}
  return { created_by: actor.username }
}

export function scoped(filter: QueryFilter, actor: Actor | null | undefined): QueryFilter {
  return { ...filter, ...ownerFilter(actor) }
}

export function canModify(record: { created_by?: string | null }, actor: Actor | null | undefined): boolean {
  if (!actor) return false
  return isAdmin(actor) || record.created_by === actor.username
}
