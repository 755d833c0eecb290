import type { AuditLogDoc } from '@/lib/db/schema'
import { generateId } from '@/lib/tokens'

import { requireActor, requireAdminActor, type ServiceContext } from './context'

export const DEFAULT_AUDIT_LIMIT = 50
export const MAX_AUDIT_LIMIT = 200

export type AuditEntry = {
  action: string
  resource_type: string
  resource_id?: string | null
  changes?: AuditLogDoc['changes']
}

export async function recordAudit(ctx: ServiceContext, entry: AuditEntry): Promise<AuditLogDoc> {
  const actor = requireActor(ctx)
  const log: AuditLogDoc = {
    id: generateId(),
    actor: actor.username,
    action: entry.action,
    resource_type: entry.resource_type,
    resource_id: entry.resource_id ?? null,
    changes: entry.changes ?? {},
    created_at: ctx.now().toISOString(),
  }
  await ctx.db.auditLogs.insertOne(log)
  return log
}

export async function listAuditLogs(ctx: ServiceContext, params?: { limit?: number }): Promise<AuditLogDoc[]> {
  requireAdminActor(ctx)

  const raw = params?.limit ?? DEFAULT_AUDIT_LIMIT
  const requested = Number.isFinite(raw) ? Math.trunc(raw) : DEFAULT_AUDIT_LIMIT
  const limit = Math.min(Math.max(requested, 1), MAX_AUDIT_LIMIT)

  return ctx.db.auditLogs.find({}, { sort: { created_at: -1 }, limit })
}
