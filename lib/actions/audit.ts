'use server'

import type { AuditLogDoc } from '@/lib/db/schema'
import { toActionError, type ActionResult } from '@/lib/errors'
import { requireUnlocked } from '@/lib/guards'
import { listAuditLogs } from '@/lib/services/audit'

export type AuditLogsResult = ActionResult<{ logs: AuditLogDoc[] }>

export async function getAuditLogs(params?: { limit?: number }): Promise<AuditLogsResult> {
  const auth = await requireUnlocked('teachers', { admin: true })
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    return { success: true, logs: await listAuditLogs(auth.ctx, params) }
  } catch (error) {
    console.error('Get audit logs error:', error)
    return { success: false, error: toActionError(error) }
  }
}
