import type { DatabaseBackend } from '@/lib/db/types'
import { AppError, fromActionError } from '@/lib/errors'
import { scoped } from '@/lib/scope'
import type { UserManager } from '@/lib/users/user-manager'

import { requireActor, type ServiceContext } from './context'

export type SystemInfo = {
  backend: DatabaseBackend
  students: number
  attendanceRecords: number
}

export async function changeOwnPassword(
  ctx: ServiceContext,
  manager: UserManager,
  input: { currentPassword: string; newPassword: string; confirmPassword: string }
): Promise<string> {
  const actor = requireActor(ctx)

  if (input.newPassword !== input.confirmPassword) {
    throw new AppError('invalid_input', 'New passwords do not match')
  }

  const result = await manager.changePassword(actor.username, input.currentPassword, input.newPassword)
  if (!result.success) throw fromActionError(result.error)

  return result.message
}

export async function getSystemInfo(ctx: ServiceContext): Promise<SystemInfo> {
  const actor = requireActor(ctx)
  const [students, attendanceRecords] = await Promise.all([
    ctx.db.students.countDocuments(scoped({}, actor)),
    ctx.db.attendance.countDocuments(scoped({}, actor)),
  ])
  return { backend: ctx.db.backend, students, attendanceRecords }
}
