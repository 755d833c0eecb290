import type { UserRole, UserStatus } from '@/lib/db/schema'
import { AppError, fromActionError } from '@/lib/errors'
import type { PublicUser } from '@/lib/types'
import { toPublicUser, type NewUserInput, type UserManager } from '@/lib/users/user-manager'

import { recordAudit } from './audit'
import { requireAdminActor, type ServiceContext } from './context'

export async function listUsers(ctx: ServiceContext): Promise<PublicUser[]> {
  requireAdminActor(ctx)
  const users = await ctx.db.users.find({}, { sort: { username: 1 } })
  return users.map(toPublicUser)
}

async function requireUser(ctx: ServiceContext, username: string) {
  const user = await ctx.db.users.findOne({ username })
  if (!user) throw new AppError('not_found', 'User not found.')
  return user
}

async function countOtherAdmins(ctx: ServiceContext, username: string) {
  return ctx.db.users.countDocuments({ role: 'admin', username: { $ne: username } })
}

export async function createUserAsAdmin(
  ctx: ServiceContext,
  manager: UserManager,
  input: NewUserInput
): Promise<PublicUser> {
  requireAdminActor(ctx)

  const result = await manager.createUser(input)
  if (!result.success) throw fromActionError(result.error)

  await recordAudit(ctx, {
    action: 'users:create',
    resource_type: 'users',
    resource_id: result.user.username,
    changes: { role: result.user.role, email: result.user.email },
  })

  return result.user
}

export async function unlockUser(ctx: ServiceContext, username: string): Promise<void> {
  requireAdminActor(ctx)
  const user = await requireUser(ctx, username)

  await ctx.db.users.updateOne(
    { username: user.username },
    { $set: { is_locked: false, failed_attempts: 0, lockout_until: null } }
  )
  await recordAudit(ctx, { action: 'users:unlock', resource_type: 'users', resource_id: user.username })
}

export async function setUserRole(ctx: ServiceContext, username: string, role: UserRole): Promise<void> {
  const actor = requireAdminActor(ctx)
  const user = await requireUser(ctx, username)

  if (user.username === actor.username) throw new AppError('forbidden', 'You cannot change your own role.')
  if (user.role === role) return
  if (user.role === 'admin' && (await countOtherAdmins(ctx, user.username)) === 0) {
    throw new AppError('forbidden', 'At least one admin account is required.')
  }

  await ctx.db.users.updateOne(
    { username: user.username },
    { $set: { role, last_modified: ctx.now().toISOString() } }
  )
  await recordAudit(ctx, {
    action: 'users:set_role',
    resource_type: 'users',
    resource_id: user.username,
    changes: { from: user.role, to: role },
  })
}

export async function setUserStatus(ctx: ServiceContext, username: string, status: UserStatus): Promise<void> {
  const actor = requireAdminActor(ctx)
  const user = await requireUser(ctx, username)

  if (user.username === actor.username) throw new AppError('forbidden', 'You cannot deactivate your own account.')
  if (user.status === status) return

  await ctx.db.users.updateOne(
    { username: user.username },
    { $set: { status, last_modified: ctx.now().toISOString() } }
  )
  if (status === 'inactive') await ctx.db.authSessions.deleteMany({ username: user.username })

  await recordAudit(ctx, {
    action: 'users:set_status',
    resource_type: 'users',
    resource_id: user.username,
    changes: { from: user.status, to: status },
  })
}

/** Deletes the account and its sign-in sessions; records it created keep their owner. */
export async function deleteUser(ctx: ServiceContext, username: string, confirmation: string): Promise<void> {
  const actor = requireAdminActor(ctx)
  const user = await requireUser(ctx, username)

  if (confirmation.trim() !== user.username) {
    throw new AppError('invalid_input', `Type "${user.username}" to confirm deletion.`)
  }
  if (user.username === actor.username) throw new AppError('forbidden', 'You cannot delete your own account.')
  if (user.role === 'admin' && (await countOtherAdmins(ctx, user.username)) === 0) {
    throw new AppError('forbidden', 'Cannot delete the last admin account.')
  }

  await ctx.db.users.deleteOne({ username: user.username })
  await ctx.db.authSessions.deleteMany({ username: user.username })

  await recordAudit(ctx, {
    action: 'users:delete',
    resource_type: 'users',
    resource_id: user.username,
    changes: { role: user.role },
  })
}
