'use server'

import { revalidatePath } from 'next/cache'

import type { UserRole, UserStatus } from '@/lib/db/schema'
import { toActionError, type ActionResult } from '@/lib/errors'
import { requireUnlocked } from '@/lib/guards'
import * as users from '@/lib/services/users'
import type { PublicUser } from '@/lib/types'
import { getUserManager } from '@/lib/users'

export type UsersResult = ActionResult<{ users: PublicUser[] }>
export type UserResult = ActionResult<{ user: PublicUser }>
export type SimpleResult = ActionResult<object>

// Every user administration call also needs the Teachers section unlocked
function requireTeachersSection() {
  return requireUnlocked('teachers', { admin: true })
}

export async function getUsers(): Promise<UsersResult> {
  const auth = await requireTeachersSection()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    return { success: true, users: await users.listUsers(auth.ctx) }
  } catch (error) {
    console.error('Get users error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function createUser(input: {
  username: string
  email: string
  name?: string
  password: string
  role: UserRole
}): Promise<UserResult> {
  const auth = await requireTeachersSection()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const user = await users.createUserAsAdmin(auth.ctx, await getUserManager(), input)
    revalidatePath('/dashboard/teachers')
    return { success: true, user }
  } catch (error) {
    console.error('Create user error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function unlockUser(username: string): Promise<SimpleResult> {
  const auth = await requireTeachersSection()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    await users.unlockUser(auth.ctx, username)
    revalidatePath('/dashboard/teachers')
    return { success: true }
  } catch (error) {
    console.error('Unlock user error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function setUserRole(username: string, role: UserRole): Promise<SimpleResult> {
  const auth = await requireTeachersSection()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    await users.setUserRole(auth.ctx, username, role)
    revalidatePath('/dashboard/teachers')
    return { success: true }
  } catch (error) {
    console.error('Set user role error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function setUserStatus(username: string, status: UserStatus): Promise<SimpleResult> {
  const auth = await requireTeachersSection()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    await users.setUserStatus(auth.ctx, username, status)
    revalidatePath('/dashboard/teachers')
    return { success: true }
  } catch (error) {
    console.error('Set user status error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function deleteUser(username: string, confirmation: string): Promise<SimpleResult> {
  const auth = await requireTeachersSection()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    await users.deleteUser(auth.ctx, username, confirmation)
    revalidatePath('/dashboard/teachers')
    return { success: true }
  } catch (error) {
    console.error('Delete user error:', error)
    return { success: false, error: toActionError(error) }
  }
}
