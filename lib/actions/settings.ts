'use server'

import { toActionError, type ActionResult } from '@/lib/errors'
import { requireUnlocked } from '@/lib/guards'
import { changeOwnPassword, getSystemInfo, type SystemInfo } from '@/lib/services/settings'
import { getUserManager } from '@/lib/users'

export type ChangePasswordResult = ActionResult<{ message: string }>
export type SystemInfoResult = ActionResult<{ info: SystemInfo }>

export async function changePassword(input: {
  currentPassword: string
  newPassword: string
  confirmPassword: string
}): Promise<ChangePasswordResult> {
  const auth = await requireUnlocked('settings')
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const message = await changeOwnPassword(auth.ctx, await getUserManager(), input)
    return { success: true, message }
  } catch (error) {
    console.error('Change password error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function getSettingsInfo(): Promise<SystemInfoResult> {
  const auth = await requireUnlocked('settings')
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    return { success: true, info: await getSystemInfo(auth.ctx) }
  } catch (error) {
    console.error('Get system info error:', error)
    return { success: false, error: toActionError(error) }
  }
}
