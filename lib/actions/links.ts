'use server'

import { revalidatePath } from 'next/cache'

import type { SessionLinkDoc, StudentLinkDoc } from '@/lib/db/schema'
import { toActionError, type ActionResult } from '@/lib/errors'
import { createServiceContext, requireUnlocked } from '@/lib/guards'
import * as links from '@/lib/services/links'
import { parseInput, sessionCheckInInput, sessionLinkInput, studentLinkInput } from '@/lib/validation'

export type SessionLinkResult = ActionResult<{ link: SessionLinkDoc; url: string }>
export type StudentLinkResult = ActionResult<{ link: StudentLinkDoc; url: string }>
export type ActiveLinksResult = ActionResult<{
  sessions: Array<SessionLinkDoc & { url: string }>
  students: Array<links.StudentLinkListItem & { url: string }>
}>
export type DeactivateLinkResult = ActionResult<object>
export type CheckInResult = ActionResult<{ checkIn: links.CheckInOutcome }>

export async function createSessionLink(input: {
  description: string
  course?: string
  durationHours?: number
}): Promise<SessionLinkResult> {
  const auth = await requireUnlocked('links')
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const result = await links.createSessionLink(auth.ctx, parseInput(sessionLinkInput, input))
    revalidatePath('/dashboard/links')
    return { success: true, ...result }
  } catch (error) {
    console.error('Create session link error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function createStudentLink(input: {
  studentId: string
  durationHours?: number
  maxUses?: number
}): Promise<StudentLinkResult> {
  const auth = await requireUnlocked('links')
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const result = await links.createStudentLink(auth.ctx, parseInput(studentLinkInput, input))
    revalidatePath('/dashboard/links')
    return { success: true, ...result }
  } catch (error) {
    console.error('Create student link error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function getActiveLinks(): Promise<ActiveLinksResult> {
  const auth = await requireUnlocked('links')
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const active = await links.listActiveLinks(auth.ctx)
    return {
      success: true,
      sessions: active.sessions.map((link) => ({ ...link, url: links.sessionLinkUrl(auth.ctx, link.session_id) })),
      students: active.students.map((link) => ({ ...link, url: links.studentLinkUrl(auth.ctx, link.link_id) })),
    }
  } catch (error) {
    console.error('Get active links error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function deactivateLink(kind: links.LinkKind, token: string): Promise<DeactivateLinkResult> {
  const auth = await requireUnlocked('links')
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    await links.deactivateLink(auth.ctx, kind, token)
    revalidatePath('/dashboard/links')
    return { success: true }
  } catch (error) {
    console.error('Deactivate link error:', error)
    return { success: false, error: toActionError(error) }
  }
}

// Public: anyone holding the link may check in, acting for the link's creator
export async function checkInWithSessionLink(
  token: string,
  input: { studentId: string; name?: string }
): Promise<CheckInResult> {
  try {
    const ctx = await createServiceContext(null)
    const checkIn = await links.checkInWithSessionLink(ctx, token, parseInput(sessionCheckInInput, input))
    return { success: true, checkIn }
  } catch (error) {
    console.error('Session link check-in error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function checkInWithStudentLink(token: string): Promise<CheckInResult> {
  try {
    const ctx = await createServiceContext(null)
    const checkIn = await links.checkInWithStudentLink(ctx, token)
    return { success: true, checkIn }
  } catch (error) {
    console.error('Student link check-in error:', error)
    return { success: false, error: toActionError(error) }
  }
}
