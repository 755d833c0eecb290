import { addHours } from 'date-fns'

import type { SessionLinkDoc, StudentDoc, StudentLinkDoc } from '@/lib/db/schema'
import { requireDate } from '@/lib/dates'
import { AppError } from '@/lib/errors'
import { canModify, scoped } from '@/lib/scope'
import { generateSecureToken } from '@/lib/tokens'
import type { Actor } from '@/lib/types'

import { recordMark } from './attendance'
import { recordAudit } from './audit'
import { requireActor, type ServiceContext } from './context'
import { getStudentInScope, listStudents } from './students'

export const SESSION_LINK_HOURS = { min: 1, max: 168, default: 24 } as const
export const STUDENT_LINK_HOURS = { min: 1, max: 720, default: 168 } as const

export type LinkKind = 'session' | 'student'

export type StudentLinkListItem = StudentLinkDoc & { student_name: string }

export type SessionCheckInView = Pick<SessionLinkDoc, 'description' | 'course' | 'expires_at'> & {
  owner: string
}

export type StudentCheckInView = Pick<StudentLinkDoc, 'student_id' | 'expires_at' | 'uses' | 'max_uses'> & {
  student_name: string
  course: string
}

export type CheckInOutcome = {
  student_id: string
  name: string
  date: string
  time: string
  // Set when the typed name does not match the stored one; the mark still counts
  nameMismatch: boolean
}

export function sessionLinkUrl(ctx: Pick<ServiceContext, 'baseUrl'>, token: string) {
  return `${ctx.baseUrl}/attend/session/${token}`
}

export function studentLinkUrl(ctx: Pick<ServiceContext, 'baseUrl'>, token: string) {
  return `${ctx.baseUrl}/attend/student/${token}`
}

function resolveDuration(value: number | undefined, limits: { min: number; max: number; default: number }) {
  const hours = value ?? limits.default
  if (!Number.isInteger(hours) || hours < limits.min || hours > limits.max) {
    throw new AppError('invalid_input', `Duration must be between ${limits.min} and ${limits.max} hours.`)
  }
  return hours
}

export async function createSessionLink(
  ctx: ServiceContext,
  input: { description: string; course?: string | null; durationHours?: number }
): Promise<{ link: SessionLinkDoc; url: string }> {
  const actor = requireActor(ctx)

  const description = input.description.trim()
  if (!description) throw new AppError('invalid_input', 'Session description is required.')
  const hours = resolveDuration(input.durationHours, SESSION_LINK_HOURS)

  const now = ctx.now()
  const link: SessionLinkDoc = {
    session_id: generateSecureToken(),
    course: input.course?.trim() || null,
    description,
    created_by: actor.username,
    created_at: now.toISOString(),
    expires_at: addHours(now, hours).toISOString(),
    is_active: true,
    attendance_count: 0,
  }
  await ctx.db.sessionLinks.insertOne(link)
  await recordAudit(ctx, {
    action: 'links:create',
    resource_type: 'session_links',
    resource_id: link.session_id,
    changes: { description, course: link.course, expires_at: link.expires_at },
  })

  return { link, url: sessionLinkUrl(ctx, link.session_id) }
}

export async function createStudentLink(
  ctx: ServiceContext,
  input: { studentId: string; durationHours?: number; maxUses?: number }
): Promise<{ link: StudentLinkDoc; url: string }> {
  const actor = requireActor(ctx)
  const student = await getStudentInScope(ctx, input.studentId)
  const hours = resolveDuration(input.durationHours, STUDENT_LINK_HOURS)

  const maxUses = input.maxUses ?? 0
  if (!Number.isInteger(maxUses) || maxUses < 0) {
    throw new AppError('invalid_input', 'Maximum uses must be 0 (unlimited) or more.')
  }

  const now = ctx.now()
  const link: StudentLinkDoc = {
    link_id: generateSecureToken(),
    student_id: student.student_id,
    created_by: actor.username,
    created_at: now.toISOString(),
    expires_at: addHours(now, hours).toISOString(),
    is_active: true,
    uses: 0,
    max_uses: maxUses === 0 ? null : maxUses,
  }
  await ctx.db.studentLinks.insertOne(link)
  await recordAudit(ctx, {
    action: 'links:create',
    resource_type: 'student_links',
    resource_id: link.link_id,
    changes: { student_id: link.student_id, expires_at: link.expires_at, max_uses: link.max_uses },
  })

  return { link, url: studentLinkUrl(ctx, link.link_id) }
}

/** Active, unexpired links in scope, newest first. */
export async function listActiveLinks(
  ctx: ServiceContext
): Promise<{ sessions: SessionLinkDoc[]; students: StudentLinkListItem[] }> {
  const actor = requireActor(ctx)
  const live = { is_active: true, expires_at: { $gt: ctx.now().toISOString() } }

  const [sessions, studentLinks, students] = await Promise.all([
    ctx.db.sessionLinks.find(scoped(live, actor), { sort: { created_at: -1 } }),
    ctx.db.studentLinks.find(scoped(live, actor), { sort: { created_at: -1 } }),
    listStudents(ctx),
  ])
  const names = new Map(students.map((student) => [student.student_id, student.name]))

  return {
    sessions,
    students: studentLinks.map((link) => ({ ...link, student_name: names.get(link.student_id) ?? 'Unknown' })),
  }
}

export async function deactivateLink(ctx: ServiceContext, kind: LinkKind, token: string): Promise<void> {
  const actor = requireActor(ctx)

  if (kind === 'session') {
    const link = await ctx.db.sessionLinks.findOne(scoped({ session_id: token }, actor))
    if (!link) throw new AppError('not_found', 'Link not found.')
    if (!canModify(link, actor)) throw new AppError('forbidden', 'You can only deactivate your own links.')
    await ctx.db.sessionLinks.updateOne({ session_id: token }, { $set: { is_active: false } })
  } else {
    const link = await ctx.db.studentLinks.findOne(scoped({ link_id: token }, actor))
    if (!link) throw new AppError('not_found', 'Link not found.')
    if (!canModify(link, actor)) throw new AppError('forbidden', 'You can only deactivate your own links.')
    await ctx.db.studentLinks.updateOne({ link_id: token }, { $set: { is_active: false } })
  }

  await recordAudit(ctx, {
    action: 'links:deactivate',
    resource_type: kind === 'session' ? 'session_links' : 'student_links',
    resource_id: token,
  })
}

// Check-ins act for the link's creator, so the student must be one they can see
async function linkOwner(ctx: ServiceContext, createdBy: string | null | undefined): Promise<Actor> {
  if (!createdBy) throw new AppError('not_found', 'Invalid or expired attendance link.')
  const owner = await ctx.db.users.findOne({ username: createdBy })
  return { username: createdBy, role: owner?.role ?? 'teacher' }
}

function assertUsable(link: { is_active: boolean; expires_at: string }, now: Date) {
  if (link.expires_at <= now.toISOString()) throw new AppError('expired', 'This attendance link has expired.')
  if (!link.is_active) throw new AppError('inactive', 'This attendance link is no longer active.')
}

async function loadSessionLink(ctx: ServiceContext, token: string) {
  const link = token ? await ctx.db.sessionLinks.findOne({ session_id: token }) : null
  if (!link) throw new AppError('not_found', 'Invalid or expired attendance link.')
  assertUsable(link, ctx.now())
  return link
}

async function loadStudentLink(ctx: ServiceContext, token: string) {
  const link = token ? await ctx.db.studentLinks.findOne({ link_id: token }) : null
  if (!link) throw new AppError('not_found', 'Invalid or expired attendance link.')
  assertUsable(link, ctx.now())
  if (link.max_uses !== null && link.uses >= link.max_uses) {
    throw new AppError('exhausted', 'This attendance link has reached its maximum number of uses.')
  }
  return link
}

async function ownedStudent(ctx: ServiceContext, owner: Actor, studentId: string): Promise<StudentDoc> {
  const student = studentId ? await ctx.db.students.findOne(scoped({ student_id: studentId }, owner)) : null
  if (!student) throw new AppError('not_found', 'Student ID not found. Please check and try again.')
  return student
}

export async function getSessionCheckIn(ctx: ServiceContext, token: string): Promise<SessionCheckInView> {
  const link = await loadSessionLink(ctx, token)
  return {
    description: link.description,
    course: link.course,
    expires_at: link.expires_at,
    owner: link.created_by ?? '',
  }
}

export async function checkInWithSessionLink(
  ctx: ServiceContext,
  token: string,
  input: { studentId: string; name?: string | null }
): Promise<CheckInOutcome> {
  const typedName = input.name?.trim() ?? ''
  if (!typedName) throw new AppError('invalid_input', 'Please enter your name.')

  const link = await loadSessionLink(ctx, token)
  const owner = await linkOwner(ctx, link.created_by)
  const student = await ownedStudent(ctx, owner, input.studentId.trim())

  const now = ctx.now()
  const date = requireDate(null, now)
  const outcome = await recordMark(ctx.db, now, {
    student,
    status: 1,
    date,
    course: link.course,
    method: 'session_link',
    owner: owner.username,
  })
  if (!outcome.marked) throw new AppError('already_marked', `Attendance already marked for ${date}.`)

  await ctx.db.sessionLinks.updateOne({ session_id: link.session_id }, { $inc: { attendance_count: 1 } })

  return {
    student_id: student.student_id,
    name: student.name,
    date,
    time: outcome.record.time,
    nameMismatch: typedName.toLowerCase() !== student.name.toLowerCase(),
  }
}

export async function getStudentCheckIn(ctx: ServiceContext, token: string): Promise<StudentCheckInView> {
  const link = await loadStudentLink(ctx, token)
  const owner = await linkOwner(ctx, link.created_by)
  const student = await ownedStudent(ctx, owner, link.student_id)

  return {
    student_id: link.student_id,
    expires_at: link.expires_at,
    uses: link.uses,
    max_uses: link.max_uses,
    student_name: student.name,
    course: student.course,
  }
}

export async function checkInWithStudentLink(ctx: ServiceContext, token: string): Promise<CheckInOutcome> {
  const link = await loadStudentLink(ctx, token)
  const owner = await linkOwner(ctx, link.created_by)
  const student = await ownedStudent(ctx, owner, link.student_id)

  const now = ctx.now()
  const date = requireDate(null, now)
  const outcome = await recordMark(ctx.db, now, {
    student,
    status: 1,
    date,
    method: 'personal_link',
    owner: owner.username,
  })
  if (!outcome.marked) throw new AppError('already_marked', `Attendance already marked for ${date}.`)

  await ctx.db.studentLinks.updateOne({ link_id: link.link_id }, { $inc: { uses: 1 } })

  return {
    student_id: student.student_id,
    name: student.name,
    date,
    time: outcome.record.time,
    nameMismatch: false,
  }
}
