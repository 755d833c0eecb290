import { format, subDays } from 'date-fns'

import {
  buildPivot,
  summarizeStatuses,
  type AttendancePivot,
  type AttendanceStats,
} from '@/lib/attendance/pivot'
import type { Database } from '@/lib/db'
import type { AttendanceDoc, AttendanceMethod, AttendanceStatus, StudentDoc } from '@/lib/db/schema'
import type { QueryFilter } from '@/lib/db/types'
import { combineWithTime, datesInRange, requireDate, resolveRange, toDateKey, type DateRange } from '@/lib/dates'
import { AppError, isDuplicateKeyError } from '@/lib/errors'
import { canModify, scoped } from '@/lib/scope'

import { recordAudit } from './audit'
import { requireActor, type ServiceContext } from './context'
import { findStudentInScope, listStudents } from './students'

export const DEFAULT_RANGE_DAYS = 30

export type MarkRequest = {
  student: StudentDoc
  status: AttendanceStatus
  date: string
  course?: string | null
  method: AttendanceMethod
  owner: string
}

export type MarkOutcome = { marked: true; record: AttendanceDoc } | { marked: false; existing: AttendanceDoc | null }

export type AttendanceRow = {
  student_id: string
  name: string
  course: string
  date: string
  time: string
  status: AttendanceStatus
  method: string
}

export type DayAttendance = {
  student: StudentDoc
  record: AttendanceDoc | null
}

export type DashboardSummary = {
  totalStudents: number
  today: string
  recordsToday: number
  presentToday: number
  lastSevenDays: Array<{ date: string; present: number; total: number }>
}

/**
 * Writes the single record a student may have for a date. The unique
 * `(student_id, date)` key settles concurrent marks: the loser gets the
 * existing record back.
 */
export async function recordMark(db: Database, now: Date, request: MarkRequest): Promise<MarkOutcome> {
  const existing = await db.attendance.findOne({ student_id: request.student.student_id, date: request.date })
  if (existing) return { marked: false, existing }

  const when = combineWithTime(request.date, now)
  const record: AttendanceDoc = {
    student_id: request.student.student_id,
    date: request.date,
    time: format(when, 'HH:mm:ss'),
    status: request.status,
    course: request.course?.trim() || request.student.course || null,
    method: request.method,
    ts: when.toISOString(),
    created_by: request.owner,
    last_modified: null,
    modified_by: null,
  }

  try {
    await db.attendance.insertOne(record)
  } catch (error) {
    if (!isDuplicateKeyError(error)) throw error
    return {
      marked: false,
      existing: await db.attendance.findOne({ student_id: request.student.student_id, date: request.date }),
    }
  }

  return { marked: true, record }
}

function alreadyMarked(student: StudentDoc, date: string) {
  return new AppError('already_marked', `${student.name} (${student.student_id}) is already marked for ${date}.`)
}

async function markInScope(
  ctx: ServiceContext,
  input: { studentId: string; status: AttendanceStatus; date?: string | null; course?: string | null },
  method: AttendanceMethod
) {
  const actor = requireActor(ctx)
  const now = ctx.now()
  const date = requireDate(input.date, now)

  const student = await findStudentInScope(ctx, input.studentId)
  if (!student) throw new AppError('not_found', 'Student not found in database.')

  const outcome = await recordMark(ctx.db, now, {
    student,
    status: input.status,
    date,
    course: input.course,
    method,
    owner: actor.username,
  })
  if (!outcome.marked) throw alreadyMarked(student, date)

  return { student, record: outcome.record }
}

/** Hardware scanner input: the scanned code is a student id and marks them present today. */
export async function scanStudent(ctx: ServiceContext, code: string) {
  const studentId = code.trim()
  if (!studentId) throw new AppError('invalid_input', 'Scan a student code.')
  return markInScope(ctx, { studentId, status: 1 }, 'scanner_device')
}

export async function markAttendance(
  ctx: ServiceContext,
  input: {
    studentId: string
    status: AttendanceStatus
    date?: string | null
    course?: string | null
    fromEditView?: boolean
  }
) {
  return markInScope(ctx, input, input.fromEditView ? 'manual_edit' : 'manual_entry')
}

export async function bulkMarkAttendance(
  ctx: ServiceContext,
  input: { date?: string | null; records: Array<{ student_id: string; status: AttendanceStatus }> }
): Promise<{ marked: number; already: number; errors: string[] }> {
  const actor = requireActor(ctx)
  const now = ctx.now()
  const date = requireDate(input.date, now)

  const students = new Map((await listStudents(ctx)).map((student) => [student.student_id, student]))
  let marked = 0
  let already = 0
  const errors: string[] = []

  for (const entry of input.records) {
    const student = students.get(entry.student_id.trim())
    if (!student) {
      errors.push(`${entry.student_id}: student not found.`)
      continue
    }

    const outcome = await recordMark(ctx.db, now, {
      student,
      status: entry.status,
      date,
      method: 'bulk_entry',
      owner: actor.username,
    })
    if (outcome.marked) marked++
    else already++
  }

  return { marked, already, errors }
}

export async function updateAttendanceStatus(
  ctx: ServiceContext,
  input: { studentId: string; date: string; status: AttendanceStatus }
): Promise<AttendanceDoc> {
  const actor = requireActor(ctx)
  const date = requireDate(input.date, ctx.now())

  const record = await ctx.db.attendance.findOne(scoped({ student_id: input.studentId.trim(), date }, actor))
  if (!record) throw new AppError('not_found', 'Attendance record not found.')
  if (!canModify(record, actor)) throw new AppError('forbidden', 'You can only edit your own records.')

  const changes = {
    status: input.status,
    last_modified: ctx.now().toISOString(),
    modified_by: actor.username,
  }
  await ctx.db.attendance.updateOne({ student_id: record.student_id, date }, { $set: changes })
  await recordAudit(ctx, {
    action: 'attendance:update_status',
    resource_type: 'attendance',
    resource_id: record.student_id,
    changes: { date, from: record.status, to: input.status },
  })

  return { ...record, ...changes }
}

/** Every student in scope for one date, with their record when they have one. */
export async function listDayAttendance(
  ctx: ServiceContext,
  params: { date?: string | null; course?: string | null }
): Promise<{ date: string; entries: DayAttendance[] }> {
  const actor = requireActor(ctx)
  const date = requireDate(params.date, ctx.now())

  const students = await listStudents(ctx, { course: params.course })
  const records = await ctx.db.attendance.find(scoped({ date }, actor))
  const byStudent = new Map(records.map((record) => [record.student_id, record]))

  return {
    date,
    entries: students.map((student) => ({ student, record: byStudent.get(student.student_id) ?? null })),
  }
}

function recordsFilter(range: DateRange, course?: string | null): QueryFilter {
  const filter: QueryFilter = { date: { $gte: range.start, $lte: range.end } }
  const selected = course?.trim()
  if (selected && selected !== 'all') filter.course = selected
  return filter
}

export async function listAttendanceRecords(
  ctx: ServiceContext,
  params: { start?: string | null; end?: string | null; course?: string | null }
): Promise<{ range: DateRange; rows: AttendanceRow[]; stats: AttendanceStats }> {
  const actor = requireActor(ctx)
  const range = resolveRange(params, ctx.now(), DEFAULT_RANGE_DAYS)

  const [records, students] = await Promise.all([
    ctx.db.attendance.find(scoped(recordsFilter(range, params.course), actor), {
      sort: { date: -1, student_id: 1 },
    }),
    listStudents(ctx),
  ])
  const names = new Map(students.map((student) => [student.student_id, student.name]))

  const rows = records.map((record) => ({
    student_id: record.student_id,
    name: names.get(record.student_id) ?? 'Unknown',
    course: record.course ?? '',
    date: record.date,
    time: record.time,
    status: record.status,
    method: record.method,
  }))

  return { range, rows, stats: summarizeStatuses(rows) }
}

export async function getAttendancePivot(
  ctx: ServiceContext,
  params: { start?: string | null; end?: string | null; course?: string | null }
): Promise<{ range: DateRange; pivot: AttendancePivot }> {
  const actor = requireActor(ctx)
  const range = resolveRange(params, ctx.now(), DEFAULT_RANGE_DAYS)

  // The course narrows which marks count, not which students are listed
  const [students, records] = await Promise.all([
    listStudents(ctx),
    ctx.db.attendance.find(scoped(recordsFilter(range, params.course), actor)),
  ])

  return { range, pivot: buildPivot(students, records, datesInRange(range)) }
}

export async function getDashboardSummary(ctx: ServiceContext): Promise<DashboardSummary> {
  const actor = requireActor(ctx)
  const now = ctx.now()
  const today = toDateKey(now)
  const weekStart = toDateKey(subDays(now, 6))

  const [totalStudents, records] = await Promise.all([
    ctx.db.students.countDocuments(scoped({}, actor)),
    ctx.db.attendance.find(scoped({ date: { $gte: weekStart, $lte: today } }, actor)),
  ])

  const lastSevenDays = datesInRange({ start: weekStart, end: today }).map((date) => {
    const stats = summarizeStatuses(records.filter((record) => record.date === date))
    return { date, present: stats.present, total: stats.total }
  })
  const todayStats = lastSevenDays[lastSevenDays.length - 1]

  return {
    totalStudents,
    today,
    recordsToday: todayStats?.total ?? 0,
    presentToday: todayStats?.present ?? 0,
    lastSevenDays,
  }
}
