'use server'

import { revalidatePath } from 'next/cache'

import type { AttendancePivot, AttendanceStats } from '@/lib/attendance/pivot'
import type { AttendanceDoc, AttendanceStatus, StudentDoc } from '@/lib/db/schema'
import type { DateRange } from '@/lib/dates'
import { toActionError, type ActionResult } from '@/lib/errors'
import { requireSignedIn, requireUnlocked } from '@/lib/guards'
import * as attendance from '@/lib/services/attendance'
import { bulkMarkInput, markAttendanceInput, parseInput, updateStatusInput } from '@/lib/validation'

export type MarkResult = ActionResult<{ student: StudentDoc; record: AttendanceDoc }>
export type BulkMarkResult = ActionResult<{ marked: number; already: number; errors: string[] }>
export type UpdateStatusResult = ActionResult<{ record: AttendanceDoc }>
export type DayAttendanceResult = ActionResult<{ date: string; entries: attendance.DayAttendance[] }>
export type RecordsResult = ActionResult<{ range: DateRange; rows: attendance.AttendanceRow[]; stats: AttendanceStats }>
export type PivotResult = ActionResult<{ range: DateRange; pivot: AttendancePivot }>

type RangeParams = { start?: string; end?: string; course?: string }

function revalidateAttendance() {
  revalidatePath('/dashboard')
  revalidatePath('/dashboard/records')
}

export async function scanStudentCode(code: string): Promise<MarkResult> {
  const auth = await requireSignedIn()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const result = await attendance.scanStudent(auth.ctx, code)
    revalidateAttendance()
    return { success: true, ...result }
  } catch (error) {
    console.error('Scan attendance error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function markAttendance(input: {
  studentId: string
  status: AttendanceStatus
  date?: string
  course?: string
  fromEditView?: boolean
}): Promise<MarkResult> {
  const auth = await requireUnlocked('manual')
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const result = await attendance.markAttendance(auth.ctx, parseInput(markAttendanceInput, input))
    revalidateAttendance()
    revalidatePath('/dashboard/manual')
    return { success: true, ...result }
  } catch (error) {
    console.error('Mark attendance error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function bulkMarkAttendance(input: {
  date?: string
  records: Array<{ student_id: string; status: AttendanceStatus }>
}): Promise<BulkMarkResult> {
  const auth = await requireUnlocked('bulk')
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const result = await attendance.bulkMarkAttendance(auth.ctx, parseInput(bulkMarkInput, input))
    revalidateAttendance()
    return { success: true, ...result }
  } catch (error) {
    console.error('Bulk mark attendance error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function updateAttendanceStatus(input: {
  studentId: string
  date: string
  status: AttendanceStatus
}): Promise<UpdateStatusResult> {
  const auth = await requireUnlocked('manual')
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const record = await attendance.updateAttendanceStatus(auth.ctx, parseInput(updateStatusInput, input))
    revalidateAttendance()
    revalidatePath('/dashboard/manual')
    return { success: true, record }
  } catch (error) {
    console.error('Update attendance error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function getDayAttendance(params: { date?: string; course?: string }): Promise<DayAttendanceResult> {
  const auth = await requireSignedIn()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    return { success: true, ...(await attendance.listDayAttendance(auth.ctx, params)) }
  } catch (error) {
    console.error('Get day attendance error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function getAttendanceRecords(params: RangeParams): Promise<RecordsResult> {
  const auth = await requireSignedIn()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    return { success: true, ...(await attendance.listAttendanceRecords(auth.ctx, params)) }
  } catch (error) {
    console.error('Get attendance records error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function getAttendancePivot(params: RangeParams): Promise<PivotResult> {
  const auth = await requireSignedIn()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    return { success: true, ...(await attendance.getAttendancePivot(auth.ctx, params)) }
  } catch (error) {
    console.error('Get attendance pivot error:', error)
    return { success: false, error: toActionError(error) }
  }
}
