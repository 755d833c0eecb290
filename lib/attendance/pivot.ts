import type { AttendanceDoc, AttendanceStatus, StudentDoc } from '@/lib/db/schema'

export type AttendanceStats = {
  present: number
  absent: number
  total: number
  rate: number
}

export type PivotRow = {
  student_id: string
  name: string
  course: string
  values: Record<string, AttendanceStatus>
}

export type AttendancePivot = {
  dates: string[]
  rows: PivotRow[]
}

export function summarizeStatuses(records: Array<{ status: AttendanceStatus }>): AttendanceStats {
  const present = records.filter((record) => record.status === 1).length
  const total = records.length
  const rate = total === 0 ? 0 : Math.round((present / total) * 1000) / 10
  return { present, absent: total - present, total, rate }
}

/** One row per student, one column per date; a present mark on any record wins. */
export function buildPivot(
  students: StudentDoc[],
  records: Array<Pick<AttendanceDoc, 'student_id' | 'date' | 'status'>>,
  dates: string[]
): AttendancePivot {
  const marks = new Map<string, AttendanceStatus>()
  for (const record of records) {
    const key = `${record.student_id}\u0000${record.date}`
    if (record.status === 1 || !marks.has(key)) marks.set(key, record.status)
  }

  const rows = students.map((student) => {
    const values: Record<string, AttendanceStatus> = {}
    for (const date of dates) {
      values[date] = marks.get(`${student.student_id}\u0000${date}`) ?? 0
    }
    return { student_id: student.student_id, name: student.name, course: student.course, values }
  })

  return { dates, rows }
}
