import type { AttendancePivot } from '@/lib/attendance/pivot'
import type { StudentDoc } from '@/lib/db/schema'
import type { DateRange } from '@/lib/dates'
import type { AttendanceRow } from '@/lib/services/attendance'
import { writeTable, type TableFile, type TableFormat, type TableRow } from '@/lib/spreadsheet'

export function statusLabel(status: number) {
  return status === 1 ? 'Present' : 'Absent'
}

export function exportStudents(students: StudentDoc[], format: TableFormat, today: string): TableFile {
  return writeTable(
    students.map((student) => ({ student_id: student.student_id, name: student.name, course: student.course })),
    { columns: ['student_id', 'name', 'course'], format, sheetName: 'Students', basename: `students_${today}` }
  )
}

export function exportRecords(rows: AttendanceRow[], range: DateRange, format: TableFormat): TableFile {
  return writeTable(
    rows.map((row) => ({
      'Student ID': row.student_id,
      Name: row.name,
      Course: row.course,
      Date: row.date,
      Time: row.time,
      Status: statusLabel(row.status),
      Method: row.method,
    })),
    {
      columns: ['Student ID', 'Name', 'Course', 'Date', 'Time', 'Status', 'Method'],
      format,
      sheetName: 'Attendance',
      basename: `attendance_${range.start}_${range.end}`,
    }
  )
}

/** Students down, dates across, 1 for present and 0 otherwise. */
export function exportPivot(pivot: AttendancePivot, range: DateRange, format: TableFormat): TableFile {
  return writeTable(
    pivot.rows.map((row) => {
      const cells: TableRow = { 'Student ID': row.student_id, Name: row.name, Course: row.course }
      for (const date of pivot.dates) cells[date] = row.values[date] ?? 0
      return cells
    }),
    {
      columns: ['Student ID', 'Name', 'Course', ...pivot.dates],
      format,
      sheetName: 'Pivot',
      basename: `attendance_pivot_${range.start}_${range.end}`,
    }
  )
}
