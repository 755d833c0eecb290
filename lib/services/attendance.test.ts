import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import type { Database } from '@/lib/db'

import {
  bulkMarkAttendance,
  getAttendancePivot,
  getDashboardSummary,
  listAttendanceRecords,
  listDayAttendance,
  markAttendance,
  scanStudent,
  updateAttendanceStatus,
} from './attendance'
import { createStudent } from './students'
import { admin, alice, bob, contextFor, createClock, createTestDatabase, type TestClock } from './testing'

describe('attendance service', () => {
  let clock: TestClock
  let db: Database
  let cleanup: () => Promise<void>

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    clock = createClock(new Date(2025, 2, 10, 9, 15, 30))
    ;({ db, cleanup } = await createTestDatabase(clock))

    await createStudent(contextFor(db, alice, clock), { student_id: 'A1', name: 'Ann', course: 'Math' })
    await createStudent(contextFor(db, alice, clock), { student_id: 'A2', name: 'Abe', course: 'Art' })
    await createStudent(contextFor(db, bob, clock), { student_id: 'B1', name: 'Bea', course: 'Bio' })
  })

  afterEach(async () => {
    await cleanup()
    vi.restoreAllMocks()
  })

  describe('scanStudent', () => {
    it('marks a scanned student present today', async () => {
      const { record } = await scanStudent(contextFor(db, alice, clock), ' A1 ')

      expect(record).toMatchObject({
        student_id: 'A1',
        date: '2025-03-10',
        time: '09:15:30',
        status: 1,
        course: 'Math',
        method: 'scanner_device',
        created_by: 'alice',
      })
    })

    it('rejects a second mark on the same day', async () => {
      const ctx = contextFor(db, alice, clock)
      await scanStudent(ctx, 'A1')

      await expect(scanStudent(ctx, 'A1')).rejects.toMatchObject({
        code: 'already_marked',
        message: 'Ann (A1) is already marked for 2025-03-10.',
      })
      expect(await db.attendance.countDocuments({ student_id: 'A1' })).toBe(1)
    })

    it('only finds students in the actor\'s scope', async () => {
      await expect(scanStudent(contextFor(db, alice, clock), 'B1')).rejects.toMatchObject({
        code: 'not_found',
        message: 'Student not found in database.',
      })
    })
  })

  describe('markAttendance', () => {
    it('records the chosen date, status and course override', async () => {
      const { record } = await markAttendance(contextFor(db, alice, clock), {
        studentId: 'A2',
        status: 0,
        date: '2025-03-07',
        course: 'Drama',
      })

      expect(record).toMatchObject({
        date: '2025-03-07',
        time: '09:15:30',
        status: 0,
        course: 'Drama',
        method: 'manual_entry',
      })
    })

    it('tags records added from the edit view', async () => {
      const { record } = await markAttendance(contextFor(db, alice, clock), {
        studentId: 'A1',
        status: 1,
        fromEditView: true,
      })
      expect(record.method).toBe('manual_edit')
    })
  })

  describe('bulkMarkAttendance', () => {
    it('marks listed students and counts existing marks and unknown ids', async () => {
      const ctx = contextFor(db, alice, clock)
      await scanStudent(ctx, 'A1')

      expect(
        await bulkMarkAttendance(ctx, {
          date: '2025-03-10',
          records: [
            { student_id: 'A1', status: 1 },
            { student_id: 'A2', status: 0 },
            { student_id: 'B1', status: 1 },
          ],
        })
      ).toEqual({ marked: 1, already: 1, errors: ['B1: student not found.'] })

      expect(await db.attendance.findOne({ student_id: 'A2' })).toMatchObject({ status: 0, method: 'bulk_entry' })
    })
  })

  describe('updateAttendanceStatus', () => {
    it('changes the status and stamps who changed it', async () => {
      await scanStudent(contextFor(db, alice, clock), 'A1')
      clock.advanceMinutes(5)

      const record = await updateAttendanceStatus(contextFor(db, alice, clock), {
        studentId: 'A1',
        date: '2025-03-10',
        status: 0,
      })

      expect(record).toMatchObject({ status: 0, modified_by: 'alice', last_modified: clock.now().toISOString() })
      expect(await db.attendance.findOne({ student_id: 'A1' })).toMatchObject({ status: 0, modified_by: 'alice' })
      expect(await db.auditLogs.findOne({ action: 'attendance:update_status' })).toMatchObject({
        actor: 'alice',
        resource_type: 'attendance',
        resource_id: 'A1',
        changes: { date: '2025-03-10', from: 1, to: 0 },
      })
    })

    it('hides other teachers\' records', async () => {
      await scanStudent(contextFor(db, bob, clock), 'B1')

      await expect(
        updateAttendanceStatus(contextFor(db, alice, clock), { studentId: 'B1', date: '2025-03-10', status: 0 })
      ).rejects.toMatchObject({ code: 'not_found' })
      expect(
        await updateAttendanceStatus(contextFor(db, admin, clock), { studentId: 'B1', date: '2025-03-10', status: 0 })
      ).toMatchObject({ modified_by: 'admin' })
    })
  })

  describe('reports', () => {
    beforeEach(async () => {
      const ctx = contextFor(db, alice, clock)
      await markAttendance(ctx, { studentId: 'A1', status: 1, date: '2025-03-08' })
      await markAttendance(ctx, { studentId: 'A2', status: 0, date: '2025-03-08' })
      await markAttendance(ctx, { studentId: 'A1', status: 1, date: '2025-03-10' })
      await scanStudent(contextFor(db, bob, clock), 'B1')
    })

    it('lists records in range with names and statistics', async () => {
      const result = await listAttendanceRecords(contextFor(db, alice, clock), {
        start: '2025-03-08',
        end: '2025-03-10',
      })

      expect(result.rows.map((row) => [row.date, row.student_id, row.name, row.status])).toEqual([
        ['2025-03-10', 'A1', 'Ann', 1],
        ['2025-03-08', 'A1', 'Ann', 1],
        ['2025-03-08', 'A2', 'Abe', 0],
      ])
      expect(result.stats).toEqual({ present: 2, absent: 1, total: 3, rate: 66.7 })
    })

    it('filters records by course', async () => {
      const result = await listAttendanceRecords(contextFor(db, alice, clock), {
        start: '2025-03-01',
        end: '2025-03-10',
        course: 'Art',
      })
      expect(result.rows.map((row) => row.student_id)).toEqual(['A2'])
    })

    it('pivots students against every day in range', async () => {
      const { pivot } = await getAttendancePivot(contextFor(db, alice, clock), {
        start: '2025-03-08',
        end: '2025-03-10',
      })

      expect(pivot.dates).toEqual(['2025-03-08', '2025-03-09', '2025-03-10'])
      expect(pivot.rows).toEqual([
        { student_id: 'A2', name: 'Abe', course: 'Art', values: { '2025-03-08': 0, '2025-03-09': 0, '2025-03-10': 0 } },
        { student_id: 'A1', name: 'Ann', course: 'Math', values: { '2025-03-08': 1, '2025-03-09': 0, '2025-03-10': 1 } },
      ])
    })

    it('limits pivot marks to the course while keeping the whole roster', async () => {
      const { pivot } = await getAttendancePivot(contextFor(db, alice, clock), {
        start: '2025-03-08',
        end: '2025-03-10',
        course: 'Art',
      })

      expect(pivot.rows).toEqual([
        { student_id: 'A2', name: 'Abe', course: 'Art', values: { '2025-03-08': 0, '2025-03-09': 0, '2025-03-10': 0 } },
        { student_id: 'A1', name: 'Ann', course: 'Math', values: { '2025-03-08': 0, '2025-03-09': 0, '2025-03-10': 0 } },
      ])

      const math = await getAttendancePivot(contextFor(db, alice, clock), {
        start: '2025-03-08',
        end: '2025-03-10',
        course: 'Math',
      })
      expect(math.pivot.rows.map((row) => [row.student_id, row.values['2025-03-10']])).toEqual([
        ['A2', 0],
        ['A1', 1],
      ])
    })

    it('shows the day view with missing records', async () => {
      const { entries } = await listDayAttendance(contextFor(db, alice, clock), { date: '2025-03-10' })
      expect(entries.map((entry) => [entry.student.student_id, entry.record?.status ?? null])).toEqual([
        ['A2', null],
        ['A1', 1],
      ])
    })

    it('summarizes the dashboard per actor', async () => {
      const summary = await getDashboardSummary(contextFor(db, alice, clock))

      expect(summary).toMatchObject({ totalStudents: 2, today: '2025-03-10', recordsToday: 1, presentToday: 1 })
      expect(summary.lastSevenDays).toHaveLength(7)
      expect(summary.lastSevenDays[0]).toEqual({ date: '2025-03-04', present: 0, total: 0 })
      expect(summary.lastSevenDays[4]).toEqual({ date: '2025-03-08', present: 1, total: 2 })

      expect((await getDashboardSummary(contextFor(db, admin, clock))).recordsToday).toBe(2)
    })
  })
})
