import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'

import type { Database } from '@/lib/db'

import {
  checkInWithSessionLink,
  checkInWithStudentLink,
  createSessionLink,
  createStudentLink,
  deactivateLink,
  getSessionCheckIn,
  getStudentCheckIn,
  listActiveLinks,
} from './links'
import { createStudent } from './students'
import { admin, alice, bob, contextFor, createClock, createTestDatabase, type TestClock } from './testing'

describe('links service', () => {
  let clock: TestClock
  let db: Database
  let cleanup: () => Promise<void>

  const anonymous = () => contextFor(db, null, clock)

  beforeEach(async () => {
    vi.spyOn(console, 'info').mockImplementation(() => {})
    clock = createClock(new Date(2025, 2, 10, 8, 45, 0))
    ;({ db, cleanup } = await createTestDatabase(clock))

    await createStudent(contextFor(db, alice, clock), { student_id: 'A1', name: 'Ann Lee', course: 'Math' })
    await createStudent(contextFor(db, bob, clock), { student_id: 'B1', name: 'Bea', course: 'Bio' })
  })

  afterEach(async () => {
    await cleanup()
    vi.restoreAllMocks()
  })

  describe('session links', () => {
    it('creates a link with a default 24 hour lifetime', async () => {
      const { link, url } = await createSessionLink(contextFor(db, alice, clock), {
        description: ' Monday lecture ',
        course: 'Math',
      })

      expect(link).toMatchObject({
        description: 'Monday lecture',
        course: 'Math',
        created_by: 'alice',
        is_active: true,
        attendance_count: 0,
        expires_at: new Date(2025, 2, 11, 8, 45, 0).toISOString(),
      })
      expect(url).toBe(`http://attendance.test/attend/session/${link.session_id}`)
    })

    it('validates the description and duration', async () => {
      const ctx = contextFor(db, alice, clock)
      await expect(createSessionLink(ctx, { description: '  ' })).rejects.toMatchObject({
        message: 'Session description is required.',
      })
      await expect(createSessionLink(ctx, { description: 'Lab', durationHours: 169 })).rejects.toMatchObject({
        code: 'invalid_input',
        message: 'Duration must be between 1 and 168 hours.',
      })
    })

    it('checks in a student of the link owner once per day', async () => {
      const { link } = await createSessionLink(contextFor(db, alice, clock), { description: 'Lab', course: 'Lab A' })

      expect(await getSessionCheckIn(anonymous(), link.session_id)).toEqual({
        description: 'Lab',
        course: 'Lab A',
        expires_at: link.expires_at,
        owner: 'alice',
      })

      expect(await checkInWithSessionLink(anonymous(), link.session_id, { studentId: 'A1', name: 'ann lee' })).toEqual({
        student_id: 'A1',
        name: 'Ann Lee',
        date: '2025-03-10',
        time: '08:45:00',
        nameMismatch: false,
      })
      expect(await db.attendance.findOne({ student_id: 'A1' })).toMatchObject({
        method: 'session_link',
        course: 'Lab A',
        created_by: 'alice',
      })

      await expect(checkInWithSessionLink(anonymous(), link.session_id, { studentId: 'A1', name: 'Ann Lee' })).rejects.toMatchObject({
        code: 'already_marked',
        message: 'Attendance already marked for 2025-03-10.',
      })
      expect((await db.sessionLinks.findOne({ session_id: link.session_id }))?.attendance_count).toBe(1)
    })

    it('flags a mismatched name but still records the mark', async () => {
      const { link } = await createSessionLink(contextFor(db, alice, clock), { description: 'Lab' })

      const outcome = await checkInWithSessionLink(anonymous(), link.session_id, { studentId: 'A1', name: 'Someone' })
      expect(outcome.nameMismatch).toBe(true)
      expect(await db.attendance.countDocuments({ student_id: 'A1' })).toBe(1)
    })

    it('requires the student to type their name', async () => {
      const { link } = await createSessionLink(contextFor(db, alice, clock), { description: 'Lab' })

      for (const name of [undefined, '', '   ']) {
        await expect(checkInWithSessionLink(anonymous(), link.session_id, { studentId: 'A1', name })).rejects.toMatchObject({
          code: 'invalid_input',
          message: 'Please enter your name.',
        })
      }
      expect(await db.attendance.countDocuments({ student_id: 'A1' })).toBe(0)
      expect((await db.sessionLinks.findOne({ session_id: link.session_id }))?.attendance_count).toBe(0)
    })

    it('refuses students outside the owner\'s roster', async () => {
      const { link } = await createSessionLink(contextFor(db, alice, clock), { description: 'Lab' })

      await expect(checkInWithSessionLink(anonymous(), link.session_id, { studentId: 'B1', name: 'Ben' })).rejects.toMatchObject({
        code: 'not_found',
        message: 'Student ID not found. Please check and try again.',
      })
    })

    it('reports unknown, expired and deactivated links', async () => {
      const { link } = await createSessionLink(contextFor(db, alice, clock), { description: 'Lab', durationHours: 1 })

      await expect(getSessionCheckIn(anonymous(), 'missing')).rejects.toMatchObject({
        code: 'not_found',
        message: 'Invalid or expired attendance link.',
      })

      await deactivateLink(contextFor(db, alice, clock), 'session', link.session_id)
      await expect(getSessionCheckIn(anonymous(), link.session_id)).rejects.toMatchObject({
        code: 'inactive',
        message: 'This attendance link is no longer active.',
      })

      clock.advanceMinutes(61)
      await expect(getSessionCheckIn(anonymous(), link.session_id)).rejects.toMatchObject({
        code: 'expired',
        message: 'This attendance link has expired.',
      })
    })
  })

  describe('student links', () => {
    it('stores zero maximum uses as unlimited', async () => {
      const { link, url } = await createStudentLink(contextFor(db, alice, clock), { studentId: 'A1' })

      expect(link).toMatchObject({
        student_id: 'A1',
        max_uses: null,
        uses: 0,
        expires_at: new Date(2025, 2, 17, 8, 45, 0).toISOString(),
      })
      expect(url).toBe(`http://attendance.test/attend/student/${link.link_id}`)

      await expect(createStudentLink(contextFor(db, alice, clock), { studentId: 'A1', maxUses: -1 })).rejects.toMatchObject({
        message: 'Maximum uses must be 0 (unlimited) or more.',
      })
      await expect(createStudentLink(contextFor(db, alice, clock), { studentId: 'B1' })).rejects.toMatchObject({
        code: 'not_found',
      })
    })

    it('checks in the linked student until the uses run out', async () => {
      const { link } = await createStudentLink(contextFor(db, alice, clock), { studentId: 'A1', maxUses: 1 })

      expect(await getStudentCheckIn(anonymous(), link.link_id)).toEqual({
        student_id: 'A1',
        expires_at: link.expires_at,
        uses: 0,
        max_uses: 1,
        student_name: 'Ann Lee',
        course: 'Math',
      })

      expect(await checkInWithStudentLink(anonymous(), link.link_id)).toMatchObject({
        student_id: 'A1',
        date: '2025-03-10',
        nameMismatch: false,
      })
      expect(await db.attendance.findOne({ student_id: 'A1' })).toMatchObject({
        method: 'personal_link',
        course: 'Math',
      })

      clock.advanceMinutes(24 * 60)
      await expect(checkInWithStudentLink(anonymous(), link.link_id)).rejects.toMatchObject({
        code: 'exhausted',
        message: 'This attendance link has reached its maximum number of uses.',
      })
    })

    it('does not count a repeated check-in on the same day', async () => {
      const { link } = await createStudentLink(contextFor(db, alice, clock), { studentId: 'A1' })
      await checkInWithStudentLink(anonymous(), link.link_id)

      await expect(checkInWithStudentLink(anonymous(), link.link_id)).rejects.toMatchObject({ code: 'already_marked' })
      expect((await db.studentLinks.findOne({ link_id: link.link_id }))?.uses).toBe(1)
    })
  })

  describe('listActiveLinks', () => {
    it('lists live links in scope with student names', async () => {
      const { link: session } = await createSessionLink(contextFor(db, alice, clock), { description: 'Lab' })
      const { link: personal } = await createStudentLink(contextFor(db, alice, clock), { studentId: 'A1' })
      const { link: short } = await createSessionLink(contextFor(db, alice, clock), {
        description: 'Quiz',
        durationHours: 1,
      })
      await createSessionLink(contextFor(db, bob, clock), { description: 'Other' })
      await deactivateLink(contextFor(db, alice, clock), 'session', short.session_id)

      const links = await listActiveLinks(contextFor(db, alice, clock))
      expect(links.sessions.map((link) => link.session_id)).toEqual([session.session_id])
      expect(links.students).toEqual([{ ...personal, student_name: 'Ann Lee' }])

      expect((await listActiveLinks(contextFor(db, admin, clock))).sessions).toHaveLength(2)
    })

    it('records link creation and deactivation in the audit log', async () => {
      const { link: session } = await createSessionLink(contextFor(db, alice, clock), { description: 'Lab' })
      const { link: personal } = await createStudentLink(contextFor(db, alice, clock), { studentId: 'A1', maxUses: 2 })
      await deactivateLink(contextFor(db, alice, clock), 'student', personal.link_id)

      expect(await db.auditLogs.find({ action: 'links:create' })).toEqual([
        expect.objectContaining({
          actor: 'alice',
          resource_type: 'session_links',
          resource_id: session.session_id,
          changes: { description: 'Lab', course: null, expires_at: session.expires_at },
        }),
        expect.objectContaining({
          actor: 'alice',
          resource_type: 'student_links',
          resource_id: personal.link_id,
          changes: { student_id: 'A1', expires_at: personal.expires_at, max_uses: 2 },
        }),
      ])
      expect(await db.auditLogs.findOne({ action: 'links:deactivate' })).toMatchObject({
        actor: 'alice',
        resource_type: 'student_links',
        resource_id: personal.link_id,
        changes: {},
      })
    })

    it('does not let teachers deactivate other teachers\' links', async () => {
      const { link } = await createSessionLink(contextFor(db, bob, clock), { description: 'Other' })

      await expect(deactivateLink(contextFor(db, alice, clock), 'session', link.session_id)).rejects.toMatchObject({
        code: 'not_found',
      })
    })
  })
})
