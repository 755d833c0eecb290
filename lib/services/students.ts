import type { StudentDoc } from '@/lib/db/schema'
import type { QueryFilter } from '@/lib/db/types'
import { AppError, isDuplicateKeyError } from '@/lib/errors'
import { canModify, scoped } from '@/lib/scope'
import { readCsvRows } from '@/lib/spreadsheet'

import { recordAudit } from './audit'
import { requireActor, requireAdminActor, type ServiceContext } from './context'

export type StudentImportError = {
  row: number
  student_id?: string
  message: string
}

export type StudentImportSummary = {
  inserted: number
  skipped: number
  errors: StudentImportError[]
}

function compareStudents(a: StudentDoc, b: StudentDoc) {
  return a.course.localeCompare(b.course) || a.student_id.localeCompare(b.student_id)
}

export async function listStudents(
  ctx: ServiceContext,
  params?: { course?: string | null; query?: string | null }
): Promise<StudentDoc[]> {
  const actor = requireActor(ctx)

  const filter: QueryFilter = {}
  const course = params?.course?.trim()
  if (course && course !== 'all') filter.course = course

  let students = await ctx.db.students.find(scoped(filter, actor))

  const search = params?.query?.trim().toLowerCase()
  if (search) {
    students = students.filter(
      (student) =>
        student.student_id.toLowerCase().includes(search) || student.name.toLowerCase().includes(search)
    )
  }

  return students.sort(compareStudents)
}

export async function listCourses(ctx: ServiceContext): Promise<string[]> {
  const students = await listStudents(ctx)
  const courses = new Set(students.map((student) => student.course).filter(Boolean))
  return [...courses].sort((a, b) => a.localeCompare(b))
}

/** A student the actor may see, or null. */
export async function findStudentInScope(ctx: ServiceContext, studentId: string): Promise<StudentDoc | null> {
  const actor = requireActor(ctx)
  const id = studentId.trim()
  if (!id) return null
  return ctx.db.students.findOne(scoped({ student_id: id }, actor))
}

export async function getStudentInScope(ctx: ServiceContext, studentId: string): Promise<StudentDoc> {
  const student = await findStudentInScope(ctx, studentId)
  if (!student) throw new AppError('not_found', 'Student not found.')
  return student
}

export async function createStudent(
  ctx: ServiceContext,
  input: { student_id: string; name: string; course?: string | null }
): Promise<StudentDoc> {
  const actor = requireActor(ctx)

  const student_id = input.student_id.trim()
  const name = input.name.trim()
  if (!student_id || !name) throw new AppError('invalid_input', 'Student ID and name are required.')

  const student: StudentDoc = {
    student_id,
    name,
    course: input.course?.trim() ?? '',
    created_by: actor.username,
    created_at: ctx.now().toISOString(),
  }

  try {
    await ctx.db.students.insertOne(student)
  } catch (error) {
    if (isDuplicateKeyError(error)) throw new AppError('duplicate', 'Student ID already exists')
    throw error
  }

  await recordAudit(ctx, {
    action: 'students:create',
    resource_type: 'students',
    resource_id: student_id,
    changes: { name, course: student.course },
  })

  return student
}

export async function updateStudent(
  ctx: ServiceContext,
  studentId: string,
  updates: { name?: string; course?: string | null }
): Promise<StudentDoc> {
  const actor = requireActor(ctx)
  const existing = await getStudentInScope(ctx, studentId)
  if (!canModify(existing, actor)) throw new AppError('forbidden', 'You can only edit your own students.')

  const changes: Record<string, string> = {}
  if (typeof updates.name === 'string') changes.name = updates.name.trim()
  if (updates.course !== undefined) changes.course = updates.course?.trim() ?? ''

  if (changes.name === '') throw new AppError('invalid_input', 'Student name is required.')
  if (Object.keys(changes).length === 0) return existing

  await ctx.db.students.updateOne({ student_id: existing.student_id }, { $set: changes })
  await recordAudit(ctx, {
    action: 'students:update',
    resource_type: 'students',
    resource_id: existing.student_id,
    changes,
  })

  return { ...existing, ...changes }
}

/** Removes the student and every link issued for them; attendance history is kept. */
export async function deleteStudent(ctx: ServiceContext, studentId: string): Promise<{ linksRemoved: number }> {
  requireAdminActor(ctx)
  const existing = await getStudentInScope(ctx, studentId)

  await ctx.db.students.deleteOne({ student_id: existing.student_id })
  const linksRemoved = await ctx.db.studentLinks.deleteMany({ student_id: existing.student_id })

  await recordAudit(ctx, {
    action: 'students:delete',
    resource_type: 'students',
    resource_id: existing.student_id,
    changes: { name: existing.name, links_removed: linksRemoved },
  })

  return { linksRemoved }
}

export async function importStudentsCsv(ctx: ServiceContext, csvText: string): Promise<StudentImportSummary> {
  const actor = requireActor(ctx)

  const errors: StudentImportError[] = []
  const normalizedRows: StudentDoc[] = []
  const seen = new Set<string>()
  let skipped = 0

  readCsvRows(csvText).forEach((row, index) => {
    const student_id = row.student_id || row.id || ''
    const name = row.name || row.student_name || ''
    const course = row.course || row.class || ''

    if (!student_id && !name && !course) return

    if (!student_id || !name) {
      errors.push({
        row: index + 1,
        student_id: student_id || undefined,
        message: 'Student ID and name are required.',
      })
      return
    }

    if (seen.has(student_id)) {
      skipped++
      return
    }

    seen.add(student_id)
    normalizedRows.push({
      student_id,
      name,
      course,
      created_by: actor.username,
      created_at: ctx.now().toISOString(),
    })
  })

  if (normalizedRows.length === 0) {
    return {
      inserted: 0,
      skipped,
      errors: errors.length > 0 ? errors : [{ row: 0, message: 'No valid student rows found.' }],
    }
  }

  // Ids are unique across owners, so the lookup is unscoped
  const existing = await ctx.db.students.find({ student_id: { $in: normalizedRows.map((row) => row.student_id) } })
  const existingIds = new Set(existing.map((student) => student.student_id))

  const toInsert = normalizedRows.filter((row) => !existingIds.has(row.student_id))
  skipped += normalizedRows.length - toInsert.length

  const inserted = await ctx.db.students.insertMany(toInsert)

  await recordAudit(ctx, {
    action: 'students:import_csv',
    resource_type: 'students',
    changes: { inserted, skipped, errors: errors.length },
  })

  return { inserted, skipped, errors }
}
