'use server'

import { revalidatePath } from 'next/cache'

import type { StudentDoc } from '@/lib/db/schema'
import { toActionError, type ActionResult } from '@/lib/errors'
import { requireAdmin, requireSignedIn } from '@/lib/guards'
import * as students from '@/lib/services/students'

export type StudentsResult = ActionResult<{ students: StudentDoc[] }>
export type CoursesResult = ActionResult<{ courses: string[] }>
export type StudentResult = ActionResult<{ student: StudentDoc }>
export type DeleteStudentResult = ActionResult<{ linksRemoved: number }>
export type StudentImportResult = ActionResult<students.StudentImportSummary>

export async function getStudents(params?: { course?: string; query?: string }): Promise<StudentsResult> {
  const auth = await requireSignedIn()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    return { success: true, students: await students.listStudents(auth.ctx, params) }
  } catch (error) {
    console.error('Get students error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function getCourses(): Promise<CoursesResult> {
  const auth = await requireSignedIn()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    return { success: true, courses: await students.listCourses(auth.ctx) }
  } catch (error) {
    console.error('Get courses error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function createStudent(input: {
  student_id: string
  name: string
  course?: string | null
}): Promise<StudentResult> {
  const auth = await requireSignedIn()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const student = await students.createStudent(auth.ctx, input)
    revalidatePath('/dashboard/students')
    return { success: true, student }
  } catch (error) {
    console.error('Create student error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function updateStudent(
  studentId: string,
  updates: { name?: string; course?: string | null }
): Promise<StudentResult> {
  const auth = await requireSignedIn()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const student = await students.updateStudent(auth.ctx, studentId, updates)
    revalidatePath('/dashboard/students')
    return { success: true, student }
  } catch (error) {
    console.error('Update student error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function deleteStudent(studentId: string): Promise<DeleteStudentResult> {
  const auth = await requireAdmin()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const result = await students.deleteStudent(auth.ctx, studentId)
    revalidatePath('/dashboard/students')
    revalidatePath('/dashboard/links')
    return { success: true, ...result }
  } catch (error) {
    console.error('Delete student error:', error)
    return { success: false, error: toActionError(error) }
  }
}

export async function importStudentsCsv(csvText: string): Promise<StudentImportResult> {
  const auth = await requireSignedIn()
  if (!auth.ok) return { success: false, error: auth.error }

  try {
    const summary = await students.importStudentsCsv(auth.ctx, csvText)
    revalidatePath('/dashboard/students')
    return { success: true, ...summary }
  } catch (error) {
    console.error('Import students CSV error:', error)
    return { success: false, error: toActionError(error) }
  }
}
