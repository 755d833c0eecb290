import { z } from 'zod'

import { attendanceStatusSchema } from '@/lib/db/schema'
import { AppError } from '@/lib/errors'

// Server actions receive whatever the client serialized, so inputs are parsed before reaching a service

export const markAttendanceInput = z.object({
  studentId: z.string(),
  status: attendanceStatusSchema,
  date: z.string().optional(),
  course: z.string().optional(),
  fromEditView: z.boolean().optional(),
})

export const bulkMarkInput = z.object({
  date: z.string().optional(),
  records: z.array(z.object({ student_id: z.string(), status: attendanceStatusSchema })),
})

export const updateStatusInput = z.object({
  studentId: z.string(),
  date: z.string(),
  status: attendanceStatusSchema,
})

export const sessionLinkInput = z.object({
  description: z.string(),
  course: z.string().optional(),
  durationHours: z.number().finite().optional(),
})

export const studentLinkInput = z.object({
  studentId: z.string(),
  durationHours: z.number().finite().optional(),
  maxUses: z.number().finite().optional(),
})

export const sessionCheckInInput = z.object({
  studentId: z.string(),
  name: z.string().optional(),
})

export function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value)
  if (result.success) return result.data

  const issue = result.error.issues[0]
  const field = issue?.path.join('.') || 'input'
  throw new AppError('invalid_input', `Invalid ${field}: ${issue?.message ?? 'invalid value'}`)
}
