import { z } from 'zod'

import type { CollectionDefinition } from './types'

const nullableString = z.string().nullable().default(null)

export const userRoleSchema = z.enum(['admin', 'teacher'])
export type UserRole = z.infer<typeof userRoleSchema>

export const userStatusSchema = z.enum(['active', 'inactive'])
export type UserStatus = z.infer<typeof userStatusSchema>

export const userSchema = z.object({
  username: z.string(),
  password: z.string(),
  email: z.string(),
  name: z.string().default(''),
  role: userRoleSchema.default('teacher'),
  status: userStatusSchema.default('active'),
  created_at: z.string(),
  last_login: nullableString,
  failed_attempts: z.number().int().default(0),
  is_locked: z.boolean().default(false),
  lockout_until: nullableString,
  password_reset_token: nullableString,
  password_reset_expires: nullableString,
  last_modified: nullableString,
})
export type UserDoc = z.infer<typeof userSchema>

// `created_by` is optional only so that records written before ownership existed still load
export const studentSchema = z.object({
  student_id: z.string(),
  name: z.string(),
  course: z.string().default(''),
  created_by: z.string().nullable().optional(),
  created_at: nullableString,
})
export type StudentDoc = z.infer<typeof studentSchema>

export const attendanceStatusSchema = z.union([z.literal(0), z.literal(1)])
export type AttendanceStatus = z.infer<typeof attendanceStatusSchema>

export const attendanceMethodSchema = z.enum([
  'scanner_device',
  'manual_entry',
  'manual_edit',
  'bulk_entry',
  'session_link',
  'personal_link',
])
export type AttendanceMethod = z.infer<typeof attendanceMethodSchema>

export const attendanceSchema = z.object({
  student_id: z.string(),
  date: z.string(),
  time: z.string(),
  status: attendanceStatusSchema,
  course: nullableString,
  method: z.string().default('manual_entry'),
  ts: z.string(),
  created_by: z.string().nullable().optional(),
  last_modified: nullableString,
  modified_by: nullableString,
})
export type AttendanceDoc = z.infer<typeof attendanceSchema>

export const sessionLinkSchema = z.object({
  session_id: z.string(),
  course: nullableString,
  description: z.string().default(''),
  created_by: z.string().nullable().optional(),
  created_at: z.string(),
  expires_at: z.string(),
  is_active: z.boolean().default(true),
  attendance_count: z.number().int().default(0),
})
export type SessionLinkDoc = z.infer<typeof sessionLinkSchema>

export const studentLinkSchema = z.object({
  link_id: z.string(),
  student_id: z.string(),
  created_by: z.string().nullable().optional(),
  created_at: z.string(),
  expires_at: z.string(),
  is_active: z.boolean().default(true),
  uses: z.number().int().default(0),
  max_uses: z.number().int().positive().nullable().default(null),
})
export type StudentLinkDoc = z.infer<typeof studentLinkSchema>

export const authSessionSchema = z.object({
  token: z.string(),
  username: z.string(),
  created_at: z.string(),
  expires_at: z.string(),
  unlocked: z.array(z.string()).default([]),
})
export type AuthSessionDoc = z.infer<typeof authSessionSchema>

export const auditLogSchema = z.object({
  id: z.string(),
  actor: z.string(),
  action: z.string(),
  resource_type: z.string(),
  resource_id: nullableString,
  changes: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).default({}),
  created_at: z.string(),
})
export type AuditLogDoc = z.infer<typeof auditLogSchema>

export const collections = {
  users: {
    name: 'users',
    schema: userSchema,
    uniqueKeys: [['username'], ['email']],
    indexes: ['password_reset_token'],
  },
  students: {
    name: 'students',
    schema: studentSchema,
    uniqueKeys: [['student_id']],
    indexes: ['created_by'],
  },
  attendance: {
    name: 'attendance',
    schema: attendanceSchema,
    uniqueKeys: [['student_id', 'date']],
    indexes: ['created_by'],
  },
  sessionLinks: {
    name: 'attendance_sessions',
    schema: sessionLinkSchema,
    uniqueKeys: [['session_id']],
    indexes: ['created_by'],
  },
  studentLinks: {
    name: 'attendance_links',
    schema: studentLinkSchema,
    uniqueKeys: [['link_id']],
    indexes: ['created_by'],
  },
  authSessions: {
    name: 'auth_sessions',
    schema: authSessionSchema,
    uniqueKeys: [['token']],
    indexes: ['username'],
    expiring: true,
  },
  auditLogs: {
    name: 'audit_logs',
    schema: auditLogSchema,
    uniqueKeys: [['id']],
    indexes: ['actor'],
  },
} satisfies {
  users: CollectionDefinition<UserDoc>
  students: CollectionDefinition<StudentDoc>
  attendance: CollectionDefinition<AttendanceDoc>
  sessionLinks: CollectionDefinition<SessionLinkDoc>
  studentLinks: CollectionDefinition<StudentLinkDoc>
  authSessions: CollectionDefinition<AuthSessionDoc>
  auditLogs: CollectionDefinition<AuditLogDoc>
}
