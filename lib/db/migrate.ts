import type { Database } from './index'

export type OwnershipMigrationResult =
  | { skipped: true }
  | {
      skipped: false
      owner: string
      students: number
      attendance: number
      sessionLinks: number
      studentLinks: number
    }

const unowned = { created_by: null }

/**
 * Assigns records written before ownership existed to the first admin, or to
 * the first user when there is no admin yet.
 */
export async function migrateOwnership(db: Database): Promise<OwnershipMigrationResult> {
  const owner = (await db.users.findOne({ role: 'admin' })) ?? (await db.users.findOne())
  if (!owner) return { skipped: true }

  const update = { $set: { created_by: owner.username } }
  const [students, attendance, sessionLinks, studentLinks] = await Promise.all([
    db.students.updateMany(unowned, update),
    db.attendance.updateMany(unowned, update),
    db.sessionLinks.updateMany(unowned, update),
    db.studentLinks.updateMany(unowned, update),
  ])

  const result = {
    skipped: false,
    owner: owner.username,
    students: students.modified,
    attendance: attendance.modified,
    sessionLinks: sessionLinks.modified,
    studentLinks: studentLinks.modified,
  } as const

  if (result.students + result.attendance + result.sessionLinks + result.studentLinks > 0) {
    console.info(
      `Assigned unowned records to "${owner.username}": ${result.students} students, ` +
        `${result.attendance} attendance records, ${result.sessionLinks} session links, ` +
        `${result.studentLinks} student links`
    )
  }

  return result
}
