import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { parseConfig } from '@/lib/config'
import { openDatabase, type Database } from '@/lib/db'
import type { Actor } from '@/lib/types'

import type { ServiceContext } from './context'

export const TEST_BASE_URL = 'http://attendance.test'

export type TestClock = {
  now: () => Date
  set: (next: Date) => void
  advanceMinutes: (minutes: number) => void
}

// Tests build dates in local time so that day keys do not depend on the machine's time zone
export function createClock(start: Date): TestClock {
  let current = new Date(start.getTime())
  return {
    now: () => new Date(current.getTime()),
    set: (next) => {
      current = new Date(next.getTime())
    },
    advanceMinutes: (minutes) => {
      current = new Date(current.getTime() + minutes * 60_000)
    },
  }
}

/** A JSON-backed database in a fresh temporary directory. */
export async function createTestDatabase(clock: TestClock): Promise<{ db: Database; cleanup: () => Promise<void> }> {
  const dataDir = await mkdtemp(path.join(tmpdir(), 'attendance-test-'))
  const config = parseConfig({ DATA_DIR: dataDir, APP_BASE_URL: TEST_BASE_URL, BCRYPT_ROUNDS: '4' })
  const db = await openDatabase(config, { clock: clock.now, migrate: false })

  return {
    db,
    cleanup: async () => {
      await db.close()
      await rm(dataDir, { recursive: true, force: true })
    },
  }
}

export function contextFor(db: Database, actor: Actor | null, clock: TestClock): ServiceContext {
  return { db, actor, now: clock.now, baseUrl: TEST_BASE_URL }
}

export const admin: Actor = { username: 'admin', role: 'admin' }
export const alice: Actor = { username: 'alice', role: 'teacher' }
export const bob: Actor = { username: 'bob', role: 'teacher' }
