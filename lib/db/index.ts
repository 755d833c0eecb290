import { MongoClient } from 'mongodb'

import { getConfig, type AppConfig } from '@/lib/config'

import { JsonFileCollection } from './json-collection'
import { migrateOwnership } from './migrate'
import { MongoDocumentCollection } from './mongo-collection'
import {
  collections,
  type AttendanceDoc,
  type AuditLogDoc,
  type AuthSessionDoc,
  type SessionLinkDoc,
  type StudentDoc,
  type StudentLinkDoc,
  type UserDoc,
} from './schema'
import type { DatabaseBackend, DocumentCollection } from './types'

export type Database = {
  backend: DatabaseBackend
  users: DocumentCollection<UserDoc>
  students: DocumentCollection<StudentDoc>
  attendance: DocumentCollection<AttendanceDoc>
  sessionLinks: DocumentCollection<SessionLinkDoc>
  studentLinks: DocumentCollection<StudentLinkDoc>
  authSessions: DocumentCollection<AuthSessionDoc>
  auditLogs: DocumentCollection<AuditLogDoc>
  close(): Promise<void>
}

export type OpenDatabaseOptions = {
  clock?: () => Date
  migrate?: boolean
}

async function connectMongo(config: AppConfig & { mongoUri: string }): Promise<MongoClient | null> {
  const client = new MongoClient(config.mongoUri, { serverSelectionTimeoutMS: config.mongoTimeoutMs })

  try {
    await client.connect()
    await client.db(config.mongoDbName).command({ ping: 1 })
    return client
  } catch (error) {
    console.warn('MongoDB unreachable, falling back to JSON files:', error)
    await client.close().catch((closeError: unknown) => {
      console.error('Close MongoDB client error:', closeError)
    })
    return null
  }
}

async function openMongoDatabase(client: MongoClient, config: AppConfig, clock?: () => Date): Promise<Database> {
  const db = client.db(config.mongoDbName)
  const options = { clock }

  return {
    backend: 'mongo',
    users: await MongoDocumentCollection.open(db, collections.users, options),
    students: await MongoDocumentCollection.open(db, collections.students, options),
    attendance: await MongoDocumentCollection.open(db, collections.attendance, options),
    sessionLinks: await MongoDocumentCollection.open(db, collections.sessionLinks, options),
    studentLinks: await MongoDocumentCollection.open(db, collections.studentLinks, options),
    authSessions: await MongoDocumentCollection.open(db, collections.authSessions, options),
    auditLogs: await MongoDocumentCollection.open(db, collections.auditLogs, options),
    close: () => client.close(),
  }
}

async function openJsonDatabase(dataDir: string, clock?: () => Date): Promise<Database> {
  const options = { clock }

  return {
    backend: 'json',
    users: await JsonFileCollection.open(collections.users, dataDir, options),
    students: await JsonFileCollection.open(collections.students, dataDir, options),
    attendance: await JsonFileCollection.open(collections.attendance, dataDir, options),
    sessionLinks: await JsonFileCollection.open(collections.sessionLinks, dataDir, options),
    studentLinks: await JsonFileCollection.open(collections.studentLinks, dataDir, options),
    authSessions: await JsonFileCollection.open(collections.authSessions, dataDir, options),
    auditLogs: await JsonFileCollection.open(collections.auditLogs, dataDir, options),
    close: async () => {},
  }
}

/**
 * Opens MongoDB when `MONGODB_URI` is configured and reachable, otherwise the
 * JSON files under `DATA_DIR`. Unowned records are assigned an owner on open.
 */
export async function openDatabase(config: AppConfig, options: OpenDatabaseOptions = {}): Promise<Database> {
  const { mongoUri } = config
  const client = mongoUri ? await connectMongo({ ...config, mongoUri }) : null

  const database = client
    ? await openMongoDatabase(client, config, options.clock)
    : await openJsonDatabase(config.dataDir, options.clock)

  console.info(
    database.backend === 'mongo'
      ? `Using MongoDB database "${config.mongoDbName}"`
      : `Using JSON data files in ${config.dataDir}`
  )

  if (options.migrate ?? true) {
    try {
      await migrateOwnership(database)
    } catch (error) {
      // Older unowned records stay invisible to teachers until the next start
      console.error('Ownership migration error:', error)
    }
  }

  return database
}

let active: Promise<Database> | null = null

export function connectDatabase(config: AppConfig = getConfig(), options?: OpenDatabaseOptions) {
  if (!active) {
    active = openDatabase(config, options)
    // A failed open is retried on the next call
    void active.catch(() => {
      active = null
    })
  }
  return active
}

export function getDatabase() {
  return connectDatabase()
}

export async function closeDatabase() {
  if (!active) return
  const pending = active
  active = null
  const database = await pending
  await database.close()
}

export type { DocumentCollection } from './types'
