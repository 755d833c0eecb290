import type { z } from 'zod'

export type JsonPrimitive = string | number | boolean | null
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue }

export type StoredDocument = Record<string, unknown>

export type OperatorCondition = {
  $exists?: boolean
  $ne?: JsonPrimitive
  $gt?: string | number
  $gte?: string | number
  $lt?: string | number
  $lte?: string | number
  $in?: JsonPrimitive[]
}

export type FieldCondition = JsonPrimitive | OperatorCondition

// Every entry must hold. A bare null also matches a missing field, as in MongoDB.
export type QueryFilter = Record<string, FieldCondition>

export type UpdateSpec = {
  $set?: Record<string, JsonValue>
  $inc?: Record<string, number>
  $unset?: Record<string, true>
}

export type SortSpec = Record<string, 1 | -1>

export type FindOptions = {
  sort?: SortSpec
  limit?: number
}

export type UpdateOutcome = {
  matched: number
  modified: number
  upserted: boolean
}

export interface DocumentCollection<T extends StoredDocument> {
  readonly name: string
  findOne(filter?: QueryFilter): Promise<T | null>
  find(filter?: QueryFilter, options?: FindOptions): Promise<T[]>
  insertOne(doc: T): Promise<void>
  insertMany(docs: T[]): Promise<number>
  updateOne(filter: QueryFilter, update: UpdateSpec, options?: { upsert?: boolean }): Promise<UpdateOutcome>
  updateMany(filter: QueryFilter, update: UpdateSpec): Promise<UpdateOutcome>
  deleteOne(filter: QueryFilter): Promise<number>
  deleteMany(filter: QueryFilter): Promise<number>
  countDocuments(filter?: QueryFilter): Promise<number>
}

export type CollectionDefinition<T extends StoredDocument> = {
  name: string
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
  uniqueKeys?: string[][]
  indexes?: string[]
  // Documents carry an ISO `expires_at` and disappear once it has passed
  expiring?: boolean
}

export type DatabaseBackend = 'mongo' | 'json'
