import type { Collection, Db, Document } from 'mongodb'

import type {
  CollectionDefinition,
  DocumentCollection,
  FindOptions,
  QueryFilter,
  StoredDocument,
  UpdateOutcome,
  UpdateSpec,
} from './types'

type MongoCollectionOptions = {
  clock?: () => Date
}

export function toMongoUpdate(update: UpdateSpec): Document {
  const mongoUpdate: Document = {}
  if (update.$set && Object.keys(update.$set).length > 0) mongoUpdate.$set = update.$set
  if (update.$inc && Object.keys(update.$inc).length > 0) mongoUpdate.$inc = update.$inc
  if (update.$unset && Object.keys(update.$unset).length > 0) {
    mongoUpdate.$unset = Object.fromEntries(Object.keys(update.$unset).map((field) => [field, '']))
  }
  return mongoUpdate
}

// Expiry is stored as an ISO string, so it is applied on read instead of through a TTL index
export function toMongoFilter(filter: QueryFilter, liveAt: Date | null): Document {
  if (!liveAt) return { ...filter }
  const live = { expires_at: { $gt: liveAt.toISOString() } }
  return Object.keys(filter).length === 0 ? live : { $and: [{ ...filter }, live] }
}

/** Parses a driver result through the collection schema, which also drops `_id`. */
export function fromMongoDocument<T extends StoredDocument>(definition: CollectionDefinition<T>, doc: Document): T {
  return definition.schema.parse(doc)
}

export class MongoDocumentCollection<T extends StoredDocument> implements DocumentCollection<T> {
  readonly name: string
  private readonly clock: () => Date

  private constructor(
    private readonly definition: CollectionDefinition<T>,
    private readonly collection: Collection<Document>,
    options: MongoCollectionOptions
  ) {
    this.name = definition.name
    this.clock = options.clock ?? (() => new Date())
  }

  static async open<T extends StoredDocument>(
    db: Db,
    definition: CollectionDefinition<T>,
    options: MongoCollectionOptions = {}
  ) {
    const collection = db.collection<Document>(definition.name)

    for (const keys of definition.uniqueKeys ?? []) {
      await collection.createIndex(Object.fromEntries(keys.map((key) => [key, 1])), { unique: true })
    }
    for (const key of definition.indexes ?? []) {
      await collection.createIndex({ [key]: 1 })
    }

    return new MongoDocumentCollection(definition, collection, options)
  }

  async findOne(filter: QueryFilter = {}): Promise<T | null> {
    const doc = await this.collection.findOne(this.toMongoFilter(filter))
    return doc ? fromMongoDocument(this.definition, doc) : null
  }

  async find(filter: QueryFilter = {}, options: FindOptions = {}): Promise<T[]> {
    let cursor = this.collection.find(this.toMongoFilter(filter))
    if (options.sort) cursor = cursor.sort(options.sort)
    if (options.limit !== undefined && options.limit > 0) cursor = cursor.limit(options.limit)

    const docs = await cursor.toArray()
    return docs.map((doc) => fromMongoDocument(this.definition, doc))
  }

  async insertOne(doc: T): Promise<void> {
    // The driver writes `_id` back into the object it is given
    const payload: Document = { ...this.definition.schema.parse(doc) }
    await this.collection.insertOne(payload)
  }

  async insertMany(docs: T[]): Promise<number> {
    if (docs.length === 0) return 0
    const payload = docs.map((doc): Document => ({ ...this.definition.schema.parse(doc) }))
    const result = await this.collection.insertMany(payload)
    return result.insertedCount
  }

  async updateOne(
    filter: QueryFilter,
    update: UpdateSpec,
    options: { upsert?: boolean } = {}
  ): Promise<UpdateOutcome> {
    const result = await this.collection.updateOne(this.toMongoFilter(filter), toMongoUpdate(update), {
      upsert: options.upsert ?? false,
    })
    return { matched: result.matchedCount, modified: result.modifiedCount, upserted: result.upsertedCount > 0 }
  }

  async updateMany(filter: QueryFilter, update: UpdateSpec): Promise<UpdateOutcome> {
    const result = await this.collection.updateMany(this.toMongoFilter(filter), toMongoUpdate(update))
    return { matched: result.matchedCount, modified: result.modifiedCount, upserted: false }
  }

  async deleteOne(filter: QueryFilter): Promise<number> {
    const result = await this.collection.deleteOne(this.toMongoFilter(filter))
    return result.deletedCount
  }

  async deleteMany(filter: QueryFilter): Promise<number> {
    const result = await this.collection.deleteMany(this.toMongoFilter(filter))
    return result.deletedCount
  }

  async countDocuments(filter: QueryFilter = {}): Promise<number> {
    return this.collection.countDocuments(this.toMongoFilter(filter))
  }

  private toMongoFilter(filter: QueryFilter): Document {
    return toMongoFilter(filter, this.definition.expiring ? this.clock() : null)
  }
}
