import { mkdir, readFile, rename, writeFile } from 'node:fs/promises'
import path from 'node:path'

import { DuplicateKeyError } from '@/lib/errors'

import { applyUpdate, isRecord, matchesFilter, seedFromFilter, sortDocuments } from './match'
import type {
  CollectionDefinition,
  DocumentCollection,
  FindOptions,
  QueryFilter,
  StoredDocument,
  UpdateOutcome,
  UpdateSpec,
} from './types'

type JsonCollectionOptions = {
  clock?: () => Date
}

function isMissingFileError(error: unknown) {
  return isRecord(error) && error.code === 'ENOENT'
}

/**
 * A collection kept as a pretty-printed JSON array in `<dataDir>/<name>.json`.
 *
 * Every call reads the file, so several processes can share a data directory,
 * but read-modify-write cycles are only serialized within this process.
 */
export class JsonFileCollection<T extends StoredDocument> implements DocumentCollection<T> {
  readonly name: string
  private readonly filePath: string
  private readonly clock: () => Date
  private queue: Promise<unknown> = Promise.resolve()

  private constructor(
    private readonly definition: CollectionDefinition<T>,
    dataDir: string,
    options: JsonCollectionOptions
  ) {
    this.name = definition.name
    this.filePath = path.join(dataDir, `${definition.name}.json`)
    this.clock = options.clock ?? (() => new Date())
  }

  static async open<T extends StoredDocument>(
    definition: CollectionDefinition<T>,
    dataDir: string,
    options: JsonCollectionOptions = {}
  ) {
    await mkdir(dataDir, { recursive: true })
    const collection = new JsonFileCollection(definition, dataDir, options)

    try {
      await readFile(collection.filePath, 'utf8')
    } catch (error) {
      if (!isMissingFileError(error)) throw error
      await writeFile(collection.filePath, '[]', 'utf8')
    }

    return collection
  }

  async findOne(filter: QueryFilter = {}): Promise<T | null> {
    const docs = await this.exclusive(() => this.load())
    const match = docs.find((doc) => matchesFilter(doc, filter))
    return match ? this.definition.schema.parse(match) : null
  }

  async find(filter: QueryFilter = {}, options: FindOptions = {}): Promise<T[]> {
    const docs = await this.exclusive(() => this.load())
    let matches = docs.filter((doc) => matchesFilter(doc, filter))
    if (options.sort) matches = sortDocuments(matches, options.sort)
    if (options.limit !== undefined && options.limit > 0) matches = matches.slice(0, options.limit)
    return matches.map((doc) => this.definition.schema.parse(doc))
  }

  async insertOne(doc: T): Promise<void> {
    await this.insertMany([doc])
  }

  async insertMany(docs: T[]): Promise<number> {
    if (docs.length === 0) return 0

    return this.exclusive(async () => {
      const existing = await this.load()
      const next = [...existing]

      for (const doc of docs) {
        const stored = toStored(doc)
        this.definition.schema.parse(stored)
        this.assertUnique(next, stored, -1)
        next.push(stored)
      }

      await this.save(next)
      return docs.length
    })
  }

  async updateOne(
    filter: QueryFilter,
    update: UpdateSpec,
    options: { upsert?: boolean } = {}
  ): Promise<UpdateOutcome> {
    return this.exclusive(async () => {
      const docs = await this.load()
      const index = docs.findIndex((doc) => matchesFilter(doc, filter))

      if (index === -1) {
        if (!options.upsert) return { matched: 0, modified: 0, upserted: false }

        const { doc } = applyUpdate(seedFromFilter(filter), update)
        this.definition.schema.parse(doc)
        this.assertUnique(docs, doc, -1)
        await this.save([...docs, doc])
        return { matched: 0, modified: 0, upserted: true }
      }

      const { doc, changed } = applyUpdate(docs[index], update)
      if (!changed) return { matched: 1, modified: 0, upserted: false }

      this.definition.schema.parse(doc)
      this.assertUnique(docs, doc, index)
      const next = [...docs]
      next[index] = doc
      await this.save(next)
      return { matched: 1, modified: 1, upserted: false }
    })
  }

  async updateMany(filter: QueryFilter, update: UpdateSpec): Promise<UpdateOutcome> {
    return this.exclusive(async () => {
      const docs = await this.load()
      const next = [...docs]
      let matched = 0
      let modified = 0

      for (let index = 0; index < next.length; index++) {
        if (!matchesFilter(next[index], filter)) continue
        matched++

        const { doc, changed } = applyUpdate(next[index], update)
        if (!changed) continue

        this.definition.schema.parse(doc)
        this.assertUnique(next, doc, index)
        next[index] = doc
        modified++
      }

      if (modified > 0) await this.save(next)
      return { matched, modified, upserted: false }
    })
  }

  async deleteOne(filter: QueryFilter): Promise<number> {
    return this.exclusive(async () => {
      const docs = await this.load()
      const index = docs.findIndex((doc) => matchesFilter(doc, filter))
      if (index === -1) return 0

      await this.save(docs.filter((_, i) => i !== index))
      return 1
    })
  }

  async deleteMany(filter: QueryFilter): Promise<number> {
    return this.exclusive(async () => {
      const docs = await this.load()
      const kept = docs.filter((doc) => !matchesFilter(doc, filter))
      const removed = docs.length - kept.length

      if (removed > 0) await this.save(kept)
      return removed
    })
  }

  async countDocuments(filter: QueryFilter = {}): Promise<number> {
    const docs = await this.exclusive(() => this.load())
    return docs.filter((doc) => matchesFilter(doc, filter)).length
  }

  // The returned promise carries the task's own outcome; the queue only waits for it to settle
  private exclusive<R>(task: () => Promise<R>): Promise<R> {
    const run = this.queue.then(task, task)
    this.queue = run.then(
      () => undefined,
      () => undefined
    )
    return run
  }

  private async load(): Promise<StoredDocument[]> {
    let raw: string
    try {
      raw = await readFile(this.filePath, 'utf8')
    } catch (error) {
      if (isMissingFileError(error)) return []
      throw error
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(raw)
    } catch (error) {
      console.warn(`Unreadable data file ${this.filePath}, treating it as empty:`, error)
      return []
    }

    if (!Array.isArray(parsed)) {
      console.warn(`Data file ${this.filePath} does not hold a JSON array, treating it as empty`)
      return []
    }

    const docs = parsed.filter(isRecord)
    if (!this.definition.expiring) return docs

    const now = this.clock().toISOString()
    const live = docs.filter((doc) => typeof doc.expires_at !== 'string' || doc.expires_at > now)
    if (live.length !== docs.length) await this.save(live)
    return live
  }

  private async save(docs: StoredDocument[]) {
    const tempPath = `${this.filePath}.tmp`
    await writeFile(tempPath, JSON.stringify(docs, null, 2), 'utf8')
    await rename(tempPath, this.filePath)
  }

  private assertUnique(docs: StoredDocument[], candidate: StoredDocument, selfIndex: number) {
    for (const keys of this.definition.uniqueKeys ?? []) {
      const keyValue: Record<string, unknown> = {}
      for (const key of keys) keyValue[key] = candidate[key]

      // Like a sparse index: documents missing part of the key are not constrained
      if (Object.values(keyValue).some((value) => value === undefined || value === null)) continue

      const clash = docs.some(
        (doc, index) => index !== selfIndex && keys.every((key) => doc[key] === keyValue[key])
      )
      if (clash) throw new DuplicateKeyError(this.name, keyValue)
    }
  }
}

function toStored(doc: StoredDocument): StoredDocument {
  const stored: StoredDocument = {}
  for (const [key, value] of Object.entries(doc)) {
    if (value !== undefined) stored[key] = value
  }
  return stored
}
