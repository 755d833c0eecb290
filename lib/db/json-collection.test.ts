import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'

import { DuplicateKeyError, isDuplicateKeyError } from '@/lib/errors'

import { JsonFileCollection } from './json-collection'
import type { CollectionDefinition } from './types'

const itemSchema = z.object({
  code: z.string(),
  label: z.string().default(''),
  count: z.number().int().default(0),
  owner: z.string().nullable().optional(),
})
type Item = z.infer<typeof itemSchema>

const items: CollectionDefinition<Item> = {
  name: 'items',
  schema: itemSchema,
  uniqueKeys: [['code']],
}

const tokenSchema = z.object({ token: z.string(), expires_at: z.string() })
type Token = z.infer<typeof tokenSchema>

const tokens: CollectionDefinition<Token> = {
  name: 'tokens',
  schema: tokenSchema,
  uniqueKeys: [['token']],
  expiring: true,
}

describe('JsonFileCollection', () => {
  let dataDir: string

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(tmpdir(), 'json-collection-'))
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(dataDir, { recursive: true, force: true })
  })

  it('creates an empty array file on open', async () => {
    await JsonFileCollection.open(items, dataDir)
    expect(await readFile(path.join(dataDir, 'items.json'), 'utf8')).toBe('[]')
  })

  it('inserts, finds, sorts and counts documents', async () => {
    const collection = await JsonFileCollection.open(items, dataDir)
    await collection.insertMany([
      { code: 'b', label: 'Second', count: 2, owner: 'alice' },
      { code: 'a', label: 'First', count: 1, owner: 'bob' },
      { code: 'c', label: 'Third', count: 3, owner: 'alice' },
    ])

    expect(await collection.findOne({ code: 'a' })).toEqual({ code: 'a', label: 'First', count: 1, owner: 'bob' })
    expect((await collection.find({ owner: 'alice' }, { sort: { count: -1 } })).map((item) => item.code)).toEqual([
      'c',
      'b',
    ])
    expect((await collection.find({}, { sort: { code: 1 }, limit: 2 })).map((item) => item.code)).toEqual(['a', 'b'])
    expect(await collection.countDocuments({ count: { $gte: 2 } })).toBe(2)
  })

  it('applies schema defaults to stored documents on read', async () => {
    await writeFile(path.join(dataDir, 'items.json'), JSON.stringify([{ code: 'legacy' }]), 'utf8')
    const collection = await JsonFileCollection.open(items, dataDir)

    expect(await collection.findOne({ code: 'legacy' })).toEqual({ code: 'legacy', label: '', count: 0 })
  })

  it('rejects duplicate unique keys with a MongoDB-style error', async () => {
    const collection = await JsonFileCollection.open(items, dataDir)
    await collection.insertOne({ code: 'a', label: 'First', count: 0 })

    const attempt = collection.insertOne({ code: 'a', label: 'Again', count: 0 })
    await expect(attempt).rejects.toBeInstanceOf(DuplicateKeyError)
    await expect(collection.insertOne({ code: 'a', label: 'Again', count: 0 })).rejects.toSatisfy(isDuplicateKeyError)
    expect(await collection.countDocuments()).toBe(1)
  })

  it('updates, upserts and deletes', async () => {
    const collection = await JsonFileCollection.open(items, dataDir)
    await collection.insertOne({ code: 'a', label: 'First', count: 0 })

    expect(await collection.updateOne({ code: 'a' }, { $inc: { count: 5 } })).toEqual({
      matched: 1,
      modified: 1,
      upserted: false,
    })
    expect(await collection.updateOne({ code: 'a' }, { $set: { label: 'First' } })).toEqual({
      matched: 1,
      modified: 0,
      upserted: false,
    })
    expect(await collection.updateOne({ code: 'z' }, { $set: { label: 'Zed' } }, { upsert: true })).toEqual({
      matched: 0,
      modified: 0,
      upserted: true,
    })
    expect(await collection.findOne({ code: 'z' })).toEqual({ code: 'z', label: 'Zed', count: 0 })

    expect(await collection.updateMany({ owner: null }, { $set: { owner: 'admin' } })).toEqual({
      matched: 2,
      modified: 2,
      upserted: false,
    })
    expect(await collection.deleteMany({ owner: 'admin' })).toBe(2)
    expect(await collection.deleteOne({ code: 'a' })).toBe(0)
  })

  it('refuses to store documents its schema cannot read back', async () => {
    const collection = await JsonFileCollection.open(items, dataDir)
    const malformed: Item = JSON.parse('{"code":"x","count":"many"}')

    await expect(collection.insertOne(malformed)).rejects.toBeInstanceOf(z.ZodError)
    await collection.insertOne({ code: 'a', label: 'First', count: 0 })
    await expect(collection.updateOne({ code: 'a' }, { $set: { count: 'many' } })).rejects.toBeInstanceOf(z.ZodError)
    await expect(collection.updateMany({}, { $set: { count: 'many' } })).rejects.toBeInstanceOf(z.ZodError)

    expect(await collection.find()).toEqual([{ code: 'a', label: 'First', count: 0 }])
  })

  it('serializes concurrent writes', async () => {
    const collection = await JsonFileCollection.open(items, dataDir)
    await collection.insertOne({ code: 'counter', label: '', count: 0 })

    await Promise.all(Array.from({ length: 20 }, () => collection.updateOne({ code: 'counter' }, { $inc: { count: 1 } })))

    expect((await collection.findOne({ code: 'counter' }))?.count).toBe(20)
  })

  it('reads a corrupt file as empty', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    await writeFile(path.join(dataDir, 'items.json'), '{not json', 'utf8')
    const collection = await JsonFileCollection.open(items, dataDir)

    expect(await collection.find()).toEqual([])
    expect(warn).toHaveBeenCalledTimes(1)
  })

  it('drops expired documents and persists the pruned list', async () => {
    let now = new Date('2025-03-10T12:00:00.000Z')
    const collection = await JsonFileCollection.open(tokens, dataDir, { clock: () => now })
    await collection.insertMany([
      { token: 'short', expires_at: '2025-03-10T13:00:00.000Z' },
      { token: 'long', expires_at: '2025-03-11T12:00:00.000Z' },
    ])

    expect(await collection.countDocuments()).toBe(2)

    now = new Date('2025-03-10T13:00:00.000Z')
    expect((await collection.find()).map((doc) => doc.token)).toEqual(['long'])

    const stored: unknown = JSON.parse(await readFile(path.join(dataDir, 'tokens.json'), 'utf8'))
    expect(stored).toEqual([{ token: 'long', expires_at: '2025-03-11T12:00:00.000Z' }])
  })
})
