import type { FieldCondition, OperatorCondition, QueryFilter, SortSpec, StoredDocument, UpdateSpec } from './types'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isOperatorCondition(condition: FieldCondition): condition is OperatorCondition {
  return isRecord(condition)
}

function compare(left: unknown, right: string | number): number | null {
  if (typeof left === 'number' && typeof right === 'number') return left - right
  if (typeof left === 'string' && typeof right === 'string') return left < right ? -1 : left > right ? 1 : 0
  // Mixed or missing types never satisfy a range operator
  return null
}

function valueEquals(value: unknown, expected: unknown) {
  if (expected === null) return value === null || value === undefined
  if (Array.isArray(value)) return value.includes(expected)
  return value === expected
}

function matchesOperators(doc: StoredDocument, field: string, condition: OperatorCondition) {
  const present = Object.prototype.hasOwnProperty.call(doc, field)
  const value = doc[field]

  if (condition.$exists !== undefined && condition.$exists !== present) return false
  if (condition.$ne !== undefined && valueEquals(value, condition.$ne)) return false
  if (condition.$in !== undefined && !condition.$in.some((candidate) => valueEquals(value, candidate))) return false

  const ranges: Array<[string | number | undefined, (diff: number) => boolean]> = [
    [condition.$gt, (diff) => diff > 0],
    [condition.$gte, (diff) => diff >= 0],
    [condition.$lt, (diff) => diff < 0],
    [condition.$lte, (diff) => diff <= 0],
  ]

  for (const [bound, holds] of ranges) {
    if (bound === undefined) continue
    const diff = compare(value, bound)
    if (diff === null || !holds(diff)) return false
  }

  return true
}

export function matchesFilter(doc: StoredDocument, filter: QueryFilter = {}): boolean {
  return Object.entries(filter).every(([field, condition]) =>
    isOperatorCondition(condition) ? matchesOperators(doc, field, condition) : valueEquals(doc[field], condition)
  )
}

// Returns a new document; `changed` is false when every $set value was already in place
export function applyUpdate(doc: StoredDocument, update: UpdateSpec): { doc: StoredDocument; changed: boolean } {
  const next: StoredDocument = { ...doc }
  let changed = false

  for (const [field, value] of Object.entries(update.$set ?? {})) {
    if (JSON.stringify(next[field]) !== JSON.stringify(value)) changed = true
    next[field] = value
  }

  for (const [field, amount] of Object.entries(update.$inc ?? {})) {
    const current = next[field]
    const base = typeof current === 'number' ? current : 0
    next[field] = base + amount
    if (amount !== 0 || typeof current !== 'number') changed = true
  }

  for (const field of Object.keys(update.$unset ?? {})) {
    if (Object.prototype.hasOwnProperty.call(next, field)) {
      delete next[field]
      changed = true
    }
  }

  return { doc: next, changed }
}

// Equality entries of an upsert filter seed the inserted document, as MongoDB does
export function seedFromFilter(filter: QueryFilter): StoredDocument {
  const seed: StoredDocument = {}
  for (const [field, condition] of Object.entries(filter)) {
    if (!isOperatorCondition(condition)) seed[field] = condition
  }
  return seed
}

function typeRank(value: unknown) {
  if (value === null || value === undefined) return 0
  if (typeof value === 'number') return 1
  if (typeof value === 'string') return 2
  return 3
}

function compareValues(a: unknown, b: unknown): number {
  const rankA = typeRank(a)
  const rankB = typeRank(b)
  if (rankA !== rankB) return rankA - rankB
  if (typeof a === 'number' && typeof b === 'number') return a - b
  const textA = typeof a === 'string' ? a : JSON.stringify(a) ?? ''
  const textB = typeof b === 'string' ? b : JSON.stringify(b) ?? ''
  return textA < textB ? -1 : textA > textB ? 1 : 0
}

export function sortDocuments<T extends StoredDocument>(docs: T[], sort: SortSpec): T[] {
  const keys = Object.entries(sort)
  if (keys.length === 0) return docs

  return [...docs].sort((a, b) => {
    for (const [field, direction] of keys) {
      const diff = compareValues(a[field], b[field])
      if (diff !== 0) return diff * direction
    }
    return 0
  })
}
