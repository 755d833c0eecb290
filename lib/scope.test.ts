import { describe, expect, it } from 'vitest'

import { matchesFilter } from '@/lib/db/match'

import { canModify, isAdmin, ownerFilter, scoped } from './scope'

const admin = { username: 'root', role: 'admin' } as const
const teacher = { username: 'alice', role: 'teacher' } as const

describe('ownerFilter', () => {
  it('leaves admin queries unscoped', () => {
    expect(ownerFilter(admin)).toEqual({})
  })

  it('limits teachers to their own records', () => {
    expect(ownerFilter(teacher)).toEqual({ created_by: 'alice' })
  })

  it('matches nothing without an actor', () => {
    const filter = ownerFilter(null)
    expect(matchesFilter({ created_by: 'alice' }, filter)).toBe(false)
    expect(matchesFilter({}, filter)).toBe(false)
  })
})

describe('scoped', () => {
  it('lets the owner entry win over a caller-supplied one', () => {
    expect(scoped({ course: 'Math', created_by: 'bob' }, teacher)).toEqual({ course: 'Math', created_by: 'alice' })
  })

  it('keeps the caller filter for admins', () => {
    expect(scoped({ created_by: 'bob' }, admin)).toEqual({ created_by: 'bob' })
  })
})

describe('canModify', () => {
  it('allows admins and owners only', () => {
    expect(canModify({ created_by: 'bob' }, admin)).toBe(true)
    expect(canModify({ created_by: 'alice' }, teacher)).toBe(true)
    expect(canModify({ created_by: 'bob' }, teacher)).toBe(false)
    expect(canModify({ created_by: 'alice' }, null)).toBe(false)
  })

  it('recognizes admins', () => {
    expect(isAdmin(admin)).toBe(true)
    expect(isAdmin(teacher)).toBe(false)
    expect(isAdmin(undefined)).toBe(false)
  })
})
