import { describe, expect, it } from 'vitest'

import { combineWithTime, datesInRange, normalizeDateInput, requireDate, resolveRange } from './dates'

const now = new Date(2025, 2, 10, 14, 30, 15)

describe('normalizeDateInput', () => {
  it('accepts ISO and day-first dates', () => {
    expect(normalizeDateInput('2025-03-10')).toEqual({ value: '2025-03-10' })
    expect(normalizeDateInput('10/03/2025')).toEqual({ value: '2025-03-10' })
    expect(normalizeDateInput('  ')).toEqual({ value: null })
  })

  it('rejects impossible dates and other formats', () => {
    expect(normalizeDateInput('2025-02-30').error).toBe('Invalid date. Use YYYY-MM-DD or DD/MM/YYYY.')
    expect(normalizeDateInput('March 10').error).toBe('Invalid date format. Use YYYY-MM-DD or DD/MM/YYYY.')
  })
})

describe('requireDate', () => {
  it('falls back to today when blank', () => {
    expect(requireDate(undefined, now)).toBe('2025-03-10')
    expect(requireDate('2025-03-01', now)).toBe('2025-03-01')
  })

  it('throws an invalid_input error for bad input', () => {
    expect(() => requireDate('31/02/2025', now)).toThrow('Invalid date. Use YYYY-MM-DD or DD/MM/YYYY.')
  })
})

describe('combineWithTime', () => {
  it('keeps the chosen day and the current time of day', () => {
    const combined = combineWithTime('2025-03-01', now)
    expect(combined.getFullYear()).toBe(2025)
    expect(combined.getMonth()).toBe(2)
    expect(combined.getDate()).toBe(1)
    expect(combined.getHours()).toBe(14)
    expect(combined.getMinutes()).toBe(30)
    expect(combined.getSeconds()).toBe(15)
  })
})

describe('resolveRange', () => {
  it('defaults to the last days up to today', () => {
    expect(resolveRange({}, now, 30)).toEqual({ start: '2025-02-08', end: '2025-03-10' })
  })

  it('rejects reversed and oversized ranges', () => {
    expect(() => resolveRange({ start: '2025-03-11', end: '2025-03-10' }, now, 30)).toThrow(
      'Start date must be on or before the end date.'
    )
    expect(() => resolveRange({ start: '2024-01-01', end: '2025-03-10' }, now, 30)).toThrow(
      'Date range cannot exceed 366 days.'
    )
  })

  it('lists every day of an inclusive range', () => {
    expect(datesInRange({ start: '2025-02-27', end: '2025-03-02' })).toEqual([
      '2025-02-27',
      '2025-02-28',
      '2025-03-01',
      '2025-03-02',
    ])
  })
})
