import { differenceInCalendarDays, eachDayOfInterval, format, isValid, parseISO, set, subDays } from 'date-fns'

import { AppError } from '@/lib/errors'

export const DATE_FORMAT = 'yyyy-MM-dd'
export const MAX_RANGE_DAYS = 366

export function toDateKey(date: Date) {
  return format(date, DATE_FORMAT)
}

export function todayKey(now: Date = new Date()) {
  return toDateKey(now)
}

/** Accepts YYYY-MM-DD or DD/MM/YYYY and returns YYYY-MM-DD. */
export function normalizeDateInput(value: string): { value: string | null; error?: string } {
  const raw = value.trim()
  if (!raw) return { value: null }

  const isoMatch = /^(\d{4})-(\d{2})-(\d{2})$/.exec(raw)
  if (isoMatch) {
    const year = Number(isoMatch[1])
    const month = Number(isoMatch[2])
    const day = Number(isoMatch[3])
    const date = new Date(Date.UTC(year, month - 1, day))
    if (date.getUTCFullYear() === year && date.getUTCMonth() + 1 === month && date.getUTCDate() === day) {
      return { value: raw }
    }
    return { value: null, error: 'Invalid date. Use YYYY-MM-DD or DD/MM/YYYY.' }
  }

  const dmyMatch = /^(\d{2})[\/-](\d{2})[\/-](\d{4})$/.exec(raw)
  if (dmyMatch) {
    const day = Number(dmyMatch[1])
    const month = Number(dmyMatch[2])
    const year = Number(dmyMatch[3])
    const date = new Date(Date.UTC(year, month - 1, day))
    if (date.getUTCFullYear() === year && date.getUTCMonth() + 1 === month && date.getUTCDate() === day) {
      const mm = String(month).padStart(2, '0')
      const dd = String(day).padStart(2, '0')
      return { value: `${year}-${mm}-${dd}` }
    }
    return { value: null, error: 'Invalid date. Use YYYY-MM-DD or DD/MM/YYYY.' }
  }

  return { value: null, error: 'Invalid date format. Use YYYY-MM-DD or DD/MM/YYYY.' }
}

/** A required date field: blank falls back to today. */
export function requireDate(value: string | null | undefined, now: Date): string {
  const { value: normalized, error } = normalizeDateInput(value ?? '')
  if (error) throw new AppError('invalid_input', error)
  return normalized ?? toDateKey(now)
}

/** The chosen day at the current time of day. */
export function combineWithTime(dateKey: string, now: Date): Date {
  const day = parseISO(dateKey)
  if (!isValid(day)) throw new AppError('invalid_input', 'Invalid date.')
  return set(day, {
    hours: now.getHours(),
    minutes: now.getMinutes(),
    seconds: now.getSeconds(),
    milliseconds: now.getMilliseconds(),
  })
}

export type DateRange = { start: string; end: string }

export function resolveRange(
  input: { start?: string | null; end?: string | null },
  now: Date,
  defaultDays: number
): DateRange {
  const end = input.end ? requireDate(input.end, now) : toDateKey(now)
  const start = input.start ? requireDate(input.start, now) : toDateKey(subDays(parseISO(end), defaultDays))

  const span = differenceInCalendarDays(parseISO(end), parseISO(start))
  if (span < 0) throw new AppError('invalid_input', 'Start date must be on or before the end date.')
  if (span >= MAX_RANGE_DAYS) {
    throw new AppError('invalid_input', `Date range cannot exceed ${MAX_RANGE_DAYS} days.`)
  }

  return { start, end }
}

export function datesInRange(range: DateRange): string[] {
  return eachDayOfInterval({ start: parseISO(range.start), end: parseISO(range.end) }).map(toDateKey)
}
