import { describe, expect, it } from 'vitest'

import { AppError, DuplicateKeyError, fromActionError, httpStatusFor, isErrorCode, toActionError } from './errors'

describe('toActionError', () => {
  it('keeps application errors as they are', () => {
    expect(toActionError(new AppError('not_found', 'Student not found.'))).toEqual({
      code: 'not_found',
      message: 'Student not found.',
    })
  })

  it('maps duplicate key errors from either backend', () => {
    const expected = { code: 'duplicate', message: 'A record with the same key already exists.' }
    expect(toActionError(new DuplicateKeyError('students', { student_id: 'S1' }))).toEqual(expected)
    expect(toActionError({ code: 11000, message: 'E11000 duplicate key error' })).toEqual(expected)
  })

  it('falls back to unknown_error', () => {
    expect(toActionError(new Error('boom'))).toEqual({ code: 'unknown_error', message: 'boom' })
    expect(toActionError(null)).toEqual({ code: 'unknown_error', message: 'Unknown error' })
  })
})

describe('fromActionError', () => {
  it('keeps known codes and downgrades unknown ones', () => {
    expect(isErrorCode('account_locked')).toBe(true)
    expect(fromActionError({ code: 'account_locked', message: 'Locked' }).code).toBe('account_locked')
    expect(fromActionError({ code: 'weird', message: 'Odd' }).code).toBe('invalid_input')
  })
})

describe('httpStatusFor', () => {
  it('maps error codes to response statuses', () => {
    expect(httpStatusFor('not_authenticated')).toBe(401)
    expect(httpStatusFor('not_found')).toBe(404)
    expect(httpStatusFor('expired')).toBe(410)
    expect(httpStatusFor('account_locked')).toBe(400)
    expect(httpStatusFor('unknown_error')).toBe(500)
  })
})
