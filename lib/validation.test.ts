import { describe, expect, it } from 'vitest'

import { bulkMarkInput, markAttendanceInput, parseInput, studentLinkInput, updateStatusInput } from './validation'

function thrownBy(run: () => unknown): unknown {
  try {
    run()
  } catch (error) {
    return error
  }
  return null
}

describe('parseInput', () => {
  it('accepts well-formed input', () => {
    expect(parseInput(markAttendanceInput, { studentId: 'A1', status: 1, date: '2025-03-10' })).toEqual({
      studentId: 'A1',
      status: 1,
      date: '2025-03-10',
    })
  })

  it('rejects a status that is not 0 or 1', () => {
    const input: unknown = JSON.parse('{"studentId":"A1","status":"present"}')

    expect(thrownBy(() => parseInput(markAttendanceInput, input))).toMatchObject({
      code: 'invalid_input',
      message: 'Invalid status: Invalid input',
    })
    expect(thrownBy(() => parseInput(updateStatusInput, { studentId: 'A1', date: '2025-03-10', status: 2 }))).toMatchObject({
      code: 'invalid_input',
      message: 'Invalid status: Invalid input',
    })
  })

  it('names the offending bulk row', () => {
    const input = { records: [{ student_id: 'A1', status: 1 }, { student_id: 'A2', status: 'yes' }] }

    expect(thrownBy(() => parseInput(bulkMarkInput, input))).toMatchObject({
      code: 'invalid_input',
      message: 'Invalid records.1.status: Invalid input',
    })
  })

  it('rejects non-numeric link durations and use limits', () => {
    expect(thrownBy(() => parseInput(studentLinkInput, { studentId: 'A1', durationHours: '24' }))).toMatchObject({
      code: 'invalid_input',
      message: 'Invalid durationHours: Expected number, received string',
    })
    expect(thrownBy(() => parseInput(studentLinkInput, { studentId: 'A1', maxUses: Number.NaN }))).toMatchObject({
      code: 'invalid_input',
    })
  })

  it('reports a missing value as the whole input when there is no path', () => {
    expect(thrownBy(() => parseInput(markAttendanceInput, null))).toMatchObject({
      code: 'invalid_input',
      message: 'Invalid input: Expected object, received null',
    })
  })
})
