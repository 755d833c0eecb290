import path from 'node:path'

import { describe, expect, it } from 'vitest'

import { AppError } from './errors'
import { parseConfig } from './config'

describe('parseConfig', () => {
  it('applies defaults', () => {
    expect(parseConfig({})).toEqual({
      mongoUri: null,
      mongoDbName: 'smart_attendance',
      mongoTimeoutMs: 2000,
      dataDir: path.resolve(process.cwd(), 'data'),
      appBaseUrl: 'http://localhost:3000',
      sessionTtlHours: 168,
      bcryptRounds: 12,
    })
  })

  it('treats empty strings as unset', () => {
    expect(parseConfig({ MONGODB_URI: '  ', MONGODB_DB: '' })).toMatchObject({
      mongoUri: null,
      mongoDbName: 'smart_attendance',
    })
  })

  it('reads and coerces values', () => {
    expect(
      parseConfig({
        MONGODB_URI: 'mongodb://localhost:27017',
        MONGODB_TIMEOUT_MS: '500',
        APP_BASE_URL: 'https://attendance.example.com/',
        BCRYPT_ROUNDS: '10',
      })
    ).toMatchObject({
      mongoUri: 'mongodb://localhost:27017',
      mongoTimeoutMs: 500,
      appBaseUrl: 'https://attendance.example.com',
      bcryptRounds: 10,
    })
  })

  it('names the invalid variable', () => {
    expect(() => parseConfig({ SESSION_TTL_HOURS: 'soon' })).toThrow(AppError)
    expect(() => parseConfig({ BCRYPT_ROUNDS: '3' })).toThrow(/^Invalid BCRYPT_ROUNDS:/)
  })
})
