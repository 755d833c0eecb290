import path from 'node:path'

import { z } from 'zod'

import { AppError } from '@/lib/errors'

// Empty strings in .env files mean "not set"
const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
)

const configSchema = z.object({
  MONGODB_URI: optionalString,
  MONGODB_DB: optionalString.transform((value) => value ?? 'smart_attendance'),
  MONGODB_TIMEOUT_MS: optionalString.pipe(z.coerce.number().int().positive().default(2000)),
  DATA_DIR: optionalString,
  APP_BASE_URL: optionalString.pipe(z.string().url().default('http://localhost:3000')),
  SESSION_TTL_HOURS: optionalString.pipe(z.coerce.number().int().positive().default(168)),
  BCRYPT_ROUNDS: optionalString.pipe(z.coerce.number().int().min(4).max(15).default(12)),
})

export type AppConfig = {
  mongoUri: string | null
  mongoDbName: string
  mongoTimeoutMs: number
  dataDir: string
  appBaseUrl: string
  sessionTtlHours: number
  bcryptRounds: number
}

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const parsed = configSchema.safeParse(env)

  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const variable = issue?.path.join('.') || 'environment'
    throw new AppError('config_invalid', `Invalid ${variable}: ${issue?.message ?? 'invalid value'}`)
  }

  const values = parsed.data
  return {
    mongoUri: values.MONGODB_URI ?? null,
    mongoDbName: values.MONGODB_DB,
    mongoTimeoutMs: values.MONGODB_TIMEOUT_MS,
    dataDir: path.resolve(values.DATA_DIR ?? path.join(process.cwd(), 'data')),
    appBaseUrl: values.APP_BASE_URL.replace(/\/+$/, ''),
    sessionTtlHours: values.SESSION_TTL_HOURS,
    bcryptRounds: values.BCRYPT_ROUNDS,
  }
}

let cached: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!cached) cached = parseConfig(process.env)
  return cached
}
