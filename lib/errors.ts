export const ERROR_CODES = [
  'not_authenticated',
  'forbidden',
  'locked_section',
  'invalid_input',
  'not_found',
  'duplicate',
  'already_marked',
  'expired',
  'inactive',
  'exhausted',
  'invalid_credentials',
  'account_locked',
  'account_inactive',
  'config_invalid',
] as const

export type ErrorCode = (typeof ERROR_CODES)[number]

export function isErrorCode(value: string): value is ErrorCode {
  return ERROR_CODES.some((code) => code === value)
}

export type ActionError = {
  code: string
  message: string
}

export type ActionResult<T> = ({ success: true } & T) | { success: false; error: ActionError }

export class AppError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'AppError'
    this.code = code
  }
}

// Mirrors the MongoDB driver's E11000 so both backends report duplicates the same way
export class DuplicateKeyError extends Error {
  readonly code = 11000
  readonly keyValue: Record<string, unknown>

  constructor(collection: string, keyValue: Record<string, unknown>) {
    super(`E11000 duplicate key error collection: ${collection} dup key: ${JSON.stringify(keyValue)}`)
    this.name = 'DuplicateKeyError'
    this.keyValue = keyValue
  }
}

/** Lifts a failed result back into an exception, keeping its code when it is a known one. */
export function fromActionError(error: ActionError): AppError {
  return new AppError(isErrorCode(error.code) ? error.code : 'invalid_input', error.message)
}

function readProperty(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) return undefined
  return Reflect.get(error, key)
}

export function isDuplicateKeyError(error: unknown) {
  return readProperty(error, 'code') === 11000
}

export function toActionError(error: unknown): ActionError {
  if (error instanceof AppError) return { code: error.code, message: error.message }

  if (isDuplicateKeyError(error)) {
    return { code: 'duplicate', message: 'A record with the same key already exists.' }
  }

  const rawMessage = error instanceof Error ? error.message : readProperty(error, 'message') ?? error
  const message = String(rawMessage || 'Unknown error').trim() || 'Unknown error'
  const code = String(readProperty(error, 'code') || 'unknown_error').trim() || 'unknown_error'
  return { code, message }
}

const HTTP_STATUS: Partial<Record<ErrorCode, number>> = {
  not_authenticated: 401,
  forbidden: 403,
  locked_section: 403,
  invalid_input: 400,
  not_found: 404,
  duplicate: 409,
  already_marked: 409,
  expired: 410,
  inactive: 410,
  exhausted: 410,
}

/** HTTP status for route handlers; unknown codes are server faults. */
export function httpStatusFor(code: string): number {
  if (!isErrorCode(code)) return 500
  return HTTP_STATUS[code] ?? 400
}
