import { randomInt, randomUUID } from 'node:crypto'

const ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789'

/** Random alphanumeric token for share links, sign-in sessions and password resets. */
export function generateSecureToken(length = 32) {
  let token = ''
  for (let i = 0; i < length; i++) token += ALPHABET[randomInt(ALPHABET.length)]
  return token
}

export function generateId() {
  return randomUUID()
}
