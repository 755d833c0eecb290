import { getConfig } from '@/lib/config'
import { getDatabase } from '@/lib/db'

import { UserManager } from './user-manager'

export async function getUserManager() {
  const db = await getDatabase()
  return new UserManager(db.users, { bcryptRounds: getConfig().bcryptRounds })
}

export { UserManager, toPublicUser } from './user-manager'
export type { AuthenticatedUser, NewUserInput } from './user-manager'
