export type { NewUser, User } from './user.entity'
