export { InMemoryUserRepository } from './in-memory-user.repository'
export { PgUserRepository } from './pg-user.repository'
export { UserRepository } from './user.repository'
