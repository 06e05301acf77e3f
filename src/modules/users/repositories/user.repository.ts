import type { NewUser, User } from '../entities'

/**
 * User Repository Port
 *
 * `create` throws EmailAlreadyRegisteredError when the email is taken.
 */
export abstract class UserRepository {
  abstract create(user: NewUser): Promise<User>
  abstract findById(id: number): Promise<User | null>
}
