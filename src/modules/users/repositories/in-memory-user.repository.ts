import { Injectable } from '@nestjs/common'

import { NewUser, User } from '../entities'
import { EmailAlreadyRegisteredError } from '../errors'
import { UserRepository } from './user.repository'

/**
 * User Repository (In-Memory)
 */
@Injectable()
export class InMemoryUserRepository extends UserRepository {
  private readonly users = new Map<number, User>()
  private currentId = 1

  async create(user: NewUser): Promise<User> {
    const taken = Array.from(this.users.values()).some((existing) => existing.email === user.email)
    if (taken) {
      throw new EmailAlreadyRegisteredError(user.email)
    }

    const created: User = { ...user, id: this.currentId++, createdAt: new Date() }
    this.users.set(created.id, created)
    return { ...created }
  }

  async findById(id: number): Promise<User | null> {
    const user = this.users.get(id)
    return user ? { ...user } : null
  }
}
