import { Expose } from 'class-transformer'

import type { User } from '../entities'

/**
 * { id, name, email, created_at }
 */
export class UserResponse {
  id: number
  name: string
  email: string

  @Expose({ name: 'created_at' })
  createdAt: Date

  constructor(user: User) {
    this.id = user.id
    this.name = user.name
    this.email = user.email
    this.createdAt = user.createdAt
  }
}
