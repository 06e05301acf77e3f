import { Injectable } from '@nestjs/common'
import { DatabaseError } from 'pg'

import { DatabaseService } from '../../../shared/database'
import { NewUser, User } from '../entities'
import { EmailAlreadyRegisteredError } from '../errors'
import { UserRepository } from './user.repository'

interface UserRow {
  id: number
  name: string
  email: string
  created_at: Date
}

const UNIQUE_VIOLATION = '23505'

@Injectable()
export class PgUserRepository extends UserRepository {
  constructor(private readonly database: DatabaseService) {
    super()
  }

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.database.query<UserRow>(
        `INSERT INTO users (name, email, created_at)
         VALUES ($1, $2, $3)
         RETURNING id, name, email, created_at`,
        [user.name, user.email, new Date()]
      )
      return toUser(result.rows[0])
    } catch (error) {
      if (error instanceof DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw new EmailAlreadyRegisteredError(user.email)
      }
      throw error
    }
  }

  async findById(id: number): Promise<User | null> {
    const result = await this.database.query<UserRow>(
      'SELECT id, name, email, created_at FROM users WHERE id = $1',
      [id]
    )
    return result.rows.length > 0 ? toUser(result.rows[0]) : null
  }
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    createdAt: row.created_at,
  }
}
