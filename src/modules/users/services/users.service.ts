import { Injectable, Logger } from '@nestjs/common'

import { CreateUserDto } from '../dto'
import { User } from '../entities'
import { UserNotFoundError } from '../errors'
import { UserRepository } from '../repositories'

const DECIMAL_ID = /^\d+$/

/**
 * Users Service
 *
 * The user directory: registers users and answers lookups by id.
 * Order creation reaches it over HTTP, never in-process.
 */
@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name)

  constructor(private readonly userRepository: UserRepository) {}

  async create(createUserDto: CreateUserDto): Promise<User> {
    const user = await this.userRepository.create({
      name: createUserDto.name,
      email: createUserDto.email,
    })
    this.logger.log(`Created user ${user.id}`)
    return user
  }

  /**
   * Look a user up by the raw `id` query parameter.
   * Anything but a plain decimal integer is simply not found.
   */
  async findByRawId(rawId: string | undefined): Promise<User> {
    if (!rawId || !DECIMAL_ID.test(rawId)) {
      throw new UserNotFoundError()
    }

    const id = Number(rawId)
    if (!Number.isSafeInteger(id)) {
      throw new UserNotFoundError()
    }

    const user = await this.userRepository.findById(id)
    if (!user) {
      throw new UserNotFoundError()
    }
    return user
  }
}
