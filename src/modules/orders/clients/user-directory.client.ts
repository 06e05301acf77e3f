import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common'
import type { AxiosInstance } from 'axios'

import { describeTransportError } from '../../../shared/http'

export const USER_DIRECTORY_HTTP = Symbol('USER_DIRECTORY_HTTP')

export type UserLookupResult =
  | { found: true }
  | { found: false; reason: 'not_found'; statusCode: number }
  | { found: false; reason: 'unavailable'; detail: string }

/**
 * User Directory Port
 *
 * Answers "does this user exist". Never throws: an unreachable directory
 * is reported as `unavailable`.
 */
export abstract class UserDirectoryClient {
  abstract findUser(userId: number): Promise<UserLookupResult>
}

/**
 * Calls `GET /users/get?id=<id>` on the user service.
 * Only a 200 counts as "user exists".
 */
@Injectable()
export class HttpUserDirectoryClient extends UserDirectoryClient {
  private readonly logger = new Logger(HttpUserDirectoryClient.name)

  constructor(@Inject(USER_DIRECTORY_HTTP) private readonly http: AxiosInstance) {
    super()
  }

  async findUser(userId: number): Promise<UserLookupResult> {
    try {
      const response = await this.http.get<unknown>('/users/get', { params: { id: userId } })

      if (response.status !== HttpStatus.OK) {
        this.logger.debug(`User ${userId} lookup answered ${response.status}`)
        return { found: false, reason: 'not_found', statusCode: response.status }
      }

      return { found: true }
    } catch (error) {
      const detail = describeTransportError(error)
      this.logger.warn(`User service unreachable while looking up user ${userId}: ${detail}`)
      return { found: false, reason: 'unavailable', detail }
    }
  }
}
