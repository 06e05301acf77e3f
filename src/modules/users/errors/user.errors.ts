import { HttpStatus } from '@nestjs/common'

import { DomainError } from '../../../shared/errors'

export class UserNotFoundError extends DomainError {
  readonly code = 'USER_NOT_FOUND'
  readonly status = HttpStatus.NOT_FOUND

  constructor() {
    super('User not found')
  }
}

export class EmailAlreadyRegisteredError extends DomainError {
  readonly code = 'EMAIL_ALREADY_REGISTERED'
  readonly status = HttpStatus.CONFLICT

  constructor(readonly email: string) {
    super(`Email ${email} is already registered`)
  }
}
