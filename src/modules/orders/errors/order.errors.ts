import { HttpStatus } from '@nestjs/common'

import { DomainError } from '../../../shared/errors'
import type { OrderStatus } from '../entities'

/**
 * The referenced user is unknown to the user directory, or the directory
 * could not be reached. Nothing has been persisted.
 */
export class UserValidationFailedError extends DomainError {
  readonly code = 'USER_VALIDATION_FAILED'
  readonly status = HttpStatus.BAD_REQUEST

  /**
   * @param detail - Transport failure, kept for logs and never sent to the client
   */
  constructor(
    readonly userId: number,
    readonly reason: 'not_found' | 'unavailable',
    readonly detail?: string
  ) {
    super(reason === 'not_found' ? `user not found: ${userId}` : 'user service unavailable')
  }
}

/**
 * The pending order could not be inserted. No payment was attempted.
 */
export class PersistenceFailedError extends DomainError {
  readonly code = 'PERSISTENCE_FAILED'
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR

  constructor(cause: unknown) {
    super('failed to persist order', { cause })
  }
}

/**
 * The payment processor rejected the charge or could not be reached.
 * Never sent to the caller: it drives the order to payment_failed.
 */
export class PaymentFailedError extends DomainError {
  readonly code = 'PAYMENT_FAILED'
  readonly status = HttpStatus.PAYMENT_REQUIRED

  constructor(
    readonly orderId: number,
    detail: string
  ) {
    super(`payment failed for order ${orderId}: ${detail}`)
  }
}

/**
 * Writing the terminal status failed. Logged only; the response is
 * decided by the payment outcome.
 */
export class StatusUpdateFailedError extends DomainError {
  readonly code = 'STATUS_UPDATE_FAILED'
  readonly status = HttpStatus.INTERNAL_SERVER_ERROR

  constructor(
    readonly orderId: number,
    readonly targetStatus: OrderStatus,
    detail: string
  ) {
    super(`failed to mark order ${orderId} as ${targetStatus}: ${detail}`)
  }
}

export class OrderNotFoundError extends DomainError {
  readonly code = 'ORDER_NOT_FOUND'
  readonly status = HttpStatus.NOT_FOUND

  constructor(readonly orderId: number) {
    super(`Order with ID ${orderId} not found`)
  }
}
