import { HttpException, HttpStatus } from '@nestjs/common'

/**
 * Domain Error
 *
 * Base class for failures raised by the service's own business rules.
 * Each subclass fixes a stable error code and the HTTP status the
 * GlobalExceptionFilter answers with.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string
  abstract readonly status: HttpStatus

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Resolve the HTTP status an error is answered with.
 * Anything the service does not recognise is a 500.
 */
export function resolveHttpStatus(error: unknown): number {
  if (error instanceof DomainError) {
    return error.status
  }
  if (error instanceof HttpException) {
    return error.getStatus()
  }
  return HttpStatus.INTERNAL_SERVER_ERROR
}

/**
 * Extract a printable reason from anything that was thrown.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}
