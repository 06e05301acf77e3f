import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Logger,
} from '@nestjs/common'
import { randomUUID } from 'node:crypto'
import { STATUS_CODES } from 'node:http'
import type { Request, Response } from 'express'

import { DomainError, resolveHttpStatus } from '../errors'
import { REQUEST_ID_HEADER } from '../interceptors/request-id.interceptor'

/**
 * Global Exception Filter
 *
 * Turns every exception into one JSON envelope:
 * { statusCode, error, message, path, timestamp, requestId, ...details }
 *
 * - DomainError: status and code come from the error class
 * - HttpException: the framework's response body is kept (validation
 *   errors, terminus health details)
 * - anything else: 500 without leaking internals
 */
@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(GlobalExceptionFilter.name)

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp()
    const response = ctx.getResponse<Response>()
    const request = ctx.getRequest<Request>()

    const statusCode = resolveHttpStatus(exception)
    // Errors raised before the interceptors ran (body parsing) carry no id yet
    let requestId = request.header(REQUEST_ID_HEADER)
    if (!requestId) {
      requestId = randomUUID()
      response.setHeader(REQUEST_ID_HEADER, requestId)
    }

    const body = {
      statusCode,
      ...this.describe(exception, statusCode),
      path: request.url,
      timestamp: new Date().toISOString(),
      requestId,
    }

    if (statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.url} failed with ${statusCode}: ${body.message}`,
        exception instanceof Error ? exception.stack : undefined
      )
    } else {
      this.logger.warn(`${request.method} ${request.url} rejected with ${statusCode}: ${body.message}`)
    }

    response.status(statusCode).json(body)
  }

  private describe(exception: unknown, statusCode: number): Record<string, unknown> & { message: string } {
    if (exception instanceof DomainError) {
      return { error: exception.code, message: exception.message }
    }

    if (exception instanceof HttpException) {
      const payload = exception.getResponse()
      if (typeof payload === 'string') {
        return { error: STATUS_CODES[statusCode] ?? 'Error', message: payload }
      }
      const message = 'message' in payload ? payload.message : exception.message
      return {
        error: STATUS_CODES[statusCode] ?? 'Error',
        ...payload,
        message: Array.isArray(message) ? message.join(', ') : String(message),
      }
    }

    return { error: STATUS_CODES[statusCode] ?? 'Error', message: 'Internal server error' }
  }
}
