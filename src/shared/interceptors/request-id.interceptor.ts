import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common'
import { randomUUID } from 'node:crypto'
import type { Request, Response } from 'express'
import { Observable } from 'rxjs'

export const REQUEST_ID_HEADER = 'x-request-id'

/**
 * Request ID Interceptor
 *
 * Reuses the caller's `x-request-id` or generates one, stores it on the
 * request so the exception filter can report it, and echoes it back.
 */
@Injectable()
export class RequestIdInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp()
    const request = http.getRequest<Request>()
    const response = http.getResponse<Response>()

    const requestId = request.header(REQUEST_ID_HEADER) || randomUUID()
    request.headers[REQUEST_ID_HEADER] = requestId
    response.setHeader(REQUEST_ID_HEADER, requestId)

    return next.handle()
  }
}
