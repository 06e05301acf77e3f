import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common'
import type { Request, Response } from 'express'
import { Observable, tap } from 'rxjs'

import { resolveHttpStatus } from '../errors'
import { MetricsService } from './metrics.service'

/**
 * Metrics Interceptor
 *
 * Records count and latency of every handled request, labelled by the
 * route pattern (`/orders/:id`) rather than the concrete URL.
 */
@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metricsService: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp()
    const request = http.getRequest<Request>()
    const response = http.getResponse<Response>()
    const startedAt = process.hrtime.bigint()

    const record = (statusCode: number) => {
      const seconds = Number(process.hrtime.bigint() - startedAt) / 1e9
      this.metricsService.recordHttpRequest(request.method, routeOf(request), statusCode, seconds)
    }

    return next.handle().pipe(
      tap({
        next: () => record(response.statusCode),
        error: (error: unknown) => record(resolveHttpStatus(error)),
      })
    )
  }
}

function routeOf(request: Request): string {
  const route: unknown = request.route
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${request.baseUrl}${route.path}`
  }
  return request.path
}
