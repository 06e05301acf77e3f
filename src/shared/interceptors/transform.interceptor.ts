import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { instanceToPlain } from 'class-transformer'
import type { Response } from 'express'
import { map, Observable } from 'rxjs'

export const SERVICE_VERSION_HEADER = 'x-service-version'

/**
 * Transform Interceptor
 *
 * Serializes response classes through class-transformer so `@Expose`
 * renames (userId -> user_id) apply, and stamps the service version.
 * Strings and other primitives pass through untouched.
 */
@Injectable()
export class TransformInterceptor implements NestInterceptor {
  private readonly version: string

  constructor(configService: ConfigService) {
    this.version = configService.get<string>('config.service.version') ?? '0.0.0'
  }

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const response = context.switchToHttp().getResponse<Response>()
    response.setHeader(SERVICE_VERSION_HEADER, this.version)

    return next
      .handle()
      .pipe(map((data: unknown) => (typeof data === 'object' && data !== null ? instanceToPlain(data) : data)))
  }
}
