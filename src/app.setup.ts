import { INestApplication } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'

import { GlobalExceptionFilter } from './shared/filters'
import { RequestIdInterceptor, TransformInterceptor } from './shared/interceptors'
import { MetricsInterceptor } from './shared/metrics'
import { GlobalValidationPipe } from './shared/pipes'

/**
 * Apply the global HTTP configuration.
 * Shared by main.ts and the e2e tests so both run the same pipeline.
 */
export function configureApp(app: INestApplication): void {
  const configService = app.get(ConfigService)
  const apiPrefix = configService.get<string>('config.app.apiPrefix') ?? ''

  // Health and metrics endpoints are excluded from the prefix
  if (apiPrefix) {
    app.setGlobalPrefix(apiPrefix, {
      exclude: ['health', 'health/live', 'health/ready', 'metrics'],
    })
  }

  const corsOrigin = configService.get<string>('config.cors.origin') ?? '*'
  app.enableCors({
    origin: corsOrigin,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'OPTIONS'],
  })

  // Order matters for interceptors
  app.useGlobalPipes(new GlobalValidationPipe())
  app.useGlobalFilters(new GlobalExceptionFilter())
  app.useGlobalInterceptors(
    new RequestIdInterceptor(), // First: Add request ID for tracing
    new TransformInterceptor(configService), // Second: Transform responses
    app.get(MetricsInterceptor) // Third: Record metrics
  )

  // Ensures the database pool is drained on SIGTERM / SIGINT
  app.enableShutdownHooks()
}
