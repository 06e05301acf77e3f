import 'reflect-metadata'

import { ConfigService } from '@nestjs/config'
import { NestFactory } from '@nestjs/core'

import { AppModule } from './app.module'
import { configureApp } from './app.setup'
import { AppLogger } from './shared/logger'

/**
 * Bootstrap the order service
 *
 * 1. Create NestJS application
 * 2. Install the winston-backed logger
 * 3. Register global pipes, filters and interceptors
 * 4. Start listening on configured port
 */
async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  })

  const configService = app.get(ConfigService)
  const port = configService.get<number>('config.app.port') ?? 8082
  const apiPrefix = configService.get<string>('config.app.apiPrefix') ?? ''
  const serviceName = configService.get<string>('config.service.name')
  const serviceVersion = configService.get<string>('config.service.version')

  const logger = app.get(AppLogger)
  logger.setContext('Bootstrap')
  app.useLogger(logger)

  configureApp(app)

  await app.listen(port)

  const baseUrl = `http://localhost:${port}`
  const fullUrl = apiPrefix ? `${baseUrl}/${apiPrefix}` : baseUrl
  logger.log(`${serviceName} v${serviceVersion} is running on: ${fullUrl}`)
  logger.log(`Metrics available at: ${baseUrl}/metrics`)
  logger.log(`Health check available at: ${baseUrl}/health`)
}

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled Rejection:', reason)
})

bootstrap().catch((error: unknown) => {
  console.error('Failed to start application:', error)
  process.exitCode = 1
})
