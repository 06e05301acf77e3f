import { Module } from '@nestjs/common'
import { TerminusModule } from '@nestjs/terminus'

import { DatabaseHealthIndicator } from './database.health'
import { HealthController } from './health.controller'

/**
 * Health Module
 *
 * Liveness and readiness endpoints built on @nestjs/terminus.
 * DatabaseService comes from the global DatabaseModule.
 */
@Module({
  imports: [TerminusModule],
  controllers: [HealthController],
  providers: [DatabaseHealthIndicator],
})
export class HealthModule {}
