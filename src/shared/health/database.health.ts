import { Injectable } from '@nestjs/common'
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus'

import { DatabaseService } from '../database'

/**
 * Database Health Indicator
 *
 * Pings PostgreSQL through the shared pool. Used in readiness probes so
 * the service doesn't receive traffic when it can't persist orders.
 * Reports "up" with `mode: in-memory` when the database is disabled.
 */
@Injectable()
export class DatabaseHealthIndicator extends HealthIndicator {
  constructor(private readonly databaseService: DatabaseService) {
    super()
  }

  /**
   * Check database connectivity
   *
   * @param key - Health check key name
   * @throws HealthCheckError if the ping fails
   */
  async isHealthy(key: string): Promise<HealthIndicatorResult> {
    if (!this.databaseService.enabled) {
      return this.getStatus(key, true, { mode: 'in-memory' })
    }

    const canPing = await this.databaseService.healthCheck()

    if (!canPing) {
      throw new HealthCheckError(
        'Database ping failed',
        this.getStatus(key, false, { mode: 'postgres', message: 'Failed to ping database' })
      )
    }

    return this.getStatus(key, true, { mode: 'postgres' })
  }
}
