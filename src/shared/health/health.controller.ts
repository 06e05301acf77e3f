import { Controller, Get } from '@nestjs/common'
import { HealthCheck, HealthCheckService, MemoryHealthIndicator } from '@nestjs/terminus'

import { DatabaseHealthIndicator } from './database.health'

const MB = 1024 * 1024

/**
 * Health Check Controller
 *
 * Provides health check endpoints for deployment orchestration.
 *
 * Endpoints:
 * - GET /health/live: Liveness probe (is the process running?)
 * - GET /health/ready: Readiness probe (can orders be persisted?)
 * - GET /health: Comprehensive health check
 */
@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly memory: MemoryHealthIndicator,
    private readonly database: DatabaseHealthIndicator
  ) {}

  /**
   * Liveness Probe
   *
   * Only fails if heap usage exceeds 300MB.
   */
  @Get('live')
  @HealthCheck()
  checkLiveness() {
    return this.health.check([async () => this.memory.checkHeap('memory_heap', 300 * MB)])
  }

  /**
   * Readiness Probe
   *
   * The order store is the only dependency checked; the user and payment
   * services are probed implicitly by every order request.
   */
  @Get('ready')
  @HealthCheck()
  checkReadiness() {
    return this.health.check([() => this.database.isHealthy('database')])
  }

  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.memory.checkHeap('memory_heap', 300 * MB),
      () => this.memory.checkRSS('memory_rss', 500 * MB),
      () => this.database.isHealthy('database'),
    ])
  }
}
