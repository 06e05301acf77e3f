import { Controller, Get, Header, NotFoundException } from '@nestjs/common'

import { MetricsService } from './metrics.service'

/**
 * Prometheus scrape endpoint. Never prefixed with API_PREFIX.
 */
@Controller('metrics')
export class MetricsController {
  constructor(private readonly metricsService: MetricsService) {}

  @Get()
  @Header('Content-Type', 'text/plain; version=0.0.4; charset=utf-8')
  async scrape(): Promise<string> {
    if (!this.metricsService.enabled) {
      throw new NotFoundException('Metrics are disabled')
    }
    return this.metricsService.getMetrics()
  }
}
