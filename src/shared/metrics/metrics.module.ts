import { Global, Module } from '@nestjs/common'

import { MetricsController } from './metrics.controller'
import { MetricsInterceptor } from './metrics.interceptor'
import { MetricsService } from './metrics.service'

/**
 * Metrics Module
 *
 * Prometheus-compatible metrics collection. Global so feature services
 * can record business counters.
 */
@Global()
@Module({
  controllers: [MetricsController],
  providers: [MetricsService, MetricsInterceptor],
  exports: [MetricsService, MetricsInterceptor],
})
export class MetricsModule {}
