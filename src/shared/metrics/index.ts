export { MetricsController } from './metrics.controller'
export { MetricsInterceptor } from './metrics.interceptor'
export { MetricsModule } from './metrics.module'
export { MetricsService } from './metrics.service'
