import { Injectable, OnModuleInit } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { collectDefaultMetrics, Counter, Histogram, Registry } from 'prom-client'

/**
 * Metrics Service
 *
 * Owns a dedicated prom-client registry so several application instances
 * (one per e2e test module) never register the same metric twice.
 */
@Injectable()
export class MetricsService implements OnModuleInit {
  readonly registry = new Registry()
  readonly enabled: boolean

  private readonly httpRequestsTotal: Counter<'method' | 'route' | 'status_code'>
  private readonly httpRequestDuration: Histogram<'method' | 'route' | 'status_code'>
  private readonly ordersCreatedTotal: Counter<'status'>

  constructor(private readonly configService: ConfigService) {
    this.enabled = configService.get<boolean>('config.metrics.enabled') ?? true
    this.registry.setDefaultLabels({
      service: configService.get<string>('config.service.name') ?? 'order-service',
    })

    this.httpRequestsTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status_code'],
      registers: [this.registry],
    })

    this.httpRequestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'HTTP request duration in seconds',
      labelNames: ['method', 'route', 'status_code'],
      buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
      registers: [this.registry],
    })

    this.ordersCreatedTotal = new Counter({
      name: 'orders_created_total',
      help: 'Orders that reached a terminal status, by status',
      labelNames: ['status'],
      registers: [this.registry],
    })
  }

  onModuleInit(): void {
    if (this.enabled && this.configService.get<string>('config.app.env') !== 'test') {
      collectDefaultMetrics({ register: this.registry })
    }
  }

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    if (!this.enabled) return

    const labels = { method, route, status_code: String(statusCode) }
    this.httpRequestsTotal.inc(labels)
    this.httpRequestDuration.observe(labels, durationSeconds)
  }

  recordOrderCreated(status: string): void {
    if (!this.enabled) return

    this.ordersCreatedTotal.inc({ status })
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics()
  }
}
