import { Module } from '@nestjs/common'
import { ConditionalModule, ConfigModule } from '@nestjs/config'

import { AppController } from './app.controller'
import { environmentConfig, validate } from './config'
import { OrdersModule } from './modules/orders'
import { UsersModule } from './modules/users'
import { DatabaseModule } from './shared/database'
import { HealthModule } from './shared/health'
import { LoggerModule } from './shared/logger'
import { MetricsModule } from './shared/metrics'

/**
 * App Module
 *
 * Root module for the order service.
 *
 * Architecture:
 * - Shared modules (global): Logging, Metrics, Database
 * - Infrastructure modules: Health checks, Configuration
 * - Feature modules: Orders, Users (optional user directory)
 */
@Module({
  imports: [
    // Configuration
    // Loads and validates environment variables
    ConfigModule.forRoot({
      isGlobal: true,
      load: [environmentConfig],
      validate,
    }),

    LoggerModule.forRoot(),

    // PostgreSQL pool (or in-memory repositories when disabled)
    DatabaseModule,

    HealthModule,

    // Prometheus-compatible metrics collection
    MetricsModule,

    OrdersModule,

    // The user-service half of the system; off with ENABLE_USER_DIRECTORY=false
    ConditionalModule.registerWhen(
      UsersModule,
      (env: NodeJS.ProcessEnv) => env.ENABLE_USER_DIRECTORY !== 'false'
    ),
  ],
  controllers: [AppController],
})
export class AppModule {}
