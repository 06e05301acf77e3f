import { Module } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'

import { DatabaseService } from '../../shared/database'
import { createHttpClient } from '../../shared/http'
import {
  HttpPaymentProcessorClient,
  HttpUserDirectoryClient,
  PAYMENT_PROCESSOR_HTTP,
  PaymentProcessorClient,
  USER_DIRECTORY_HTTP,
  UserDirectoryClient,
} from './clients'
import { OrdersController } from './controllers'
import { InMemoryOrderRepository, OrderRepository, PgOrderRepository } from './repositories'
import { OrdersService } from './services'

/**
 * Orders Module
 *
 * - OrdersController: REST endpoints
 * - OrdersService: creation workflow and queries
 * - OrderRepository: PostgreSQL, or in-memory when the database is disabled
 * - UserDirectoryClient / PaymentProcessorClient: HTTP collaborators
 *
 * Collaborators are bound to abstract classes so tests can override them.
 */
@Module({
  controllers: [OrdersController],
  providers: [
    OrdersService,
    {
      provide: OrderRepository,
      useFactory: (database: DatabaseService) =>
        database.enabled ? new PgOrderRepository(database) : new InMemoryOrderRepository(),
      inject: [DatabaseService],
    },
    {
      provide: USER_DIRECTORY_HTTP,
      useFactory: (configService: ConfigService) =>
        createHttpClient(
          configService.get<string>('config.services.userService.url') ?? 'http://localhost:8081',
          configService.get<number>('config.http.timeoutMs') ?? 5000
        ),
      inject: [ConfigService],
    },
    {
      provide: PAYMENT_PROCESSOR_HTTP,
      useFactory: (configService: ConfigService) =>
        createHttpClient(
          configService.get<string>('config.services.paymentService.url') ?? 'http://localhost:8083',
          configService.get<number>('config.http.timeoutMs') ?? 5000
        ),
      inject: [ConfigService],
    },
    { provide: UserDirectoryClient, useClass: HttpUserDirectoryClient },
    { provide: PaymentProcessorClient, useClass: HttpPaymentProcessorClient },
  ],
  exports: [OrdersService],
})
export class OrdersModule {}
