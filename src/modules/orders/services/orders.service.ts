import { Injectable, Logger } from '@nestjs/common'

import { describeError } from '../../../shared/errors'
import { MetricsService } from '../../../shared/metrics'
import { PaymentProcessorClient, PaymentResult, UserDirectoryClient } from '../clients'
import { CreateOrderDto } from '../dto'
import { Order, OrderStatus, TerminalOrderStatus } from '../entities'
import {
  OrderNotFoundError,
  PaymentFailedError,
  PersistenceFailedError,
  StatusUpdateFailedError,
  UserValidationFailedError,
} from '../errors'
import { OrderFilter, OrderRepository } from '../repositories'

/**
 * Orders Service
 *
 * Orchestrates order creation across the user service, the order store
 * and the payment service:
 *
 * 1. Validate the user         (failure: 400, nothing persisted)
 * 2. Insert the pending order  (failure: 500, no payment attempted)
 * 3. Charge the payment        (failure: order becomes payment_failed)
 * 4. Write the terminal status (failure: logged, response unchanged)
 *
 * Every outbound call is made exactly once. Steps 2 and 4 are separate
 * store operations, so a concurrent reader can observe `pending`.
 */
@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name)

  constructor(
    private readonly orderRepository: OrderRepository,
    private readonly userDirectory: UserDirectoryClient,
    private readonly paymentProcessor: PaymentProcessorClient,
    private readonly metricsService: MetricsService
  ) {}

  /**
   * Create an order and drive it to a terminal status
   *
   * @returns The order with status `completed` or `payment_failed`
   * @throws UserValidationFailedError if the user is unknown or the user service is down
   * @throws PersistenceFailedError if the pending order could not be inserted
   */
  async create(createOrderDto: CreateOrderDto): Promise<Order> {
    this.logger.log(`Creating order for user ${createOrderDto.userId}`)

    await this.validateUser(createOrderDto.userId)

    const order = await this.insertPendingOrder(createOrderDto)

    const payment = await this.paymentProcessor.charge({
      orderId: order.id,
      amount: order.amount,
    })

    return this.finalize(order, payment)
  }

  async findOne(id: number): Promise<Order> {
    const order = await this.orderRepository.findById(id)
    if (!order) {
      throw new OrderNotFoundError(id)
    }
    return order
  }

  /**
   * @returns Orders newest first, optionally only those of one user
   */
  async findAll(filter: OrderFilter = {}): Promise<Order[]> {
    return this.orderRepository.findMany(filter)
  }

  private async validateUser(userId: number): Promise<void> {
    const lookup = await this.userDirectory.findUser(userId)

    if (!lookup.found) {
      const error =
        lookup.reason === 'not_found'
          ? new UserValidationFailedError(userId, 'not_found')
          : new UserValidationFailedError(userId, 'unavailable', lookup.detail)
      this.logger.warn(error.detail ? `${error.message}: ${error.detail}` : error.message)
      throw error
    }
  }

  private async insertPendingOrder(createOrderDto: CreateOrderDto): Promise<Order> {
    try {
      const order = await this.orderRepository.insert({
        userId: createOrderDto.userId,
        product: createOrderDto.product,
        quantity: createOrderDto.quantity,
        amount: createOrderDto.amount,
        status: OrderStatus.PENDING,
        createdAt: new Date(),
      })
      this.logger.log(`Order ${order.id} created as pending`)
      return order
    } catch (error) {
      this.logger.error(`Failed to insert order for user ${createOrderDto.userId}`, error)
      throw new PersistenceFailedError(error)
    }
  }

  /**
   * Best-effort status write. The payment outcome alone decides the
   * status returned to the caller.
   */
  private async finalize(order: Order, payment: PaymentResult): Promise<Order> {
    let status: TerminalOrderStatus = OrderStatus.COMPLETED

    if (payment.status !== 'approved') {
      status = OrderStatus.PAYMENT_FAILED
      const failure = new PaymentFailedError(
        order.id,
        payment.status === 'rejected'
          ? `processor answered ${payment.statusCode}`
          : `processor unavailable (${payment.detail})`
      )
      this.logger.warn(failure.message)
    }

    try {
      const updated = await this.orderRepository.updateStatus(order.id, status)
      if (!updated) {
        this.logger.error(new StatusUpdateFailedError(order.id, status, 'order is no longer pending').message)
      }
    } catch (error) {
      this.logger.error(new StatusUpdateFailedError(order.id, status, describeError(error)).message)
    }

    this.metricsService.recordOrderCreated(status)
    this.logger.log(`Order ${order.id} finished as ${status}`)

    return { ...order, status }
  }
}
