import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common'

import { CreateOrderDto, OrderResponse } from '../dto'
import { OrdersService } from '../services'

/**
 * Orders Controller
 *
 * Endpoints:
 * - POST /orders: Create an order (user check, persist, pay, finalize)
 * - GET /orders: List orders (optionally filtered by user_id)
 * - GET /orders/:id: Get a specific order
 */
@Controller('orders')
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  /**
   * Create a new order
   *
   * Answers 200 whenever the order was persisted, including when the
   * payment failed: the body's `status` is then `payment_failed`.
   *
   * Example request:
   * POST /orders
   * {
   *   "user_id": 1,
   *   "product": "Mechanical keyboard",
   *   "quantity": 1,
   *   "amount": 89.9
   * }
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async create(@Body() createOrderDto: CreateOrderDto): Promise<OrderResponse> {
    const order = await this.ordersService.create(createOrderDto)
    return new OrderResponse(order)
  }

  /**
   * Examples:
   * GET /orders
   * GET /orders?user_id=1
   */
  @Get()
  async findAll(
    @Query('user_id', new ParseIntPipe({ optional: true })) userId?: number
  ): Promise<OrderResponse[]> {
    const orders = await this.ordersService.findAll({ userId })
    return orders.map((order) => new OrderResponse(order))
  }

  @Get(':id')
  async findOne(@Param('id', ParseIntPipe) id: number): Promise<OrderResponse> {
    return new OrderResponse(await this.ordersService.findOne(id))
  }
}
