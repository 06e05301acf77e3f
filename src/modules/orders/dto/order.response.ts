import { Expose } from 'class-transformer'

import type { Order, OrderStatus } from '../entities'

/**
 * Order as returned over HTTP:
 * { id, user_id, product, quantity, amount, status, created_at }
 */
export class OrderResponse {
  id: number

  @Expose({ name: 'user_id' })
  userId: number

  product: string
  quantity: number
  amount: number
  status: OrderStatus

  @Expose({ name: 'created_at' })
  createdAt: Date

  constructor(order: Order) {
    this.id = order.id
    this.userId = order.userId
    this.product = order.product
    this.quantity = order.quantity
    this.amount = order.amount
    this.status = order.status
    this.createdAt = order.createdAt
  }
}
