import { Injectable } from '@nestjs/common'

import { canTransition, NewOrder, Order, TerminalOrderStatus } from '../entities'
import { OrderFilter, OrderRepository } from './order.repository'

/**
 * Order Repository (In-Memory)
 *
 * Used when the database is disabled, and as the store in tests.
 * Returns copies so callers can't mutate stored rows.
 */
@Injectable()
export class InMemoryOrderRepository extends OrderRepository {
  private readonly orders = new Map<number, Order>()
  private currentId = 1

  async insert(order: NewOrder): Promise<Order> {
    const created: Order = { ...order, id: this.currentId++ }
    this.orders.set(created.id, created)
    return { ...created }
  }

  async updateStatus(id: number, status: TerminalOrderStatus): Promise<boolean> {
    const order = this.orders.get(id)
    if (!order || !canTransition(order.status, status)) {
      return false
    }
    this.orders.set(id, { ...order, status })
    return true
  }

  async findById(id: number): Promise<Order | null> {
    const order = this.orders.get(id)
    return order ? { ...order } : null
  }

  async findMany(filter: OrderFilter = {}): Promise<Order[]> {
    return Array.from(this.orders.values())
      .filter((order) => filter.userId === undefined || order.userId === filter.userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map((order) => ({ ...order }))
  }
}
