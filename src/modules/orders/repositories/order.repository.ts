import type { NewOrder, Order, TerminalOrderStatus } from '../entities'

export interface OrderFilter {
  userId?: number
}

/**
 * Order Repository Port
 *
 * Each method is one atomic store operation. `updateStatus` only moves an
 * order out of `pending`; it reports `false` when no pending order with
 * that id exists, so terminal statuses are never overwritten.
 */
export abstract class OrderRepository {
  abstract insert(order: NewOrder): Promise<Order>
  abstract updateStatus(id: number, status: TerminalOrderStatus): Promise<boolean>
  abstract findById(id: number): Promise<Order | null>
  abstract findMany(filter?: OrderFilter): Promise<Order[]>
}
