import { Injectable } from '@nestjs/common'

import { DatabaseService } from '../../../shared/database'
import { isOrderStatus, NewOrder, Order, OrderStatus, TerminalOrderStatus } from '../entities'
import { OrderFilter, OrderRepository } from './order.repository'

interface OrderRow {
  id: number
  user_id: number
  product: string
  quantity: number
  // NUMERIC comes back from pg as a string
  amount: string
  status: string
  created_at: Date
}

const ORDER_COLUMNS = 'id, user_id, product, quantity, amount, status, created_at'

@Injectable()
export class PgOrderRepository extends OrderRepository {
  constructor(private readonly database: DatabaseService) {
    super()
  }

  async insert(order: NewOrder): Promise<Order> {
    const result = await this.database.query<OrderRow>(
      `INSERT INTO orders (user_id, product, quantity, amount, status, created_at)
       VALUES ($1, $2, $3, $4, $5, $6)
       RETURNING ${ORDER_COLUMNS}`,
      [order.userId, order.product, order.quantity, order.amount, order.status, order.createdAt]
    )
    return toOrder(result.rows[0])
  }

  async updateStatus(id: number, status: TerminalOrderStatus): Promise<boolean> {
    const result = await this.database.query(
      'UPDATE orders SET status = $1 WHERE id = $2 AND status = $3',
      [status, id, OrderStatus.PENDING]
    )
    return (result.rowCount ?? 0) > 0
  }

  async findById(id: number): Promise<Order | null> {
    const result = await this.database.query<OrderRow>(
      `SELECT ${ORDER_COLUMNS} FROM orders WHERE id = $1`,
      [id]
    )
    return result.rows.length > 0 ? toOrder(result.rows[0]) : null
  }

  async findMany(filter: OrderFilter = {}): Promise<Order[]> {
    const result =
      filter.userId === undefined
        ? await this.database.query<OrderRow>(
            `SELECT ${ORDER_COLUMNS} FROM orders ORDER BY created_at DESC, id DESC`
          )
        : await this.database.query<OrderRow>(
            `SELECT ${ORDER_COLUMNS} FROM orders WHERE user_id = $1 ORDER BY created_at DESC, id DESC`,
            [filter.userId]
          )
    return result.rows.map(toOrder)
  }
}

function toOrder(row: OrderRow): Order {
  if (!isOrderStatus(row.status)) {
    throw new Error(`Order ${row.id} has unknown status "${row.status}"`)
  }
  return {
    id: row.id,
    userId: row.user_id,
    product: row.product,
    quantity: row.quantity,
    amount: Number(row.amount),
    status: row.status,
    createdAt: row.created_at,
  }
}
