export { InMemoryOrderRepository } from './in-memory-order.repository'
export { OrderRepository } from './order.repository'
export type { OrderFilter } from './order.repository'
export { PgOrderRepository } from './pg-order.repository'
