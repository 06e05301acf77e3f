export { canTransition, isOrderStatus, OrderStatus } from './order.entity'
export type { NewOrder, Order, TerminalOrderStatus } from './order.entity'
