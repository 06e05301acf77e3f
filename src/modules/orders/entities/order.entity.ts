/**
 * Order statuses
 *
 * pending -> completed        (payment approved)
 * pending -> payment_failed   (payment rejected or processor unreachable)
 *
 * completed and payment_failed are terminal.
 */
export const OrderStatus = {
  PENDING: 'pending',
  COMPLETED: 'completed',
  PAYMENT_FAILED: 'payment_failed',
} as const

export type OrderStatus = (typeof OrderStatus)[keyof typeof OrderStatus]

export type TerminalOrderStatus = Exclude<OrderStatus, typeof OrderStatus.PENDING>

export interface Order {
  id: number
  userId: number
  product: string
  quantity: number
  amount: number
  status: OrderStatus
  createdAt: Date
}

/** Order as handed to the store, before it has an id */
export type NewOrder = Omit<Order, 'id'>

const TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  [OrderStatus.PENDING]: [OrderStatus.COMPLETED, OrderStatus.PAYMENT_FAILED],
  [OrderStatus.COMPLETED]: [],
  [OrderStatus.PAYMENT_FAILED]: [],
}

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return TRANSITIONS[from].includes(to)
}

export function isOrderStatus(value: unknown): value is OrderStatus {
  return typeof value === 'string' && Object.values<string>(OrderStatus).includes(value)
}
