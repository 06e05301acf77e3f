export { CreateOrderDto } from './create-order.dto'
export { OrderResponse } from './order.response'
