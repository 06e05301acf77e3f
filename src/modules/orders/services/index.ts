export { OrdersService } from './orders.service'
