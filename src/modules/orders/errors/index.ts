export {
  OrderNotFoundError,
  PaymentFailedError,
  PersistenceFailedError,
  StatusUpdateFailedError,
  UserValidationFailedError,
} from './order.errors'
