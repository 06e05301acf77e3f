export {
  HttpPaymentProcessorClient,
  PAYMENT_PROCESSOR_HTTP,
  PaymentProcessorClient,
} from './payment-processor.client'
export type { PaymentRequest, PaymentResult } from './payment-processor.client'
export {
  HttpUserDirectoryClient,
  USER_DIRECTORY_HTTP,
  UserDirectoryClient,
} from './user-directory.client'
export type { UserLookupResult } from './user-directory.client'
