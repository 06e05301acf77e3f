import { HttpStatus, Inject, Injectable, Logger } from '@nestjs/common'
import type { AxiosInstance } from 'axios'

import { describeTransportError } from '../../../shared/http'

export const PAYMENT_PROCESSOR_HTTP = Symbol('PAYMENT_PROCESSOR_HTTP')

export interface PaymentRequest {
  orderId: number
  amount: number
}

export type PaymentResult =
  | { status: 'approved' }
  | { status: 'rejected'; statusCode: number }
  | { status: 'unavailable'; detail: string }

/**
 * Payment Processor Port
 *
 * Charges an amount against an order. Never throws; both failure
 * classes come back as a result.
 */
export abstract class PaymentProcessorClient {
  abstract charge(payment: PaymentRequest): Promise<PaymentResult>
}

/**
 * Calls `POST /payments` with `{ order_id, amount }`.
 * Single attempt, bounded by the client timeout.
 */
@Injectable()
export class HttpPaymentProcessorClient extends PaymentProcessorClient {
  private readonly logger = new Logger(HttpPaymentProcessorClient.name)

  constructor(@Inject(PAYMENT_PROCESSOR_HTTP) private readonly http: AxiosInstance) {
    super()
  }

  async charge(payment: PaymentRequest): Promise<PaymentResult> {
    try {
      const response = await this.http.post<unknown>('/payments', {
        order_id: payment.orderId,
        amount: payment.amount,
      })

      if (response.status !== HttpStatus.OK) {
        this.logger.warn(`Payment for order ${payment.orderId} rejected with ${response.status}`)
        return { status: 'rejected', statusCode: response.status }
      }

      return { status: 'approved' }
    } catch (error) {
      const detail = describeTransportError(error)
      this.logger.warn(`Payment service unreachable for order ${payment.orderId}: ${detail}`)
      return { status: 'unavailable', detail }
    }
  }
}
