import { INestApplication } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { Test, TestingModule } from '@nestjs/testing'
import request from 'supertest'
import { App } from 'supertest/types'

import { AppModule } from '../src/app.module'
import { configureApp } from '../src/app.setup'
import {
  PaymentProcessorClient,
  PaymentRequest,
  PaymentResult,
  UserDirectoryClient,
  UserLookupResult,
} from '../src/modules/orders/clients'
import { NewOrder, Order } from '../src/modules/orders/entities'
import { InMemoryOrderRepository, OrderRepository } from '../src/modules/orders/repositories'
import { InMemoryUserRepository, UserRepository } from '../src/modules/users/repositories'
import { DatabaseService } from '../src/shared/database'

/**
 * E2E Tests
 *
 * Runs the full HTTP pipeline (validation, filters, interceptors) with the
 * user service, the payment service and the database replaced by
 * in-process stand-ins.
 */

class StubUserDirectory extends UserDirectoryClient {
  readonly lookups: number[] = []
  reachable = true

  constructor(private readonly knownUsers: number[]) {
    super()
  }

  async findUser(userId: number): Promise<UserLookupResult> {
    this.lookups.push(userId)
    if (!this.reachable) {
      return { found: false, reason: 'unavailable', detail: 'ECONNREFUSED: connect ECONNREFUSED 127.0.0.1:8081' }
    }
    return this.knownUsers.includes(userId)
      ? { found: true }
      : { found: false, reason: 'not_found', statusCode: 404 }
  }
}

class StubPaymentProcessor extends PaymentProcessorClient {
  readonly charges: PaymentRequest[] = []
  nextResult: PaymentResult = { status: 'approved' }

  async charge(payment: PaymentRequest): Promise<PaymentResult> {
    this.charges.push(payment)
    return this.nextResult
  }
}

class SwitchableOrderRepository extends InMemoryOrderRepository {
  failInserts = false

  async insert(order: NewOrder): Promise<Order> {
    if (this.failInserts) {
      throw new Error('could not connect to server')
    }
    return super.insert(order)
  }
}

const ORDER_KEYS = ['amount', 'created_at', 'id', 'product', 'quantity', 'status', 'user_id']

describe('Order service (e2e)', () => {
  let app: INestApplication<App>
  let userDirectory: StubUserDirectory
  let paymentProcessor: StubPaymentProcessor
  let orders: SwitchableOrderRepository

  const newOrder = { user_id: 1, product: 'Desk lamp', quantity: 2, amount: 40 }

  beforeAll(async () => {
    userDirectory = new StubUserDirectory([1, 2])
    paymentProcessor = new StubPaymentProcessor()
    orders = new SwitchableOrderRepository()

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(DatabaseService)
      .useValue(new DatabaseService(new ConfigService({ config: { database: { enabled: false } } })))
      .overrideProvider(OrderRepository)
      .useValue(orders)
      .overrideProvider(UserRepository)
      .useValue(new InMemoryUserRepository())
      .overrideProvider(UserDirectoryClient)
      .useValue(userDirectory)
      .overrideProvider(PaymentProcessorClient)
      .useValue(paymentProcessor)
      .compile()

    app = moduleFixture.createNestApplication()

    // Same global configuration as main.ts
    configureApp(app)

    await app.init()
  })

  afterAll(async () => {
    await app.close()
  })

  beforeEach(() => {
    userDirectory.lookups.length = 0
    userDirectory.reachable = true
    paymentProcessor.charges.length = 0
    paymentProcessor.nextResult = { status: 'approved' }
    orders.failInserts = false
  })

  describe('Service Info', () => {
    it('/ (GET) should return service info', async () => {
      const response = await request(app.getHttpServer()).get('/').expect(200)

      expect(response.body).toHaveProperty('service')
      expect(response.body).toHaveProperty('version')
      expect(response.body).toHaveProperty('environment', 'test')
      expect(response.body).toHaveProperty('timestamp')
    })
  })

  describe('POST /orders', () => {
    it('returns 200 with a completed order when the payment succeeds', async () => {
      const response = await request(app.getHttpServer()).post('/orders').send(newOrder).expect(200)

      expect(Object.keys(response.body).sort()).toEqual(ORDER_KEYS)
      expect(response.body).toMatchObject({
        user_id: 1,
        product: 'Desk lamp',
        quantity: 2,
        amount: 40,
        status: 'completed',
      })
      expect(typeof response.body.id).toBe('number')
      expect(Number.isNaN(Date.parse(response.body.created_at))).toBe(false)
      expect(paymentProcessor.charges).toEqual([{ orderId: response.body.id, amount: 40 }])
    })

    it('returns 200 with payment_failed when the processor rejects the charge', async () => {
      paymentProcessor.nextResult = { status: 'rejected', statusCode: 402 }

      const response = await request(app.getHttpServer()).post('/orders').send(newOrder).expect(200)

      expect(response.body.status).toBe('payment_failed')
      expect((await orders.findById(response.body.id))?.status).toBe('payment_failed')
    })

    it('returns 200 with payment_failed when the processor is unreachable', async () => {
      paymentProcessor.nextResult = { status: 'unavailable', detail: 'ECONNABORTED: timeout of 5000ms exceeded' }

      const response = await request(app.getHttpServer()).post('/orders').send(newOrder).expect(200)

      expect(response.body.status).toBe('payment_failed')
    })

    it('returns 400 and persists nothing for an unknown user', async () => {
      const before = (await orders.findMany()).length

      const response = await request(app.getHttpServer())
        .post('/orders')
        .send({ ...newOrder, user_id: 999 })
        .expect(400)

      expect(response.body).toMatchObject({
        statusCode: 400,
        error: 'USER_VALIDATION_FAILED',
        message: 'user not found: 999',
      })
      expect(await orders.findMany()).toHaveLength(before)
      expect(paymentProcessor.charges).toEqual([])
    })

    it('returns 400 without transport details when the user service is unreachable', async () => {
      userDirectory.reachable = false

      const response = await request(app.getHttpServer()).post('/orders').send(newOrder).expect(400)

      expect(response.body).toMatchObject({
        error: 'USER_VALIDATION_FAILED',
        message: 'user service unavailable',
      })
      expect(JSON.stringify(response.body)).not.toContain('127.0.0.1')
      expect(paymentProcessor.charges).toEqual([])
    })

    it('returns 400 for malformed JSON without calling anything downstream', async () => {
      const response = await request(app.getHttpServer())
        .post('/orders')
        .set('Content-Type', 'application/json')
        .send('{"user_id": 1, "product": ')
        .expect(400)

      expect(typeof response.body.requestId).toBe('string')
      expect(response.headers['x-request-id']).toBe(response.body.requestId)

      expect(userDirectory.lookups).toEqual([])
      expect(paymentProcessor.charges).toEqual([])
    })

    it('returns 400 with validation errors for invalid fields', async () => {
      const response = await request(app.getHttpServer())
        .post('/orders')
        .send({ user_id: -1, product: '', quantity: 2, amount: -5 })
        .expect(400)

      expect(response.body.message).toBe('Validation failed')
      expect(response.body.errors).toEqual([
        'user_id must be a positive number',
        'product should not be empty',
        'amount must not be less than 0',
      ])
      expect(userDirectory.lookups).toEqual([])
    })

    it('returns 400 for values the orders table cannot store', async () => {
      const before = (await orders.findMany()).length

      const response = await request(app.getHttpServer())
        .post('/orders')
        .send({ user_id: 1, product: 'x', quantity: 3000000000, amount: 1e13 })
        .expect(400)

      expect(response.body.errors).toEqual([
        'quantity must not be greater than 2147483647',
        'amount must not be greater than 9999999999.99',
      ])
      expect(await orders.findMany()).toHaveLength(before)
      expect(paymentProcessor.charges).toEqual([])
    })

    it('returns 400 for an amount with more than two decimals', async () => {
      const response = await request(app.getHttpServer())
        .post('/orders')
        .send({ ...newOrder, amount: 89.999 })
        .expect(400)

      expect(response.body.errors).toEqual(['amount must be a number conforming to the specified constraints'])
      expect(paymentProcessor.charges).toEqual([])
    })

    it('returns 500 and skips payment when the order cannot be stored', async () => {
      orders.failInserts = true

      const response = await request(app.getHttpServer()).post('/orders').send(newOrder).expect(500)

      expect(response.body).toMatchObject({ error: 'PERSISTENCE_FAILED', message: 'failed to persist order' })
      expect(userDirectory.lookups).toEqual([1])
      expect(paymentProcessor.charges).toEqual([])
    })

    it('creates two distinct orders for two identical requests', async () => {
      const first = await request(app.getHttpServer()).post('/orders').send(newOrder).expect(200)
      const second = await request(app.getHttpServer()).post('/orders').send(newOrder).expect(200)

      expect(first.body.id).not.toBe(second.body.id)
    })

    it('ignores a client-supplied id and status', async () => {
      const response = await request(app.getHttpServer())
        .post('/orders')
        .send({ ...newOrder, id: 12345, status: 'completed' })
        .expect(200)

      expect(response.body.id).not.toBe(12345)
      expect(paymentProcessor.charges).toEqual([{ orderId: response.body.id, amount: 40 }])
    })

    it('echoes the caller request id on errors', async () => {
      const response = await request(app.getHttpServer())
        .post('/orders')
        .set('x-request-id', 'test-request-1')
        .send({ ...newOrder, user_id: 999 })
        .expect(400)

      expect(response.headers['x-request-id']).toBe('test-request-1')
      expect(response.body.requestId).toBe('test-request-1')
    })
  })

  describe('GET /orders', () => {
    it('returns a stored order by id', async () => {
      const created = await request(app.getHttpServer()).post('/orders').send(newOrder).expect(200)

      const response = await request(app.getHttpServer()).get(`/orders/${created.body.id}`).expect(200)

      expect(response.body).toEqual(created.body)
    })

    it('returns 404 for an unknown order', async () => {
      const response = await request(app.getHttpServer()).get('/orders/99999').expect(404)

      expect(response.body).toMatchObject({ statusCode: 404, error: 'ORDER_NOT_FOUND' })
    })

    it('returns 400 for a non-numeric id', async () => {
      await request(app.getHttpServer()).get('/orders/abc').expect(400)
    })

    it('filters the list by user_id', async () => {
      await request(app.getHttpServer())
        .post('/orders')
        .send({ ...newOrder, user_id: 2 })
        .expect(200)

      const response = await request(app.getHttpServer()).get('/orders?user_id=2').expect(200)

      expect(response.body.length).toBeGreaterThan(0)
      for (const order of response.body) {
        expect(order.user_id).toBe(2)
      }
    })
  })

  describe('User directory', () => {
    it('creates and looks up a user', async () => {
      const created = await request(app.getHttpServer())
        .post('/users')
        .send({ name: 'Ada', email: 'ada@example.com' })
        .expect(200)

      expect(created.body).toMatchObject({ id: 1, name: 'Ada', email: 'ada@example.com' })
      expect(created.body).toHaveProperty('created_at')

      const found = await request(app.getHttpServer()).get('/users/get?id=1').expect(200)

      expect(found.body).toEqual(created.body)
    })

    it('returns 409 for a duplicate email', async () => {
      await request(app.getHttpServer())
        .post('/users')
        .send({ name: 'Grace', email: 'grace@example.com' })
        .expect(200)

      const response = await request(app.getHttpServer())
        .post('/users')
        .send({ name: 'Grace H.', email: 'grace@example.com' })
        .expect(409)

      expect(response.body.error).toBe('EMAIL_ALREADY_REGISTERED')
    })

    it('returns 404 for an unknown or malformed id', async () => {
      const missing = await request(app.getHttpServer()).get('/users/get?id=4242').expect(404)
      await request(app.getHttpServer()).get('/users/get?id=abc').expect(404)

      expect(missing.body.message).toBe('User not found')
    })

    it('validates the email address', async () => {
      const response = await request(app.getHttpServer())
        .post('/users')
        .send({ name: 'Ada', email: 'not-an-email' })
        .expect(400)

      expect(response.body.errors).toEqual(['email must be an email'])
    })
  })

  describe('Health Checks', () => {
    it('/health/live (GET) should report status', async () => {
      const response = await request(app.getHttpServer()).get('/health/live')

      expect([200, 503]).toContain(response.status)
      expect(response.body).toHaveProperty('status')
    })

    it('/health/ready (GET) should report the in-memory store as up', async () => {
      const response = await request(app.getHttpServer()).get('/health/ready').expect(200)

      expect(response.body.status).toBe('ok')
      expect(response.body.info.database).toEqual({ status: 'up', mode: 'in-memory' })
    })
  })

  describe('Metrics', () => {
    it('/metrics (GET) should return Prometheus metrics', async () => {
      const response = await request(app.getHttpServer())
        .get('/metrics')
        .expect(200)
        .expect('Content-Type', /text\/plain/)

      expect(response.text).toContain('http_requests_total')
      expect(response.text).toContain('http_request_duration_seconds')
      expect(response.text).toContain('orders_created_total')
    })
  })
})
