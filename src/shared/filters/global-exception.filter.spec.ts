import { BadRequestException, NotFoundException } from '@nestjs/common'
import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host'

import { UserValidationFailedError } from '../../modules/orders/errors'
import { GlobalExceptionFilter } from './global-exception.filter'

interface FakeResponse {
  status(code: number): FakeResponse
  json(body: Record<string, unknown>): FakeResponse
  setHeader(name: string, value: string): FakeResponse
}

interface CapturedResponse {
  statusCode?: number
  body?: Record<string, unknown>
  headers?: Record<string, string>
}

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/

function hostFor(captured: CapturedResponse, headers: Record<string, string> = {}): ExecutionContextHost {
  const response: FakeResponse = {
    status(code: number) {
      captured.statusCode = code
      return response
    },
    json(body: Record<string, unknown>) {
      captured.body = body
      return response
    },
    setHeader(name: string, value: string) {
      captured.headers = { ...captured.headers, [name]: value }
      return response
    },
  }
  const request = {
    method: 'POST',
    url: '/orders',
    header: (name: string) => headers[name.toLowerCase()],
  }
  return new ExecutionContextHost([request, response])
}

describe('GlobalExceptionFilter', () => {
  const filter = new GlobalExceptionFilter()

  it('maps domain errors to their status and code', () => {
    const captured: CapturedResponse = {}

    filter.catch(new UserValidationFailedError(999, 'not_found'), hostFor(captured, { 'x-request-id': 'req-1' }))

    expect(captured.statusCode).toBe(400)
    expect(captured.body).toEqual({
      statusCode: 400,
      error: 'USER_VALIDATION_FAILED',
      message: 'user not found: 999',
      path: '/orders',
      timestamp: expect.any(String),
      requestId: 'req-1',
    })
  })

  it('keeps the caller request id without rewriting the header', () => {
    const captured: CapturedResponse = {}

    filter.catch(new NotFoundException(), hostFor(captured, { 'x-request-id': 'req-2' }))

    expect(captured.body?.requestId).toBe('req-2')
    expect(captured.headers).toBeUndefined()
  })

  it('generates a request id when none reached the handler', () => {
    const captured: CapturedResponse = {}

    filter.catch(new BadRequestException('Unexpected end of JSON input'), hostFor(captured))

    const requestId = captured.body?.requestId
    expect(typeof requestId).toBe('string')
    expect(String(requestId)).toMatch(UUID)
    expect(captured.headers).toEqual({ 'x-request-id': requestId })
  })

  it('keeps validation details from the pipe', () => {
    const captured: CapturedResponse = {}

    filter.catch(
      new BadRequestException({ message: 'Validation failed', errors: ['product should not be empty'] }),
      hostFor(captured)
    )

    expect(captured.statusCode).toBe(400)
    expect(captured.body).toMatchObject({
      statusCode: 400,
      error: 'Bad Request',
      message: 'Validation failed',
      errors: ['product should not be empty'],
    })
  })

  it('keeps the framework message for http exceptions', () => {
    const captured: CapturedResponse = {}

    filter.catch(new NotFoundException('Cannot GET /nowhere'), hostFor(captured))

    expect(captured.statusCode).toBe(404)
    expect(captured.body).toMatchObject({ error: 'Not Found', message: 'Cannot GET /nowhere' })
  })

  it('hides unexpected errors behind a 500', () => {
    const captured: CapturedResponse = {}

    filter.catch(new Error('password authentication failed for user "orders"'), hostFor(captured))

    expect(captured.statusCode).toBe(500)
    expect(captured.body).toMatchObject({
      statusCode: 500,
      error: 'Internal Server Error',
      message: 'Internal server error',
    })
  })
})
