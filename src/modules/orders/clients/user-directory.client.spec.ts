import { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from 'axios'

import { createHttpClient } from '../../../shared/http'
import { HttpUserDirectoryClient } from './user-directory.client'

describe('HttpUserDirectoryClient', () => {
  let requests: InternalAxiosRequestConfig[]

  const clientWith = (adapter: AxiosAdapter) => {
    const http = createHttpClient('http://users.internal', 1000)
    http.defaults.adapter = adapter
    return new HttpUserDirectoryClient(http)
  }

  const respond =
    (status: number, data: unknown = {}): AxiosAdapter =>
    async (config) => {
      requests.push(config)
      return { data, status, statusText: String(status), headers: {}, config }
    }

  beforeEach(() => {
    requests = []
  })

  it('looks the user up by id', async () => {
    const client = clientWith(respond(200, { id: 1, name: 'Ada', email: 'ada@example.com' }))

    await client.findUser(1)

    expect(requests).toHaveLength(1)
    expect(requests[0].method).toBe('get')
    expect(requests[0].baseURL).toBe('http://users.internal')
    expect(requests[0].url).toBe('/users/get')
    expect(requests[0].params).toEqual({ id: 1 })
  })

  it('reports the user as found on 200', async () => {
    const client = clientWith(respond(200, { id: 1 }))

    await expect(client.findUser(1)).resolves.toEqual({ found: true })
  })

  it('reports not_found on any other status', async () => {
    const client = clientWith(respond(404, 'User not found'))

    await expect(client.findUser(999)).resolves.toEqual({
      found: false,
      reason: 'not_found',
      statusCode: 404,
    })
  })

  it('treats a 500 from the directory as not found', async () => {
    const client = clientWith(respond(500))

    await expect(client.findUser(1)).resolves.toEqual({
      found: false,
      reason: 'not_found',
      statusCode: 500,
    })
  })

  it('reports unavailable when the call times out', async () => {
    const client = clientWith(async (config) => {
      throw new AxiosError('timeout of 1000ms exceeded', AxiosError.ECONNABORTED, config)
    })

    await expect(client.findUser(1)).resolves.toEqual({
      found: false,
      reason: 'unavailable',
      detail: 'ECONNABORTED: timeout of 1000ms exceeded',
    })
  })

  it('reports unavailable when the connection is refused', async () => {
    const client = clientWith(async (config) => {
      throw new AxiosError('connect ECONNREFUSED 127.0.0.1:8081', 'ECONNREFUSED', config)
    })

    await expect(client.findUser(1)).resolves.toEqual({
      found: false,
      reason: 'unavailable',
      detail: 'ECONNREFUSED: connect ECONNREFUSED 127.0.0.1:8081',
    })
  })
})
