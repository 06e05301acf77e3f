import axios, { AxiosInstance } from 'axios'

/**
 * Create the axios instance used to reach one collaborator service.
 *
 * Every status code resolves: callers read `response.status` themselves,
 * so only transport failures (refused, reset, timeout) reject.
 */
export function createHttpClient(baseURL: string, timeoutMs: number): AxiosInstance {
  return axios.create({
    baseURL,
    timeout: timeoutMs,
    headers: {
      Accept: 'application/json',
      'Content-Type': 'application/json',
    },
    validateStatus: () => true,
  })
}

/**
 * Short reason for a failed outbound call, for logs and error messages
 */
export function describeTransportError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message
  }
  return error instanceof Error ? error.message : String(error)
}
