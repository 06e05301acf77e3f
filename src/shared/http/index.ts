export { createHttpClient, describeTransportError } from './http-client.factory'
