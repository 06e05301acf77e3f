export { REQUEST_ID_HEADER, RequestIdInterceptor } from './request-id.interceptor'
export { SERVICE_VERSION_HEADER, TransformInterceptor } from './transform.interceptor'
