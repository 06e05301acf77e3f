export { GlobalExceptionFilter } from './global-exception.filter'
