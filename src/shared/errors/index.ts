export { DomainError, describeError, resolveHttpStatus } from './domain.error'
