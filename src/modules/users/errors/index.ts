export { EmailAlreadyRegisteredError, UserNotFoundError } from './user.errors'
