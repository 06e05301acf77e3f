export { CreateUserDto } from './create-user.dto'
export { UserResponse } from './user.response'
