import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common'

import { CreateUserDto, UserResponse } from '../dto'
import { UsersService } from '../services'

/**
 * Users Controller
 *
 * Endpoints:
 * - POST /users: Register a user
 * - GET /users/get?id=1: Look a user up (the contract order creation relies on)
 */
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  /**
   * Example request:
   * POST /users
   * { "name": "Ada", "email": "ada@example.com" }
   */
  @Post()
  @HttpCode(HttpStatus.OK)
  async create(@Body() createUserDto: CreateUserDto): Promise<UserResponse> {
    return new UserResponse(await this.usersService.create(createUserDto))
  }

  @Get('get')
  async findOne(@Query('id') id?: string): Promise<UserResponse> {
    return new UserResponse(await this.usersService.findByRawId(id))
  }
}
