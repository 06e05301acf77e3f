import { Test, TestingModule } from '@nestjs/testing'

import { EmailAlreadyRegisteredError, UserNotFoundError } from '../errors'
import { InMemoryUserRepository, UserRepository } from '../repositories'
import { UsersService } from './users.service'

describe('UsersService', () => {
  let service: UsersService

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [UsersService, { provide: UserRepository, useClass: InMemoryUserRepository }],
    }).compile()

    service = module.get<UsersService>(UsersService)
  })

  it('creates a user with a generated id', async () => {
    const user = await service.create({ name: 'Ada', email: 'ada@example.com' })

    expect(user).toEqual({
      id: 1,
      name: 'Ada',
      email: 'ada@example.com',
      createdAt: expect.any(Date),
    })
  })

  it('refuses a second user with the same email', async () => {
    await service.create({ name: 'Ada', email: 'ada@example.com' })

    await expect(service.create({ name: 'Ada L.', email: 'ada@example.com' })).rejects.toBeInstanceOf(
      EmailAlreadyRegisteredError
    )
  })

  it('finds a user from the raw id parameter', async () => {
    const created = await service.create({ name: 'Ada', email: 'ada@example.com' })

    await expect(service.findByRawId('1')).resolves.toEqual(created)
  })

  it.each([undefined, '', 'abc', '1.5', '999', '0x1', '1e0', ' 1 ', '+1', '9007199254740993'])(
    'reports %p as not found',
    async (rawId) => {
      await service.create({ name: 'Ada', email: 'ada@example.com' })

      await expect(service.findByRawId(rawId)).rejects.toBeInstanceOf(UserNotFoundError)
    }
  )
})
