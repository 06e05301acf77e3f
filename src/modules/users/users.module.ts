import { Module } from '@nestjs/common'

import { DatabaseService } from '../../shared/database'
import { UsersController } from './controllers'
import { InMemoryUserRepository, PgUserRepository, UserRepository } from './repositories'
import { UsersService } from './services'

/**
 * Users Module
 *
 * The user directory service. Registered only when
 * ENABLE_USER_DIRECTORY is not "false"; point USER_SERVICE_URL at this
 * process to run both halves locally.
 */
@Module({
  controllers: [UsersController],
  providers: [
    UsersService,
    {
      provide: UserRepository,
      useFactory: (database: DatabaseService) =>
        database.enabled ? new PgUserRepository(database) : new InMemoryUserRepository(),
      inject: [DatabaseService],
    },
  ],
})
export class UsersModule {}
