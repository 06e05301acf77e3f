import { Global, Module } from '@nestjs/common'

import { DatabaseService } from './database.service'

/**
 * Database Module
 *
 * Global so every feature module's repositories can reach the pool.
 */
@Global()
@Module({
  providers: [DatabaseService],
  exports: [DatabaseService],
})
export class DatabaseModule {}
