import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { Pool, QueryResult, QueryResultRow } from 'pg'

import { Migration, migrations } from './migrations'

/**
 * Database Service
 *
 * Owns the process-wide PostgreSQL pool. Every repository query goes
 * through `query`, which is a single atomic statement: no transaction is
 * held open across calls.
 *
 * The pool is only created when DATABASE_ENABLED=true and DATABASE_URL is
 * set; otherwise the repositories use their in-memory implementations.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name)
  private readonly pool: Pool | null
  private readonly migrateOnStart: boolean

  readonly enabled: boolean

  constructor(configService: ConfigService) {
    const databaseEnabled = configService.get<boolean>('config.database.enabled') ?? false
    const databaseUrl = configService.get<string>('config.database.url')

    this.enabled = databaseEnabled && !!databaseUrl
    this.migrateOnStart = configService.get<boolean>('config.database.migrate') ?? false
    this.pool = this.enabled
      ? new Pool({
          connectionString: databaseUrl,
          max: configService.get<number>('config.database.poolMax') ?? 10,
        })
      : null

    this.pool?.on('error', (error: Error) => {
      this.logger.error(`Unexpected error on idle client: ${error.message}`, error.stack)
    })
  }

  async onModuleInit(): Promise<void> {
    if (!this.enabled) {
      this.logger.log('Database disabled, using in-memory repositories')
      return
    }

    try {
      await this.query('SELECT 1')
      this.logger.log('Successfully connected to database')
    } catch (error) {
      this.logger.error('Failed to connect to database', error)
      throw error
    }

    if (this.migrateOnStart) {
      await this.migrate()
    }
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.pool) {
      return
    }

    try {
      await this.pool.end()
      this.logger.log('Disconnected from database')
    } catch (error) {
      this.logger.error('Error disconnecting from database', error)
    }
  }

  /**
   * Run one parameterized statement on a pooled connection
   */
  async query<R extends QueryResultRow = QueryResultRow>(
    sql: string,
    parameters: unknown[] = []
  ): Promise<QueryResult<R>> {
    try {
      return await this.getPool().query<R>(sql, parameters)
    } catch (error) {
      this.logger.error(`SQL query failed: ${sql.trim().split('\n')[0]}`, error)
      throw error
    }
  }

  /**
   * Health check method to verify database connectivity
   */
  async healthCheck(): Promise<boolean> {
    try {
      await this.getPool().query('SELECT 1')
      return true
    } catch (error) {
      this.logger.error('Database health check failed', error)
      return false
    }
  }

  /**
   * Apply pending migrations, each inside its own transaction
   *
   * @returns Names of the migrations applied by this call
   */
  async migrate(): Promise<string[]> {
    await this.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name VARCHAR(255) PRIMARY KEY,
        executed_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
      )
    `)

    const executed = await this.query<{ name: string }>('SELECT name FROM schema_migrations')
    const done = new Set(executed.rows.map((row) => row.name))
    const applied: string[] = []

    for (const migration of migrations) {
      if (done.has(migration.name)) {
        continue
      }
      await this.runMigration(migration)
      applied.push(migration.name)
    }

    this.logger.log(
      applied.length > 0 ? `Applied migrations: ${applied.join(', ')}` : 'Database schema is up to date'
    )
    return applied
  }

  private async runMigration(migration: Migration): Promise<void> {
    const client = await this.getPool().connect()
    try {
      await client.query('BEGIN')
      await migration.up(client)
      await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [migration.name])
      await client.query('COMMIT')
      this.logger.log(`Migration ${migration.name} executed`)
    } catch (error) {
      await client.query('ROLLBACK')
      this.logger.error(`Migration ${migration.name} failed`, error)
      throw error
    } finally {
      client.release()
    }
  }

  private getPool(): Pool {
    if (!this.pool) {
      throw new Error('Database is disabled; set DATABASE_ENABLED=true and DATABASE_URL')
    }
    return this.pool
  }
}
