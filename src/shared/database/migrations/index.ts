import { createOrdersTable } from './001_create_orders_table'
import { createUsersTable } from './002_create_users_table'
import { Migration } from './migration'

export type { Migration } from './migration'

// Applied in order; names are recorded in the schema_migrations table
export const migrations: Migration[] = [createOrdersTable, createUsersTable]
