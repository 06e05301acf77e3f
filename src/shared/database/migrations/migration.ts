import type { PoolClient } from 'pg'

export interface Migration {
  name: string
  up(client: PoolClient): Promise<void>
}
