import { Migration } from './migration'

export const createOrdersTable: Migration = {
  name: '001_create_orders_table',
  async up(client) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id SERIAL PRIMARY KEY,
        user_id INTEGER NOT NULL,
        product VARCHAR(255) NOT NULL,
        quantity INTEGER NOT NULL CHECK (quantity > 0),
        amount NUMERIC(12, 2) NOT NULL CHECK (amount >= 0),
        status VARCHAR(32) NOT NULL,
        created_at TIMESTAMP NOT NULL
      )
    `)

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_user_id ON orders(user_id)
    `)
  },
}
