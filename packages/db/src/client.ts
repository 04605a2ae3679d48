import { drizzle } from 'drizzle-orm/node-postgres'
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import { Pool } from 'pg'
import type { DatabaseConfig } from './config'
import { logError } from './log'
import { schema, type Schema } from './schema'

/**
 * Any Drizzle Postgres database over this schema, whatever the driver
 * (node-postgres in production, PGlite in tests). Transactions are databases
 * too, so every operation accepts either.
 */
export type Database = PgDatabase<PgQueryResultHKT, Schema>

export function createDatabase(config: DatabaseConfig) {
  const pool = new Pool({ connectionString: config.connectionString, max: config.poolMax })
  pool.on('error', (error) => {
    logError('Idle database client failed', error)
  })

  const db = drizzle(pool, { schema })

  async function checkDatabaseConnection(): Promise<boolean> {
    const client = await pool.connect()
    try {
      await client.query('SELECT 1')
      return true
    } finally {
      client.release()
    }
  }

  async function close(): Promise<void> {
    await pool.end()
  }

  return { db, pool, checkDatabaseConnection, close }
}
