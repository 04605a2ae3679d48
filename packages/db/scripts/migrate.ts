import 'dotenv/config'
import { sql } from 'drizzle-orm'
import { createDatabase, loadDatabaseConfig, log, logError, schemaDdlStatements } from '../src'

/**
 * Creates the NSI schema (enum types, tables, constraints, indexes) on an
 * empty database at `DATABASE_URL`. The statements are rendered from the
 * table definitions and run in one transaction; a failed run leaves nothing.
 */
async function run() {
  const { db, close } = createDatabase(loadDatabaseConfig())
  try {
    const statements = schemaDdlStatements()
    await db.transaction(async (tx) => {
      for (const statement of statements) {
        await tx.execute(sql.raw(statement))
      }
    })
    log(`Schema created (${statements.length} statements).`)
  } finally {
    await close()
  }
}

run().catch((error) => {
  logError('Migration failed:', error)
  process.exit(1)
})
