import { z } from 'zod'

const DATABASE_URL_REQUIRED = 'DATABASE_URL is required to initialize @lightpath/db'

const databaseEnvSchema = z.object({
  DATABASE_URL: z.string({ required_error: DATABASE_URL_REQUIRED }).min(1, DATABASE_URL_REQUIRED),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
})

export type DatabaseConfig = {
  connectionString: string
  /** Upper bound of pooled connections. */
  poolMax: number
}

/**
 * Read database settings from the environment.
 *
 * Scripts load `.env` first through `dotenv/config`; library code only reads
 * the env object it is handed.
 */
export function loadDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const parsed = databaseEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((issue) => issue.message).join('; '))
  }
  return {
    connectionString: parsed.data.DATABASE_URL,
    poolMax: parsed.data.DB_POOL_MAX,
  }
}
