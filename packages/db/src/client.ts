import pg from 'pg'
import type { PoolConfig, QueryResult, QueryResultRow } from 'pg'
import type { ILogger } from '@shopsweep/logger'

/**
 * The slice of pg's Pool the repository depends on. Tests substitute an
 * in-process fake; production passes a real Pool.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>
}

export interface PoolClientLike extends Queryable {
  release(err?: Error | boolean): void
}

export interface PoolLike extends Queryable {
  connect(): Promise<PoolClientLike>
  end(): Promise<void>
}

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 10)
 * - DB_POOL_MIN: Minimum idle connections (default: 1)
 * - DB_CONNECT_TIMEOUT_MS: Wait for a free connection before failing (default: 5000)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: shopsweep)
 */
export function getPoolConfig(connectionString: string): PoolConfig {
  return {
    connectionString,

    max: parseInt(process.env.DB_POOL_MAX || '10', 10),
    min: parseInt(process.env.DB_POOL_MIN || '1', 10),

    idleTimeoutMillis: 30000,
    // Pool exhaustion surfaces as an error after this long; the repository retries it
    connectionTimeoutMillis: parseInt(process.env.DB_CONNECT_TIMEOUT_MS || '5000', 10),

    maxUses: 7500,
    maxLifetimeSeconds: 1800,

    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: process.env.DB_SERVICE_NAME || 'shopsweep',
  }
}

/**
 * Create the process-wide pool. Construct once at startup and `end()` it on shutdown.
 */
export function createPool(connectionString = process.env.DATABASE_URL): pg.Pool {
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set')
  }
  return new pg.Pool(getPoolConfig(connectionString))
}

/**
 * Ping the database until it answers, backing off between attempts.
 */
export async function warmupDatabase(
  db: Queryable,
  logger: ILogger,
  maxAttempts = 5,
  sleep: (ms: number) => Promise<void> = ms => new Promise(resolve => setTimeout(resolve, ms))
): Promise<boolean> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      logger.info('Connection attempt', { attempt, maxAttempts })
      await db.query('SELECT 1')
      logger.info('Connection established')
      return true
    } catch (error) {
      logger.error('Connection failed', { attempt, error: error instanceof Error ? error.message : String(error) })

      if (attempt < maxAttempts) {
        const delayMs = Math.min(2000 * Math.pow(2, attempt - 1), 30000)
        logger.info('Retrying', { delayMs })
        await sleep(delayMs)
      }
    }
  }

  logger.error('Failed to establish connection after all attempts', { maxAttempts })
  return false
}
