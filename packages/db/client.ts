import { Pool, type PoolConfig, type QueryResult, type QueryResultRow } from 'pg'

/**
 * Anything that can run a parameterized query: a Pool, a checked-out
 * PoolClient, or an in-process fake in tests.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<QueryResult<R>>
}

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 5)
 * - DB_POOL_MIN: Minimum idle connections (default: 0)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: tilecrawl)
 */
export function getPoolConfig(
  connectionString: string,
  env: NodeJS.ProcessEnv = process.env
): PoolConfig {
  return {
    connectionString,

    // === Pool Size ===
    // A crawl run is sequential; one connection serves writes, one holds the run lock.
    max: parsePositiveInt(env.DB_POOL_MAX, 5),
    min: parsePositiveInt(env.DB_POOL_MIN, 0),

    // === Timeouts ===
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,

    // === Connection Recycling ===
    maxUses: 7500,
    maxLifetimeSeconds: 1800,

    // === Keep-Alive ===
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: env.DB_SERVICE_NAME || 'tilecrawl',
  }
}

function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback
  const parsed = parseInt(value, 10)
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback
}

/**
 * Creates a connection pool for DATABASE_URL (or the given connection string).
 * The caller owns the pool and must `end()` it on shutdown.
 */
export function createPool(connectionString = process.env.DATABASE_URL): Pool {
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is not set')
  }
  return new Pool(getPoolConfig(connectionString))
}

export type { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg'
