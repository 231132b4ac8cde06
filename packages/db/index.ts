export { createPool, getPoolConfig } from './client.js'
export type { Queryable, Pool, PoolClient, QueryResult, QueryResultRow } from './client.js'
export { ensureSchema, readSchemaSql, SCHEMA_FILES } from './schema.js'
export { acquireAdvisoryLock } from './advisory-lock.js'
export type { AdvisoryLockHandle } from './advisory-lock.js'
