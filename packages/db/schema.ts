import { readFile } from 'node:fs/promises'
import { createLogger } from '@tilecrawl/logger'
import type { Queryable } from './client.js'

const log = createLogger('db').child('schema')

/** Schema files applied in order. Each one is idempotent. */
export const SCHEMA_FILES = ['001_crawl_state.sql'] as const

export async function readSchemaSql(file: (typeof SCHEMA_FILES)[number]): Promise<string> {
  return readFile(new URL(`./sql/${file}`, import.meta.url), 'utf8')
}

/**
 * Create the crawl-state tables if they are missing.
 */
export async function ensureSchema(db: Queryable): Promise<void> {
  for (const file of SCHEMA_FILES) {
    const sql = await readSchemaSql(file)
    await db.query(sql)
    log.debug('Schema applied', { file })
  }
}
