/**
 * Crawl run mutual exclusion.
 *
 * Two crawl processes must not share the cursor and budgets, so a run holds a
 * PostgreSQL session advisory lock for its whole duration.
 */

import { acquireAdvisoryLock, type Pool } from '@tilecrawl/db'
import { loggers } from '../config/logger.js'

const log = loggers.crawler

/** Arbitrary fixed key shared by every crawl process */
export const CRAWL_LOCK_KEY = 7_340_112_001n

export type LockedRunResult<T> = { acquired: true; value: T } | { acquired: false }

/**
 * Run `fn` while holding the crawl lock. Returns `{ acquired: false }`
 * without calling `fn` when another process holds it.
 */
export async function withCrawlLock<T>(
  pool: Pick<Pool, 'connect'>,
  fn: () => Promise<T>,
  key: bigint = CRAWL_LOCK_KEY
): Promise<LockedRunResult<T>> {
  const lock = await acquireAdvisoryLock(pool, key)
  if (!lock) {
    log.warn('Another crawl run holds the lock, not starting', { lockKey: key.toString() })
    return { acquired: false }
  }

  try {
    return { acquired: true, value: await fn() }
  } finally {
    await lock.release()
  }
}
