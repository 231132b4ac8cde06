/**
 * PostgreSQL session advisory locks.
 *
 * pg_try_advisory_lock is session scoped, so the lock is taken on a dedicated
 * client that stays checked out until release. Acquisition never blocks.
 */

import type { Pool, PoolClient } from 'pg'
import { createLogger } from '@tilecrawl/logger'

const log = createLogger('db').child('advisory-lock')

export interface AdvisoryLockHandle {
  key: bigint
  release: () => Promise<boolean>
}

type LockPool = Pick<Pool, 'connect'>

export async function acquireAdvisoryLock(
  pool: LockPool,
  key: bigint
): Promise<AdvisoryLockHandle | null> {
  let client: PoolClient
  try {
    client = await pool.connect()
  } catch (error) {
    log.error('Failed to connect for advisory lock', { key: key.toString() }, error)
    return null
  }

  try {
    const result = await client.query<{ acquired: boolean }>(
      'SELECT pg_try_advisory_lock($1) AS acquired',
      [key.toString()]
    )
    if (!result.rows[0]?.acquired) {
      client.release()
      log.debug('Advisory lock not available', { key: key.toString() })
      return null
    }
  } catch (error) {
    client.release()
    log.error('Failed to acquire advisory lock', { key: key.toString() }, error)
    return null
  }

  log.debug('Advisory lock acquired', { key: key.toString() })

  return {
    key,
    release: async () => {
      try {
        const result = await client.query<{ released: boolean }>(
          'SELECT pg_advisory_unlock($1) AS released',
          [key.toString()]
        )
        const released = result.rows[0]?.released === true
        if (!released) {
          log.warn('Advisory lock was not held at release', { key: key.toString() })
        }
        return released
      } catch (error) {
        log.warn('Advisory lock release error', { key: key.toString() }, error)
        return false
      } finally {
        client.release()
      }
    },
  }
}
