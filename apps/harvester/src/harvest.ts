/**
 * Harvest entry point: one locked crawl run against PostgreSQL.
 */

import './env.js'

import { createPool, ensureSchema, type Pool } from '@tilecrawl/db'
import { loadCrawlConfig } from './config/crawl-config.js'
import { loggers } from './config/logger.js'
import { classifyCrawlError, ConfigurationError } from './crawler/errors.js'
import { runCrawl } from './crawler/orchestrator.js'
import { withCrawlLock } from './crawler/run-lock.js'
import { PgCrawlStateStore } from './crawler/state/pg-store.js'
import { freshnessWindows } from './crawler/state/store.js'
import { loadTilesFromFile } from './crawler/tiles.js'
import type { CrawlSummary, ProviderSession, Tile } from './crawler/types.js'

const log = loggers.crawler

export interface HarvestOptions {
  session: ProviderSession
  env?: NodeJS.ProcessEnv
  /** Reused as is and left open; otherwise a pool is created from DATABASE_URL and closed */
  pool?: Pool
  /** Overrides CRAWL_TILE_FILE */
  tiles?: Tile[]
}

/**
 * Returns null when another process holds the crawl lock.
 */
export async function runHarvest(options: HarvestOptions): Promise<CrawlSummary | null> {
  const env = options.env ?? process.env
  const config = loadCrawlConfig(env)

  let tiles = options.tiles
  if (!tiles) {
    const tileFile = env.CRAWL_TILE_FILE
    if (!tileFile) {
      throw new ConfigurationError('CRAWL_TILE_FILE environment variable is not set')
    }
    tiles = await loadTilesFromFile(tileFile)
  }
  const tileList = tiles

  const pool = options.pool ?? createPool(env.DATABASE_URL)
  try {
    await ensureSchema(pool)
    const store = new PgCrawlStateStore(pool, {
      windows: freshnessWindows(config),
      logger: loggers.state,
    })

    const result = await withCrawlLock(pool, () =>
      runCrawl({ store, session: options.session, tiles: tileList, config })
    )
    return result.acquired ? result.value : null
  } catch (error) {
    log.error('Harvest run failed', { ...classifyCrawlError(error) }, error)
    throw error
  } finally {
    if (!options.pool) {
      await pool.end()
    }
  }
}
