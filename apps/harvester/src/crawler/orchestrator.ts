/**
 * Crawl Orchestrator
 *
 * One bounded run over the tile list:
 *
 * 1. Read the cursor and take the window [cursor, cursor + tilesPerRun).
 * 2. Skip invalid and fresh tiles, advancing the cursor past them.
 * 3. Page through each remaining tile; persist new records and enrich
 *    records that are not yet detailed, within the run budget.
 * 4. Record visited tiles and advance the cursor, wrapping at the end of
 *    the list. A tile cut short by the budget is recorded and passed too, so
 *    a tile with more new records than one run's budget cannot hold the
 *    cursor; its remaining records are found when the tile goes stale.
 *
 * Tiles, pages and records are processed sequentially.
 */

import type { ILogger } from '@tilecrawl/logger'
import { loggers } from '../config/logger.js'
import { createRunContext, pause, type CrawlRunContext } from './context.js'
import { DetailEnricher } from './detail/enricher.js'
import { classifyCrawlError } from './errors.js'
import type { MappedListing } from './extract/listing-mapper.js'
import { RetryingFetcher } from './fetch/retrying-fetcher.js'
import { validateTile } from './geo.js'
import { recordRunCompleted, recordTileCompleted } from './metrics.js'
import { SearchPager, type SearchPage } from './search/pager.js'
import type { CrawlStateStore } from './state/store.js'
import type {
  Clock,
  CrawlConfig,
  CrawlSummary,
  ProviderSession,
  SearchContext,
  Sleep,
  Tile,
} from './types.js'
import { summarizeRecords, validateBasicRecord, validateDetailRecord } from './validation.js'

export interface CrawlDependencies {
  store: CrawlStateStore
  session: ProviderSession
  tiles: readonly Tile[]
  config: CrawlConfig
  logger?: ILogger
  runId?: string
  clock?: Clock
  sleep?: Sleep
  random?: () => number
  /** Defaults to a fetcher over the session transport with the configured retry policy */
  fetcher?: RetryingFetcher
}

interface RunCounters {
  tilesProcessed: number
  tilesSkippedFresh: number
  tilesSkippedInvalid: number
  tilesFailed: number
  recordsFound: number
  basicSaved: number
  detailedSaved: number
}

interface RecordWorkers {
  store: CrawlStateStore
  session: ProviderSession
  enricher: DetailEnricher
  counters: RunCounters
}

async function logStoreStats(store: CrawlStateStore, log: ILogger, when: 'start' | 'end'): Promise<void> {
  try {
    const stats = await store.stats()
    log.info(`Store stats at run ${when}`, { ...stats })
  } catch (error) {
    log.warn('Failed to read store stats', { when, ...classifyCrawlError(error) }, error)
  }
}

async function processRecord(
  listing: MappedListing,
  searchContext: SearchContext,
  ctx: CrawlRunContext,
  workers: RecordWorkers
): Promise<void> {
  const { store, session, enricher, counters } = workers
  const { record, hints } = listing
  const log = ctx.logger
  const validationOptions = { currency: ctx.config.provider.currency, region: ctx.config.regionBounds }

  counters.recordsFound++

  try {
    if (!(await store.isRecordFresh(record.id))) {
      const reservation = ctx.budget.reserveNewRecord()
      if (!reservation) {
        ctx.stop.request('new-record-budget')
        return
      }

      const warnings = validateBasicRecord(record, validationOptions)
      if (warnings.length > 0) {
        log.warn('Record validation warnings', { listingId: record.id, warnings })
      }

      try {
        await store.upsertBasicRecord(record, ctx.clock())
      } catch (error) {
        reservation.cancel()
        throw error
      }
      reservation.commit()
      counters.basicSaved++
    }

    if (ctx.budget.detailCallsExhausted) return
    if (await store.isRecordDetailed(record.id)) return

    const detailToken = session.credentials().detailToken
    if (!detailToken) {
      log.debug('No detail token in session, record stays basic', { listingId: record.id })
      return
    }
    if (!ctx.budget.tryReserveDetailCall()) return

    const result = await enricher.enrich(detailToken, record.id, { ...hints, ...searchContext })
    if (result.status === 'ok') {
      const warnings = validateDetailRecord(result.detail, validationOptions)
      if (warnings.length > 0) {
        log.debug('Detail validation warnings', { listingId: record.id, warnings })
      }
      await store.applyDetailEnrichment(record.id, result.detail, ctx.clock())
      counters.detailedSaved++
    } else {
      log.info('Detail enrichment skipped', { listingId: record.id, reason: result.reason })
    }

    await pause(ctx)
  } catch (error) {
    log.error('Failed to persist record, skipping', { listingId: record.id, ...classifyCrawlError(error) }, error)
  }
}

async function handlePage(page: SearchPage, ctx: CrawlRunContext, workers: RecordWorkers): Promise<void> {
  for (const listing of page.listings) {
    if (ctx.stop.stopped) return

    await processRecord(listing, page.searchContext, ctx, workers)

    if (ctx.budget.newRecordsExhausted) {
      ctx.stop.request('new-record-budget')
    }
  }
}

export async function runCrawl(deps: CrawlDependencies): Promise<CrawlSummary> {
  const ctx = createRunContext({
    config: deps.config,
    logger: deps.logger ?? loggers.crawler,
    runId: deps.runId,
    clock: deps.clock,
    sleep: deps.sleep,
    random: deps.random,
  })
  const log = ctx.logger
  const { store, session, tiles, config } = deps
  const startedAt = ctx.clock().getTime()

  const fetcher =
    deps.fetcher ??
    new RetryingFetcher(session.transport, {
      retryPolicy: config.retry,
      logger: loggers.fetch.child({ runId: ctx.runId }),
      sleep: ctx.sleep,
      random: ctx.random,
    })
  const pager = new SearchPager({ fetcher, session })
  const enricher = new DetailEnricher({
    fetcher,
    provider: config.provider,
    credentials: () => session.credentials(),
    logger: loggers.detail.child({ runId: ctx.runId }),
  })

  const counters: RunCounters = {
    tilesProcessed: 0,
    tilesSkippedFresh: 0,
    tilesSkippedInvalid: 0,
    tilesFailed: 0,
    recordsFound: 0,
    basicSaved: 0,
    detailedSaved: 0,
  }
  const workers: RecordWorkers = { store, session, enricher, counters }

  await logStoreStats(store, log, 'start')

  let cursor = await store.getCursor()
  if (cursor >= tiles.length) {
    cursor = 0
  }
  const startCursor = cursor
  const windowEnd = Math.min(cursor + config.tilesPerRun, tiles.length)

  log.info('Crawl run starting', {
    tileCount: tiles.length,
    startCursor,
    windowEnd,
    maxNewRecords: config.maxNewRecordsPerRun,
    maxDetailCalls: config.maxDetailEnrichmentsPerRun,
  })

  const advancePast = async (position: number): Promise<void> => {
    cursor = (position + 1) % tiles.length
    await store.setCursor(cursor)
  }

  let visited = 0
  for (let position = startCursor; position < windowEnd; position++) {
    if (ctx.stop.stopped) break
    const tile = tiles[position]

    const validity = validateTile(tile, { maxSpanDegrees: config.maxTileSpanDegrees, region: config.regionBounds })
    if (!validity.ok) {
      log.warn('Skipping invalid tile', { tileIndex: tile.index, reason: validity.reason, details: validity.details })
      counters.tilesSkippedInvalid++
      await advancePast(position)
      continue
    }

    if (await store.isTileFresh(tile.index)) {
      log.debug('Skipping fresh tile', { tileIndex: tile.index })
      counters.tilesSkippedFresh++
      await advancePast(position)
      continue
    }

    if (session.refresh && visited > 0 && visited % config.sessionRefreshEveryTiles === 0) {
      try {
        await session.refresh()
        log.info('Session refreshed', { tilesVisited: visited })
      } catch (error) {
        log.warn('Session refresh failed, continuing with current tokens', { ...classifyCrawlError(error) }, error)
      }
    }
    visited++

    const result = await pager.runTile(tile, ctx, (page) => handlePage(page, ctx, workers))

    if (result.outcome === 'stopped') {
      log.info('Tile cut short by the run budget, moving past it', { tileIndex: tile.index, pages: result.pages })
    }

    switch (result.outcome) {
      case 'complete':
      case 'stopped':
      case 'partial-fetch':
        await store.recordTileScrape(tile.index, tile, result.recordsSeen, ctx.clock())
        counters.tilesProcessed++
        await advancePast(position)
        break
      case 'exhausted':
        counters.tilesFailed++
        await advancePast(position)
        break
      case 'no-token':
        ctx.stop.request('stopped')
        break
    }

    recordTileCompleted({
      runId: ctx.runId,
      tileIndex: tile.index,
      outcome: result.outcome,
      pages: result.pages,
      summary: summarizeRecords(result.records),
    })
  }

  const summary: CrawlSummary = {
    runId: ctx.runId,
    ...counters,
    detailCalls: ctx.budget.detailCalls,
    stopReason: ctx.stop.reason ?? 'completed',
    startCursor,
    endCursor: cursor,
  }

  await logStoreStats(store, log, 'end')
  recordRunCompleted(summary, ctx.clock().getTime() - startedAt)

  return summary
}
