/**
 * Crawl Metrics
 *
 * Structured log events only; no metrics backend.
 */

import { loggers } from '../config/logger.js'
import type { CrawlSummary } from './types.js'
import type { TileRecordSummary } from './validation.js'

const log = loggers.crawler

export const CRAWL_EVENTS = {
  RUN_COMPLETED: 'CRAWL_RUN_COMPLETED',
  TILE_COMPLETED: 'CRAWL_TILE_COMPLETED',
  ALERT_EXTRACTION_DRIFT: 'CRAWL_ALERT_EXTRACTION_DRIFT',
} as const

export function recordRunCompleted(summary: CrawlSummary, durationMs: number): void {
  log.info(CRAWL_EVENTS.RUN_COMPLETED, {
    event_name: CRAWL_EVENTS.RUN_COMPLETED,
    ...summary,
    durationMs,
  })
}

export function recordTileCompleted(payload: {
  runId: string
  tileIndex: number
  outcome: string
  pages: number
  summary: TileRecordSummary
}): void {
  log.info(CRAWL_EVENTS.TILE_COMPLETED, {
    event_name: CRAWL_EVENTS.TILE_COMPLETED,
    runId: payload.runId,
    tileIndex: payload.tileIndex,
    outcome: payload.outcome,
    pages: payload.pages,
    ...payload.summary,
  })
}

/**
 * The provider reported result pages but nothing was extracted: the response
 * shape has likely changed.
 */
export function recordExtractionDrift(payload: {
  runId: string
  tileIndex: number
  pageIndex: number
  totalPages: number
  strategy: string
}): void {
  log.warn(CRAWL_EVENTS.ALERT_EXTRACTION_DRIFT, {
    event_name: CRAWL_EVENTS.ALERT_EXTRACTION_DRIFT,
    ...payload,
  })
}
