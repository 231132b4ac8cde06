/**
 * Crawl state store contract.
 *
 * Every operation is idempotent and safe to retry. Writes are keyed by the
 * canonical record id or the tile ordinal. Freshness is decided in one place,
 * `isFresh`, against an injected clock.
 */

import type { BasicRecord, CrawlStats, DetailedRecord, DetailRecord, TileBounds } from '../types.js'

export const DAY_MS = 24 * 60 * 60 * 1000

export interface FreshnessWindows {
  tileWindowMs: number
  recordWindowMs: number
}

export function freshnessWindows(config: {
  tileFreshnessWindowDays: number
  recordFreshnessWindowDays: number
}): FreshnessWindows {
  return {
    tileWindowMs: config.tileFreshnessWindowDays * DAY_MS,
    recordWindowMs: config.recordFreshnessWindowDays * DAY_MS,
  }
}

/**
 * An entity is fresh while `now - lastScrapedAt < window`.
 */
export function isFresh(lastScrapedAt: Date | null | undefined, now: Date, windowMs: number): boolean {
  if (!lastScrapedAt) return false
  return now.getTime() - lastScrapedAt.getTime() < windowMs
}

export interface CrawlStateStore {
  /** Current cursor; the single row is created at 0 on first use */
  getCursor(): Promise<number>
  setCursor(value: number): Promise<void>

  isTileFresh(tileIndex: number): Promise<boolean>
  recordTileScrape(tileIndex: number, bounds: TileBounds, recordCount: number, scrapedAt: Date): Promise<void>

  isRecordFresh(id: string): Promise<boolean>
  /** Fresh and detail-complete */
  isRecordDetailed(id: string): Promise<boolean>

  /** Insert or overwrite the basic fields; detail fields reset, detailComplete = false */
  upsertBasicRecord(record: BasicRecord, scrapedAt: Date): Promise<void>
  /** Insert or overwrite every field; detailComplete = true */
  upsertDetailedRecord(record: DetailedRecord, scrapedAt: Date): Promise<void>
  /** Detail fields only; basic fields and lastScrapedAt untouched; detailComplete = true */
  applyDetailEnrichment(id: string, detail: DetailRecord, enrichedAt: Date): Promise<void>

  stats(): Promise<CrawlStats>
}

