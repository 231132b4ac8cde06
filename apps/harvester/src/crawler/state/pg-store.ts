/**
 * PostgreSQL-backed crawl state.
 *
 * Record writes are last-write-wins on `last_scraped_at`: an upsert carrying
 * an older timestamp than the stored row leaves the row alone.
 */

import type { Queryable } from '@tilecrawl/db'
import type { ILogger } from '@tilecrawl/logger'
import type { BasicRecord, Clock, CrawlStats, DetailedRecord, DetailRecord, TileBounds } from '../types.js'
import { EMPTY_DETAIL } from '../types.js'
import { DAY_MS, isFresh, type CrawlStateStore, type FreshnessWindows } from './store.js'

const BASIC_COLUMNS = [
  'listing_obj_type',
  'room_type_category',
  'title',
  'name',
  'picture',
  'checkin',
  'checkout',
  'price',
  'discounted_price',
  'original_price',
  'price_amount',
  'link',
] as const

const DETAIL_COLUMNS = [
  'reviews_count',
  'average_rating',
  'host_name',
  'is_luxe',
  'location',
  'max_guest_capacity',
  'is_guest_favorite',
  'lat',
  'lng',
  'is_superhost',
  'is_verified',
  'host_rating_count',
  'host_user_id',
  'host_years',
  'host_months',
  'host_rating_average',
] as const

function basicValues(record: BasicRecord): unknown[] {
  return [
    record.listingObjType,
    record.roomTypeCategory,
    record.title,
    record.name,
    record.picture,
    record.checkin,
    record.checkout,
    record.price,
    record.discountedPrice,
    record.originalPrice,
    record.priceAmount,
    record.link,
  ]
}

function detailValues(detail: DetailRecord): unknown[] {
  return [
    detail.reviewsCount,
    detail.averageRating,
    detail.hostName,
    detail.isLuxe,
    detail.location,
    detail.maxGuestCapacity,
    detail.isGuestFavorite,
    detail.lat,
    detail.lng,
    detail.isSuperhost,
    detail.isVerified,
    detail.hostRatingCount,
    detail.hostUserId,
    detail.hostYears,
    detail.hostMonths,
    detail.hostRatingAverage,
  ]
}

const RECORD_COLUMNS = [
  'id',
  ...BASIC_COLUMNS,
  ...DETAIL_COLUMNS,
  'detail_complete',
  'needs_detail',
  'first_seen_at',
  'last_scraped_at',
  'detail_scraped_at',
]

/** Every column but id and first_seen_at is overwritten on conflict */
const UPSERT_RECORD_SQL = `
  INSERT INTO crawl_records (${RECORD_COLUMNS.join(', ')})
  VALUES (${RECORD_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})
  ON CONFLICT (id) DO UPDATE SET
    ${RECORD_COLUMNS.filter((c) => c !== 'id' && c !== 'first_seen_at')
      .map((c) => `${c} = EXCLUDED.${c}`)
      .join(',\n    ')}
  WHERE crawl_records.last_scraped_at <= EXCLUDED.last_scraped_at
`

const APPLY_DETAIL_SQL = `
  UPDATE crawl_records SET
    ${DETAIL_COLUMNS.map((c, i) => `${c} = $${i + 2}`).join(',\n    ')},
    detail_complete = TRUE,
    needs_detail = FALSE,
    detail_scraped_at = $${DETAIL_COLUMNS.length + 2}
  WHERE id = $1
`

export interface PgCrawlStateStoreOptions {
  windows: FreshnessWindows
  clock?: Clock
  logger?: ILogger
}

interface StatsRow {
  total: string
  basic_only: string
  detailed: string
  pending_detail: string
  recent: string
}

export class PgCrawlStateStore implements CrawlStateStore {
  private readonly windows: FreshnessWindows
  private readonly clock: Clock
  private readonly log?: ILogger

  constructor(
    private readonly db: Queryable,
    options: PgCrawlStateStoreOptions
  ) {
    this.windows = options.windows
    this.clock = options.clock ?? (() => new Date())
    this.log = options.logger
  }

  async getCursor(): Promise<number> {
    await this.db.query('INSERT INTO crawl_cursor (id, position) VALUES (1, 0) ON CONFLICT (id) DO NOTHING')
    const result = await this.db.query<{ position: number }>('SELECT position FROM crawl_cursor WHERE id = 1')
    return result.rows[0]?.position ?? 0
  }

  async setCursor(value: number): Promise<void> {
    if (!Number.isInteger(value) || value < 0) {
      throw new RangeError(`Cursor must be a non-negative integer, got ${value}`)
    }
    await this.db.query(
      `INSERT INTO crawl_cursor (id, position, updated_at) VALUES (1, $1, $2)
       ON CONFLICT (id) DO UPDATE SET position = EXCLUDED.position, updated_at = EXCLUDED.updated_at`,
      [value, this.clock()]
    )
  }

  async isTileFresh(tileIndex: number): Promise<boolean> {
    const result = await this.db.query<{ last_scraped_at: Date }>(
      'SELECT last_scraped_at FROM crawl_tiles WHERE tile_index = $1',
      [tileIndex]
    )
    return isFresh(result.rows[0]?.last_scraped_at, this.clock(), this.windows.tileWindowMs)
  }

  async recordTileScrape(tileIndex: number, bounds: TileBounds, recordCount: number, scrapedAt: Date): Promise<void> {
    await this.db.query(
      `INSERT INTO crawl_tiles (tile_index, sw_lat, sw_lng, ne_lat, ne_lng, record_count, last_scraped_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (tile_index) DO UPDATE SET
         record_count = EXCLUDED.record_count,
         last_scraped_at = EXCLUDED.last_scraped_at`,
      [tileIndex, bounds.swLat, bounds.swLng, bounds.neLat, bounds.neLng, recordCount, scrapedAt]
    )
  }

  async isRecordFresh(id: string): Promise<boolean> {
    const row = await this.recordState(id)
    return isFresh(row?.last_scraped_at, this.clock(), this.windows.recordWindowMs)
  }

  async isRecordDetailed(id: string): Promise<boolean> {
    const row = await this.recordState(id)
    if (!row?.detail_complete) return false
    return isFresh(row.last_scraped_at, this.clock(), this.windows.recordWindowMs)
  }

  async upsertBasicRecord(record: BasicRecord, scrapedAt: Date): Promise<void> {
    await this.db.query(UPSERT_RECORD_SQL, [
      record.id,
      ...basicValues(record),
      ...detailValues(EMPTY_DETAIL),
      false,
      true,
      scrapedAt,
      scrapedAt,
      null,
    ])
  }

  async upsertDetailedRecord(record: DetailedRecord, scrapedAt: Date): Promise<void> {
    await this.db.query(UPSERT_RECORD_SQL, [
      record.id,
      ...basicValues(record),
      ...detailValues(record),
      true,
      false,
      scrapedAt,
      scrapedAt,
      scrapedAt,
    ])
  }

  async applyDetailEnrichment(id: string, detail: DetailRecord, enrichedAt: Date): Promise<void> {
    const result = await this.db.query(APPLY_DETAIL_SQL, [id, ...detailValues(detail), enrichedAt])
    if (result.rowCount === 0) {
      this.log?.warn('Detail enrichment for unknown record', { listingId: id })
    }
  }

  async stats(): Promise<CrawlStats> {
    const since = new Date(this.clock().getTime() - DAY_MS)
    const records = await this.db.query<StatsRow>(
      `SELECT
         COUNT(*) AS total,
         COUNT(*) FILTER (WHERE NOT detail_complete) AS basic_only,
         COUNT(*) FILTER (WHERE detail_complete) AS detailed,
         COUNT(*) FILTER (WHERE needs_detail AND NOT detail_complete) AS pending_detail,
         COUNT(*) FILTER (WHERE last_scraped_at >= $1) AS recent
       FROM crawl_records`,
      [since]
    )
    const tiles = await this.db.query<{ count: string }>('SELECT COUNT(*) AS count FROM crawl_tiles')

    const row = records.rows[0]
    return {
      total: Number(row?.total ?? 0),
      basicOnly: Number(row?.basic_only ?? 0),
      detailed: Number(row?.detailed ?? 0),
      pendingDetail: Number(row?.pending_detail ?? 0),
      tilesProcessed: Number(tiles.rows[0]?.count ?? 0),
      recentCount: Number(row?.recent ?? 0),
    }
  }

  private async recordState(id: string): Promise<{ last_scraped_at: Date; detail_complete: boolean } | undefined> {
    const result = await this.db.query<{ last_scraped_at: Date; detail_complete: boolean }>(
      'SELECT last_scraped_at, detail_complete FROM crawl_records WHERE id = $1',
      [id]
    )
    return result.rows[0]
  }
}
