import { describe, it, expect, beforeEach } from 'vitest'
import type { Queryable, QueryResult, QueryResultRow } from '@tilecrawl/db'
import { PgCrawlStateStore } from '../state/pg-store.js'
import { DAY_MS } from '../state/store.js'
import { EMPTY_DETAIL, type BasicRecord, type DetailRecord } from '../types.js'
import { createTestLogger } from './helpers/fakes.js'

class FakeDb implements Queryable {
  readonly calls: Array<{ text: string; values?: unknown[] }> = []
  private readonly replies: Array<{ rows: QueryResultRow[]; rowCount?: number }> = []

  reply(rows: QueryResultRow[], rowCount = rows.length): this {
    this.replies.push({ rows, rowCount })
    return this
  }

  async query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
    this.calls.push({ text, values })
    const reply = this.replies.shift() ?? { rows: [], rowCount: 0 }
    return {
      command: 'SELECT',
      rowCount: reply.rowCount ?? reply.rows.length,
      oid: 0,
      fields: [],
      rows: reply.rows as R[],
    }
  }
}

const now = new Date('2026-03-01T12:00:00Z')

const record: BasicRecord = {
  id: '1001',
  listingObjType: 'REGULAR',
  roomTypeCategory: 'entire_home',
  title: 'Riad near the medina',
  name: 'Riad near the medina',
  picture: '',
  checkin: null,
  checkout: null,
  price: 'MAD2,283',
  discountedPrice: '',
  originalPrice: '',
  priceAmount: 2283,
  link: 'https://www.example.test/rooms/1001',
}

const detail: DetailRecord = { ...EMPTY_DETAIL, hostName: 'Amina', reviewsCount: 12 }

describe('PgCrawlStateStore', () => {
  let db: FakeDb
  let store: PgCrawlStateStore
  let logger: ReturnType<typeof createTestLogger>

  beforeEach(() => {
    db = new FakeDb()
    logger = createTestLogger()
    store = new PgCrawlStateStore(db, {
      windows: { tileWindowMs: 30 * DAY_MS, recordWindowMs: 30 * DAY_MS },
      clock: () => now,
      logger,
    })
  })

  it('creates the cursor row on first read', async () => {
    db.reply([]).reply([{ position: 7 }])

    expect(await store.getCursor()).toBe(7)
    expect(db.calls[0].text).toContain('ON CONFLICT (id) DO NOTHING')
    expect(db.calls[1].text).toBe('SELECT position FROM crawl_cursor WHERE id = 1')
  })

  it('writes the cursor with the clock time', async () => {
    await store.setCursor(3)

    expect(db.calls[0].values).toEqual([3, now])
  })

  it('rejects a negative cursor', async () => {
    await expect(store.setCursor(-1)).rejects.toBeInstanceOf(RangeError)
    expect(db.calls).toHaveLength(0)
  })

  it('decides tile freshness against the window', async () => {
    db.reply([{ last_scraped_at: new Date(now.getTime() - 29 * DAY_MS) }])
    expect(await store.isTileFresh(4)).toBe(true)

    db.reply([{ last_scraped_at: new Date(now.getTime() - 31 * DAY_MS) }])
    expect(await store.isTileFresh(4)).toBe(false)

    db.reply([])
    expect(await store.isTileFresh(5)).toBe(false)
    expect(db.calls[2].values).toEqual([5])
  })

  it('requires detail completion for a detailed record', async () => {
    db.reply([{ last_scraped_at: now, detail_complete: false }])
    expect(await store.isRecordDetailed('1001')).toBe(false)

    db.reply([{ last_scraped_at: now, detail_complete: true }])
    expect(await store.isRecordDetailed('1001')).toBe(true)
  })

  it('upserts a basic record with reset detail fields and a timestamp guard', async () => {
    await store.upsertBasicRecord(record, now)

    const [{ text, values }] = db.calls
    expect(text).toContain('ON CONFLICT (id) DO UPDATE SET')
    expect(text).toContain('WHERE crawl_records.last_scraped_at <= EXCLUDED.last_scraped_at')
    expect(text).not.toContain('first_seen_at = EXCLUDED.first_seen_at')
    expect(values).toHaveLength(34)
    expect(values?.[0]).toBe('1001')
    expect(values?.[11]).toBe(2283)
    expect(values?.[13]).toBe(0)
    expect(values?.slice(29)).toEqual([false, true, now, now, null])
  })

  it('upserts a detailed record as complete', async () => {
    await store.upsertDetailedRecord({ ...record, ...detail }, now)

    const values = db.calls[0].values
    expect(values?.[13]).toBe(12)
    expect(values?.[15]).toBe('Amina')
    expect(values?.slice(29)).toEqual([true, false, now, now, now])
  })

  it('applies detail fields without touching the scrape time', async () => {
    db.reply([], 1)
    await store.applyDetailEnrichment('1001', detail, now)

    const [{ text, values }] = db.calls
    expect(text).not.toContain('last_scraped_at')
    expect(text).toContain('detail_complete = TRUE')
    expect(values).toHaveLength(18)
    expect(values?.[0]).toBe('1001')
    expect(values?.[17]).toBe(now)
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it('warns when enriching an unknown record', async () => {
    db.reply([], 0)
    await store.applyDetailEnrichment('404', detail, now)

    expect(logger.warn).toHaveBeenCalledWith('Detail enrichment for unknown record', { listingId: '404' })
  })

  it('reads stats as numbers', async () => {
    db.reply([{ total: '5', basic_only: '3', detailed: '2', pending_detail: '3', recent: '1' }]).reply([{ count: '4' }])

    expect(await store.stats()).toEqual({
      total: 5,
      basicOnly: 3,
      detailed: 2,
      pendingDetail: 3,
      tilesProcessed: 4,
      recentCount: 1,
    })
    expect(db.calls[0].values).toEqual([new Date(now.getTime() - DAY_MS)])
  })
})
