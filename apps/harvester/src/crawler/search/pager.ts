/**
 * Search Pager
 *
 * Walks the result pages of one tile:
 *
 *   START → FETCHING → EXTRACTING → PERSISTING → (FETCHING | DONE)
 *
 * A page ends the tile when it has no next cursor or fewer records than the
 * full-page threshold. The loop is bounded by the provider's page count when
 * known, and never exceeds maxPagesPerTile. The stop signal is checked
 * before every fetch; a page already handed to the handler is finished first,
 * and a tile whose last page was handled is complete even if the stop was
 * raised on it.
 */

import type { ILogger } from '@tilecrawl/logger'
import { loggers } from '../../config/logger.js'
import { pause, type CrawlRunContext } from '../context.js'
import { TileFetchExhaustedError, type CrawlError } from '../errors.js'
import { mapSearchResults, type MappedListing } from '../extract/listing-mapper.js'
import { extractSearchPage } from '../extract/response-extractor.js'
import type { RetryingFetcher } from '../fetch/retrying-fetcher.js'
import { recordExtractionDrift } from '../metrics.js'
import type { BasicRecord, ProviderSession, SearchContext, Tile } from '../types.js'
import { buildSearchRequest } from './request.js'

export interface SearchPage {
  tile: Tile
  /** 0-based */
  pageIndex: number
  listings: MappedListing[]
  searchContext: SearchContext
}

export type PageHandler = (page: SearchPage) => Promise<void>

/**
 * complete       every page was walked
 * exhausted      the first page failed after all retries
 * partial-fetch  a later page failed; earlier pages count
 * stopped        the stop signal cut the tile short before its last page
 * no-token       the session has no search token
 */
export type TileOutcome = 'complete' | 'exhausted' | 'partial-fetch' | 'stopped' | 'no-token'

export interface TileRunResult {
  outcome: TileOutcome
  pages: number
  recordsSeen: number
  records: BasicRecord[]
  error?: CrawlError
}

type PagerState =
  | { phase: 'START' }
  | { phase: 'FETCHING'; pageIndex: number; cursor: string | null }
  | { phase: 'EXTRACTING'; pageIndex: number; body: unknown }
  | { phase: 'PERSISTING'; page: SearchPage; isLastPage: boolean; nextCursor: string | null }
  | { phase: 'DONE'; outcome: TileOutcome; error?: CrawlError }

export interface SearchPagerOptions {
  fetcher: RetryingFetcher
  session: ProviderSession
  logger?: ILogger
}

export class SearchPager {
  private readonly log: ILogger

  constructor(private readonly options: SearchPagerOptions) {
    this.log = options.logger ?? loggers.search
  }

  async runTile(tile: Tile, ctx: CrawlRunContext, onPage: PageHandler): Promise<TileRunResult> {
    const log = this.log.child({ runId: ctx.runId, tileIndex: tile.index })
    const { provider, fullPageThreshold, maxPagesPerTile } = ctx.config

    let pageLimit = maxPagesPerTile
    let pages = 0
    const records: BasicRecord[] = []
    let state: PagerState = { phase: 'START' }

    while (state.phase !== 'DONE') {
      switch (state.phase) {
        case 'START': {
          state = { phase: 'FETCHING', pageIndex: 0, cursor: null }
          break
        }

        case 'FETCHING': {
          const { pageIndex, cursor }: Extract<PagerState, { phase: 'FETCHING' }> = state
          if (ctx.stop.stopped) {
            state = { phase: 'DONE', outcome: 'stopped' }
            break
          }
          if (pageIndex > 0) {
            await pause(ctx)
          }

          const request = buildSearchRequest({
            tile,
            credentials: this.options.session.credentials(),
            provider,
            cursor,
          })
          if (!request) {
            log.error('No search token in session, cannot fetch tile')
            state = { phase: 'DONE', outcome: 'no-token' }
            break
          }

          const outcome = await this.options.fetcher.fetch(request)
          if (!outcome.ok) {
            state =
              pageIndex === 0
                ? { phase: 'DONE', outcome: 'exhausted', error: new TileFetchExhaustedError(tile.index, outcome.error) }
                : { phase: 'DONE', outcome: 'partial-fetch', error: outcome.error }
            break
          }

          state = { phase: 'EXTRACTING', pageIndex, body: outcome.body }
          break
        }

        case 'EXTRACTING': {
          const { pageIndex, body }: Extract<PagerState, { phase: 'EXTRACTING' }> = state
          const extracted = extractSearchPage(body)
          pages++

          if (extracted.errors.length > 0) {
            log.warn('Search response carried GraphQL errors', { pageIndex, errors: extracted.errors })
          }

          if (pageIndex === 0 && extracted.totalPages > 0) {
            pageLimit = Math.min(extracted.totalPages, maxPagesPerTile)
          }

          if (extracted.records.length === 0 && extracted.totalPages > 0) {
            recordExtractionDrift({
              runId: ctx.runId,
              tileIndex: tile.index,
              pageIndex,
              totalPages: extracted.totalPages,
              strategy: extracted.strategy,
            })
          }

          const mapped = mapSearchResults(extracted.records, { baseUrl: provider.baseUrl })
          if (mapped.dropped.length > 0 || mapped.duplicates > 0) {
            log.debug('Search results dropped', {
              pageIndex,
              dropped: mapped.dropped.map((d) => d.reason),
              duplicates: mapped.duplicates,
            })
          }

          log.debug('Search page extracted', {
            pageIndex,
            strategy: extracted.strategy,
            matchedPath: extracted.matchedPath,
            candidates: extracted.records.length,
            listings: mapped.listings.length,
            totalPages: extracted.totalPages,
          })

          const isLastPage =
            extracted.nextCursor === null ||
            extracted.records.length < fullPageThreshold ||
            pageIndex + 1 >= pageLimit

          state = {
            phase: 'PERSISTING',
            page: { tile, pageIndex, listings: mapped.listings, searchContext: extracted.searchContext },
            isLastPage,
            nextCursor: extracted.nextCursor,
          }
          break
        }

        case 'PERSISTING': {
          const { page, isLastPage, nextCursor }: Extract<PagerState, { phase: 'PERSISTING' }> = state
          for (const listing of page.listings) {
            records.push(listing.record)
          }
          await onPage(page)

          if (isLastPage) {
            state = { phase: 'DONE', outcome: 'complete' }
          } else {
            state = { phase: 'FETCHING', pageIndex: page.pageIndex + 1, cursor: nextCursor }
          }
          break
        }
      }
    }

    const result: TileRunResult = {
      outcome: state.outcome,
      pages,
      recordsSeen: records.length,
      records,
      error: state.error,
    }

    if (result.outcome === 'exhausted' || result.outcome === 'partial-fetch') {
      log.warn('Tile fetch ended early', { outcome: result.outcome, pages, error: result.error?.message })
    }

    return result
  }
}
