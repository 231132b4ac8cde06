/**
 * Incremental tile crawler
 *
 * Public surface of the harvester package.
 */

export { runHarvest, type HarvestOptions } from './harvest.js'
export { loadCrawlConfig, crawlEnvSchema } from './config/crawl-config.js'
export { logger, loggers } from './config/logger.js'

export { runCrawl, type CrawlDependencies } from './crawler/orchestrator.js'
export { withCrawlLock, CRAWL_LOCK_KEY, type LockedRunResult } from './crawler/run-lock.js'
export { createRunContext, StopSignal, type CrawlRunContext } from './crawler/context.js'
export { RunBudget } from './crawler/budget.js'
export { createStaticSession } from './crawler/session.js'
export { parseTiles, loadTilesFromFile } from './crawler/tiles.js'

export { normalizeListingId, encodeListingGlobalId, decodeOpaqueUserId } from './crawler/identifier.js'
export { zoomLevel, validateTile } from './crawler/geo.js'
export { extractSearchPage, type ExtractedPage } from './crawler/extract/response-extractor.js'
export { mapSearchResult, mapSearchResults } from './crawler/extract/listing-mapper.js'
export { RetryingFetcher, backoffDelay, type FetchOutcome } from './crawler/fetch/retrying-fetcher.js'
export { FetchTransport } from './crawler/fetch/fetch-transport.js'
export { SearchPager, type SearchPage, type TileOutcome, type TileRunResult } from './crawler/search/pager.js'
export { buildSearchRequest } from './crawler/search/request.js'
export { DetailEnricher, type DetailResult } from './crawler/detail/enricher.js'
export { buildDetailRequest } from './crawler/detail/request.js'
export { buildProviderHeaders, describeCredentials } from './crawler/headers.js'
export { validateBasicRecord, validateDetailRecord, summarizeRecords } from './crawler/validation.js'

export { PgCrawlStateStore } from './crawler/state/pg-store.js'
export { isFresh, freshnessWindows, type CrawlStateStore } from './crawler/state/store.js'

export {
  CrawlError,
  TransientFetchError,
  TileFetchExhaustedError,
  ConfigurationError,
  classifyCrawlError,
  CRAWL_ERROR_CODES,
} from './crawler/errors.js'

export type * from './crawler/types.js'
export { DEFAULT_RETRY_POLICY, EMPTY_DETAIL } from './crawler/types.js'
