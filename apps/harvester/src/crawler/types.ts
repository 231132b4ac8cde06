/**
 * Crawl Engine Core Types
 *
 * Tiles, records, run configuration and the provider session seam shared by
 * the pager, enricher and orchestrator.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Tiles
// ═══════════════════════════════════════════════════════════════════════════════

export interface TileBounds {
  swLat: number
  swLng: number
  neLat: number
  neLng: number
}

/**
 * A bounding box plus its ordinal position in the externally supplied tile list.
 * The ordinal is the tile's identity in the state store.
 */
export interface Tile extends TileBounds {
  index: number
}

// ═══════════════════════════════════════════════════════════════════════════════
// Records
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Fields obtainable from search results alone.
 */
export interface BasicRecord {
  /** Canonical identifier: a string of decimal digits */
  id: string
  listingObjType: string
  roomTypeCategory: string
  title: string
  name: string
  /** First picture URL, empty when none was found */
  picture: string
  checkin: string | null
  checkout: string | null
  /** Display price as the provider formats it, e.g. "MAD 450" */
  price: string
  discountedPrice: string
  originalPrice: string
  /** Numeric amount parsed from the display price */
  priceAmount: number | null
  link: string
}

/**
 * Per-record hints carried from a search result to its detail request.
 * Not persisted.
 */
export interface RecordHints {
  categoryTag?: string
  photoId?: string
  checkin?: string
  checkout?: string
}

/**
 * Fields obtainable only from the per-record detail fetch.
 * Every field is best effort and defaults to its zero value.
 */
export interface DetailRecord {
  reviewsCount: number
  averageRating: number
  hostName: string
  isLuxe: boolean
  location: string
  maxGuestCapacity: number
  isGuestFavorite: boolean
  lat: number | null
  lng: number | null
  isSuperhost: boolean
  isVerified: boolean
  hostRatingCount: number
  hostUserId: string
  hostYears: number
  hostMonths: number
  hostRatingAverage: number
}

export type DetailedRecord = BasicRecord & DetailRecord

export const EMPTY_DETAIL: Readonly<DetailRecord> = Object.freeze({
  reviewsCount: 0,
  averageRating: 0,
  hostName: '',
  isLuxe: false,
  location: '',
  maxGuestCapacity: 0,
  isGuestFavorite: false,
  lat: null,
  lng: null,
  isSuperhost: false,
  isVerified: false,
  hostRatingCount: 0,
  hostUserId: '',
  hostYears: 0,
  hostMonths: 0,
  hostRatingAverage: 0,
})

/**
 * Search-session identifiers passed from a results page to detail requests.
 */
export interface SearchContext {
  federatedSearchId?: string
  federatedSearchSessionId?: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Configuration
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  /** Total attempts, including the first */
  maxRetries: number
  baseDelayMs: number
  maxDelayMs: number
  /** Upper bound (exclusive) of the uniform jitter added to each delay */
  jitterMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 15,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitterMs: 1000,
}

export interface ProviderSettings {
  baseUrl: string
  locale: string
  currency: string
  /** Free-text search query sent with every search request */
  searchQuery: string
  placeId?: string
  itemsPerPage: number
}

export interface CrawlConfig {
  retry: RetryPolicy
  tileFreshnessWindowDays: number
  recordFreshnessWindowDays: number
  tilesPerRun: number
  maxNewRecordsPerRun: number
  maxDetailEnrichmentsPerRun: number
  /** Inclusive range, seconds */
  interRequestDelayRange: { min: number; max: number }
  maxTileSpanDegrees: number
  regionBounds?: TileBounds
  /** A page with fewer records than this is the last page */
  fullPageThreshold: number
  maxPagesPerTile: number
  sessionRefreshEveryTiles: number
  provider: ProviderSettings
}

// ═══════════════════════════════════════════════════════════════════════════════
// Provider session seam
// ═══════════════════════════════════════════════════════════════════════════════

export interface HttpRequestSpec {
  method: 'GET' | 'POST'
  url: string
  headers: Record<string, string>
  body?: string
}

export interface HttpResponse {
  status: number
  statusText: string
  text: string
}

/**
 * Issues one HTTP request in the context of a live session.
 * Rejects on transport failure; any HTTP status resolves.
 */
export interface SessionTransport {
  send(request: HttpRequestSpec): Promise<HttpResponse>
}

export interface Viewport {
  width: number
  height: number
}

/**
 * Session material harvested from observed traffic by the browser collaborator.
 * Opaque to the crawl engine.
 */
export interface SessionCredentials {
  /** Persisted-query hash for the search operation */
  searchToken: string | null
  /** Persisted-query hash for the detail operation */
  detailToken: string | null
  /** Raw request headers observed on a live search call */
  headers: Record<string, string>
  apiKey?: string
  clientVersion?: string
  requestId?: string
  viewport: Viewport
  /**
   * Search filters observed on the live request (monthly dates, place id...).
   * Merged over the defaults; tile bounds and zoom always win.
   */
  searchParams?: Record<string, string[]>
}

export interface ProviderSession {
  transport: SessionTransport
  credentials(): SessionCredentials
  /** Ask the collaborator to refresh tokens and headers. Optional. */
  refresh?(): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run results
// ═══════════════════════════════════════════════════════════════════════════════

export type StopReason = 'completed' | 'new-record-budget' | 'stopped'

export interface CrawlSummary {
  runId: string
  tilesProcessed: number
  tilesSkippedFresh: number
  tilesSkippedInvalid: number
  tilesFailed: number
  recordsFound: number
  basicSaved: number
  detailedSaved: number
  detailCalls: number
  stopReason: StopReason
  startCursor: number
  endCursor: number
}

export interface CrawlStats {
  total: number
  basicOnly: number
  detailed: number
  pendingDetail: number
  tilesProcessed: number
  /** Records scraped in the last 24 hours */
  recentCount: number
}

export type Clock = () => Date

export type Sleep = (ms: number) => Promise<void>
