/**
 * Crawl configuration from environment variables.
 *
 * Every value has a default; an invalid value fails the whole load with a
 * ConfigurationError listing each offending variable.
 */

import { z } from 'zod'
import { ConfigurationError } from '../crawler/errors.js'
import type { CrawlConfig, TileBounds } from '../crawler/types.js'

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback)
const nonNegativeNumber = (fallback: number) => z.coerce.number().min(0).default(fallback)

const regionBoundsSchema = z
  .string()
  .trim()
  .transform((value, ctx): TileBounds | undefined => {
    if (value === '') return undefined
    const parts = value.split(',').map((p) => Number(p.trim()))
    if (parts.length !== 4 || !parts.every(Number.isFinite)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected "swLat,swLng,neLat,neLng"' })
      return z.NEVER
    }
    const [swLat, swLng, neLat, neLng] = parts
    if (swLat >= neLat || swLng >= neLng) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'south-west corner must be below and left of north-east' })
      return z.NEVER
    }
    return { swLat, swLng, neLat, neLng }
  })
  .optional()

export const crawlEnvSchema = z
  .object({
    CRAWL_MAX_RETRIES: positiveInt(15),
    CRAWL_RETRY_BASE_DELAY_MS: nonNegativeNumber(1000),
    CRAWL_RETRY_MAX_DELAY_MS: nonNegativeNumber(30_000),
    CRAWL_RETRY_JITTER_MS: nonNegativeNumber(1000),
    CRAWL_TILE_FRESHNESS_DAYS: z.coerce.number().positive().default(30),
    CRAWL_RECORD_FRESHNESS_DAYS: z.coerce.number().positive().default(30),
    CRAWL_TILES_PER_RUN: positiveInt(20),
    CRAWL_MAX_NEW_RECORDS_PER_RUN: positiveInt(3),
    CRAWL_MAX_DETAIL_ENRICHMENTS_PER_RUN: z.coerce.number().int().min(0).default(3),
    CRAWL_DELAY_MIN_SECONDS: nonNegativeNumber(1),
    CRAWL_DELAY_MAX_SECONDS: nonNegativeNumber(2),
    CRAWL_MAX_TILE_SPAN_DEGREES: z.coerce.number().positive().default(5),
    CRAWL_FULL_PAGE_THRESHOLD: positiveInt(13),
    CRAWL_ITEMS_PER_PAGE: positiveInt(18),
    CRAWL_MAX_PAGES_PER_TILE: positiveInt(20),
    CRAWL_SESSION_REFRESH_EVERY_TILES: positiveInt(10),
    CRAWL_REGION_BOUNDS: regionBoundsSchema,
    PROVIDER_BASE_URL: z.string().url().default('https://www.airbnb.com'),
    PROVIDER_LOCALE: z.string().min(1).default('en'),
    PROVIDER_CURRENCY: z.string().min(1).default('MAD'),
    PROVIDER_SEARCH_QUERY: z.string().min(1).default('Morocco'),
    PROVIDER_PLACE_ID: z.string().min(1).optional(),
  })
  .refine((env) => env.CRAWL_DELAY_MIN_SECONDS <= env.CRAWL_DELAY_MAX_SECONDS, {
    message: 'CRAWL_DELAY_MIN_SECONDS must not exceed CRAWL_DELAY_MAX_SECONDS',
    path: ['CRAWL_DELAY_MIN_SECONDS'],
  })
  .refine((env) => env.CRAWL_RETRY_BASE_DELAY_MS <= env.CRAWL_RETRY_MAX_DELAY_MS, {
    message: 'CRAWL_RETRY_BASE_DELAY_MS must not exceed CRAWL_RETRY_MAX_DELAY_MS',
    path: ['CRAWL_RETRY_BASE_DELAY_MS'],
  })

/** Empty strings count as unset so `FOO=` in an env file falls back to the default */
function withoutEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') values[key] = value
  }
  return values
}

export function loadCrawlConfig(env: NodeJS.ProcessEnv = process.env): CrawlConfig {
  const parsed = crawlEnvSchema.safeParse(withoutEmpty(env))
  if (!parsed.success) {
    throw ConfigurationError.fromZod(parsed.error)
  }
  const e = parsed.data

  return {
    retry: {
      maxRetries: e.CRAWL_MAX_RETRIES,
      baseDelayMs: e.CRAWL_RETRY_BASE_DELAY_MS,
      maxDelayMs: e.CRAWL_RETRY_MAX_DELAY_MS,
      jitterMs: e.CRAWL_RETRY_JITTER_MS,
    },
    tileFreshnessWindowDays: e.CRAWL_TILE_FRESHNESS_DAYS,
    recordFreshnessWindowDays: e.CRAWL_RECORD_FRESHNESS_DAYS,
    tilesPerRun: e.CRAWL_TILES_PER_RUN,
    maxNewRecordsPerRun: e.CRAWL_MAX_NEW_RECORDS_PER_RUN,
    maxDetailEnrichmentsPerRun: e.CRAWL_MAX_DETAIL_ENRICHMENTS_PER_RUN,
    interRequestDelayRange: { min: e.CRAWL_DELAY_MIN_SECONDS, max: e.CRAWL_DELAY_MAX_SECONDS },
    maxTileSpanDegrees: e.CRAWL_MAX_TILE_SPAN_DEGREES,
    regionBounds: e.CRAWL_REGION_BOUNDS,
    fullPageThreshold: e.CRAWL_FULL_PAGE_THRESHOLD,
    maxPagesPerTile: e.CRAWL_MAX_PAGES_PER_TILE,
    sessionRefreshEveryTiles: e.CRAWL_SESSION_REFRESH_EVERY_TILES,
    provider: {
      baseUrl: e.PROVIDER_BASE_URL,
      locale: e.PROVIDER_LOCALE,
      currency: e.PROVIDER_CURRENCY,
      searchQuery: e.PROVIDER_SEARCH_QUERY,
      placeId: e.PROVIDER_PLACE_ID,
      itemsPerPage: e.CRAWL_ITEMS_PER_PAGE,
    },
  }
}
