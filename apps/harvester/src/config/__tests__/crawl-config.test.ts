import { describe, it, expect } from 'vitest'
import { ConfigurationError } from '../../crawler/errors.js'
import { loadCrawlConfig } from '../crawl-config.js'

function issuesOf(env: NodeJS.ProcessEnv): { path: string; message: string }[] {
  try {
    loadCrawlConfig(env)
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues
    throw error
  }
  throw new Error('expected a ConfigurationError')
}

describe('loadCrawlConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadCrawlConfig({})

    expect(config).toEqual({
      retry: { maxRetries: 15, baseDelayMs: 1000, maxDelayMs: 30_000, jitterMs: 1000 },
      tileFreshnessWindowDays: 30,
      recordFreshnessWindowDays: 30,
      tilesPerRun: 20,
      maxNewRecordsPerRun: 3,
      maxDetailEnrichmentsPerRun: 3,
      interRequestDelayRange: { min: 1, max: 2 },
      maxTileSpanDegrees: 5,
      regionBounds: undefined,
      fullPageThreshold: 13,
      maxPagesPerTile: 20,
      sessionRefreshEveryTiles: 10,
      provider: {
        baseUrl: 'https://www.airbnb.com',
        locale: 'en',
        currency: 'MAD',
        searchQuery: 'Morocco',
        placeId: undefined,
        itemsPerPage: 18,
      },
    })
  })

  it('coerces numeric variables and treats empty strings as unset', () => {
    const config = loadCrawlConfig({
      CRAWL_TILES_PER_RUN: '5',
      CRAWL_DELAY_MIN_SECONDS: '0.5',
      CRAWL_MAX_DETAIL_ENRICHMENTS_PER_RUN: '0',
      CRAWL_MAX_RETRIES: '',
      PROVIDER_CURRENCY: 'EUR',
    })

    expect(config.tilesPerRun).toBe(5)
    expect(config.interRequestDelayRange).toEqual({ min: 0.5, max: 2 })
    expect(config.maxDetailEnrichmentsPerRun).toBe(0)
    expect(config.retry.maxRetries).toBe(15)
    expect(config.provider.currency).toBe('EUR')
  })

  it('parses region bounds', () => {
    const config = loadCrawlConfig({ CRAWL_REGION_BOUNDS: '27.6, -13.2, 35.9, -1.0' })
    expect(config.regionBounds).toEqual({ swLat: 27.6, swLng: -13.2, neLat: 35.9, neLng: -1 })
  })

  it('rejects malformed region bounds', () => {
    expect(issuesOf({ CRAWL_REGION_BOUNDS: '1,2,3' })).toEqual([
      { path: 'CRAWL_REGION_BOUNDS', message: 'expected "swLat,swLng,neLat,neLng"' },
    ])
  })

  it('rejects a delay range whose minimum exceeds its maximum', () => {
    expect(issuesOf({ CRAWL_DELAY_MIN_SECONDS: '3', CRAWL_DELAY_MAX_SECONDS: '2' })).toEqual([
      { path: 'CRAWL_DELAY_MIN_SECONDS', message: 'CRAWL_DELAY_MIN_SECONDS must not exceed CRAWL_DELAY_MAX_SECONDS' },
    ])
  })

  it('reports every invalid variable', () => {
    const paths = issuesOf({ CRAWL_TILES_PER_RUN: '0', PROVIDER_BASE_URL: 'not a url', CRAWL_MAX_RETRIES: 'many' }).map(
      (issue) => issue.path
    )

    expect(paths.sort()).toEqual(['CRAWL_MAX_RETRIES', 'CRAWL_TILES_PER_RUN', 'PROVIDER_BASE_URL'])
  })
})
