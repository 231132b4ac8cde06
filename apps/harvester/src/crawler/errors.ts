/**
 * Crawl error taxonomy
 *
 * Only failures that cross a component boundary are exceptions. Schema drift,
 * unresolvable identifiers and skipped detail fetches are modelled as results
 * (see ExtractedPage.strategy, ListingMapResult and DetailResult).
 */

import { ZodError } from 'zod'

export const CRAWL_ERROR_CODES = {
  TRANSIENT_FETCH: 'TRANSIENT_FETCH',
  TILE_FETCH_EXHAUSTED: 'TILE_FETCH_EXHAUSTED',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  STORE_WRITE_FAILED: 'STORE_WRITE_FAILED',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type CrawlErrorCode = (typeof CRAWL_ERROR_CODES)[keyof typeof CRAWL_ERROR_CODES]

export class CrawlError extends Error {
  readonly code: CrawlErrorCode

  constructor(code: CrawlErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'CrawlError'
    this.code = code
  }
}

export type TransientFetchKind = 'network' | 'http' | 'parse'

/**
 * Network error, non-2xx status, or an unparseable body.
 */
export class TransientFetchError extends CrawlError {
  readonly kind: TransientFetchKind
  readonly statusCode?: number
  readonly attempt: number

  constructor(
    kind: TransientFetchKind,
    message: string,
    details: { statusCode?: number; attempt: number; cause?: unknown }
  ) {
    super(CRAWL_ERROR_CODES.TRANSIENT_FETCH, message, { cause: details.cause })
    this.name = 'TransientFetchError'
    this.kind = kind
    this.statusCode = details.statusCode
    this.attempt = details.attempt
  }
}

/**
 * Every attempt on the first page of a tile failed.
 */
export class TileFetchExhaustedError extends CrawlError {
  readonly tileIndex: number

  constructor(tileIndex: number, cause: TransientFetchError) {
    super(
      CRAWL_ERROR_CODES.TILE_FETCH_EXHAUSTED,
      `First page of tile ${tileIndex} failed after ${cause.attempt} attempts: ${cause.message}`,
      { cause }
    )
    this.name = 'TileFetchExhaustedError'
    this.tileIndex = tileIndex
  }
}

export interface ConfigurationIssue {
  path: string
  message: string
}

export class ConfigurationError extends CrawlError {
  readonly issues: ConfigurationIssue[]

  constructor(message: string, issues: ConfigurationIssue[] = []) {
    super(CRAWL_ERROR_CODES.CONFIGURATION_ERROR, message)
    this.name = 'ConfigurationError'
    this.issues = issues
  }

  static fromZod(error: ZodError, message = 'Invalid crawl configuration'): ConfigurationError {
    return new ConfigurationError(
      message,
      error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    )
  }
}

export interface ClassifiedCrawlError {
  code: CrawlErrorCode
  message: string
  isRetryable: boolean
  statusCode?: number
}

const NETWORK_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE'])

/**
 * Map any thrown value to a loggable shape.
 */
export function classifyCrawlError(error: unknown): ClassifiedCrawlError {
  if (error instanceof TransientFetchError) {
    return {
      code: error.code,
      message: error.message,
      isRetryable: error.statusCode === undefined || error.statusCode >= 500 || error.statusCode === 429,
      statusCode: error.statusCode,
    }
  }

  if (error instanceof CrawlError) {
    return { code: error.code, message: error.message, isRetryable: false }
  }

  if (error instanceof ZodError) {
    return {
      code: CRAWL_ERROR_CODES.CONFIGURATION_ERROR,
      message: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      isRetryable: false,
    }
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined
    if (error.name === 'AbortError' || (code !== undefined && NETWORK_ERROR_CODES.has(code))) {
      return { code: CRAWL_ERROR_CODES.TRANSIENT_FETCH, message: error.message, isRetryable: true }
    }
    return { code: CRAWL_ERROR_CODES.UNEXPECTED_ERROR, message: error.message, isRetryable: false }
  }

  return { code: CRAWL_ERROR_CODES.UNEXPECTED_ERROR, message: String(error), isRetryable: false }
}
