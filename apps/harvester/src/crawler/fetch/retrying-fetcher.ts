/**
 * Retrying JSON fetcher
 *
 * Wraps one provider call with a hard attempt cap and exponential backoff
 * with jitter. Transport errors, non-2xx statuses and unparseable bodies all
 * count as failed attempts. Exhaustion is returned, never thrown; the caller
 * decides whether it costs a record, a tile or the run.
 */

import type { ILogger } from '@tilecrawl/logger'
import { TransientFetchError } from '../errors.js'
import type { HttpRequestSpec, RetryPolicy, SessionTransport, Sleep } from '../types.js'
import { DEFAULT_RETRY_POLICY } from '../types.js'
import { safeJsonParse } from '../../utils/json.js'

export type FetchOutcome =
  | { ok: true; statusCode: number; body: unknown; attempts: number; durationMs: number }
  | { ok: false; error: TransientFetchError; attempts: number; durationMs: number }

export interface RetryingFetcherOptions {
  retryPolicy?: RetryPolicy
  logger?: ILogger
  sleep?: Sleep
  /** Uniform [0, 1) source for jitter */
  random?: () => number
  now?: () => number
}

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

/**
 * Delay after failed attempt `attempt` (1-based): min(cap, base * 2^(attempt-1)) + jitter.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number): number {
  const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * Math.pow(2, attempt - 1))
  return exponential + Math.floor(random() * policy.jitterMs)
}

export class RetryingFetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly log?: ILogger
  private readonly sleep: Sleep
  private readonly random: () => number
  private readonly now: () => number

  constructor(
    private readonly transport: SessionTransport,
    options: RetryingFetcherOptions = {}
  ) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.log = options.logger
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
    this.now = options.now ?? Date.now
  }

  get policy(): RetryPolicy {
    return this.retryPolicy
  }

  async fetch(request: HttpRequestSpec): Promise<FetchOutcome> {
    const startTime = this.now()
    const maxAttempts = Math.max(1, this.retryPolicy.maxRetries)
    let lastError: TransientFetchError | null = null

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const result = await this.fetchOnce(request, attempt)
      if (result.ok) {
        return { ...result, attempts: attempt, durationMs: this.now() - startTime }
      }

      lastError = result.error

      if (attempt < maxAttempts) {
        const delay = backoffDelay(this.retryPolicy, attempt, this.random)
        this.log?.warn('Provider request failed, retrying', {
          method: request.method,
          attempt,
          maxAttempts,
          statusCode: result.error.statusCode,
          kind: result.error.kind,
          delayMs: delay,
        })
        await this.sleep(delay)
      }
    }

    const error =
      lastError ?? new TransientFetchError('network', 'Unknown error after retries', { attempt: maxAttempts })

    this.log?.error('Provider request exhausted retries', {
      method: request.method,
      attempts: maxAttempts,
      statusCode: error.statusCode,
      kind: error.kind,
    })

    return { ok: false, error, attempts: maxAttempts, durationMs: this.now() - startTime }
  }

  /**
   * Single attempt (no retries).
   */
  private async fetchOnce(
    request: HttpRequestSpec,
    attempt: number
  ): Promise<{ ok: true; statusCode: number; body: unknown } | { ok: false; error: TransientFetchError }> {
    let status: number
    let statusText: string
    let text: string
    try {
      const response = await this.transport.send(request)
      status = response.status
      statusText = response.statusText
      text = response.text
    } catch (cause) {
      const message = cause instanceof Error ? cause.message : String(cause)
      return {
        ok: false,
        error: new TransientFetchError('network', `Request failed: ${message}`, { attempt, cause }),
      }
    }

    if (status < 200 || status >= 300) {
      return {
        ok: false,
        error: new TransientFetchError('http', `HTTP ${status}: ${statusText}`, { statusCode: status, attempt }),
      }
    }

    const parsed = safeJsonParse(text)
    if (!parsed.ok) {
      return {
        ok: false,
        error: new TransientFetchError('parse', `Invalid JSON body: ${parsed.error}`, {
          statusCode: status,
          attempt,
        }),
      }
    }

    return { ok: true, statusCode: status, body: parsed.value }
  }
}
