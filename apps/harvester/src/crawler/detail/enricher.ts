/**
 * Detail enrichment for one record.
 *
 * A failure of any kind is a SKIP: the record stays basic and is retried on
 * a later run. Nothing here throws to the tile loop.
 */

import type { ILogger } from '@tilecrawl/logger'
import type { RetryingFetcher } from '../fetch/retrying-fetcher.js'
import type { DetailRecord, ProviderSettings, SessionCredentials } from '../types.js'
import { buildDetailRequest, type DetailContextHints } from './request.js'
import { mapDetailDocument } from './sections.js'

export type DetailSkipReason =
  | 'NO_CAPABILITY_TOKEN'
  | 'FETCH_EXHAUSTED'
  | 'GRAPHQL_ERRORS'
  | 'MISSING_PAYLOAD'
  | 'MALFORMED_SECTIONS'

export type DetailResult =
  | { status: 'ok'; detail: DetailRecord; sectionsSeen: string[] }
  | { status: 'skip'; reason: DetailSkipReason; details?: string }

export interface DetailEnricherOptions {
  fetcher: RetryingFetcher
  provider: ProviderSettings
  /** Current session material; read on every call so refreshed tokens apply */
  credentials: () => SessionCredentials
  logger: ILogger
}

export class DetailEnricher {
  constructor(private readonly options: DetailEnricherOptions) {}

  async enrich(capabilityToken: string | null, id: string, hints: DetailContextHints): Promise<DetailResult> {
    const log = this.options.logger
    if (!capabilityToken) {
      return { status: 'skip', reason: 'NO_CAPABILITY_TOKEN' }
    }

    const request = buildDetailRequest({
      id,
      detailToken: capabilityToken,
      credentials: this.options.credentials(),
      provider: this.options.provider,
      hints,
    })

    const outcome = await this.options.fetcher.fetch(request)
    if (!outcome.ok) {
      log.warn('Detail fetch failed, skipping record', {
        listingId: id,
        attempts: outcome.attempts,
        statusCode: outcome.error.statusCode,
      })
      return { status: 'skip', reason: 'FETCH_EXHAUSTED', details: outcome.error.message }
    }

    const mapped = mapDetailDocument(outcome.body)
    if (!mapped.ok) {
      log.warn('Detail response unusable, skipping record', {
        listingId: id,
        reason: mapped.reason,
        details: mapped.details,
      })
      return { status: 'skip', reason: mapped.reason, details: mapped.details }
    }

    log.debug('Detail sections mapped', { listingId: id, sections: mapped.sectionsSeen })
    return { status: 'ok', detail: mapped.detail, sectionsSeen: mapped.sectionsSeen }
  }
}
