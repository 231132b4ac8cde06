/**
 * Detail request builder
 *
 * One GET per record, scoped by the record's opaque global id. Variables and
 * extensions travel JSON-encoded in the query string.
 */

import { buildProviderHeaders } from '../headers.js'
import { encodeListingGlobalId } from '../identifier.js'
import type { HttpRequestSpec, ProviderSettings, RecordHints, SearchContext, SessionCredentials } from '../types.js'
import { listingLink } from '../extract/listing-mapper.js'

export const DETAIL_OPERATION = 'StaysPdpSections'

/** Section ids the enricher knows how to map */
export const DETAIL_SECTION_IDS = [
  'AVAILABILITY_CALENDAR_DEFAULT',
  'REVIEWS_DEFAULT',
  'LOCATION_DEFAULT',
  'MEET_YOUR_HOST',
] as const

export type DetailContextHints = RecordHints & SearchContext

export interface DetailRequestInput {
  id: string
  detailToken: string
  credentials: SessionCredentials
  provider: ProviderSettings
  hints: DetailContextHints
}

export function buildDetailVariables(id: string, hints: DetailContextHints): Record<string, unknown> {
  return {
    id: encodeListingGlobalId(id),
    useContextualUser: false,
    pdpSectionsRequest: {
      adults: '1',
      children: '0',
      infants: '0',
      pets: 0,
      categoryTag: hints.categoryTag ?? null,
      photoId: hints.photoId ?? null,
      checkIn: hints.checkin ?? null,
      checkOut: hints.checkout ?? null,
      federatedSearchId: hints.federatedSearchId ?? null,
      layouts: ['SIDEBAR', 'SINGLE_COLUMN'],
      sectionIds: [...DETAIL_SECTION_IDS],
      bypassTargetings: false,
      hostPreview: false,
      preview: false,
      privateBooking: false,
      staysBookingMigrationEnabled: false,
      translateUgc: false,
      useNewSectionWrapperApi: false,
    },
  }
}

export function buildDetailRequest(input: DetailRequestInput): HttpRequestSpec {
  const { provider } = input
  const query = new URLSearchParams({
    operationName: DETAIL_OPERATION,
    locale: provider.locale,
    currency: provider.currency,
    variables: JSON.stringify(buildDetailVariables(input.id, input.hints)),
    extensions: JSON.stringify({ persistedQuery: { version: 1, sha256Hash: input.detailToken } }),
  })

  return {
    method: 'GET',
    url: `${provider.baseUrl.replace(/\/+$/, '')}/api/v3/${DETAIL_OPERATION}/${encodeURIComponent(input.detailToken)}?${query.toString()}`,
    headers: buildProviderHeaders(input.credentials, {
      baseUrl: provider.baseUrl,
      extra: {
        referer: listingLink(provider.baseUrl, input.id),
        'accept-language': `${provider.locale},en;q=0.9`,
      },
    }),
  }
}
