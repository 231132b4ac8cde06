/**
 * Search request builder
 *
 * One POST per result page. The persisted-query hash is the search capability
 * token; the tile's bounds and implied zoom travel as raw filter params.
 */

import { zoomLevel } from '../geo.js'
import { buildProviderHeaders } from '../headers.js'
import type { HttpRequestSpec, ProviderSettings, SessionCredentials, Tile } from '../types.js'

export const SEARCH_OPERATION = 'StaysSearch'

const TREATMENT_FLAGS = [
  'feed_map_decouple_m11_treatment',
  'recommended_filters_2024_treatment_b',
  'm1_2024_monthly_stays_dial_treatment_flag',
  'recommended_amenities_2024_treatment_b',
  'filter_redesign_2024_treatment',
  'filter_reordering_2024_roomtype_treatment',
  'selected_filters_2024_treatment',
  'm13_search_input_phase2_treatment',
]

/** Filters sent on every map search unless the session overrides them */
const DEFAULT_FILTERS: Readonly<Record<string, string[]>> = {
  adults: ['1'],
  cdnCacheSafe: ['false'],
  channel: ['EXPLORE'],
  flexibleTripLengths: ['one_week'],
  monthlyLength: ['3'],
  priceFilterInputType: ['0'],
  priceFilterNumNights: ['5'],
  refinementPaths: ['/homes'],
  screenSize: ['large'],
  searchByMap: ['true'],
  searchMode: ['regular_search'],
  tabId: ['home_tab'],
  version: ['1.8.3'],
}

export interface RawParam {
  filterName: string
  filterValues: string[]
}

export interface SearchRequestInput {
  tile: Tile
  credentials: SessionCredentials
  provider: ProviderSettings
  /** Page cursor from the previous page; absent on the first page */
  cursor?: string | null
}

/**
 * Filter params for one tile, sorted by name. Tile bounds and zoom override
 * anything the session supplied under the same name.
 */
export function buildRawParams(
  input: SearchRequestInput,
  options: { includeItemsPerGrid: boolean }
): RawParam[] {
  const { tile, credentials, provider } = input
  const zoom = zoomLevel(
    tile.swLat,
    tile.swLng,
    tile.neLat,
    tile.neLng,
    credentials.viewport.width,
    credentials.viewport.height
  )

  const filters: Record<string, string[]> = {
    ...DEFAULT_FILTERS,
    query: [provider.searchQuery],
    ...(provider.placeId ? { placeId: [provider.placeId] } : {}),
    ...credentials.searchParams,
    neLat: [String(tile.neLat)],
    neLng: [String(tile.neLng)],
    swLat: [String(tile.swLat)],
    swLng: [String(tile.swLng)],
    zoomLevel: [String(zoom)],
  }

  if (options.includeItemsPerGrid) {
    filters.itemsPerGrid = [String(provider.itemsPerPage)]
  } else {
    delete filters.itemsPerGrid
  }

  return Object.keys(filters)
    .sort()
    .map((filterName) => ({ filterName, filterValues: filters[filterName] }))
}

function searchRequestBody(input: SearchRequestInput, searchToken: string): Record<string, unknown> {
  const cursor = input.cursor ? { cursor: input.cursor } : {}
  const common = {
    requestedPageType: 'STAYS_SEARCH',
    metadataOnly: false,
    treatmentFlags: TREATMENT_FLAGS,
    searchType: 'user_map_move',
    skipHydrationListingIds: [],
  }

  return {
    operationName: SEARCH_OPERATION,
    variables: {
      aiSearchEnabled: false,
      staysSearchRequest: {
        ...common,
        maxMapItems: 9999,
        rawParams: buildRawParams(input, { includeItemsPerGrid: true }),
        ...cursor,
      },
      staysMapSearchRequestV2: {
        ...common,
        rawParams: buildRawParams(input, { includeItemsPerGrid: false }),
        ...cursor,
      },
      isLeanTreatment: false,
      skipExtendedSearchParams: false,
      includeDemandStayListing: true,
    },
    extensions: { persistedQuery: { version: 1, sha256Hash: searchToken } },
  }
}

/**
 * Returns null when the session has no search token yet.
 */
export function buildSearchRequest(input: SearchRequestInput): HttpRequestSpec | null {
  const searchToken = input.credentials.searchToken
  if (!searchToken) return null

  const { provider } = input
  const query = new URLSearchParams({
    operationName: SEARCH_OPERATION,
    locale: provider.locale,
    currency: provider.currency,
  })

  return {
    method: 'POST',
    url: `${provider.baseUrl.replace(/\/+$/, '')}/api/v3/${SEARCH_OPERATION}/${encodeURIComponent(searchToken)}?${query.toString()}`,
    headers: buildProviderHeaders(input.credentials, {
      baseUrl: provider.baseUrl,
      extra: { 'content-type': 'application/json' },
    }),
    body: JSON.stringify(searchRequestBody(input, searchToken)),
  }
}
