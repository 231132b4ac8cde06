import { describe, it, expect } from 'vitest'
import { buildDetailRequest, DETAIL_SECTION_IDS } from '../detail/request.js'
import { buildProviderHeaders, describeCredentials } from '../headers.js'
import { encodeListingGlobalId } from '../identifier.js'
import { buildSearchRequest } from '../search/request.js'
import type { Tile } from '../types.js'
import { testConfig, testCredentials } from './helpers/fakes.js'

const provider = testConfig().provider
const tile: Tile = { index: 0, swLat: 30, swLng: -8, neLat: 30.5, neLng: -7.5 }

interface RawParam {
  filterName: string
  filterValues: string[]
}

function rawParamsOf(body: string | undefined, key: 'staysSearchRequest' | 'staysMapSearchRequestV2'): RawParam[] {
  const parsed = JSON.parse(body ?? '{}') as { variables: Record<string, { rawParams: RawParam[] }> }
  return parsed.variables[key].rawParams
}

function param(params: RawParam[], name: string): string[] | undefined {
  return params.find((p) => p.filterName === name)?.filterValues
}

describe('buildSearchRequest', () => {
  it('returns null without a search token', () => {
    expect(buildSearchRequest({ tile, provider, credentials: testCredentials({ searchToken: null }) })).toBeNull()
  })

  it('posts to the persisted query with locale and currency', () => {
    const request = buildSearchRequest({ tile, provider, credentials: testCredentials() })

    expect(request?.method).toBe('POST')
    expect(request?.url).toBe(
      'https://www.example.test/api/v3/StaysSearch/search-hash?operationName=StaysSearch&locale=en&currency=MAD'
    )
    const body = JSON.parse(request?.body ?? '{}') as { extensions: { persistedQuery: { sha256Hash: string } } }
    expect(body.extensions.persistedQuery.sha256Hash).toBe('search-hash')
  })

  it('carries bounds, zoom and query as sorted raw params', () => {
    const request = buildSearchRequest({ tile, provider, credentials: testCredentials() })
    const params = rawParamsOf(request?.body, 'staysSearchRequest')

    expect(param(params, 'neLat')).toEqual(['30.5'])
    expect(param(params, 'swLng')).toEqual(['-8'])
    expect(param(params, 'zoomLevel')).toEqual(['9'])
    expect(param(params, 'query')).toEqual(['Morocco'])
    expect(param(params, 'itemsPerGrid')).toEqual(['18'])

    const names = params.map((p) => p.filterName)
    expect(names).toEqual([...names].sort())
  })

  it('leaves items per grid out of the map request', () => {
    const request = buildSearchRequest({ tile, provider, credentials: testCredentials() })

    expect(param(rawParamsOf(request?.body, 'staysMapSearchRequestV2'), 'itemsPerGrid')).toBeUndefined()
  })

  it('lets session params override defaults but never the tile bounds', () => {
    const credentials = testCredentials({ searchParams: { adults: ['2'], neLat: ['0'] } })
    const params = rawParamsOf(buildSearchRequest({ tile, provider, credentials })?.body, 'staysSearchRequest')

    expect(param(params, 'adults')).toEqual(['2'])
    expect(param(params, 'neLat')).toEqual(['30.5'])
  })

  it('sends the page cursor on both requests', () => {
    const request = buildSearchRequest({ tile, provider, credentials: testCredentials(), cursor: 'cursor-2' })
    const body = JSON.parse(request?.body ?? '{}') as { variables: Record<string, { cursor?: string }> }

    expect(body.variables.staysSearchRequest.cursor).toBe('cursor-2')
    expect(body.variables.staysMapSearchRequestV2.cursor).toBe('cursor-2')
  })
})

describe('buildDetailRequest', () => {
  it('encodes the global id, hints and section ids in the query', () => {
    const request = buildDetailRequest({
      id: '1001',
      detailToken: 'detail-hash',
      credentials: testCredentials(),
      provider,
      hints: { categoryTag: 'Tag:8678', checkin: '2026-11-02', federatedSearchId: 'fed-1' },
    })
    const url = new URL(request.url)
    const variables = JSON.parse(url.searchParams.get('variables') ?? '{}') as {
      id: string
      pdpSectionsRequest: Record<string, unknown>
    }

    expect(request.method).toBe('GET')
    expect(url.pathname).toBe('/api/v3/StaysPdpSections/detail-hash')
    expect(url.searchParams.get('operationName')).toBe('StaysPdpSections')
    expect(variables.id).toBe(encodeListingGlobalId('1001'))
    expect(variables.pdpSectionsRequest.categoryTag).toBe('Tag:8678')
    expect(variables.pdpSectionsRequest.checkIn).toBe('2026-11-02')
    expect(variables.pdpSectionsRequest.checkOut).toBeNull()
    expect(variables.pdpSectionsRequest.federatedSearchId).toBe('fed-1')
    expect(variables.pdpSectionsRequest.sectionIds).toEqual([...DETAIL_SECTION_IDS])
    expect(request.headers.referer).toBe('https://www.example.test/rooms/1001')
  })
})

describe('provider headers', () => {
  it('drops non-replayable headers and adds client headers', () => {
    const headers = buildProviderHeaders(testCredentials(), { baseUrl: 'https://www.example.test/' })

    expect(headers[':authority']).toBeUndefined()
    expect(headers['content-length']).toBeUndefined()
    expect(headers['user-agent']).toBe('test-agent')
    expect(headers['x-airbnb-api-key']).toBe('test-api-key-value')
    expect(headers['x-client-version']).toBe('test-client')
    expect(headers['x-client-request-id']).toBe('req-1')
    expect(headers.origin).toBe('https://www.example.test')
  })

  it('masks tokens in the loggable view', () => {
    expect(describeCredentials(testCredentials())).toEqual({
      searchHash: 'search…hash',
      detailHash: 'detail…hash',
      clientKey: 'test-a…alue',
      headerCount: 3,
      viewport: '1400x900',
    })
  })
})
