import { readFileSync } from 'node:fs'
import { describe, it, expect } from 'vitest'
import { mapSearchResults } from '../extract/listing-mapper.js'
import { cursorFrom, extractSearchPage, totalPagesFrom } from '../extract/response-extractor.js'

function fixture(name: string): unknown {
  return JSON.parse(readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8'))
}

const BASE_URL = 'https://www.example.test/'

describe('extractSearchPage', () => {
  it('reads records from a known path', () => {
    const page = extractSearchPage(fixture('search-known-path.json'))

    expect(page.strategy).toBe('known-path')
    expect(page.matchedPath).toBe('data.presentation.staysSearch.results.searchResults')
    expect(page.records).toHaveLength(2)
    expect(page.nextCursor).toBe('cursor-page-2')
    expect(page.totalPages).toBe(3)
    expect(page.searchContext).toEqual({ federatedSearchId: 'fed-1', federatedSearchSessionId: 'sess-1' })
    expect(page.errors).toEqual([])
  })

  it('falls back to a deep scan when the layout has drifted', () => {
    const page = extractSearchPage(fixture('search-drifted.json'))

    expect(page.strategy).toBe('deep-scan')
    expect(page.matchedPath).toBeUndefined()
    expect(page.records).toHaveLength(2)
    expect(page.nextCursor).toBe('cursor-page-2')
    expect(page.totalPages).toBe(3)
    expect(page.searchContext).toEqual({ federatedSearchId: 'fed-1', federatedSearchSessionId: 'sess-1' })
  })

  it('yields the same records from legacy and drifted layouts', () => {
    const known = mapSearchResults(extractSearchPage(fixture('search-known-path.json')).records, { baseUrl: BASE_URL })
    const drifted = mapSearchResults(extractSearchPage(fixture('search-drifted.json')).records, { baseUrl: BASE_URL })

    expect(drifted.listings).toEqual(known.listings)
    expect(known.listings.map((l) => l.record.id)).toEqual(['1001', '1002'])
  })

  it('takes the first non-empty known record path', () => {
    const doc = {
      data: {
        staysSearch: {
          searchResults: [],
          staysSearchResultsV2: { searchResults: [{ listing: { id: '7', title: 'A' } }] },
          mapResults: [{ listing: { id: '8', title: 'B' } }],
        },
      },
    }
    const page = extractSearchPage(doc)

    expect(page.strategy).toBe('known-path')
    expect(page.matchedPath).toBe('data.staysSearch.staysSearchResultsV2.searchResults')
    expect(page.records).toEqual([{ listing: { id: '7', title: 'A' } }])
  })

  it('wraps bare listings found by the deep scan', () => {
    const page = extractSearchPage({ payload: { card: { id: 55, title: 'Kasbah room' } } })

    expect(page.strategy).toBe('deep-scan')
    expect(page.records).toEqual([{ listing: { id: 55, title: 'Kasbah room' } }])
  })

  it('collects each record once', () => {
    const listing = { listing: { id: '9', title: 'Dar' } }
    const page = extractSearchPage({ a: { b: [listing] }, c: { d: listing } })

    expect(page.records).toHaveLength(1)
  })

  it('survives cyclic input', () => {
    const node: Record<string, unknown> = { name: 'loop' }
    node.self = node
    const page = extractSearchPage({ wrapper: node })

    expect(page.strategy).toBe('none')
    expect(page.records).toEqual([])
  })

  it('returns an empty page for non-document input', () => {
    for (const input of [null, 42, 'text', []]) {
      const page = extractSearchPage(input)
      expect(page.records).toEqual([])
      expect(page.strategy).toBe('none')
      expect(page.nextCursor).toBeNull()
      expect(page.totalPages).toBe(0)
    }
  })

  it('surfaces GraphQL errors without failing', () => {
    const page = extractSearchPage({ errors: [{ message: 'persisted query not found' }], data: null })

    expect(page.errors).toEqual(['persisted query not found'])
    expect(page.records).toEqual([])
  })
})

describe('pagination helpers', () => {
  it('reads the cursor of the last element of a list', () => {
    expect(cursorFrom([{ cursor: 'a' }, { cursor: 'b' }])).toBe('b')
    expect(cursorFrom([{ nextPageCursor: 'z' }])).toBe('z')
  })

  it('prefers nextPageCursor over other cursor keys', () => {
    expect(cursorFrom({ cursor: 'old', nextPageCursor: 'new' })).toBe('new')
    expect(cursorFrom({})).toBeNull()
  })

  it('counts pages from lists, maps and totalPages', () => {
    expect(totalPagesFrom({ pageCursors: ['a', 'b'] })).toBe(2)
    expect(totalPagesFrom({ pages: { totalCount: 4 } })).toBe(4)
    expect(totalPagesFrom({ totalPages: '5' })).toBe(5)
    expect(totalPagesFrom({})).toBe(0)
    expect(totalPagesFrom([{ cursor: 'a' }])).toBe(0)
  })
})
