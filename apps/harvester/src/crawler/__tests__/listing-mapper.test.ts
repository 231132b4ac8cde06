import { describe, it, expect } from 'vitest'
import { listingLink, mapSearchResult, mapSearchResults, parsePriceAmount } from '../extract/listing-mapper.js'

const options = { baseUrl: 'https://www.example.test' }

describe('mapSearchResult', () => {
  it('maps a wrapped listing with fallbacks and defaults', () => {
    const result = mapSearchResult(
      { listing: { id: '5', title: 'Dar by the sea', pricingQuote: { priceString: 'MAD 900' } } },
      options
    )

    expect(result).toEqual({
      ok: true,
      record: {
        id: '5',
        listingObjType: 'REGULAR',
        roomTypeCategory: 'unavailable',
        title: 'Dar by the sea',
        name: 'Dar by the sea',
        picture: '',
        checkin: null,
        checkout: null,
        price: 'MAD 900',
        discountedPrice: '',
        originalPrice: '',
        priceAmount: 900,
        link: 'https://www.example.test/rooms/5',
      },
      hints: { categoryTag: undefined, photoId: undefined, checkin: undefined, checkout: undefined },
    })
  })

  it('falls back to single image fields', () => {
    const result = mapSearchResult(
      { listing: { id: '6', name: 'Atlas lodge', previewImage: { url: 'https://img.example.test/a.jpg' } } },
      options
    )

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.record.picture).toBe('https://img.example.test/a.jpg')
      expect(result.record.title).toBe('Atlas lodge')
    }
  })

  it('finds a nested listing node by its id', () => {
    const result = mapSearchResult({ card: { listingId: 'StayListing:77', title: 'Nested' } }, options)

    expect(result.ok).toBe(true)
    if (result.ok) expect(result.record.id).toBe('77')
  })

  it('reports items without a listing node', () => {
    expect(mapSearchResult({ foo: { bar: 1 } }, options)).toMatchObject({ ok: false, reason: 'NO_LISTING_NODE' })
    expect(mapSearchResult('text', options)).toMatchObject({ ok: false, reason: 'NO_LISTING_NODE' })
  })

  it('reports identifiers that cannot be normalized', () => {
    expect(mapSearchResult({ listing: { id: 'not-an-id', title: 'x' } }, options)).toEqual({
      ok: false,
      reason: 'IDENTIFIER_UNRESOLVABLE',
      details: 'not-an-id',
    })
  })
})

describe('mapSearchResults', () => {
  it('drops unmappable items and repeated ids', () => {
    const page = mapSearchResults(
      [
        { listing: { id: '1', title: 'First' } },
        { listing: { id: 'StayListing:1', title: 'First again' } },
        { listing: { id: 'nope', title: 'Bad' } },
        { listing: { id: 2, title: 'Second' } },
      ],
      options
    )

    expect(page.listings.map((l) => l.record.id)).toEqual(['1', '2'])
    expect(page.duplicates).toBe(1)
    expect(page.dropped).toEqual([{ reason: 'IDENTIFIER_UNRESOLVABLE', details: 'nope' }])
  })
})

describe('price and link helpers', () => {
  it('parses display prices', () => {
    expect(parsePriceAmount('MAD2,283')).toBe(2283)
    expect(parsePriceAmount('€ 95.50')).toBe(95.5)
    expect(parsePriceAmount('on request')).toBeNull()
  })

  it('builds canonical links without doubled slashes', () => {
    expect(listingLink('https://www.example.test//', '6')).toBe('https://www.example.test/rooms/6')
  })
})
