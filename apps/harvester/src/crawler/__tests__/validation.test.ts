import { describe, it, expect } from 'vitest'
import { EMPTY_DETAIL, type BasicRecord } from '../types.js'
import { priceInCurrency, summarizeRecords, validateBasicRecord, validateDetailRecord } from '../validation.js'

function record(overrides: Partial<BasicRecord> = {}): BasicRecord {
  return {
    id: '1001',
    listingObjType: 'REPRESENTATIVE',
    roomTypeCategory: 'entire_home',
    title: 'Riad in Marrakech',
    name: 'Riad',
    picture: 'https://a0.muscache.com/im/pictures/abc.jpg',
    checkin: '',
    checkout: '',
    price: 'MAD2,283',
    discountedPrice: '',
    originalPrice: '',
    priceAmount: 2283,
    link: 'https://www.example.test/rooms/1001',
    ...overrides,
  }
}

const options = { currency: 'MAD', region: { swLat: 27, swLng: -13, neLat: 36, neLng: -1 } }

describe('priceInCurrency', () => {
  it('reads amounts with or without a space after the code', () => {
    expect(priceInCurrency('MAD2,283', 'MAD')).toBe(2283)
    expect(priceInCurrency('MAD 640 night', 'MAD')).toBe(640)
  })

  it('returns null for another currency', () => {
    expect(priceInCurrency('€120', 'MAD')).toBeNull()
  })
})

describe('validateBasicRecord', () => {
  it('accepts a well-formed record', () => {
    expect(validateBasicRecord(record(), options)).toEqual([])
  })

  it('reports price and image problems', () => {
    const warnings = validateBasicRecord(
      record({ price: 'MAD12', picture: 'https://cdn.example.test/photo.jpg' }),
      options
    )

    expect(warnings).toEqual([
      'Price out of expected range: MAD12',
      'Unexpected image URL: https://cdn.example.test/photo.jpg',
    ])
  })

  it('reports an unparseable price', () => {
    expect(validateBasicRecord(record({ price: '$99' }), options)).toEqual(['Price format issue: $99'])
  })
})

describe('validateDetailRecord', () => {
  it('flags a missing host and out-of-range values', () => {
    const warnings = validateDetailRecord(
      { ...EMPTY_DETAIL, averageRating: 7, maxGuestCapacity: 80, lat: 31.6, lng: -8 },
      options
    )

    expect(warnings).toEqual(['No host information', 'Invalid average rating: 7', 'Unusual guest capacity: 80'])
  })

  it('reports coordinates outside the region', () => {
    expect(validateDetailRecord({ ...EMPTY_DETAIL, hostName: 'Amina', lat: 48.85, lng: 2.35 }, options)).toEqual([
      'Coordinates outside region: 48.85, 2.35',
    ])
  })

  it('treats a zero capacity as not reported', () => {
    expect(validateDetailRecord({ ...EMPTY_DETAIL, hostName: 'Amina' }, options)).toEqual([])
  })
})

describe('summarizeRecords', () => {
  it('aggregates price and image coverage', () => {
    const summary = summarizeRecords([
      record(),
      record({ id: '1002', price: 'MAD 640', priceAmount: 640, picture: '' }),
      record({ id: '1003', price: '', priceAmount: null }),
    ])

    expect(summary).toEqual({
      total: 3,
      withPrice: 2,
      withImage: 2,
      priceMin: 640,
      priceMax: 2283,
      priceAverage: 1462,
    })
  })

  it('returns nulls when no record has a price', () => {
    expect(summarizeRecords([])).toEqual({
      total: 0,
      withPrice: 0,
      withImage: 0,
      priceMin: null,
      priceMax: null,
      priceAverage: null,
    })
  })
})
