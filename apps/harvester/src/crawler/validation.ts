/**
 * Soft record checks.
 *
 * Warnings are logged by the caller and never block a write.
 */

import type { BasicRecord, DetailRecord, TileBounds } from './types.js'

const IMAGE_URL_PREFIXES = [
  'https://a0.muscache.com/im/pictures/',
  'https://a1.muscache.com/im/pictures/',
  'https://a2.muscache.com/im/pictures/',
] as const

export const PRICE_SANITY_RANGE = { min: 50, max: 50_000 } as const

export interface RecordValidationOptions {
  /** Currency code expected in display prices, e.g. "MAD" */
  currency: string
  /** Coordinates outside this box are reported */
  region?: TileBounds
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Amount of a display price in the expected currency ("MAD2,283", "MAD 2,283"),
 * or null when the string does not carry one.
 */
export function priceInCurrency(display: string, currency: string): number | null {
  const match = new RegExp(`${escapeRegExp(currency)}\\s*([0-9,]+)`).exec(display)
  if (!match) return null
  const value = Number.parseFloat(match[1].replace(/,/g, ''))
  return Number.isFinite(value) ? value : null
}

function outsideRegion(lat: number | null, lng: number | null, region: TileBounds | undefined): boolean {
  if (!region || lat === null || lng === null) return false
  return lat < region.swLat || lat > region.neLat || lng < region.swLng || lng > region.neLng
}

/** Search results carry no coordinates; the region check runs on detail records. */
export function validateBasicRecord(record: BasicRecord, options: RecordValidationOptions): string[] {
  const warnings: string[] = []

  if (record.price) {
    const amount = priceInCurrency(record.price, options.currency)
    if (amount === null) {
      warnings.push(`Price format issue: ${record.price}`)
    } else if (amount < PRICE_SANITY_RANGE.min || amount > PRICE_SANITY_RANGE.max) {
      warnings.push(`Price out of expected range: ${record.price}`)
    }
  }

  if (record.picture && !IMAGE_URL_PREFIXES.some((prefix) => record.picture.startsWith(prefix))) {
    warnings.push(`Unexpected image URL: ${record.picture.slice(0, 50)}`)
  }

  return warnings
}

export function validateDetailRecord(detail: DetailRecord, options: RecordValidationOptions): string[] {
  const warnings: string[] = []

  if (!detail.hostName) {
    warnings.push('No host information')
  }
  if (outsideRegion(detail.lat, detail.lng, options.region)) {
    warnings.push(`Coordinates outside region: ${detail.lat}, ${detail.lng}`)
  }
  if (detail.averageRating < 0 || detail.averageRating > 5) {
    warnings.push(`Invalid average rating: ${detail.averageRating}`)
  }
  if (detail.hostRatingAverage < 0 || detail.hostRatingAverage > 5) {
    warnings.push(`Invalid host rating: ${detail.hostRatingAverage}`)
  }
  // zero means "not reported"
  if (detail.maxGuestCapacity !== 0 && (detail.maxGuestCapacity < 1 || detail.maxGuestCapacity > 50)) {
    warnings.push(`Unusual guest capacity: ${detail.maxGuestCapacity}`)
  }

  return warnings
}

export interface TileRecordSummary {
  total: number
  withPrice: number
  withImage: number
  priceMin: number | null
  priceMax: number | null
  priceAverage: number | null
}

export function summarizeRecords(records: readonly BasicRecord[]): TileRecordSummary {
  const amounts = records.map((r) => r.priceAmount).filter((a): a is number => a !== null && a > 0)
  const sum = amounts.reduce((acc, a) => acc + a, 0)

  return {
    total: records.length,
    withPrice: records.filter((r) => r.price !== '').length,
    withImage: records.filter((r) => r.picture !== '').length,
    priceMin: amounts.length > 0 ? Math.min(...amounts) : null,
    priceMax: amounts.length > 0 ? Math.max(...amounts) : null,
    priceAverage: amounts.length > 0 ? Math.round(sum / amounts.length) : null,
  }
}
