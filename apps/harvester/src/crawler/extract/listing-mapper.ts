/**
 * Search result → BasicRecord mapping
 *
 * The single pass from loosely-typed search JSON into the canonical record.
 * Each field is an ordered fallback chain; a missing field keeps its default.
 */

import { normalizeListingId } from '../identifier.js'
import type { BasicRecord, RecordHints } from '../types.js'
import { asArray, asRecord, asString, firstString, getPath, isRecord, type JsonRecord } from '../../utils/json.js'

export type ListingMapFailureReason = 'NO_LISTING_NODE' | 'IDENTIFIER_UNRESOLVABLE'

export type ListingMapResult =
  | { ok: true; record: BasicRecord; hints: RecordHints }
  | { ok: false; reason: ListingMapFailureReason; details?: string }

export interface ListingMapOptions {
  baseUrl: string
}

const PICTURE_LIST_KEYS = [
  'contextualPictures',
  'listingContextualPictures',
  'pictures',
  'images',
  'photos',
  'media',
  'cardPhotos',
] as const

const PICTURE_URL_KEYS = ['picture', 'url', 'src', 'uri'] as const

const SINGLE_IMAGE_KEYS = ['previewImage', 'mainImage', 'heroImage', 'thumbnail', 'image'] as const

const PRICE_KEYS = ['price', 'priceString', 'displayPrice'] as const

function hasId(node: JsonRecord): boolean {
  return Boolean(node.id) || Boolean(node.listingId)
}

/**
 * The listing body is `item.listing`, the item itself, or the first nested
 * map carrying an id.
 */
export function resolveListingNode(item: JsonRecord): JsonRecord | undefined {
  const nested = asRecord(item.listing)
  if (nested) return nested
  if (hasId(item)) return item
  for (const value of Object.values(item)) {
    if (isRecord(value) && hasId(value)) return value
  }
  return undefined
}

function pickTitle(item: JsonRecord, listing: JsonRecord): string {
  return (
    firstString(listing, ['title', 'name', 'localizedTitle']) ??
    asString(getPath(listing, ['presentation', 'title'])) ??
    firstString(item, ['title', 'name']) ??
    ''
  )
}

function nonBlank(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined
}

interface PriceTriple {
  price: string
  discountedPrice: string
  originalPrice: string
}

function pickPrice(item: JsonRecord, listing: JsonRecord): PriceTriple {
  const triple: PriceTriple = { price: '', discountedPrice: '', originalPrice: '' }

  const structured = asRecord(item.structuredDisplayPrice) ?? asRecord(listing.structuredDisplayPrice)
  const primaryLine = asRecord(structured?.primaryLine)
  if (primaryLine) {
    triple.price = PRICE_KEYS.map((key) => nonBlank(primaryLine[key])).find(Boolean) ?? ''
    triple.discountedPrice = nonBlank(primaryLine.discountedPrice) ?? ''
    triple.originalPrice = nonBlank(primaryLine.originalPrice) ?? ''
  }

  if (!triple.price) {
    for (const node of [item, listing]) {
      const candidate =
        nonBlank(getPath(node, ['price', 'amountFormatted'])) ??
        nonBlank(getPath(node, ['pricingQuote', 'priceString'])) ??
        nonBlank(getPath(node, ['priceMetadata', 'displayRate'])) ??
        nonBlank(node.displayPrice) ??
        nonBlank(node.price)
      if (candidate) {
        triple.price = candidate
        break
      }
    }
  }

  return triple
}

function pickPicture(item: JsonRecord, listing: JsonRecord): string {
  for (const key of PICTURE_LIST_KEYS) {
    const pictures = asArray(item[key]) ?? asArray(listing[key])
    const first = asRecord(pictures?.[0])
    if (!first) continue
    const url = firstString(first, PICTURE_URL_KEYS)
    if (url) return url
  }

  for (const key of SINGLE_IMAGE_KEYS) {
    const image = item[key] ?? listing[key]
    if (typeof image === 'string' && image) return image
    const imageNode = asRecord(image)
    if (imageNode) {
      const url = firstString(imageNode, ['url', 'src'])
      if (url) return url
    }
  }

  return ''
}

/**
 * Numeric amount of a display price: "MAD2,283" → 2283, "€ 95.50" → 95.5.
 */
export function parsePriceAmount(display: string): number | null {
  const match = /\d[\d,]*(?:\.\d+)?/.exec(display)
  if (!match) return null
  const value = Number.parseFloat(match[0].replace(/,/g, ''))
  return Number.isFinite(value) ? value : null
}

export function listingLink(baseUrl: string, id: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/rooms/${id}`
}

export function mapSearchResult(item: unknown, options: ListingMapOptions): ListingMapResult {
  const itemNode = asRecord(item)
  if (!itemNode) {
    return { ok: false, reason: 'NO_LISTING_NODE', details: `item is ${Array.isArray(item) ? 'array' : typeof item}` }
  }

  const listing = resolveListingNode(itemNode)
  if (!listing) {
    return { ok: false, reason: 'NO_LISTING_NODE', details: `keys: ${Object.keys(itemNode).slice(0, 8).join(',')}` }
  }

  const rawId = listing.id || listing.listingId
  const id = normalizeListingId(rawId || null, listing)
  if (id === null) {
    return { ok: false, reason: 'IDENTIFIER_UNRESOLVABLE', details: String(rawId) }
  }

  const title = pickTitle(itemNode, listing)
  const prices = pickPrice(itemNode, listing)
  const overrides = asRecord(itemNode.listingParamOverrides) ?? {}
  const checkin = asString(overrides.checkin) ?? null
  const checkout = asString(overrides.checkout) ?? null

  const record: BasicRecord = {
    id,
    listingObjType: asString(listing.listingObjType) ?? 'REGULAR',
    roomTypeCategory: asString(listing.roomTypeCategory) ?? 'unavailable',
    title,
    name: title,
    picture: pickPicture(itemNode, listing),
    checkin,
    checkout,
    ...prices,
    priceAmount: prices.price ? parsePriceAmount(prices.price) : null,
    link: listingLink(options.baseUrl, id),
  }

  const hints: RecordHints = {
    categoryTag: asString(overrides.categoryTag),
    photoId: asString(overrides.photoId),
    checkin: checkin ?? undefined,
    checkout: checkout ?? undefined,
  }

  return { ok: true, record, hints }
}

export interface MappedListing {
  record: BasicRecord
  hints: RecordHints
}

export interface MappedPage {
  listings: MappedListing[]
  dropped: Array<{ reason: ListingMapFailureReason; details?: string }>
  duplicates: number
}

/**
 * Map every candidate of a page, dropping unmappable ones and repeats of an
 * id already seen on the same page.
 */
export function mapSearchResults(items: readonly unknown[], options: ListingMapOptions): MappedPage {
  const page: MappedPage = { listings: [], dropped: [], duplicates: 0 }
  const seen = new Set<string>()

  for (const item of items) {
    const result = mapSearchResult(item, options)
    if (!result.ok) {
      page.dropped.push({ reason: result.reason, details: result.details })
      continue
    }
    if (seen.has(result.record.id)) {
      page.duplicates++
      continue
    }
    seen.add(result.record.id)
    page.listings.push({ record: result.record, hints: result.hints })
  }

  return page
}
