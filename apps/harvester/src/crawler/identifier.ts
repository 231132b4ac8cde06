/**
 * Listing identifier normalization
 *
 * Identifiers arrive as integers, digit strings, exponent notation, prefixed
 * global ids ("StayListing:123"), URL paths ("/rooms/123") or base64 blobs.
 * Every form is reduced to one canonical string of decimal digits.
 *
 * Each rule is an independent strategy; the first one returning a value wins.
 * Nothing here throws.
 */

import { isRecord } from '../utils/json.js'

type IdStrategy = (value: unknown) => string | null

const DIGITS = /^\d+$/
const FIRST_DIGIT_RUN = /\d+/

/** Type prefixes that may precede the numeric id, checked in order. */
export const TYPE_PREFIXES = [
  'StayListing:',
  'DemandStayListing:',
  'StayListingProduct:',
  'listing:',
  'rooms/',
] as const

/** Prefixes of the provider's opaque global ids once base64-decoded. */
const GLOBAL_ID_PREFIXES = ['StayListing:', 'DemandStayListing:', 'StayListingProduct:'] as const

/** Keys tried on the container when the raw id is absent. */
export const FALLBACK_ID_KEYS = ['listingId', 'id', 'roomId'] as const

const BASE64_BODY = /^[A-Za-z0-9+/_-]+={0,2}$/
const BASE64_MIN_LENGTH = 11

function isDigits(value: string): boolean {
  return DIGITS.test(value)
}

const fromInteger: IdStrategy = (value) => {
  if (typeof value === 'bigint') {
    return value >= 0n ? value.toString() : null
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return String(value)
  }
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
    // From 1e21 String() switches to exponent form
    return BigInt(value).toString()
  }
  return null
}

const fromDigitString: IdStrategy = (value) => {
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  return isDigits(trimmed) ? trimmed : null
}

const fromExponentNotation: IdStrategy = (value) => {
  if (typeof value !== 'string' || !value.toLowerCase().includes('e+')) return null
  const parsed = Number(value.trim())
  if (!Number.isFinite(parsed) || parsed < 0) return null
  return BigInt(Math.trunc(parsed)).toString()
}

const fromTypePrefix: IdStrategy = (value) => {
  if (typeof value !== 'string') return null
  for (const prefix of TYPE_PREFIXES) {
    const at = value.lastIndexOf(prefix)
    if (at === -1) continue
    const match = FIRST_DIGIT_RUN.exec(value.slice(at + prefix.length))
    if (match) return match[0]
  }
  return null
}

const fromPath: IdStrategy = (value) => {
  if (typeof value !== 'string' || !value.includes('/') || !value.includes('rooms')) return null
  const segments = value.split('/').filter((segment) => segment.length > 0)
  for (let i = segments.length - 1; i >= 0; i--) {
    if (isDigits(segments[i])) return segments[i]
  }
  return null
}

/**
 * Decode base64 (standard or url-safe alphabet), padding to a multiple of 4.
 * Returns null when the input is not base64.
 */
export function decodeBase64Text(value: string): string | null {
  let padded = value.trim()
  if (padded.length % 4 !== 0) {
    padded += '='.repeat(4 - (padded.length % 4))
  }
  if (!BASE64_BODY.test(padded)) return null
  return Buffer.from(padded, 'base64').toString('utf8')
}

const fromBase64: IdStrategy = (value) => {
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  if (trimmed.length < BASE64_MIN_LENGTH || isDigits(trimmed)) return null

  const decoded = decodeBase64Text(trimmed)
  if (decoded === null) return null

  for (const prefix of GLOBAL_ID_PREFIXES) {
    const at = decoded.lastIndexOf(prefix)
    if (at === -1) continue
    const candidate = decoded.slice(at + prefix.length).split(',')[0].trim()
    if (isDigits(candidate)) return candidate
  }

  const bare = decoded.trim()
  return isDigits(bare) ? bare : null
}

const STRATEGIES: readonly IdStrategy[] = [
  fromInteger,
  fromDigitString,
  fromExponentNotation,
  fromTypePrefix,
  fromPath,
  fromBase64,
]

function isAbsent(value: unknown): boolean {
  return value === null || value === undefined || value === ''
}

function resolve(value: unknown): string | null {
  for (const strategy of STRATEGIES) {
    const id = strategy(value)
    if (id !== null) return id
  }
  return null
}

/**
 * Normalize a listing identifier to a canonical digit string.
 *
 * When `raw` is absent, the container's `listingId`, `id` and `roomId` are
 * tried in that order.
 *
 * @example
 * normalizeListingId('listing:12345') // '12345'
 * normalizeListingId(123)             // '123'
 * normalizeListingId('aGVsbG8=')      // null
 */
export function normalizeListingId(raw: unknown, fallbackContainer?: unknown): string | null {
  if (!isAbsent(raw)) {
    return resolve(raw)
  }

  if (!isRecord(fallbackContainer)) return null

  for (const key of FALLBACK_ID_KEYS) {
    const candidate = fallbackContainer[key]
    if (isAbsent(candidate)) continue
    const id = resolve(candidate)
    if (id !== null) return id
  }
  return null
}

/**
 * Build the provider's opaque global id used by detail requests.
 */
export function encodeListingGlobalId(id: string): string {
  return Buffer.from(`StayListing:${id}`, 'utf8').toString('base64')
}

/**
 * Opaque user tokens decode to "<Type>:<id>". Returns the trailing segment,
 * or the raw value when it is not such a token.
 */
export function decodeOpaqueUserId(raw: string): string {
  const decoded = decodeBase64Text(raw)
  if (decoded !== null && decoded.includes(':')) {
    const tail = decoded.slice(decoded.lastIndexOf(':') + 1).trim()
    if (tail.length > 0) return tail
  }
  return raw
}
