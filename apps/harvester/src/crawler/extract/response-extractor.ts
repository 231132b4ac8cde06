/**
 * Search response extraction
 *
 * Tiered strategy against upstream schema drift:
 * 1. known roots and known record paths, first non-empty list wins
 * 2. bounded deep scan of the whole document for listing-shaped nodes
 *
 * Pagination and search context are located the same way. Total over any
 * input: drift only shows up as `strategy` and an empty result.
 */

import { stringify } from 'lossless-json'
import type { SearchContext } from '../types.js'
import { asArray, asNumber, asRecord, asString, getPath, isRecord, type JsonRecord } from '../../utils/json.js'
import { DEFAULT_SCAN_LIMITS, deepScan, findKeyedContainer, type ScanLimits, type ScanNode } from './deep-scan.js'

export type ExtractionStrategy = 'known-path' | 'deep-scan' | 'none'

export interface ExtractedPage {
  /** Candidate record nodes, in document order */
  records: JsonRecord[]
  nextCursor: string | null
  totalPages: number
  strategy: ExtractionStrategy
  /** Root or record path that matched, for drift diagnostics */
  matchedPath?: string
  searchContext: SearchContext
  /** Upstream GraphQL error messages; informational */
  errors: string[]
}

export const RESULT_ROOT_PATHS: readonly (readonly string[])[] = [
  ['data', 'presentation', 'staysSearch'],
  ['data', 'staysSearch'],
  ['data', 'presentation', 'explore'],
  ['data', 'presentation', 'search'],
  ['data', 'explore', 'sections', 'sectionedResults'],
]

export const RECORD_PATHS: readonly (readonly string[])[] = [
  ['searchResults'],
  ['staysSearchResults', 'searchResults'],
  ['staysSearchResultsV2', 'searchResults'],
  ['staysMapSearchResults', 'mapResults'],
  ['staysMapSearchResultsV2', 'mapResults'],
  ['sectionedResults'],
  ['results'],
  ['mapResults'],
  ['listings'],
  ['items'],
  ['exploreItems'],
]

export const PAGINATION_KEYS = ['paginationInfo', 'pageInfo', 'pagination', 'pagingInfo'] as const

export const CURSOR_KEYS = ['nextPageCursor', 'nextCursor', 'nextPageToken', 'cursor', 'next'] as const

const PAGE_LIST_KEYS = ['pageCursors', 'cursors', 'pages'] as const

const SAMPLE_SIZE = 3

// ═══════════════════════════════════════════════════════════════════════════════
// Candidate shapes
// ═══════════════════════════════════════════════════════════════════════════════

function hasIdValue(node: JsonRecord): boolean {
  return Boolean(node.id) || Boolean(node.listingId)
}

function hasIdKey(node: JsonRecord): boolean {
  return 'id' in node || 'listingId' in node
}

/** `{ listing: { id, ... } }` */
function isListingWrapper(node: JsonRecord): boolean {
  const listing = asRecord(node.listing)
  return listing !== undefined && hasIdValue(listing)
}

/** `{ id, title | name | structuredDisplayPrice, ... }` */
function isBareListing(node: JsonRecord): boolean {
  return hasIdKey(node) && ('title' in node || 'name' in node || 'structuredDisplayPrice' in node)
}

function looksLikeListing(value: unknown): boolean {
  return isRecord(value) && (isListingWrapper(value) || isBareListing(value))
}

export function isListingArray(node: readonly unknown[]): boolean {
  return node.slice(0, SAMPLE_SIZE).some(looksLikeListing)
}

/**
 * Deep-scan the document for listing-shaped nodes. Accepted nodes are not
 * descended into, so each record is collected once.
 */
export function scanForListings(doc: unknown, limits: ScanLimits = DEFAULT_SCAN_LIMITS): JsonRecord[] {
  const found: JsonRecord[] = []
  const claimed = new Set<JsonRecord>()

  const collect = (node: JsonRecord, record: JsonRecord): void => {
    if (claimed.has(node)) return
    claimed.add(node)
    found.push(record)
  }

  deepScan(
    doc,
    (node: ScanNode) => {
      if (Array.isArray(node)) {
        if (!isListingArray(node)) return 'descend'
        for (const element of node) {
          if (isRecord(element)) collect(element, element)
        }
        return 'claim'
      }
      if (isListingWrapper(node)) {
        collect(node, node)
        return 'claim'
      }
      if (isBareListing(node)) {
        collect(node, { listing: node })
        return 'claim'
      }
      return 'descend'
    },
    limits
  )

  return found
}

// ═══════════════════════════════════════════════════════════════════════════════
// Known paths
// ═══════════════════════════════════════════════════════════════════════════════

function locateResults(doc: unknown): { results: JsonRecord; path: string } | undefined {
  for (const path of RESULT_ROOT_PATHS) {
    const root = asRecord(getPath(doc, path))
    if (!root || Object.keys(root).length === 0) continue
    const results = asRecord(root.results)
    return results && Object.keys(results).length > 0
      ? { results, path: [...path, 'results'].join('.') }
      : { results: root, path: path.join('.') }
  }
  return undefined
}

function recordsAtKnownPath(results: JsonRecord): { records: JsonRecord[]; path: string } | undefined {
  for (const path of RECORD_PATHS) {
    const list = asArray(getPath(results, path))
    if (!list || list.length === 0) continue
    const records = list.filter(isRecord)
    if (records.length > 0) {
      return { records, path: path.join('.') }
    }
  }
  return undefined
}

// ═══════════════════════════════════════════════════════════════════════════════
// Pagination
// ═══════════════════════════════════════════════════════════════════════════════

function locatePagination(scope: unknown, limits: ScanLimits): ScanNode | undefined {
  const node = asRecord(scope)
  if (node) {
    for (const key of PAGINATION_KEYS) {
      const value = node[key]
      if (isRecord(value) || Array.isArray(value)) return value
    }
  }
  return findKeyedContainer(scope, PAGINATION_KEYS, limits)?.value
}

export function cursorFrom(pagination: ScanNode | undefined): string | null {
  if (!pagination) return null

  if (Array.isArray(pagination)) {
    const last = asRecord(pagination[pagination.length - 1])
    if (!last) return null
    return asString(last.cursor) ?? asString(last.nextPageCursor) ?? null
  }

  for (const key of CURSOR_KEYS) {
    const cursor = asString(pagination[key])
    if (cursor !== undefined) return cursor
  }
  return null
}

function toPageCount(value: unknown): number {
  const count = asNumber(value)
  return count !== undefined && count > 0 ? Math.trunc(count) : 0
}

export function totalPagesFrom(pagination: ScanNode | undefined): number {
  if (!pagination || Array.isArray(pagination)) return 0

  const node: JsonRecord = pagination
  const pageList = PAGE_LIST_KEYS.map((key) => node[key]).find(Boolean)
  if (Array.isArray(pageList)) return pageList.length

  const pageInfo = asRecord(pageList)
  if (pageInfo) return toPageCount(pageInfo.totalCount || pageInfo.totalPages)

  return toPageCount(node.totalPages)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Search context
// ═══════════════════════════════════════════════════════════════════════════════

function searchContextFrom(scope: unknown, limits: ScanLimits): SearchContext {
  const context =
    asRecord(getPath(scope, ['loggingMetadata', 'legacyLoggingContext'])) ??
    asRecord(findKeyedContainer(scope, ['legacyLoggingContext'], limits)?.value)
  if (!context) return {}

  return {
    federatedSearchId: asString(context.federatedSearchId),
    federatedSearchSessionId: asString(context.federatedSearchSessionId),
  }
}

function graphqlErrors(doc: unknown): string[] {
  const errors = asArray(getPath(doc, ['errors']))
  if (!errors) return []
  return errors.map((error) => asString(asRecord(error)?.message) ?? stringify(error) ?? String(error))
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entry point
// ═══════════════════════════════════════════════════════════════════════════════

function emptyPage(errors: string[]): ExtractedPage {
  return { records: [], nextCursor: null, totalPages: 0, strategy: 'none', searchContext: {}, errors }
}

export function extractSearchPage(doc: unknown, limits: ScanLimits = DEFAULT_SCAN_LIMITS): ExtractedPage {
  try {
    const located = locateResults(doc)
    const scope: unknown = located?.results ?? doc

    let records: JsonRecord[] = []
    let strategy: ExtractionStrategy = 'none'
    let matchedPath: string | undefined

    const known = located ? recordsAtKnownPath(located.results) : undefined
    if (known) {
      records = known.records
      strategy = 'known-path'
      matchedPath = `${located?.path}.${known.path}`
    } else {
      records = scanForListings(doc, limits)
      if (records.length > 0) strategy = 'deep-scan'
    }

    const pagination = locatePagination(scope, limits)

    return {
      records,
      nextCursor: cursorFrom(pagination),
      totalPages: totalPagesFrom(pagination),
      strategy,
      matchedPath,
      searchContext: searchContextFrom(scope, limits),
      errors: graphqlErrors(doc),
    }
  } catch (error) {
    return emptyPage([`extraction failed: ${error instanceof Error ? error.message : String(error)}`])
  }
}
