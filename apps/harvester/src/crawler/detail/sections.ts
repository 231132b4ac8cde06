/**
 * Detail document → DetailRecord mapping.
 *
 * Sections are mapped independently; one that is absent or malformed leaves
 * its fields at their zero values.
 */

import { decodeOpaqueUserId } from '../identifier.js'
import { EMPTY_DETAIL, type DetailRecord } from '../types.js'
import { asArray, asBoolean, asNumber, asRecord, asString, getPath, type JsonRecord } from '../../utils/json.js'

export type DetailEnvelopeResult =
  | { ok: true; detail: DetailRecord; sectionsSeen: string[] }
  | { ok: false; reason: 'GRAPHQL_ERRORS' | 'MISSING_PAYLOAD' | 'MALFORMED_SECTIONS'; details?: string }

type SectionMapper = (section: JsonRecord, detail: DetailRecord) => void

function integer(value: unknown, fallback: number): number {
  const parsed = asNumber(value)
  return parsed === undefined ? fallback : Math.trunc(parsed)
}

function coordinate(value: unknown): number | null {
  const parsed = asNumber(value)
  return parsed === undefined ? null : parsed
}

const SECTION_MAPPERS: Readonly<Record<string, SectionMapper>> = {
  AVAILABILITY_CALENDAR_DEFAULT: (section, detail) => {
    detail.location = asString(section.localizedLocation) ?? ''
    detail.maxGuestCapacity = integer(section.maxGuestCapacity, 0)
  },

  REVIEWS_DEFAULT: (section, detail) => {
    detail.isGuestFavorite = Boolean(section.isGuestFavorite)
    detail.reviewsCount = integer(section.overallCount, detail.reviewsCount)
    detail.averageRating = asNumber(section.overallRating) ?? detail.averageRating
  },

  LOCATION_DEFAULT: (section, detail) => {
    detail.lat = coordinate(section.lat)
    detail.lng = coordinate(section.lng)
  },

  MEET_YOUR_HOST: (section, detail) => {
    const card = asRecord(section.cardData)
    if (!card) return
    detail.hostName = asString(card.name) ?? detail.hostName
    detail.isSuperhost = asBoolean(card.isSuperhost) ?? detail.isSuperhost
    detail.isVerified = asBoolean(card.isVerified) ?? detail.isVerified
    detail.hostRatingCount = integer(card.ratingCount, detail.hostRatingCount)
    detail.hostRatingAverage = asNumber(card.ratingAverage) ?? detail.hostRatingAverage

    const userId = asString(card.userId)
    if (userId) detail.hostUserId = decodeOpaqueUserId(userId)

    const timeAsHost = asRecord(card.timeAsHost)
    detail.hostYears = integer(timeAsHost?.years, 0)
    detail.hostMonths = integer(timeAsHost?.months, 0)
  },
}

function hasLuxeBanner(sections: JsonRecord): boolean {
  const configured = asArray(getPath(sections, ['sbuiData', 'sectionConfiguration', 'root', 'sections'])) ?? []
  return configured.some((entry) => asRecord(entry)?.sectionId === 'LUXE_BANNER')
}

export function mapDetailDocument(doc: unknown): DetailEnvelopeResult {
  const errors = asArray(getPath(doc, ['errors']))
  if (errors && errors.length > 0) {
    const first = asString(asRecord(errors[0])?.message)
    return { ok: false, reason: 'GRAPHQL_ERRORS', details: first ?? `${errors.length} error(s)` }
  }

  const page = asRecord(getPath(doc, ['data', 'presentation', 'stayProductDetailPage']))
  if (!page || Object.keys(page).length === 0) {
    return { ok: false, reason: 'MISSING_PAYLOAD' }
  }

  const sectionsNode: unknown = page.sections
  const sectionsRecord = asRecord(sectionsNode)
  const sectionList = sectionsRecord ? asArray(sectionsRecord.sections) ?? [] : asArray(sectionsNode) ?? []

  if (sectionsRecord && sectionsRecord.sections !== undefined && !Array.isArray(sectionsRecord.sections)) {
    return { ok: false, reason: 'MALFORMED_SECTIONS', details: typeof sectionsRecord.sections }
  }

  const detail: DetailRecord = { ...EMPTY_DETAIL }
  const sectionsSeen: string[] = []

  if (sectionsRecord) {
    detail.isLuxe = hasLuxeBanner(sectionsRecord)
  }

  for (const entry of sectionList) {
    const node = asRecord(entry)
    const sectionId = asString(node?.sectionId)
    if (!node || !sectionId) continue

    const mapper = SECTION_MAPPERS[sectionId]
    const body = asRecord(node.section)
    if (!mapper || !body) continue

    mapper(body, detail)
    sectionsSeen.push(sectionId)
  }

  return { ok: true, detail, sectionsSeen }
}
