/**
 * Tile geometry: display zoom for a bounding box, and tile sanity checks.
 */

import type { TileBounds } from './types.js'

/** Width in pixels of the whole world at zoom 0 */
const GLOBE_WIDTH = 256
export const ZOOM_MIN = 1
export const ZOOM_MAX = 21

function toRadians(deg: number): number {
  return deg * (Math.PI / 180)
}

/**
 * Zoom level an interactive map client would use to show the box in the
 * given viewport. Pure; degenerate inputs clamp to [ZOOM_MIN, ZOOM_MAX].
 *
 * @example
 * zoomLevel(30, -8, 30.5, -7.5, 1400, 900) // 9
 */
export function zoomLevel(
  swLat: number,
  swLng: number,
  neLat: number,
  neLng: number,
  viewportWidthPx: number,
  viewportHeightPx: number
): number {
  let lngSpan = neLng - swLng
  if (lngSpan < 0) {
    lngSpan += 360
  }
  const zoomWidth = Math.floor(Math.log2((viewportWidthPx * 360) / lngSpan / GLOBE_WIDTH))

  const latFraction = Math.log(
    Math.tan(toRadians(neLat) / 2 + Math.PI / 4) / Math.tan(toRadians(swLat) / 2 + Math.PI / 4)
  )
  const zoomHeight = Math.floor(Math.log2((viewportHeightPx * 2) / latFraction / GLOBE_WIDTH))

  const zoom = Math.min(zoomWidth, zoomHeight, ZOOM_MAX)
  if (Number.isNaN(zoom)) return ZOOM_MIN
  return Math.max(ZOOM_MIN, zoom)
}

export type TileValidation =
  | { ok: true }
  | { ok: false; reason: 'NON_FINITE' | 'INVERTED' | 'TOO_LARGE' | 'OUTSIDE_REGION'; details: string }

export interface TileValidationOptions {
  maxSpanDegrees: number
  region?: TileBounds
}

/**
 * SW corner strictly below and left of NE, both spans within the limit,
 * and, when a region is configured, the whole box inside it.
 */
export function validateTile(tile: TileBounds, options: TileValidationOptions): TileValidation {
  const { swLat, swLng, neLat, neLng } = tile
  if (![swLat, swLng, neLat, neLng].every(Number.isFinite)) {
    return { ok: false, reason: 'NON_FINITE', details: 'coordinates must be finite numbers' }
  }

  if (swLat >= neLat || swLng >= neLng) {
    return { ok: false, reason: 'INVERTED', details: 'south-west corner must be below and left of north-east' }
  }

  const latSpan = neLat - swLat
  const lngSpan = neLng - swLng
  if (latSpan > options.maxSpanDegrees || lngSpan > options.maxSpanDegrees) {
    return {
      ok: false,
      reason: 'TOO_LARGE',
      details: `span ${latSpan.toFixed(3)}x${lngSpan.toFixed(3)} exceeds ${options.maxSpanDegrees} degrees`,
    }
  }

  const region = options.region
  if (
    region &&
    (swLat < region.swLat || neLat > region.neLat || swLng < region.swLng || neLng > region.neLng)
  ) {
    return { ok: false, reason: 'OUTSIDE_REGION', details: 'tile extends beyond the configured region' }
  }

  return { ok: true }
}
