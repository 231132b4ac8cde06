/**
 * Tile list loading.
 *
 * One tile per line, `swLat,swLng|neLat,neLng`. Blank lines and `#` comments
 * are ignored; the ordinal of each remaining line is the tile index.
 */

import { readFile } from 'node:fs/promises'
import { ConfigurationError, type ConfigurationIssue } from './errors.js'
import type { Tile } from './types.js'

function parseCorner(text: string): [number, number] | null {
  const parts = text.split(',').map((p) => p.trim())
  if (parts.length !== 2 || parts.some((p) => p === '')) return null
  const lat = Number(parts[0])
  const lng = Number(parts[1])
  if (!Number.isFinite(lat) || !Number.isFinite(lng)) return null
  return [lat, lng]
}

export function parseTiles(text: string): Tile[] {
  const tiles: Tile[] = []
  const issues: ConfigurationIssue[] = []

  text.split(/\r?\n/).forEach((raw, lineIndex) => {
    const line = raw.trim()
    if (line === '' || line.startsWith('#')) return

    const corners = line.split('|')
    const sw = corners.length === 2 ? parseCorner(corners[0]) : null
    const ne = corners.length === 2 ? parseCorner(corners[1]) : null
    if (!sw || !ne) {
      issues.push({ path: `line ${lineIndex + 1}`, message: `expected "swLat,swLng|neLat,neLng", got "${line}"` })
      return
    }

    tiles.push({ index: tiles.length, swLat: sw[0], swLng: sw[1], neLat: ne[0], neLng: ne[1] })
  })

  if (issues.length > 0) {
    throw new ConfigurationError(`Invalid tile list: ${issues.length} bad line(s)`, issues)
  }
  return tiles
}

export async function loadTilesFromFile(path: string): Promise<Tile[]> {
  let text: string
  try {
    text = await readFile(path, 'utf8')
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Cannot read tile file ${path}: ${message}`)
  }
  return parseTiles(text)
}
