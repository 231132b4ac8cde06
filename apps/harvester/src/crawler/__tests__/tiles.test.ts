import { describe, it, expect } from 'vitest'
import { ConfigurationError } from '../errors.js'
import { loadTilesFromFile, parseTiles } from '../tiles.js'

describe('parseTiles', () => {
  it('numbers tiles by their position among non-comment lines', () => {
    const tiles = parseTiles(['# Atlantic coast', '31.5,-9.8|31.6,-9.7', '', '  30.4,-9.6 | 30.5,-9.5  '].join('\n'))

    expect(tiles).toEqual([
      { index: 0, swLat: 31.5, swLng: -9.8, neLat: 31.6, neLng: -9.7 },
      { index: 1, swLat: 30.4, swLng: -9.6, neLat: 30.5, neLng: -9.5 },
    ])
  })

  it('accepts CRLF line endings', () => {
    expect(parseTiles('1,2|3,4\r\n5,6|7,8\r\n')).toHaveLength(2)
  })

  it('reports every malformed line', () => {
    let caught: unknown
    try {
      parseTiles(['1,2|3,4', '1,2,3,4', 'a,b|c,d'].join('\n'))
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ConfigurationError)
    if (!(caught instanceof ConfigurationError)) return
    expect(caught.message).toBe('Invalid tile list: 2 bad line(s)')
    expect(caught.issues).toEqual([
      { path: 'line 2', message: 'expected "swLat,swLng|neLat,neLng", got "1,2,3,4"' },
      { path: 'line 3', message: 'expected "swLat,swLng|neLat,neLng", got "a,b|c,d"' },
    ])
  })

  it('returns an empty list for an empty file', () => {
    expect(parseTiles('')).toEqual([])
  })
})

describe('loadTilesFromFile', () => {
  it('wraps read failures in a ConfigurationError', async () => {
    await expect(loadTilesFromFile('/nonexistent/tiles.txt')).rejects.toThrow(
      /^Cannot read tile file \/nonexistent\/tiles\.txt: /
    )
  })
})
