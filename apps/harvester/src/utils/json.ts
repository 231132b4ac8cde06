/**
 * Helpers for reading loosely-typed provider JSON.
 *
 * Provider payloads have no stable schema, so every access goes through
 * these narrowing helpers instead of casts.
 */

import { isInteger, isSafeNumber, parse } from 'lossless-json'

export type JsonRecord = Record<string, unknown>

export type SafeJsonParseResult<T = unknown> =
  | { ok: true; value: T }
  | { ok: false; error: string }

/** Integers past 2^53 become bigint; every other number is a plain number */
function parseNumber(text: string): number | bigint {
  return isInteger(text) && !isSafeNumber(text) ? BigInt(text) : Number.parseFloat(text)
}

/**
 * Parse without losing integer precision: listing ids routinely exceed 2^53.
 */
export function safeJsonParse(input: string): SafeJsonParseResult {
  try {
    const value: unknown = parse(input, null, parseNumber)
    return { ok: true, value }
  } catch (error) {
    return {
      ok: false,
      error: error instanceof Error ? error.message : 'Invalid JSON',
    }
  }
}

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function asRecord(value: unknown): JsonRecord | undefined {
  return isRecord(value) ? value : undefined
}

export function asArray(value: unknown): unknown[] | undefined {
  return Array.isArray(value) ? value : undefined
}

/** Walk a key path through nested maps. Returns undefined on the first miss. */
export function getPath(root: unknown, path: readonly string[]): unknown {
  let node: unknown = root
  for (const key of path) {
    if (!isRecord(node)) return undefined
    node = node[key]
  }
  return node
}

/** Non-empty string or undefined. Numbers are stringified. */
export function asString(value: unknown): string | undefined {
  if (typeof value === 'string') return value.length > 0 ? value : undefined
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  if (typeof value === 'bigint') return value.toString()
  return undefined
}

export function asNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value)
    return Number.isFinite(parsed) ? parsed : undefined
  }
  return undefined
}

export function asBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined
}

/** First key of `keys` whose value is a non-empty string. */
export function firstString(node: JsonRecord, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = asString(node[key])
    if (value !== undefined) return value
  }
  return undefined
}
