/**
 * Request headers for provider GraphQL calls.
 *
 * Starts from the header bag the browser collaborator observed on a live
 * request, drops what must not be replayed, and adds the client headers the
 * provider's web app sends.
 */

import { maskSecret } from '@tilecrawl/logger'
import type { SessionCredentials } from './types.js'

const NON_REPLAYABLE_HEADERS = new Set([':authority', ':method', ':path', ':scheme', 'content-length', 'host'])

export const API_KEY_HEADER = 'x-airbnb-api-key'

const GRAPHQL_CLIENT_HEADERS: Readonly<Record<string, string>> = {
  'x-airbnb-supports-airlock-v2': 'true',
  'x-airbnb-graphql-platform': 'web',
  'x-airbnb-graphql-platform-client': 'minimalist-niobe',
  'x-niobe-short-circuited': 'true',
  'x-csrf-without-token': '1',
}

export interface ProviderHeaderOptions {
  baseUrl: string
  /** Extra headers for this request type; applied last */
  extra?: Record<string, string>
}

export function stripNonReplayable(headers: Record<string, string>): Record<string, string> {
  const kept: Record<string, string> = {}
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase()
    if (lower.startsWith(':') || NON_REPLAYABLE_HEADERS.has(lower)) continue
    kept[name] = value
  }
  return kept
}

export function buildProviderHeaders(
  credentials: SessionCredentials,
  options: ProviderHeaderOptions
): Record<string, string> {
  const headers: Record<string, string> = {
    ...stripNonReplayable(credentials.headers),
    ...GRAPHQL_CLIENT_HEADERS,
    origin: options.baseUrl.replace(/\/+$/, ''),
  }

  if (credentials.apiKey) headers[API_KEY_HEADER] = credentials.apiKey
  if (credentials.clientVersion) headers['x-client-version'] = credentials.clientVersion
  if (credentials.requestId) headers['x-client-request-id'] = credentials.requestId

  return { ...headers, ...options.extra }
}

/**
 * Loggable view of the session material. Tokens and keys are masked, and the
 * field names avoid the logger's redaction patterns so the masked form shows.
 */
export function describeCredentials(credentials: SessionCredentials): Record<string, unknown> {
  return {
    searchHash: maskSecret(credentials.searchToken),
    detailHash: maskSecret(credentials.detailToken),
    clientKey: maskSecret(credentials.apiKey ?? apiKeyFromBag(credentials.headers)),
    headerCount: Object.keys(credentials.headers).length,
    viewport: `${credentials.viewport.width}x${credentials.viewport.height}`,
  }
}

function apiKeyFromBag(headers: Record<string, string>): string | undefined {
  const entry = Object.entries(headers).find(([name]) => name.toLowerCase() === API_KEY_HEADER)
  return entry?.[1]
}
