/**
 * Fixed-credential provider session.
 *
 * For runs where the session material was captured ahead of time rather than
 * supplied live by a browser. Tokens never change, so there is no refresh.
 */

import { FetchTransport } from './fetch/fetch-transport.js'
import type { ProviderSession, SessionCredentials, SessionTransport } from './types.js'

export function createStaticSession(
  credentials: SessionCredentials,
  transport: SessionTransport = new FetchTransport()
): ProviderSession {
  const snapshot: SessionCredentials = { ...credentials, headers: { ...credentials.headers } }
  return {
    transport,
    credentials: () => snapshot,
  }
}
