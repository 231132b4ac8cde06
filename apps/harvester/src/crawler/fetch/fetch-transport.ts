/**
 * SessionTransport over native fetch.
 *
 * Used when the browser collaborator hands over plain headers instead of its
 * own request context. Supports a per-request timeout and a body size limit.
 */

import type { HttpRequestSpec, HttpResponse, SessionTransport } from '../types.js'

export interface FetchTransportOptions {
  timeoutMs?: number
  maxSizeBytes?: number
}

const DEFAULT_TIMEOUT_MS = 30_000
const DEFAULT_MAX_SIZE_BYTES = 10 * 1024 * 1024

export class ResponseTooLargeError extends Error {
  constructor(maxBytes: number) {
    super(`Response exceeded ${maxBytes} bytes`)
    this.name = 'ResponseTooLargeError'
  }
}

export class FetchTransport implements SessionTransport {
  private readonly timeoutMs: number
  private readonly maxSizeBytes: number

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES
  }

  async send(request: HttpRequestSpec): Promise<HttpResponse> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
        redirect: 'follow',
      })

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > this.maxSizeBytes) {
        throw new ResponseTooLargeError(this.maxSizeBytes)
      }

      const text = await this.readBodyWithLimit(response)
      return { status: response.status, statusText: response.statusText, text }
    } finally {
      clearTimeout(timeoutId)
    }
  }

  private async readBodyWithLimit(response: Response): Promise<string> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > this.maxSizeBytes) {
          await reader.cancel()
          throw new ResponseTooLargeError(this.maxSizeBytes)
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }
}
