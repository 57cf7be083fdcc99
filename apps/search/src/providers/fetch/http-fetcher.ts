/**
 * HTTP Fetcher
 *
 * Uses native fetch for provider page requests.
 * One attempt per call: a search never retries a provider, so neither does
 * the fetcher. Supports timeout, caller cancellation, size limits and
 * blocked-page detection.
 */

export interface FetchOptions {
  /** Request timeout in ms (default: 20000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 5MB) */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>

  /** Caller cancellation (the orchestrator's per-provider budget) */
  signal?: AbortSignal
}

export type FetchResultStatus = 'ok' | 'error' | 'blocked' | 'timeout' | 'too_large'

export interface FetchResult {
  status: FetchResultStatus
  statusCode?: number
  body?: string
  error?: string
  durationMs: number
}

/**
 * Fetcher interface - lets providers swap HTTP for a rendering backend or a fake.
 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export const DEFAULT_FETCH_HEADERS = {
  'User-Agent': 'PriceMesh/0.1 (+https://pricemesh.dev/bot)',
  Accept: 'text/html,application/xhtml+xml,application/json;q=0.9',
  'Accept-Language': 'en-US,en;q=0.9',
} as const

export const DEFAULT_FETCH_TIMEOUT_MS = 20000
export const DEFAULT_MAX_SIZE_BYTES = 5 * 1024 * 1024

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'hcaptcha',
  'challenge-form',
  'cf-browser-verification',
  'please verify you are a human',
  'access denied',
  'bot detection',
]

/**
 * Heuristic check for blocked/captcha pages.
 */
export function looksLikeBlockedPage(html: string): boolean {
  const lowerHtml = html.toLowerCase()
  return BLOCK_INDICATORS.some((indicator) => lowerHtml.includes(indicator))
}

export class HttpFetcher implements Fetcher {
  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now()
    const timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
    const maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES
    const headers = { ...DEFAULT_FETCH_HEADERS, ...(options.headers ?? {}) }

    // Caller aborts propagate; our own timeout is reported as 'timeout'
    if (options.signal?.aborted) {
      throw options.signal.reason
    }
    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeoutMs)
    const onCallerAbort = () => controller.abort(options.signal?.reason)
    options.signal?.addEventListener('abort', onCallerAbort, { once: true })

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (response.status === 403 || response.status === 503) {
        const text = await response.text()
        if (looksLikeBlockedPage(text)) {
          return {
            status: 'blocked',
            statusCode: response.status,
            durationMs: Date.now() - startTime,
            error: 'Request blocked (captcha or access denied)',
          }
        }
      }

      if (!response.ok) {
        return {
          status: 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && Number.parseInt(contentLength, 10) > maxSizeBytes) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const body = await this.readBodyWithLimit(response, maxSizeBytes)
      if (body === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        body,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (timedOut) {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${timeoutMs}ms`,
        }
      }
      throw error
    } finally {
      clearTimeout(timeoutId)
      options.signal?.removeEventListener('abort', onCallerAbort)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
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
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }
}
