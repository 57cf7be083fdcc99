import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { HttpFetcher, looksLikeBlockedPage } from '../http-fetcher.js'

function hangingFetch() {
  return vi.fn().mockImplementation(
    (_url: unknown, init?: RequestInit) =>
      new Promise((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
      })
  )
}

describe('HttpFetcher', () => {
  const originalFetch = globalThis.fetch

  beforeEach(() => {
    vi.restoreAllMocks()
  })

  afterEach(() => {
    if (originalFetch) {
      globalThis.fetch = originalFetch
    }
  })

  it('returns the body of a successful response', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('<html>ok</html>', { status: 200 }))
    globalThis.fetch = fetchSpy

    const result = await new HttpFetcher().fetch('https://shop.test/search?q=phone', {
      headers: { 'X-Test': '1' },
    })

    expect(result.status).toBe('ok')
    expect(result.statusCode).toBe(200)
    expect(result.body).toBe('<html>ok</html>')
    expect(fetchSpy).toHaveBeenCalledTimes(1)
    expect(fetchSpy).toHaveBeenCalledWith(
      'https://shop.test/search?q=phone',
      expect.objectContaining({
        method: 'GET',
        headers: expect.objectContaining({ 'X-Test': '1', Accept: expect.any(String) }),
      })
    )
  })

  it('reports HTTP errors without retrying', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('fail', { status: 500, statusText: 'Server Error' }))
    globalThis.fetch = fetchSpy

    const result = await new HttpFetcher().fetch('https://shop.test/p')

    expect(result.status).toBe('error')
    expect(result.statusCode).toBe(500)
    expect(result.error).toBe('HTTP 500: Server Error')
    expect(fetchSpy).toHaveBeenCalledTimes(1)
  })

  it('detects captcha pages', async () => {
    globalThis.fetch = vi
      .fn()
      .mockResolvedValue(new Response('<div class="g-recaptcha"></div>', { status: 403, statusText: 'Forbidden' }))

    const result = await new HttpFetcher().fetch('https://shop.test/p')

    expect(result.status).toBe('blocked')
    expect(result.statusCode).toBe(403)
  })

  it('stops reading bodies over the size limit', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('x'.repeat(64), { status: 200 }))

    const result = await new HttpFetcher().fetch('https://shop.test/p', { maxSizeBytes: 16 })

    expect(result.status).toBe('too_large')
  })

  it('reports its own timeout as a result', async () => {
    globalThis.fetch = hangingFetch()

    const result = await new HttpFetcher().fetch('https://shop.test/p', { timeoutMs: 10 })

    expect(result.status).toBe('timeout')
    expect(result.error).toBe('Request timed out after 10ms')
  })

  it('rethrows when the caller aborts', async () => {
    globalThis.fetch = hangingFetch()
    const controller = new AbortController()

    const pending = new HttpFetcher().fetch('https://shop.test/p', { signal: controller.signal, timeoutMs: 5000 })
    controller.abort(new Error('budget spent'))

    await expect(pending).rejects.toThrow('aborted')
  })

  it('does not call fetch for an already aborted signal', async () => {
    const fetchSpy = vi.fn()
    globalThis.fetch = fetchSpy
    const controller = new AbortController()
    controller.abort(new Error('too late'))

    await expect(new HttpFetcher().fetch('https://shop.test/p', { signal: controller.signal })).rejects.toThrow(
      'too late'
    )
    expect(fetchSpy).not.toHaveBeenCalled()
  })
})

describe('looksLikeBlockedPage', () => {
  it('spots block markers regardless of case', () => {
    expect(looksLikeBlockedPage('<h1>Access Denied</h1>')).toBe(true)
    expect(looksLikeBlockedPage('<h1>Results for phone</h1>')).toBe(false)
  })
})
