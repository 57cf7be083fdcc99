import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createLogger, setLogLevel, setRedactionEnabled, silentLogger } from '../index.js'

describe('logger', () => {
  const originalLogFormat = process.env.LOG_FORMAT

  beforeEach(() => {
    process.env.LOG_FORMAT = 'json'
    setLogLevel('debug')
  })

  afterEach(() => {
    vi.restoreAllMocks()
    setLogLevel(null)
    setRedactionEnabled(null)
    process.env.LOG_FORMAT = originalLogFormat
  })

  function lastJson(spy: { mock: { calls: unknown[][] } }): Record<string, unknown> {
    const calls = spy.mock.calls
    const [line] = calls[calls.length - 1]
    const entry: Record<string, unknown> = JSON.parse(String(line))
    return entry
  }

  it('writes JSON entries with service, component path and metadata', () => {
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})

    const logger = createLogger('search').child('orchestrator').child('providers')
    logger.info('provider finished', { provider: 'ebay', offers: 3 })

    expect(consoleInfo).toHaveBeenCalledTimes(1)
    const payload = lastJson(consoleInfo)
    expect(payload.service).toBe('search')
    expect(payload.component).toBe('orchestrator:providers')
    expect(payload.message).toBe('provider finished')
    expect(payload.level).toBe('info')
    expect(payload.provider).toBe('ebay')
    expect(payload.offers).toBe(3)
  })

  it('routes error level to console.error with a serialized error', () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})

    createLogger('search').error('boom', { stage: 'rank' }, new TypeError('bad input'))

    const payload = lastJson(consoleError)
    expect(payload.error).toMatchObject({ name: 'TypeError', message: 'bad input' })
    expect(payload.stage).toBe('rank')
  })

  it('suppresses entries below the configured level', () => {
    const consoleDebug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    setLogLevel('warn')

    createLogger('search').debug('noise')

    expect(consoleDebug).not.toHaveBeenCalled()
  })

  it('merges default context from object children', () => {
    const consoleWarn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    createLogger('search').child({ searchId: 's-1' }).warn('slow provider', { provider: 'target' })

    const payload = lastJson(consoleWarn)
    expect(payload.searchId).toBe('s-1')
    expect(payload.provider).toBe('target')
    expect(payload.component).toBeUndefined()
  })

  it('redacts credential-like keys when redaction is enabled', () => {
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})
    setRedactionEnabled(true)

    createLogger('search').info('rates fetched', { apiKey: 'test-secret', Authorization: 'Bearer x', base: 'EUR' })

    const payload = lastJson(consoleInfo)
    expect(payload.apiKey).toBe('[REDACTED]')
    expect(payload.Authorization).toBe('[REDACTED]')
    expect(payload.base).toBe('EUR')
  })

  it('silent logger never writes', () => {
    const consoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})
    silentLogger.child('x').info('nothing')
    expect(consoleInfo).not.toHaveBeenCalled()
  })
})
