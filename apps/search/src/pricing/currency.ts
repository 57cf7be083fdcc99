/**
 * Currency conversion collaborators.
 *
 * The normalizer only sees the CurrencyConverter interface. Two
 * implementations ship: bundled reference rates, and a rate service polled
 * over HTTP with a TTL cache.
 */

import type { ILogger } from '@pricemesh/logger'
import { loggers } from '../config/logger.js'
import { CurrencyConversionError } from '../lib/errors.js'
import { exchangeRatesSchema, loadReferenceRates, type ExchangeRates } from './currencies.js'

export interface CurrencyConverter {
  /**
   * Convert an amount between ISO 4217 codes.
   * @throws CurrencyConversionError when either code is unknown or rates are unavailable
   */
  convert(amount: number, from: string, to: string): Promise<number>
}

function crossConvert(table: ExchangeRates, amount: number, from: string, to: string): number {
  const rateOf = (code: string) => (code === table.base ? 1 : table.rates[code])
  const fromRate = rateOf(from)
  const toRate = rateOf(to)

  if (fromRate === undefined) {
    throw new CurrencyConversionError(from, to, `no rate for ${from}`)
  }
  if (toRate === undefined) {
    throw new CurrencyConversionError(from, to, `no rate for ${to}`)
  }

  return (amount / fromRate) * toRate
}

/**
 * Converts with a fixed rate table (EUR based unless the table says otherwise).
 */
export class StaticRateConverter implements CurrencyConverter {
  private readonly table: ExchangeRates

  constructor(table: ExchangeRates = loadReferenceRates()) {
    this.table = table
  }

  async convert(amount: number, from: string, to: string): Promise<number> {
    const source = from.toUpperCase()
    const target = to.toUpperCase()
    if (source === target) {
      return amount
    }
    return crossConvert(this.table, amount, source, target)
  }
}

export type RatesFetch = (url: string) => Promise<Response>

export interface HttpRateConverterOptions {
  url: string
  /** Cache lifetime of a fetched table, in ms. 0 disables caching */
  ttlMs: number
  fetch?: RatesFetch
  now?: () => number
  logger?: ILogger
}

/**
 * Converts with rates from a JSON service returning `{ base, rates }`.
 * Concurrent lookups share one request; failures are not cached.
 */
export class HttpRateConverter implements CurrencyConverter {
  private readonly url: string
  private readonly ttlMs: number
  private readonly fetchRates: RatesFetch
  private readonly now: () => number
  private readonly logger: ILogger
  private cached?: { table: ExchangeRates; fetchedAt: number }
  private inflight?: Promise<ExchangeRates>

  constructor(options: HttpRateConverterOptions) {
    this.url = options.url
    this.ttlMs = options.ttlMs
    this.fetchRates = options.fetch ?? ((url) => fetch(url, { headers: { Accept: 'application/json' } }))
    this.now = options.now ?? Date.now
    this.logger = (options.logger ?? loggers.pricing).child('rates')
  }

  async convert(amount: number, from: string, to: string): Promise<number> {
    const source = from.toUpperCase()
    const target = to.toUpperCase()
    if (source === target) {
      return amount
    }

    let table: ExchangeRates
    try {
      table = await this.getTable()
    } catch (error) {
      throw new CurrencyConversionError(source, target, 'rate service unavailable', { cause: error })
    }
    return crossConvert(table, amount, source, target)
  }

  private getTable(): Promise<ExchangeRates> {
    if (this.cached && this.now() - this.cached.fetchedAt < this.ttlMs) {
      return Promise.resolve(this.cached.table)
    }
    if (!this.inflight) {
      this.inflight = this.load().finally(() => {
        this.inflight = undefined
      })
    }
    return this.inflight
  }

  private async load(): Promise<ExchangeRates> {
    const response = await this.fetchRates(this.url)
    if (!response.ok) {
      throw new Error(`HTTP ${response.status} from rate service`)
    }

    const table = exchangeRatesSchema.parse(await response.json())
    this.cached = { table, fetchedAt: this.now() }
    this.logger.info('Exchange rates refreshed', {
      base: table.base,
      currencies: Object.keys(table.rates).length,
    })
    return table
  }
}
