import type { ILogger } from '@pricemesh/logger'
import { loggers } from '../config/logger.js'
import { MinIntervalLimiter, DEFAULT_RATE_LIMIT } from './rate-limiter.js'
import {
  UNSUPPORTED_PRIORITY,
  type PriceProvider,
  type ProviderFetchOptions,
  type ProviderKind,
  type RawOffer,
} from './types.js'

export interface BaseProviderOptions {
  name: string
  kind: ProviderKind
  supportedCountries: string[]
  /** Priority for supported countries. A number applies everywhere; a map overrides per country */
  priority?: number | Record<string, number>
  /** Minimum spacing between request starts. Default 2000 */
  minIntervalMs?: number
  logger?: ILogger
}

const DEFAULT_PRIORITY = 1

/**
 * Common plumbing for providers: country support, priority, request spacing.
 * Subclasses implement `search`.
 */
export abstract class BaseProvider implements PriceProvider {
  readonly name: string
  readonly kind: ProviderKind
  protected readonly logger: ILogger
  private readonly countries: Set<string>
  private readonly priorityConfig: number | Map<string, number>
  private readonly limiter: MinIntervalLimiter

  constructor(options: BaseProviderOptions) {
    this.name = options.name
    this.kind = options.kind
    this.countries = new Set(options.supportedCountries.map((country) => country.toUpperCase()))
    this.priorityConfig =
      typeof options.priority === 'object'
        ? new Map(Object.entries(options.priority).map(([country, value]): [string, number] => [country.toUpperCase(), value]))
        : options.priority ?? DEFAULT_PRIORITY
    this.limiter = new MinIntervalLimiter({
      minIntervalMs: options.minIntervalMs ?? DEFAULT_RATE_LIMIT.minIntervalMs,
    })
    this.logger = (options.logger ?? loggers.providers).child({ provider: options.name })
  }

  supports(country: string): boolean {
    return this.countries.has(country.toUpperCase())
  }

  priority(country: string): number {
    if (!this.supports(country)) {
      return UNSUPPORTED_PRIORITY
    }
    if (typeof this.priorityConfig === 'number') {
      return this.priorityConfig
    }
    return this.priorityConfig.get(country.toUpperCase()) ?? DEFAULT_PRIORITY
  }

  async fetch(query: string, country: string, options: ProviderFetchOptions = {}): Promise<RawOffer[]> {
    await this.limiter.acquire(options.signal)
    return this.search(query, country.toUpperCase(), options)
  }

  /**
   * Run the actual lookup. `country` is upper-cased.
   */
  protected abstract search(query: string, country: string, options: ProviderFetchOptions): Promise<RawOffer[]>
}
