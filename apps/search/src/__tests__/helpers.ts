import type { NormalizedOffer } from '../processing/types.js'
import type { PriceProvider, ProviderFetchOptions, RawOffer } from '../providers/types.js'

export const OBSERVED_AT = '2026-03-01T12:00:00.000Z'

export function makeOffer(overrides: Partial<RawOffer> = {}): RawOffer {
  return {
    link: 'https://shop.test/p/1',
    price: '$100.00',
    productName: 'Test Product',
    availability: 'In Stock',
    source: 'TestShop',
    scrapedAt: OBSERVED_AT,
    ...overrides,
  }
}

type FakeBehavior =
  | { type: 'offers'; offers: RawOffer[]; delayMs?: number }
  | { type: 'error'; error: unknown }
  | { type: 'hang' }

export interface FakeProviderOptions {
  name: string
  countries?: string[]
  priority?: number
  behavior?: FakeBehavior
  onStart?: () => void
  onSettle?: () => void
}

/**
 * Provider stand-in with scripted results. `hang` never settles unless aborted.
 */
export class FakeProvider implements PriceProvider {
  readonly name: string
  readonly calls: Array<{ query: string; country: string; signal?: AbortSignal }> = []
  private readonly countries: Set<string>
  private readonly rank: number
  private readonly behavior: FakeBehavior
  private readonly onStart?: () => void
  private readonly onSettle?: () => void

  constructor(options: FakeProviderOptions) {
    this.name = options.name
    this.countries = new Set((options.countries ?? ['US']).map((c) => c.toUpperCase()))
    this.rank = options.priority ?? 1
    this.behavior = options.behavior ?? { type: 'offers', offers: [] }
    this.onStart = options.onStart
    this.onSettle = options.onSettle
  }

  supports(country: string): boolean {
    return this.countries.has(country.toUpperCase())
  }

  priority(country: string): number {
    return this.supports(country) ? this.rank : 999
  }

  fetch(query: string, country: string, options: ProviderFetchOptions = {}): Promise<RawOffer[]> {
    this.calls.push({ query, country, signal: options.signal })
    this.onStart?.()
    return this.run(options.signal).finally(() => this.onSettle?.())
  }

  private run(signal?: AbortSignal): Promise<RawOffer[]> {
    const behavior = this.behavior
    switch (behavior.type) {
      case 'offers':
        return new Promise((resolve, reject) => {
          const timer = setTimeout(() => resolve(behavior.offers), behavior.delayMs ?? 0)
          signal?.addEventListener('abort', () => {
            clearTimeout(timer)
            reject(signal.reason)
          })
        })
      case 'error':
        return Promise.reject(behavior.error)
      case 'hang':
        return new Promise((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(signal.reason))
        })
    }
  }
}

export function makeNormalized(
  offer: Partial<RawOffer> = {},
  values: { price?: number; currency?: string; similarity?: number } = {}
): NormalizedOffer {
  return {
    offer: Object.freeze(makeOffer(offer)),
    normalizedPrice: values.price ?? 100,
    normalizedCurrency: values.currency ?? 'USD',
    similarityScore: values.similarity ?? 0.5,
  }
}
