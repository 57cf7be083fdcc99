import { describe, it, expect } from 'vitest'
import { silentLogger } from '@pricemesh/logger'
import { createConverter, createSearchService } from '../bootstrap.js'
import { DEFAULT_SEARCH_CONFIG } from '../config/index.js'
import { ConfigError, ProviderRegistrationError } from '../lib/errors.js'
import { HttpRateConverter, StaticRateConverter } from '../pricing/currency.js'
import type { ListingManifest } from '../providers/listing/types.js'
import { FakeProvider } from './helpers.js'

const manifest: ListingManifest = {
  name: 'ExampleMart',
  regions: { GB: { searchUrl: 'https://mart.test/search?q={query}', currency: 'GBP' } },
  selectors: { item: '.card', title: '.title', price: '.price', link: 'a' },
}

describe('createSearchService', () => {
  it('registers providers and manifests in order', () => {
    const service = createSearchService({
      env: {},
      providers: [new FakeProvider({ name: 'Amazon' })],
      manifests: [manifest],
      logger: silentLogger,
    })

    expect(service.listProviders()).toEqual([{ name: 'Amazon' }, { name: 'ExampleMart' }])
    expect(service.listProviders('GB')).toEqual([
      { name: 'Amazon', priority: 999, supported: false },
      { name: 'ExampleMart', priority: 1, supported: true },
    ])
  })

  it('rejects an invalid environment', () => {
    expect(() => createSearchService({ env: { MAX_CONCURRENT_PROVIDERS: '0' }, logger: silentLogger })).toThrow(
      ConfigError
    )
  })

  it('rejects duplicate provider names', () => {
    expect(() =>
      createSearchService({
        env: {},
        providers: [new FakeProvider({ name: 'ExampleMart' })],
        manifests: [manifest],
        logger: silentLogger,
      })
    ).toThrow(ProviderRegistrationError)
  })
})

describe('createConverter', () => {
  it('uses the bundled rates without a rate service URL', () => {
    expect(createConverter(DEFAULT_SEARCH_CONFIG, silentLogger)).toBeInstanceOf(StaticRateConverter)
  })

  it('uses the rate service when one is configured', () => {
    const config = { ...DEFAULT_SEARCH_CONFIG, exchangeRatesUrl: 'https://rates.test/latest.json' }

    expect(createConverter(config, silentLogger)).toBeInstanceOf(HttpRateConverter)
  })
})
