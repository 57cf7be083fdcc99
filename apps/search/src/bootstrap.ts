/**
 * Service assembly for entry points.
 *
 * Reads configuration from the environment, registers providers and picks a
 * currency converter. Tests and embedders that want full control construct
 * PriceSearchService directly.
 */

import './env.js'

import type { ILogger } from '@pricemesh/logger'
import { loadSearchConfig, type SearchConfig } from './config/index.js'
import { loggers } from './config/logger.js'
import { HttpRateConverter, StaticRateConverter, type CurrencyConverter } from './pricing/currency.js'
import { ListingProvider } from './providers/listing/listing-provider.js'
import type { ListingManifest } from './providers/listing/types.js'
import { ProviderRegistry } from './providers/registry.js'
import type { PriceProvider } from './providers/types.js'
import { PriceSearchService } from './search/search-service.js'

export interface CreateSearchServiceOptions {
  providers?: PriceProvider[]
  /** Each manifest becomes a ListingProvider, registered after `providers` */
  manifests?: ListingManifest[]
  env?: NodeJS.ProcessEnv
  /** Overrides the converter chosen from configuration */
  converter?: CurrencyConverter
  logger?: ILogger
}

export function createConverter(config: Readonly<SearchConfig>, logger?: ILogger): CurrencyConverter {
  if (config.exchangeRatesUrl) {
    return new HttpRateConverter({
      url: config.exchangeRatesUrl,
      ttlMs: config.exchangeRatesTtlSeconds * 1000,
      logger,
    })
  }
  return new StaticRateConverter()
}

/**
 * @throws ConfigError when the environment holds invalid settings
 * @throws ProviderRegistrationError on duplicate provider names
 */
export function createSearchService(options: CreateSearchServiceOptions = {}): PriceSearchService {
  const config = loadSearchConfig(options.env)
  const registry = new ProviderRegistry(options.providers)
  registry.registerAll(
    (options.manifests ?? []).map((manifest) => new ListingProvider(manifest, { logger: options.logger }))
  )

  const converter = options.converter ?? createConverter(config, options.logger)
  const log = options.logger ?? loggers.config
  log.info('Search service configured', {
    providers: registry.size(),
    maxConcurrentProviders: config.maxConcurrentProviders,
    defaultTimeoutSeconds: config.defaultTimeoutSeconds,
    converter: converter.constructor.name,
  })

  return new PriceSearchService({ registry, converter, config, logger: options.logger })
}
