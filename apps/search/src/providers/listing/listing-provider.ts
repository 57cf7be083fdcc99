/**
 * Listing Provider
 *
 * Generic provider for retailers that expose an HTML search-results page.
 * Everything retailer-specific (regions, URL templates, selectors) lives in
 * the manifest, so adding a retailer is a data change.
 */

import type { ILogger } from '@pricemesh/logger'
import { ProviderFetchError } from '../../lib/errors.js'
import { BaseProvider } from '../base-provider.js'
import { HttpFetcher, type Fetcher } from '../fetch/http-fetcher.js'
import type { ProviderFetchOptions, RawOffer } from '../types.js'
import { extractListings } from './extract.js'
import type { ListingManifest } from './types.js'

export interface ListingProviderOptions {
  fetcher?: Fetcher
  logger?: ILogger
  now?: () => Date
}

export function buildSearchUrl(template: string, query: string): string {
  return template.replace('{query}', encodeURIComponent(query.trim()).replace(/%20/g, '+'))
}

export class ListingProvider extends BaseProvider {
  private readonly manifest: ListingManifest
  private readonly fetcher: Fetcher
  private readonly now: () => Date

  constructor(manifest: ListingManifest, options: ListingProviderOptions = {}) {
    super({
      name: manifest.name,
      kind: manifest.kind ?? 'ecommerce',
      supportedCountries: Object.keys(manifest.regions),
      priority: manifest.priority,
      minIntervalMs: manifest.minIntervalMs,
      logger: options.logger,
    })
    this.manifest = manifest
    this.fetcher = options.fetcher ?? new HttpFetcher()
    this.now = options.now ?? (() => new Date())
  }

  protected async search(query: string, country: string, options: ProviderFetchOptions): Promise<RawOffer[]> {
    const region = this.findRegion(country)
    if (!region) {
      throw new ProviderFetchError(this.name, `country '${country}' is not configured`)
    }

    const url = buildSearchUrl(region.searchUrl, query)
    const result = await this.fetcher.fetch(url, {
      signal: options.signal,
      timeoutMs: this.manifest.requestTimeoutMs,
      headers: this.manifest.headers,
    })

    if (result.status !== 'ok' || result.body === undefined) {
      throw new ProviderFetchError(this.name, result.error ?? `fetch ended with status '${result.status}'`, {
        statusCode: result.statusCode,
      })
    }

    const offers = extractListings({
      html: result.body,
      manifest: this.manifest,
      region,
      pageUrl: url,
      observedAt: this.now(),
    })

    this.logger.debug('Listings extracted', {
      country,
      offers: offers.length,
      durationMs: result.durationMs,
    })

    return offers
  }

  private findRegion(country: string) {
    const entry = Object.entries(this.manifest.regions).find(([code]) => code.toUpperCase() === country)
    return entry?.[1]
  }
}
