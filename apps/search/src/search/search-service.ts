/**
 * Price Search Service
 *
 * Fans one query out to every provider that serves the requested country,
 * under a shared concurrency bound and a per-provider deadline, then hands
 * the surviving offers to the result processor.
 *
 * Provider failures never escape: a provider that throws, rejects, returns
 * garbage or runs out of time simply contributes nothing. The only error a
 * caller sees is InvalidSearchRequestError.
 */

import type { ILogger } from '@pricemesh/logger'
import { DEFAULT_SEARCH_CONFIG, type SearchConfig } from '../config/index.js'
import { loggers } from '../config/logger.js'
import {
  classifyError,
  formatErrorForLog,
  InvalidSearchRequestError,
  ProviderFetchError,
  ProviderTimeoutError,
} from '../lib/errors.js'
import { ProductMatcher } from '../matching/product-matcher.js'
import { PriceNormalizer } from '../pricing/normalizer.js'
import type { CurrencyConverter } from '../pricing/currency.js'
import { ResultProcessor, toResultItem } from '../processing/result-processor.js'
import { checkRawOffer } from '../providers/raw-offer.js'
import type { ProviderRegistry } from '../providers/registry.js'
import type { PriceProvider, ProviderDescriptor, RawOffer } from '../providers/types.js'
import { Semaphore, withTimeout } from './concurrency.js'
import { createSearchRequestSchema, type SearchRequest, type SearchRequestInput, type SearchResponse } from './types.js'

type ProviderOutcome =
  | { status: 'ok'; offers: Array<Readonly<RawOffer>> }
  | { status: 'timeout' }
  | { status: 'failed' }

export interface PriceSearchServiceDeps {
  registry: ProviderRegistry
  converter: CurrencyConverter
  config?: Readonly<SearchConfig>
  logger?: ILogger
  /** Clock for response timestamps */
  now?: () => Date
}

function nameSet(names: readonly string[] | undefined): Set<string> | undefined {
  return names ? new Set(names.map((name) => name.trim().toLowerCase())) : undefined
}

export class PriceSearchService {
  private readonly registry: ProviderRegistry
  private readonly config: Readonly<SearchConfig>
  private readonly processor: ResultProcessor
  private readonly requestSchema: ReturnType<typeof createSearchRequestSchema>
  private readonly logger: ILogger
  private readonly now: () => Date

  constructor(deps: PriceSearchServiceDeps) {
    this.registry = deps.registry
    this.config = deps.config ?? DEFAULT_SEARCH_CONFIG
    this.logger = deps.logger ?? loggers.orchestrator
    this.now = deps.now ?? (() => new Date())
    this.requestSchema = createSearchRequestSchema(this.config)

    const matcher = new ProductMatcher({
      duplicateThreshold: this.config.duplicateThreshold,
      priceVarianceThreshold: this.config.priceVarianceThreshold,
      logger: deps.logger ?? loggers.matching,
    })
    this.processor = new ResultProcessor({
      normalizer: new PriceNormalizer(deps.converter, deps.logger ?? loggers.pricing),
      matcher,
      logger: deps.logger ?? loggers.processing,
    })
  }

  /**
   * Registered providers in registration order. With a country, each entry
   * also carries its priority and whether it serves that country.
   */
  listProviders(country?: string): ProviderDescriptor[] {
    const code = country?.trim().toUpperCase()
    if (!code) {
      return this.registry.list().map((provider) => ({ name: provider.name }))
    }
    return this.registry.describe(code)
  }

  /**
   * Run one search.
   * @throws InvalidSearchRequestError for structurally invalid input
   */
  async search(input: SearchRequestInput): Promise<SearchResponse> {
    const startedAt = Date.now()
    const parsed = this.requestSchema.safeParse(input)
    if (!parsed.success) {
      throw InvalidSearchRequestError.fromZod(parsed.error)
    }
    const request: SearchRequest = Object.freeze(parsed.data)

    const log = this.logger.child({ query: request.query, country: request.country })
    const providers = this.selectProviders(request, log)

    if (providers.length === 0) {
      log.info('No providers serve this request')
      return this.respond(request, [], [], startedAt)
    }

    const perProviderTimeoutMs = (request.timeout * 1000) / Math.max(1, providers.length)
    const semaphore = new Semaphore(this.config.maxConcurrentProviders)

    log.info('Search started', {
      providers: providers.map((provider) => provider.name),
      perProviderTimeoutMs,
      maxConcurrent: this.config.maxConcurrentProviders,
    })

    const outcomes = await Promise.all(
      providers.map((provider) =>
        semaphore.run(() => this.runProvider(provider, request, perProviderTimeoutMs, log))
      )
    )

    const offers: Array<Readonly<RawOffer>> = []
    const sourcesUsed: string[] = []
    outcomes.forEach((outcome, index) => {
      const provider = providers[index]
      if (outcome.status !== 'ok' || !provider) return
      sourcesUsed.push(provider.name)
      offers.push(...outcome.offers)
    })

    const { ranked, stats } = await this.processor.process(offers, request.query, request.targetCurrency)
    const limited = request.maxResults > 0 ? ranked.slice(0, request.maxResults) : ranked

    const response = this.respond(request, limited.map(toResultItem), sourcesUsed, startedAt)
    log.info('Search completed', {
      ...stats,
      totalResults: response.totalResults,
      sourcesUsed: sourcesUsed.length,
      providersSelected: providers.length,
      searchTime: response.searchTime,
    })
    return response
  }

  /**
   * Supported providers after include/exclude filters, by ascending priority.
   * Array sort is stable, so equal priorities keep registration order.
   * A provider whose `supports` or `priority` throws is left out.
   */
  private selectProviders(request: SearchRequest, log: ILogger): PriceProvider[] {
    const include = nameSet(request.includeSources)
    const exclude = nameSet(request.excludeSources)

    const candidates: Array<{ provider: PriceProvider; priority: number }> = []
    for (const provider of this.registry.list()) {
      const key = provider.name.toLowerCase()
      if (include && !include.has(key)) continue
      if (exclude?.has(key)) continue

      try {
        if (!provider.supports(request.country)) continue
        candidates.push({ provider, priority: provider.priority(request.country) })
      } catch (error) {
        log.warn('Skipping provider that failed selection', {
          provider: provider.name,
          ...formatErrorForLog(classifyError(error)),
        })
      }
    }

    return candidates.sort((a, b) => a.priority - b.priority).map(({ provider }) => provider)
  }

  /**
   * One provider call. The deadline starts once the provider holds a slot.
   */
  private async runProvider(
    provider: PriceProvider,
    request: SearchRequest,
    timeoutMs: number,
    log: ILogger
  ): Promise<ProviderOutcome> {
    const startedAt = Date.now()

    try {
      const result: unknown = await withTimeout(
        (signal) => provider.fetch(request.query, request.country, { signal }),
        timeoutMs,
        () => new ProviderTimeoutError(provider.name, timeoutMs)
      )
      if (!Array.isArray(result)) {
        throw new ProviderFetchError(provider.name, 'returned a non-list result')
      }

      const offers: Array<Readonly<RawOffer>> = []
      let invalid = 0
      for (const candidate of result) {
        const checked = checkRawOffer(candidate, provider.name)
        if (checked.ok) {
          offers.push(checked.offer)
        } else {
          invalid++
          log.debug('Dropping malformed offer', { provider: provider.name, issues: checked.issues })
        }
      }

      log.info('Provider finished', {
        provider: provider.name,
        offers: offers.length,
        invalid,
        durationMs: Date.now() - startedAt,
      })
      return { status: 'ok', offers }
    } catch (error) {
      const classified = classifyError(error)
      log.warn('Provider contributed no offers', {
        provider: provider.name,
        durationMs: Date.now() - startedAt,
        ...formatErrorForLog(classified),
      })
      return error instanceof ProviderTimeoutError ? { status: 'timeout' } : { status: 'failed' }
    }
  }

  private respond(
    request: SearchRequest,
    results: SearchResponse['results'],
    sourcesUsed: string[],
    startedAt: number
  ): SearchResponse {
    return {
      results,
      totalResults: results.length,
      searchTime: (Date.now() - startedAt) / 1000,
      sourcesUsed,
      query: request.query,
      country: request.country,
      timestamp: this.now().toISOString(),
    }
  }
}
