/**
 * @pricemesh/search
 *
 * Fan-out price search: provider registry, price normalization, product
 * matching, duplicate merging and ranking.
 */

export { createConverter, createSearchService } from './bootstrap.js'
export type { CreateSearchServiceOptions } from './bootstrap.js'

export { PriceSearchService } from './search/search-service.js'
export type { PriceSearchServiceDeps } from './search/search-service.js'
export { createSearchRequestSchema } from './search/types.js'
export type { SearchRequest, SearchRequestInput, SearchResponse } from './search/types.js'
export { Semaphore, withTimeout } from './search/concurrency.js'

export { DEFAULT_SEARCH_CONFIG, loadSearchConfig } from './config/index.js'
export type { SearchConfig } from './config/index.js'

export { ProviderRegistry } from './providers/registry.js'
export { BaseProvider } from './providers/base-provider.js'
export type { BaseProviderOptions } from './providers/base-provider.js'
export { ListingProvider, buildSearchUrl } from './providers/listing/listing-provider.js'
export type { ListingProviderOptions } from './providers/listing/listing-provider.js'
export type { ListingManifest, ListingRegion, ListingSelectors } from './providers/listing/types.js'
export { HttpFetcher } from './providers/fetch/http-fetcher.js'
export type { Fetcher, FetchOptions, FetchResult, FetchResultStatus } from './providers/fetch/http-fetcher.js'
export { MinIntervalLimiter } from './providers/rate-limiter.js'
export { checkRawOffer, rawOfferSchema } from './providers/raw-offer.js'
export { UNSUPPORTED_PRIORITY } from './providers/types.js'
export type {
  PriceProvider,
  ProviderDescriptor,
  ProviderFetchOptions,
  ProviderKind,
  RawOffer,
} from './providers/types.js'

export { HttpRateConverter, StaticRateConverter } from './pricing/currency.js'
export type { CurrencyConverter, HttpRateConverterOptions, RatesFetch } from './pricing/currency.js'
export { loadReferenceRates } from './pricing/currencies.js'
export type { ExchangeRates } from './pricing/currencies.js'
export { detectCurrency, parseAmount, parsePrice } from './pricing/price-parser.js'
export type { ParsedPrice } from './pricing/price-parser.js'
export { PriceNormalizer } from './pricing/normalizer.js'
export type { NormalizeResult } from './pricing/normalizer.js'

export { extractFeatures } from './matching/features.js'
export type { FeatureSet } from './matching/features.js'
export {
  DEFAULT_SIMILARITY_WEIGHTS,
  ProductMatcher,
  priceSimilarity,
  queryRelevance,
} from './matching/product-matcher.js'
export type { ProductMatcherOptions, SimilarityScore, SimilarityWeights } from './matching/product-matcher.js'
export { partialRatio, ratio, tokenSetRatio, tokenSortRatio } from './matching/text-similarity.js'

export { Deduplicator } from './processing/deduplicator.js'
export type { DedupResult } from './processing/deduplicator.js'
export { rankOffers, rankingScore } from './processing/ranker.js'
export { ResultProcessor, toResultItem } from './processing/result-processor.js'
export type { ProcessedResults, ProcessingStats } from './processing/result-processor.js'
export type { NormalizedOffer, RankedOffer, ResultItem } from './processing/types.js'

export {
  classifyError,
  ConfigError,
  CurrencyConversionError,
  ERROR_CODES,
  formatErrorForLog,
  InvalidSearchRequestError,
  PriceParseError,
  ProviderFetchError,
  ProviderRegistrationError,
  ProviderTimeoutError,
  SearchError,
} from './lib/errors.js'
export type { ClassifiedError, ErrorCategory, ErrorCode, RequestIssue } from './lib/errors.js'
