/**
 * Result Processor
 *
 * Turns the offers gathered for one search into the ranked, deduplicated
 * list: normalize prices -> score relevance -> deduplicate -> rank.
 * Everything after normalization is synchronous.
 */

import type { ILogger } from '@pricemesh/logger'
import { loggers } from '../config/logger.js'
import { queryRelevance, type ProductMatcher } from '../matching/product-matcher.js'
import type { PriceNormalizer } from '../pricing/normalizer.js'
import type { RawOffer } from '../providers/types.js'
import { Deduplicator } from './deduplicator.js'
import { rankOffers } from './ranker.js'
import type { NormalizedOffer, RankedOffer, ResultItem } from './types.js'

export interface ProcessingStats {
  /** Offers handed in */
  received: number
  /** Dropped because the price could not be read */
  unparseable: number
  /** Kept in their source currency after a failed conversion */
  conversionFallbacks: number
  /** Offers folded into another group's representative */
  duplicatesMerged: number
  returned: number
}

export interface ProcessedResults {
  ranked: RankedOffer[]
  stats: ProcessingStats
}

export interface ResultProcessorDeps {
  normalizer: PriceNormalizer
  matcher: ProductMatcher
  logger?: ILogger
}

export class ResultProcessor {
  private readonly normalizer: PriceNormalizer
  private readonly deduplicator: Deduplicator
  private readonly logger: ILogger

  constructor(deps: ResultProcessorDeps) {
    this.normalizer = deps.normalizer
    this.logger = deps.logger ?? loggers.processing
    this.deduplicator = new Deduplicator(deps.matcher, this.logger)
  }

  async process(
    offers: ReadonlyArray<Readonly<RawOffer>>,
    query: string,
    targetCurrency: string
  ): Promise<ProcessedResults> {
    const outcomes = await Promise.all(offers.map((offer) => this.normalizer.normalize(offer, targetCurrency)))

    const normalized: NormalizedOffer[] = []
    let unparseable = 0
    let conversionFallbacks = 0
    for (const outcome of outcomes) {
      if (outcome.status === 'drop') {
        unparseable++
        continue
      }
      if (outcome.status === 'conversion_fallback') {
        conversionFallbacks++
      }
      outcome.offer.similarityScore = queryRelevance(outcome.offer.offer.productName, query)
      normalized.push(outcome.offer)
    }

    const { representatives } = this.deduplicator.deduplicate(normalized, query)
    const ranked = rankOffers(representatives)

    const stats: ProcessingStats = {
      received: offers.length,
      unparseable,
      conversionFallbacks,
      duplicatesMerged: normalized.length - representatives.length,
      returned: ranked.length,
    }
    this.logger.info('Results processed', { ...stats })

    return { ranked, stats }
  }
}

/**
 * Response shape of one ranked offer. Absent optional fields become null.
 */
export function toResultItem(ranked: RankedOffer): ResultItem {
  const raw = ranked.offer
  return {
    link: raw.link,
    price: ranked.normalizedPrice.toFixed(2),
    currency: ranked.normalizedCurrency,
    productName: raw.productName,
    availability: raw.availability,
    rating: raw.rating ?? null,
    reviewsCount: raw.reviewsCount ?? null,
    seller: raw.seller ?? null,
    shippingCost: raw.shippingCost ?? null,
    deliveryTime: raw.deliveryTime ?? null,
    imageUrl: raw.imageUrl ?? null,
    specifications: raw.specifications ? { ...raw.specifications } : null,
    confidenceScore: raw.confidenceScore ?? 1,
    source: raw.source,
    scrapedAt: raw.scrapedAt,
    similarityScore: ranked.similarityScore,
    rank: ranked.finalRank,
  }
}
