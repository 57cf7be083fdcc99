/**
 * Ranker
 *
 * Composite score per offer, clamped to [0, 1]:
 * - similarity to the query (40%)
 * - source reliability (20%)
 * - availability (up to 0.15)
 * - rating and review volume (up to 0.10 each)
 * - shipping (+0.05 when free, up to -0.05 when expensive)
 *
 * Ties on score go to the lower price.
 */

import { parseAmount } from '../pricing/price-parser.js'
import type { RawOffer } from '../providers/types.js'
import type { NormalizedOffer, RankedOffer } from './types.js'

export const SOURCE_RELIABILITY: Readonly<Record<string, number>> = Object.freeze({
  amazon: 0.9,
  apple: 0.95,
  bestbuy: 0.85,
  walmart: 0.8,
  target: 0.75,
  ebay: 0.7,
})

export const DEFAULT_SOURCE_RELIABILITY = 0.6

const RANKING_WEIGHTS = {
  similarity: 0.4,
  reliability: 0.2,
  inStock: 0.15,
  limitedStock: 0.1,
  rating: 0.1,
  reviews: 0.1,
  freeShipping: 0.05,
  maxShippingPenalty: 0.05,
} as const

/**
 * Reliability keyed by source name, ignoring case, spaces and punctuation
 * ("Best Buy" -> bestbuy).
 */
export function sourceReliability(source: string): number {
  const key = source.toLowerCase().replace(/[^a-z0-9]/g, '')
  return SOURCE_RELIABILITY[key] ?? DEFAULT_SOURCE_RELIABILITY
}

export function availabilityBonus(availability: string): number {
  const text = availability.trim().toLowerCase()
  if (text === 'in stock' || text === 'available') return RANKING_WEIGHTS.inStock
  if (text.includes('limited')) return RANKING_WEIGHTS.limitedStock
  return 0
}

export function ratingBonus(rating: number | null | undefined): number {
  if (!rating || rating <= 0) return 0
  return Math.min(rating / 5, 1) * RANKING_WEIGHTS.rating
}

export function reviewsBonus(reviewsCount: number | null | undefined): number {
  if (!reviewsCount || reviewsCount <= 0) return 0
  return Math.min(Math.log10(reviewsCount + 1) / 4, 1) * RANKING_WEIGHTS.reviews
}

/**
 * Free shipping earns a bonus; paid shipping costs up to the same amount,
 * in proportion to the item price. Unreadable shipping text counts as 0.
 */
export function shippingAdjustment(shippingCost: string | null | undefined, price: number): number {
  if (!shippingCost?.trim()) return 0
  if (/\bfree\b/i.test(shippingCost)) return RANKING_WEIGHTS.freeShipping

  const amount = parseAmount(shippingCost)
  if (amount === null || amount < 0) return 0
  if (amount === 0) return RANKING_WEIGHTS.freeShipping
  if (price <= 0) return 0

  return -Math.min((amount / price) * RANKING_WEIGHTS.maxShippingPenalty, RANKING_WEIGHTS.maxShippingPenalty)
}

/**
 * Shipping text is in the offer's own currency, so it is weighed against the
 * displayed price rather than the converted one.
 */
export function rankingScore(offer: NormalizedOffer): number {
  const raw: Readonly<RawOffer> = offer.offer
  const score =
    offer.similarityScore * RANKING_WEIGHTS.similarity +
    sourceReliability(raw.source) * RANKING_WEIGHTS.reliability +
    availabilityBonus(raw.availability) +
    ratingBonus(raw.rating) +
    reviewsBonus(raw.reviewsCount) +
    shippingAdjustment(raw.shippingCost, parseAmount(raw.price) ?? offer.normalizedPrice)

  return Math.max(0, Math.min(1, score))
}

/**
 * Score, sort and number offers. Ranks are 1..n with no gaps.
 */
export function rankOffers(offers: readonly NormalizedOffer[]): RankedOffer[] {
  return offers
    .map((offer) => ({ offer, score: rankingScore(offer) }))
    .sort((a, b) => b.score - a.score || a.offer.normalizedPrice - b.offer.normalizedPrice)
    .map(({ offer, score }, index) => ({ ...offer, rankingScore: score, finalRank: index + 1 }))
}
