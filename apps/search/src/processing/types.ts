import type { RawOffer } from '../providers/types.js'

/**
 * A raw offer wrapped with the values the pipeline derives for it.
 * The raw offer itself is never edited.
 */
export interface NormalizedOffer {
  readonly offer: Readonly<RawOffer>
  /** Amount in `normalizedCurrency`, always > 0 */
  readonly normalizedPrice: number
  readonly normalizedCurrency: string
  /** Relevance to the query, 0-1 */
  similarityScore: number
  duplicateGroupId?: string
}

export interface RankedOffer extends NormalizedOffer {
  /** Composite ranking score, 0-1 */
  rankingScore: number
  /** 1-based position after ranking */
  finalRank: number
}

/**
 * One entry of a search response.
 */
export interface ResultItem {
  link: string
  /** Normalized amount with two decimals */
  price: string
  currency: string
  productName: string
  availability: string
  rating: number | null
  reviewsCount: number | null
  seller: string | null
  shippingCost: string | null
  deliveryTime: string | null
  imageUrl: string | null
  specifications: Record<string, string> | null
  confidenceScore: number
  source: string
  scrapedAt: string
  similarityScore: number
  rank: number
}
