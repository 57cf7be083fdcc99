/**
 * Product Matcher
 *
 * Weighted similarity between two product titles found for the same query,
 * and the duplicate decision built on it.
 */

import type { ILogger } from '@pricemesh/logger'
import { loggers } from '../config/logger.js'
import { extractFeatures, type FeatureSet } from './features.js'
import { partialRatio, processText, ratio, tokenSetRatio, tokenSortRatio } from './text-similarity.js'

export interface SimilarityWeights {
  tokenSort: number
  brand: number
  model: number
  storage: number
  color: number
  query: number
}

/**
 * Default weights - sum to 1.0
 *
 * - Token sort (30%): word-order-insensitive title similarity
 * - Brand (25%): different brands are different products
 * - Model (20%): fuzzy match of the extracted model
 * - Storage (10%): 128GB vs 256GB are different SKUs
 * - Colour (5%): usually a variant, not a different product
 * - Query (10%): both titles answering the query well
 */
export const DEFAULT_SIMILARITY_WEIGHTS: Readonly<SimilarityWeights> = Object.freeze({
  tokenSort: 0.3,
  brand: 0.25,
  model: 0.2,
  storage: 0.1,
  color: 0.05,
  query: 0.1,
})

export const DEFAULT_DUPLICATE_THRESHOLD = 0.85
export const DEFAULT_PRICE_VARIANCE = 0.15
/** Added to the duplicate threshold when prices differ by more than the variance bound */
export const PRICE_GAP_THRESHOLD_PENALTY = 0.05

export type SimilarityComponents = { [K in keyof SimilarityWeights]: number }

export interface SimilarityScore {
  score: number
  components: SimilarityComponents
  features: [FeatureSet, FeatureSet]
}

export interface ProductMatcherOptions {
  duplicateThreshold?: number
  priceVarianceThreshold?: number
  weights?: SimilarityWeights
  logger?: ILogger
}

function compareBrands(a?: string, b?: string): number {
  if (a === undefined || b === undefined) return 0.5
  return a === b ? 1 : 0
}

function compareModels(a?: string, b?: string): number {
  if (a === undefined || b === undefined) return 0.5
  return ratio(a, b)
}

function compareStorage(a?: string, b?: string): number {
  if (a === undefined || b === undefined) return 0.5
  return a === b ? 1 : 0.3
}

function compareColors(a?: string, b?: string): number {
  if (a === undefined || b === undefined) return 0.8
  return a === b ? 1 : 0.6
}

/**
 * 1 - |a - b| / max(a, b). 1 for equal prices, towards 0 as they diverge.
 */
export function priceSimilarity(a: number, b: number): number {
  const larger = Math.max(a, b)
  if (larger <= 0) return a === b ? 1 : 0
  return 1 - Math.abs(a - b) / larger
}

/**
 * How well a product title answers the query:
 * 40% token sort + 40% token set + 20% partial match.
 */
export function queryRelevance(productName: string, query: string): number {
  const name = processText(productName)
  const cleanQuery = processText(query)
  if (!name || !cleanQuery) return 0

  return (
    tokenSortRatio(name, cleanQuery) * 0.4 + tokenSetRatio(name, cleanQuery) * 0.4 + partialRatio(name, cleanQuery) * 0.2
  )
}

export class ProductMatcher {
  readonly duplicateThreshold: number
  readonly priceVarianceThreshold: number
  private readonly weights: SimilarityWeights
  private readonly logger: ILogger

  constructor(options: ProductMatcherOptions = {}) {
    const weights = options.weights ?? DEFAULT_SIMILARITY_WEIGHTS
    const sum = Object.values(weights).reduce((a, b) => a + b, 0)
    if (Math.abs(sum - 1.0) > 0.001) {
      throw new Error(`Weights must sum to 1.0, got ${sum}`)
    }

    this.weights = weights
    this.duplicateThreshold = options.duplicateThreshold ?? DEFAULT_DUPLICATE_THRESHOLD
    this.priceVarianceThreshold = options.priceVarianceThreshold ?? DEFAULT_PRICE_VARIANCE
    this.logger = options.logger ?? loggers.matching
  }

  extractFeatures(productName: string, query = ''): FeatureSet {
    return extractFeatures(productName, query)
  }

  /**
   * Similarity of two titles with the per-component breakdown.
   */
  scoreSimilarity(productA: string, productB: string, query = ''): SimilarityScore {
    const featuresA = extractFeatures(productA, query)
    const featuresB = extractFeatures(productB, query)
    const lowerQuery = query.trim().toLowerCase()

    const components: SimilarityComponents = {
      tokenSort: tokenSortRatio(productA, productB),
      brand: compareBrands(featuresA.brand, featuresB.brand),
      model: compareModels(featuresA.model, featuresB.model),
      storage: compareStorage(featuresA.storage, featuresB.storage),
      color: compareColors(featuresA.color, featuresB.color),
      query: lowerQuery
        ? (partialRatio(lowerQuery, productA) + partialRatio(lowerQuery, productB)) / 2
        : 0.5,
    }

    const weights = this.weights
    const score =
      components.tokenSort * weights.tokenSort +
      components.brand * weights.brand +
      components.model * weights.model +
      components.storage * weights.storage +
      components.color * weights.color +
      components.query * weights.query

    return { score: Math.min(1, Math.max(0, score)), components, features: [featuresA, featuresB] }
  }

  calculateSimilarity(productA: string, productB: string, query = ''): number {
    return this.scoreSimilarity(productA, productB, query).score
  }

  /**
   * Name-based duplicate decision. A price gap beyond the variance bound
   * raises the threshold.
   */
  isDuplicate(productA: string, productB: string, priceA: number, priceB: number, query = ''): boolean {
    let threshold = this.duplicateThreshold
    if (priceA > 0 && priceB > 0 && 1 - priceSimilarity(priceA, priceB) > this.priceVarianceThreshold) {
      threshold += PRICE_GAP_THRESHOLD_PENALTY
    }
    return this.calculateSimilarity(productA, productB, query) >= threshold
  }

  /**
   * Items ordered by partial match of their name against the query, best first.
   * Equal scores keep their input order.
   */
  rankByRelevance<T>(items: readonly T[], query: string, nameOf: (item: T) => string): Array<{ item: T; relevance: number }> {
    const lowerQuery = query.toLowerCase()
    return items
      .map((item) => ({ item, relevance: partialRatio(lowerQuery, nameOf(item)) }))
      .sort((a, b) => b.relevance - a.relevance)
  }

  /**
   * Group items whose names score at least `threshold` against the first
   * member of a group. Items are visited in order; each seeds a group when
   * no earlier seed claimed it.
   */
  groupSimilar<T>(items: readonly T[], nameOf: (item: T) => string, threshold = 0.8): T[][] {
    const groups: T[][] = []
    const used = new Set<number>()

    items.forEach((seed, i) => {
      if (used.has(i)) return
      used.add(i)
      const group = [seed]

      for (let j = i + 1; j < items.length; j++) {
        if (used.has(j)) continue
        const candidate = items[j]
        if (this.calculateSimilarity(nameOf(seed), nameOf(candidate)) >= threshold) {
          group.push(candidate)
          used.add(j)
        }
      }

      groups.push(group)
    })

    this.logger.debug('Grouped similar items', { items: items.length, groups: groups.length, threshold })
    return groups
  }
}
