/**
 * Deduplicator
 *
 * Greedy single-pass clustering in arrival order. An offer joins the first
 * group holding a member it duplicates by name and by price; otherwise it
 * opens a new group. Offer counts per search are small, so comparing
 * against every member is fine.
 */

import { createHash } from 'node:crypto'
import type { ILogger } from '@pricemesh/logger'
import { loggers } from '../config/logger.js'
import { priceSimilarity, type ProductMatcher } from '../matching/product-matcher.js'
import type { NormalizedOffer } from './types.js'

export interface DedupResult {
  /** One representative per group, in group-creation order */
  representatives: NormalizedOffer[]
  /** Every input offer, grouped; each carries its group id */
  groups: NormalizedOffer[][]
}

/**
 * Highest similarity, then lowest price, then earliest arrival.
 */
export function pickRepresentative(group: readonly NormalizedOffer[]): NormalizedOffer {
  const [first, ...rest] = group
  if (!first) {
    throw new RangeError('Cannot pick a representative of an empty group')
  }
  return rest.reduce(
    (best, candidate) =>
      candidate.similarityScore > best.similarityScore ||
      (candidate.similarityScore === best.similarityScore && candidate.normalizedPrice < best.normalizedPrice)
        ? candidate
        : best,
    first
  )
}

/**
 * Short hash of a product name: first 8 hex chars of SHA-256.
 */
export function nameHash(productName: string): string {
  return createHash('sha256').update(productName).digest('hex').slice(0, 8)
}

export class Deduplicator {
  private readonly logger: ILogger

  constructor(
    private readonly matcher: ProductMatcher,
    logger: ILogger = loggers.processing
  ) {
    this.logger = logger.child('dedup')
  }

  private belongsTo(offer: NormalizedOffer, group: readonly NormalizedOffer[], query: string): boolean {
    const minPriceSimilarity = 1 - this.matcher.priceVarianceThreshold
    return group.some(
      (member) =>
        priceSimilarity(offer.normalizedPrice, member.normalizedPrice) > minPriceSimilarity &&
        this.matcher.isDuplicate(
          offer.offer.productName,
          member.offer.productName,
          offer.normalizedPrice,
          member.normalizedPrice,
          query
        )
    )
  }

  /**
   * Cluster offers and tag every one with its group id.
   * Ids are unique per call: a colliding hash gets a `-2`, `-3`, ... suffix.
   */
  deduplicate(offers: readonly NormalizedOffer[], query = ''): DedupResult {
    const groups: NormalizedOffer[][] = []

    for (const offer of offers) {
      const home = groups.find((group) => this.belongsTo(offer, group, query))
      if (home) {
        home.push(offer)
      } else {
        groups.push([offer])
      }
    }

    const seen = new Map<string, number>()
    const representatives = groups.map((group) => {
      const representative = pickRepresentative(group)
      const hash = nameHash(representative.offer.productName)
      const count = (seen.get(hash) ?? 0) + 1
      seen.set(hash, count)
      const groupId = count === 1 ? hash : `${hash}-${count}`

      for (const member of group) {
        member.duplicateGroupId = groupId
      }
      return representative
    })

    this.logger.debug('Deduplication complete', {
      received: offers.length,
      groups: groups.length,
      merged: offers.length - groups.length,
    })

    return { representatives, groups }
  }
}
