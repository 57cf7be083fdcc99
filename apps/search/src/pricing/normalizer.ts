/**
 * Price Normalizer
 *
 * Reads a raw offer's price text and expresses it in the target currency.
 * Failures stay per offer: unparseable prices drop the offer, failed
 * conversions keep it in its source currency.
 */

import type { ILogger } from '@pricemesh/logger'
import { loggers } from '../config/logger.js'
import { classifyError, formatErrorForLog, PriceParseError } from '../lib/errors.js'
import type { NormalizedOffer } from '../processing/types.js'
import type { RawOffer } from '../providers/types.js'
import type { CurrencyConverter } from './currency.js'
import { parsePrice } from './price-parser.js'

export type NormalizeResult =
  | { status: 'ok'; offer: NormalizedOffer }
  | { status: 'conversion_fallback'; offer: NormalizedOffer; reason: string }
  | { status: 'drop'; reason: string }

export class PriceNormalizer {
  private readonly logger: ILogger

  constructor(
    private readonly converter: CurrencyConverter,
    logger: ILogger = loggers.pricing
  ) {
    this.logger = logger
  }

  async normalize(offer: Readonly<RawOffer>, targetCurrency: string): Promise<NormalizeResult> {
    const target = targetCurrency.toUpperCase()
    const declared = offer.currency?.trim().toUpperCase() || undefined
    const parsed = parsePrice(offer.price, declared)

    if (!parsed) {
      this.logger.debug('Dropping offer with unparseable price', {
        source: offer.source,
        price: offer.price,
      })
      return { status: 'drop', reason: new PriceParseError(offer.price).message }
    }

    const currency = parsed.currency ?? declared ?? target
    const wrap = (normalizedPrice: number, normalizedCurrency: string): NormalizedOffer => ({
      offer,
      normalizedPrice,
      normalizedCurrency,
      similarityScore: 0,
    })

    if (currency === target) {
      return { status: 'ok', offer: wrap(parsed.amount, target) }
    }

    try {
      const converted = await this.converter.convert(parsed.amount, currency, target)
      if (!Number.isFinite(converted) || converted <= 0) {
        throw new RangeError(`converter returned ${converted}`)
      }
      return { status: 'ok', offer: wrap(converted, target) }
    } catch (error) {
      const classified = classifyError(error)
      this.logger.warn('Currency conversion failed, keeping source currency', {
        source: offer.source,
        from: currency,
        to: target,
        ...formatErrorForLog(classified),
      })
      return {
        status: 'conversion_fallback',
        offer: wrap(parsed.amount, currency),
        reason: classified.message,
      }
    }
  }
}
