import { z } from 'zod'
import type { RawOffer } from './types.js'

const optionalText = z.string().trim().min(1).nullish()

/**
 * Shape check for offers coming back from providers. Providers are external
 * code; anything that fails here is dropped before normalization.
 */
export const rawOfferSchema = z.object({
  link: z.string().trim().min(1),
  price: z.string().trim().min(1),
  currency: z.string().trim().min(1).optional(),
  productName: z.string().trim().min(1),
  availability: z.string(),
  rating: z.number().min(0).max(5).nullish(),
  reviewsCount: z.number().int().min(0).nullish(),
  seller: optionalText,
  shippingCost: optionalText,
  deliveryTime: optionalText,
  imageUrl: optionalText,
  specifications: z.record(z.string()).nullish(),
  confidenceScore: z.number().min(0).max(1).optional(),
  source: z.string(),
  scrapedAt: z.string().min(1),
})

export type RawOfferCheck =
  | { ok: true; offer: Readonly<RawOffer> }
  | { ok: false; issues: string[] }

/**
 * Validate one provider offer, stamp an empty source with the provider name
 * and freeze the result.
 */
export function checkRawOffer(candidate: unknown, providerName: string): RawOfferCheck {
  const parsed = rawOfferSchema.safeParse(candidate)
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    }
  }

  const offer: RawOffer = {
    ...parsed.data,
    source: parsed.data.source.trim() || providerName,
  }
  if (offer.specifications) {
    Object.freeze(offer.specifications)
  }

  return { ok: true, offer: Object.freeze(offer) }
}
