import * as cheerio from 'cheerio'
import type { RawOffer } from '../types.js'
import {
  DEFAULT_LISTING_AVAILABILITY,
  DEFAULT_LISTING_MAX_RESULTS,
  type ListingManifest,
  type ListingRegion,
} from './types.js'

function resolveUrl(href: string | undefined, base: string): string | undefined {
  if (!href) return undefined
  try {
    return new URL(href, base).toString()
  } catch {
    return undefined
  }
}

/**
 * "4.5 out of 5 stars" -> 4.5. Values outside 0-5 are ignored.
 */
export function parseRating(value: string | undefined): number | null {
  const match = value?.match(/\d+(?:[.,]\d+)?/)
  if (!match) return null
  const rating = Number.parseFloat(match[0].replace(',', '.'))
  return Number.isFinite(rating) && rating >= 0 && rating <= 5 ? rating : null
}

/**
 * "(12,345 reviews)" -> 12345
 */
export function parseReviewCount(value: string | undefined): number | null {
  const match = value?.match(/\d[\d,.\s]*/)
  if (!match) return null
  const count = Number.parseInt(match[0].replace(/[^\d]/g, ''), 10)
  return Number.isFinite(count) ? count : null
}

/**
 * Shipping text as the ranker expects it: "0" for free shipping, the
 * displayed number otherwise ("+ $5.99 shipping" -> "5.99").
 */
export function normalizeShipping(value: string | undefined): string | null {
  if (!value) return null
  if (/\bfree\b/i.test(value)) return '0'
  const match = value.match(/\d[\d.,]*/)
  return match ? match[0] : null
}

export interface ExtractListingsInput {
  html: string
  manifest: ListingManifest
  region: ListingRegion
  /** Page URL, used to resolve relative links */
  pageUrl: string
  observedAt: Date
}

/**
 * Parse one search-results page into raw offers.
 * Cards missing a title, price or link are skipped.
 */
export function extractListings(input: ExtractListingsInput): RawOffer[] {
  const { manifest, region, pageUrl } = input
  const { selectors } = manifest
  const $ = cheerio.load(input.html)
  const limit = manifest.maxResults ?? DEFAULT_LISTING_MAX_RESULTS
  const skip = (manifest.skipTitles ?? []).map((title) => title.toLowerCase())
  const scrapedAt = input.observedAt.toISOString()
  const offers: RawOffer[] = []

  $(selectors.item).each((_index, element) => {
    if (offers.length >= limit) return false

    const card = $(element)
    const text = (selector: string | undefined): string | undefined => {
      if (!selector) return undefined
      const value = card.find(selector).first().text().replace(/\s+/g, ' ').trim()
      return value || undefined
    }
    const attr = (selector: string | undefined, names: string[]): string | undefined => {
      if (!selector) return undefined
      const found = card.find(selector).first()
      for (const name of names) {
        const value = found.attr(name)?.trim()
        if (value) return value
      }
      return undefined
    }

    const title = text(selectors.title)
    const price = text(selectors.price)
    const link = resolveUrl(attr(selectors.link, ['href']), pageUrl)

    if (!title || !price || !link) return undefined
    const lowered = title.toLowerCase()
    if (skip.some((fragment) => lowered.includes(fragment))) return undefined

    offers.push({
      link,
      price,
      currency: region.currency,
      productName: title,
      availability: text(selectors.availability) ?? manifest.defaultAvailability ?? DEFAULT_LISTING_AVAILABILITY,
      rating: parseRating(text(selectors.rating)),
      reviewsCount: parseReviewCount(text(selectors.reviews)),
      seller: text(selectors.seller) ?? null,
      shippingCost: normalizeShipping(text(selectors.shipping)),
      imageUrl: resolveUrl(attr(selectors.image, ['src', 'data-src']), pageUrl) ?? null,
      source: manifest.name,
      scrapedAt,
    })
    return undefined
  })

  return offers
}
