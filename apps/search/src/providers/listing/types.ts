import type { ProviderKind } from '../types.js'

/**
 * CSS selectors for a search-results page.
 * `item` selects one listing card; every other selector is scoped to the card.
 */
export interface ListingSelectors {
  item: string
  title: string
  price: string
  link: string
  image?: string
  shipping?: string
  seller?: string
  rating?: string
  reviews?: string
  availability?: string
}

export interface ListingRegion {
  /** Search URL with a `{query}` placeholder, e.g. https://shop.example/search?q={query} */
  searchUrl: string
  /** ISO 4217 currency the region prices in */
  currency: string
}

export interface ListingManifest {
  name: string
  kind?: ProviderKind
  /** Country code -> region settings. Keys define the supported countries */
  regions: Record<string, ListingRegion>
  selectors: ListingSelectors
  priority?: number | Record<string, number>
  /** Cap on listings read per page (default: 15) */
  maxResults?: number
  /** Availability reported when the page shows none (default: 'In Stock') */
  defaultAvailability?: string
  /** Listings whose title contains one of these (case-insensitive) are skipped, e.g. ad tiles */
  skipTitles?: string[]
  minIntervalMs?: number
  requestTimeoutMs?: number
  headers?: Record<string, string>
}

export const DEFAULT_LISTING_MAX_RESULTS = 15
export const DEFAULT_LISTING_AVAILABILITY = 'In Stock'
