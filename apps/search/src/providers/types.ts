/**
 * Provider Framework Core Types
 *
 * A provider is a named offer source (a retailer search page, a partner API,
 * a regional store) that answers one query for one country. Providers are
 * registered explicitly at startup; the orchestrator never discovers them.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// RawOffer - Provider Output Contract
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One listing exactly as a provider saw it.
 *
 * Produced once per provider call and frozen by the orchestrator; every later
 * stage wraps it instead of editing it.
 */
export interface RawOffer {
  /** Product page URL */
  link: string

  /** Free-text price as displayed ("$1,299.99", "£899", "1.299,00 €") */
  price: string

  /** Declared ISO 4217 code when the provider knows it */
  currency?: string

  productName: string

  /** Free-text availability ("In Stock", "Limited stock", "Sold out") */
  availability: string

  /** 0-5 star rating */
  rating?: number | null

  reviewsCount?: number | null

  seller?: string | null

  /** Free-text shipping cost ("Free", "$5.99", "0") */
  shippingCost?: string | null

  deliveryTime?: string | null

  imageUrl?: string | null

  specifications?: Record<string, string> | null

  /** Provider's own confidence in the extraction, 0-1. Default 1 */
  confidenceScore?: number

  /** Provider name */
  source: string

  /** ISO 8601 timestamp of the observation */
  scrapedAt: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Provider Interface
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Priority reported for countries a provider does not serve.
 */
export const UNSUPPORTED_PRIORITY = 999

export type ProviderKind = 'ecommerce' | 'regional' | 'api' | 'specialized'

export interface ProviderFetchOptions {
  /**
   * Aborted when the orchestrator's per-provider budget runs out.
   * Providers should stop work and reject once it fires.
   */
  signal?: AbortSignal
}

export interface PriceProvider {
  /** Unique, human-readable name (matched case-insensitively) */
  readonly name: string

  supports(country: string): boolean

  /**
   * Lower numbers run first. Unsupported countries return UNSUPPORTED_PRIORITY.
   */
  priority(country: string): number

  /**
   * Fetch offers for a query. May reject; must not be relied on to stop by
   * itself, the orchestrator enforces its own timeout.
   */
  fetch(query: string, country: string, options?: ProviderFetchOptions): Promise<RawOffer[]>
}

export interface ProviderDescriptor {
  name: string
  /** Present when described for a country */
  priority?: number
  supported?: boolean
}
