import { z } from 'zod'
import { MAX_TIMEOUT_SECONDS, type SearchConfig } from '../config/index.js'
import type { ResultItem } from '../processing/types.js'

const sourceList = z.array(z.string().trim().min(1)).optional()

/**
 * Request schema with defaults taken from the service configuration.
 */
export function createSearchRequestSchema(
  defaults: Pick<SearchConfig, 'defaultMaxResults' | 'defaultTimeoutSeconds' | 'defaultTargetCurrency'>
) {
  return z.object({
    query: z.string().trim().min(1, 'must not be empty'),
    country: z
      .string()
      .trim()
      .regex(/^[A-Za-z]{2}$/, 'must be a two-letter country code')
      .transform((code) => code.toUpperCase()),
    maxResults: z.number().int().min(0).default(defaults.defaultMaxResults),
    /** Total budget in seconds */
    timeout: z.number().positive().max(MAX_TIMEOUT_SECONDS).default(defaults.defaultTimeoutSeconds),
    targetCurrency: z
      .string()
      .trim()
      .regex(/^[A-Za-z]{3}$/, 'must be a three-letter currency code')
      .transform((code) => code.toUpperCase())
      .default(defaults.defaultTargetCurrency),
    includeSources: sourceList,
    excludeSources: sourceList,
  })
}

type SearchRequestSchema = ReturnType<typeof createSearchRequestSchema>

/** What callers pass to `search`; omitted fields take configured defaults */
export type SearchRequestInput = z.input<SearchRequestSchema>

/** A validated request */
export type SearchRequest = Readonly<z.output<SearchRequestSchema>>

export interface SearchResponse {
  results: ResultItem[]
  totalResults: number
  /** Wall-clock seconds */
  searchTime: number
  /** Providers that answered in time, in dispatch order */
  sourcesUsed: string[]
  query: string
  country: string
  /** ISO 8601 */
  timestamp: string
}
