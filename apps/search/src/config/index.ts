/**
 * Search configuration, validated from environment variables.
 *
 * Every value has a default so an empty environment yields a working config.
 */

import { z } from 'zod'
import { ConfigError } from '../lib/errors.js'

export interface SearchConfig {
  /** Upper bound on provider fetches in flight at once */
  maxConcurrentProviders: number
  /** Total wall-clock budget of one search, in seconds */
  defaultTimeoutSeconds: number
  /** 0 means unlimited */
  defaultMaxResults: number
  defaultTargetCurrency: string
  duplicateThreshold: number
  priceVarianceThreshold: number
  exchangeRatesUrl?: string
  exchangeRatesTtlSeconds: number
}

/** Longest search budget whose timer fits in setTimeout's 32-bit delay */
export const MAX_TIMEOUT_SECONDS = 2_147_483

export const DEFAULT_SEARCH_CONFIG: Readonly<SearchConfig> = Object.freeze({
  maxConcurrentProviders: 10,
  defaultTimeoutSeconds: 60,
  defaultMaxResults: 50,
  defaultTargetCurrency: 'USD',
  duplicateThreshold: 0.85,
  priceVarianceThreshold: 0.15,
  exchangeRatesTtlSeconds: 3600,
})

// Blank variables behave as unset
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const optionalNumber = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema.optional())

const envSchema = z.object({
  MAX_CONCURRENT_PROVIDERS: optionalNumber(z.coerce.number().int().min(1)),
  SEARCH_TIMEOUT_SECONDS: optionalNumber(z.coerce.number().positive().max(MAX_TIMEOUT_SECONDS)),
  SEARCH_MAX_RESULTS: optionalNumber(z.coerce.number().int().min(0)),
  TARGET_CURRENCY: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .regex(/^[A-Za-z]{3}$/, 'must be a three-letter currency code')
      .transform((code) => code.toUpperCase())
      .optional()
  ),
  DUPLICATE_THRESHOLD: optionalNumber(z.coerce.number().min(0).max(1)),
  PRICE_VARIANCE_THRESHOLD: optionalNumber(z.coerce.number().min(0).max(1)),
  EXCHANGE_RATES_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
  EXCHANGE_RATES_TTL_SECONDS: optionalNumber(z.coerce.number().int().min(0)),
})

type SearchEnv = z.infer<typeof envSchema>

function pick<T>(value: T | undefined, fallback: T): T {
  return value === undefined ? fallback : value
}

/**
 * Build a frozen SearchConfig from environment variables.
 * @throws ConfigError listing every invalid variable
 */
export function loadSearchConfig(env: NodeJS.ProcessEnv = process.env): Readonly<SearchConfig> {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw ConfigError.fromZod(parsed.error)
  }

  const values: SearchEnv = parsed.data
  const config: SearchConfig = {
    maxConcurrentProviders: pick(values.MAX_CONCURRENT_PROVIDERS, DEFAULT_SEARCH_CONFIG.maxConcurrentProviders),
    defaultTimeoutSeconds: pick(values.SEARCH_TIMEOUT_SECONDS, DEFAULT_SEARCH_CONFIG.defaultTimeoutSeconds),
    defaultMaxResults: pick(values.SEARCH_MAX_RESULTS, DEFAULT_SEARCH_CONFIG.defaultMaxResults),
    defaultTargetCurrency: pick(values.TARGET_CURRENCY, DEFAULT_SEARCH_CONFIG.defaultTargetCurrency),
    duplicateThreshold: pick(values.DUPLICATE_THRESHOLD, DEFAULT_SEARCH_CONFIG.duplicateThreshold),
    priceVarianceThreshold: pick(values.PRICE_VARIANCE_THRESHOLD, DEFAULT_SEARCH_CONFIG.priceVarianceThreshold),
    exchangeRatesTtlSeconds: pick(values.EXCHANGE_RATES_TTL_SECONDS, DEFAULT_SEARCH_CONFIG.exchangeRatesTtlSeconds),
  }

  if (values.EXCHANGE_RATES_URL) {
    config.exchangeRatesUrl = values.EXCHANGE_RATES_URL
  }

  return Object.freeze(config)
}
