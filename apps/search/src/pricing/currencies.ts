import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

const dataFile = (name: string) => fileURLToPath(new URL(`../../data/${name}`, import.meta.url))

/**
 * ISO 4217 codes recognised inside free-text prices ("USD 999", "899 EUR").
 */
export const KNOWN_CURRENCY_CODES: ReadonlySet<string> = new Set(
  z.array(z.string().length(3)).parse(JSON.parse(readFileSync(dataFile('currencies.json'), 'utf8')))
)

export const exchangeRatesSchema = z.object({
  base: z
    .string()
    .length(3)
    .transform((code) => code.toUpperCase()),
  date: z.string().optional(),
  rates: z.record(z.number().positive()),
})

export type ExchangeRates = z.infer<typeof exchangeRatesSchema>

/**
 * Bundled reference rates (EUR based).
 */
export function loadReferenceRates(file: string = dataFile('exchange-rates.json')): ExchangeRates {
  return exchangeRatesSchema.parse(JSON.parse(readFileSync(file, 'utf8')))
}

/**
 * Currencies written with a bare `$`.
 */
export const DOLLAR_CURRENCIES: ReadonlySet<string> = new Set(['USD', 'CAD', 'AUD', 'NZD', 'SGD', 'HKD', 'MXN', 'TWD'])

/**
 * Symbols shared by several currencies. The first code is the default; a
 * declared currency from the same family wins.
 */
export const SYMBOL_FAMILIES: ReadonlyMap<string, readonly string[]> = new Map([
  ['$', [...DOLLAR_CURRENCIES]],
  ['¥', ['JPY', 'CNY']],
  ['￥', ['JPY', 'CNY']],
  ['kr', ['SEK', 'NOK', 'DKK', 'ISK']],
])

/**
 * Symbols and prefixes, longest first so `US$` wins over `$`.
 * Alphabetic entries only match as whole words.
 */
export const CURRENCY_SYMBOLS: ReadonlyArray<readonly [symbol: string, code: string]> = [
  ['US$', 'USD'],
  ['CA$', 'CAD'],
  ['AU$', 'AUD'],
  ['NZ$', 'NZD'],
  ['HK$', 'HKD'],
  ['MX$', 'MXN'],
  ['NT$', 'TWD'],
  ['C$', 'CAD'],
  ['A$', 'AUD'],
  ['S$', 'SGD'],
  ['R$', 'BRL'],
  ['Rs.', 'INR'],
  ['Rs', 'INR'],
  ['CHF', 'CHF'],
  ['RM', 'MYR'],
  ['zł', 'PLN'],
  ['kr', 'SEK'],
  ['£', 'GBP'],
  ['€', 'EUR'],
  ['₹', 'INR'],
  ['¥', 'JPY'],
  ['￥', 'JPY'],
  ['₩', 'KRW'],
  ['₱', 'PHP'],
  ['₺', 'TRY'],
  ['₪', 'ILS'],
  ['฿', 'THB'],
]
