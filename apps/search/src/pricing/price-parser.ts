/**
 * Free-text price parsing.
 *
 * Handles the shapes retail pages display: "$1,299.99", "£899", "1.299,00 €",
 * "Rs. 84,999", "CHF 1'099.–", "USD 999".
 */

import { CURRENCY_SYMBOLS, KNOWN_CURRENCY_CODES, SYMBOL_FAMILIES } from './currencies.js'

export interface ParsedPrice {
  amount: number
  /** Detected ISO 4217 code, when the text names one */
  currency?: string
}

const NUMBER_RUN = /\d(?:[\d.,'’\s]*\d)?/
const GROUPING = /['’\s]/g

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

const SYMBOL_MATCHERS = CURRENCY_SYMBOLS.map(([symbol, code]) => {
  const pattern = /^[a-z]/i.test(symbol)
    ? new RegExp(`(?<![\\p{L}])${escapeRegExp(symbol)}(?![\\p{L}])`, 'u')
    : new RegExp(escapeRegExp(symbol), 'u')
  return { pattern, code, family: SYMBOL_FAMILIES.get(symbol) }
})

function resolveFamily(code: string, family: readonly string[] | undefined, hintCurrency?: string): string {
  const hint = hintCurrency?.toUpperCase()
  return hint && family?.includes(hint) ? hint : code
}

/**
 * Detect the currency a price text is written in.
 * ISO codes win over symbols. Shared symbols (`$`, `¥`, `kr`) follow the hint
 * when it belongs to the symbol's family.
 */
export function detectCurrency(text: string, hintCurrency?: string): string | undefined {
  for (const match of text.matchAll(/(?<![A-Za-z])([A-Z]{3})(?![A-Za-z])/g)) {
    const code = match[1]
    if (code && KNOWN_CURRENCY_CODES.has(code)) {
      return code
    }
  }

  for (const { pattern, code, family } of SYMBOL_MATCHERS) {
    if (pattern.test(text)) {
      return resolveFamily(code, family, hintCurrency)
    }
  }

  if (text.includes('$')) {
    return resolveFamily('USD', SYMBOL_FAMILIES.get('$'), hintCurrency)
  }

  return undefined
}

/**
 * Turn a numeric run into a JS number string.
 * Both separators: the last one is the decimal mark. One kind, repeated:
 * grouping. One kind, once: grouping when exactly three digits follow and the
 * integer part is not "0", decimal otherwise.
 */
export function normalizeAmount(run: string): string {
  const compact = run.replace(GROUPING, '')
  const lastComma = compact.lastIndexOf(',')
  const lastDot = compact.lastIndexOf('.')

  if (lastComma >= 0 && lastDot >= 0) {
    const decimal = lastComma > lastDot ? ',' : '.'
    const grouping = decimal === ',' ? '.' : ','
    return compact.split(grouping).join('').replace(decimal, '.')
  }

  const separator = lastComma >= 0 ? ',' : lastDot >= 0 ? '.' : null
  if (separator === null) {
    return compact
  }

  const parts = compact.split(separator)
  if (parts.length > 2) {
    return parts.join('')
  }

  const [integerPart = '', fraction = ''] = parts
  if (fraction.length === 3 && integerPart !== '0' && integerPart !== '') {
    return integerPart + fraction
  }
  return `${integerPart || '0'}.${fraction}`
}

/**
 * First number in a text, zero included. Null when there is none.
 */
export function parseAmount(text: string): number | null {
  const run = text.match(NUMBER_RUN)
  if (!run) {
    return null
  }

  const amount = Number.parseFloat(normalizeAmount(run[0]))
  return Number.isFinite(amount) ? amount : null
}

/**
 * Parse a displayed price. Returns null when no positive amount can be read.
 */
export function parsePrice(text: string, hintCurrency?: string): ParsedPrice | null {
  const amount = parseAmount(text)
  if (amount === null || amount <= 0) {
    return null
  }

  const currency = detectCurrency(text, hintCurrency)
  return currency ? { amount, currency } : { amount }
}
