import { describe, it, expect } from 'vitest'
import { detectCurrency, normalizeAmount, parseAmount, parsePrice } from '../price-parser.js'

describe('parsePrice', () => {
  it.each([
    { text: '$1,299.99', amount: 1299.99, currency: 'USD' },
    { text: '£899', amount: 899, currency: 'GBP' },
    { text: '1.299,00 €', amount: 1299, currency: 'EUR' },
    { text: 'Rs. 84,999', amount: 84999, currency: 'INR' },
    { text: '₹1,29,900', amount: 129900, currency: 'INR' },
    { text: "CHF 1'099.–", amount: 1099, currency: 'CHF' },
    { text: 'USD 999', amount: 999, currency: 'USD' },
    { text: '999 EUR', amount: 999, currency: 'EUR' },
    { text: 'C$ 1,499.00', amount: 1499, currency: 'CAD' },
    { text: 'US$ 25', amount: 25, currency: 'USD' },
    { text: '2 999 kr', amount: 2999, currency: 'SEK' },
    { text: '¥ 158,000', amount: 158000, currency: 'JPY' },
    { text: 'RM 4.299,00', amount: 4299, currency: 'MYR' },
  ])('parses $text', ({ text, amount, currency }) => {
    expect(parsePrice(text)).toEqual({ amount, currency })
  })

  it('resolves a bare dollar sign through a dollar hint', () => {
    expect(parsePrice('$999', 'CAD')).toEqual({ amount: 999, currency: 'CAD' })
    expect(parsePrice('$999', 'aud')).toEqual({ amount: 999, currency: 'AUD' })
  })

  it('reads a bare dollar sign as USD for other hints', () => {
    expect(parsePrice('$999', 'GBP')).toEqual({ amount: 999, currency: 'USD' })
    expect(parsePrice('$999')).toEqual({ amount: 999, currency: 'USD' })
  })

  it('returns the amount alone when no currency is written', () => {
    expect(parsePrice('1,5')).toEqual({ amount: 1.5 })
    expect(parsePrice('1.234.567')).toEqual({ amount: 1234567 })
  })

  it('returns null without a positive amount', () => {
    expect(parsePrice('Free')).toBeNull()
    expect(parsePrice('')).toBeNull()
    expect(parsePrice('$0.00')).toBeNull()
    expect(parsePrice('See price in cart')).toBeNull()
  })
})

describe('normalizeAmount', () => {
  it('treats the last of two separator kinds as the decimal mark', () => {
    expect(normalizeAmount('1,299.99')).toBe('1299.99')
    expect(normalizeAmount('1.299,99')).toBe('1299.99')
  })

  it('treats a single separator before three digits as grouping', () => {
    expect(normalizeAmount('1,299')).toBe('1299')
    expect(normalizeAmount('1.299')).toBe('1299')
  })

  it('keeps a leading zero as a decimal', () => {
    expect(normalizeAmount('0.999')).toBe('0.999')
  })

  it('reads other single separators as decimals', () => {
    expect(normalizeAmount('12,5')).toBe('12.5')
    expect(normalizeAmount('12.50')).toBe('12.50')
  })

  it('drops spaces and apostrophes', () => {
    expect(normalizeAmount("1'099")).toBe('1099')
    expect(normalizeAmount('1 299,00')).toBe('1299.00')
  })
})

describe('detectCurrency', () => {
  it('prefers an ISO code over a symbol', () => {
    expect(detectCurrency('$ 1,499 CAD')).toBe('CAD')
  })

  it('ignores three-letter words that are not currency codes', () => {
    expect(detectCurrency('NEW £20')).toBe('GBP')
  })

  it('resolves shared yen and krona symbols through the hint', () => {
    expect(detectCurrency('¥5,999', 'CNY')).toBe('CNY')
    expect(detectCurrency('￥5,999', 'cny')).toBe('CNY')
    expect(detectCurrency('12 990 kr', 'NOK')).toBe('NOK')
    expect(detectCurrency('1.499 kr', 'DKK')).toBe('DKK')
    expect(detectCurrency('9 990 kr', 'ISK')).toBe('ISK')
  })

  it('keeps the default for a hint outside the symbol family', () => {
    expect(detectCurrency('¥5,999', 'USD')).toBe('JPY')
    expect(detectCurrency('12 990 kr', 'EUR')).toBe('SEK')
    expect(detectCurrency('C$ 20', 'AUD')).toBe('CAD')
  })

  it('does not match alphabetic symbols inside words', () => {
    expect(detectCurrency('Markdown 20')).toBeUndefined()
  })
})

describe('parseAmount', () => {
  it('reads zero and plain numbers', () => {
    expect(parseAmount('0')).toBe(0)
    expect(parseAmount('$5.99')).toBe(5.99)
  })

  it('returns null without digits', () => {
    expect(parseAmount('Free')).toBeNull()
  })
})
