import { describe, it, expect } from 'vitest'
import { checkRawOffer } from '../raw-offer.js'
import { makeOffer } from '../../__tests__/helpers.js'

describe('checkRawOffer', () => {
  it('accepts a well-formed offer and freezes it', () => {
    const result = checkRawOffer(makeOffer({ rating: 4.5, reviewsCount: 10 }), 'TestShop')

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.offer.rating).toBe(4.5)
      expect(result.offer.reviewsCount).toBe(10)
      expect(Object.isFrozen(result.offer)).toBe(true)
    }
  })

  it('stamps a blank source with the provider name', () => {
    const result = checkRawOffer(makeOffer({ source: '  ' }), 'Argos')

    expect(result.ok && result.offer.source).toBe('Argos')
  })

  it('freezes specifications', () => {
    const result = checkRawOffer(makeOffer({ specifications: { ram: '8GB' } }), 'TestShop')

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.offer.specifications).toEqual({ ram: '8GB' })
      expect(Object.isFrozen(result.offer.specifications)).toBe(true)
    }
  })

  it('rejects offers with a blank price', () => {
    const result = checkRawOffer(makeOffer({ price: '  ' }), 'TestShop')

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.issues).toHaveLength(1)
      expect(result.issues[0]?.startsWith('price:')).toBe(true)
    }
  })

  it('rejects ratings outside 0-5 and non-objects', () => {
    expect(checkRawOffer(makeOffer({ rating: 7 }), 'TestShop').ok).toBe(false)
    expect(checkRawOffer('not an offer', 'TestShop').ok).toBe(false)
    expect(checkRawOffer(null, 'TestShop').ok).toBe(false)
  })

  it('accepts null optional fields', () => {
    const result = checkRawOffer(makeOffer({ seller: null, shippingCost: null, imageUrl: null }), 'TestShop')
    expect(result.ok).toBe(true)
  })
})
