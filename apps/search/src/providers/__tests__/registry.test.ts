import { describe, it, expect } from 'vitest'
import { ProviderRegistrationError } from '../../lib/errors.js'
import { ProviderRegistry } from '../registry.js'
import { FakeProvider } from '../../__tests__/helpers.js'

describe('ProviderRegistry', () => {
  it('keeps registration order', () => {
    const registry = new ProviderRegistry([
      new FakeProvider({ name: 'Walmart' }),
      new FakeProvider({ name: 'Amazon' }),
      new FakeProvider({ name: 'eBay' }),
    ])

    expect(registry.list().map((p) => p.name)).toEqual(['Walmart', 'Amazon', 'eBay'])
    expect(registry.size()).toBe(3)
  })

  it('rejects duplicate names case-insensitively', () => {
    const registry = new ProviderRegistry([new FakeProvider({ name: 'Amazon' })])

    expect(() => registry.register(new FakeProvider({ name: ' amazon ' }))).toThrow(ProviderRegistrationError)
    expect(() => registry.register(new FakeProvider({ name: ' amazon ' }))).toThrow(
      "Provider ' amazon ' is already registered as 'Amazon'"
    )
    expect(registry.size()).toBe(1)
  })

  it('rejects blank names', () => {
    const registry = new ProviderRegistry()
    expect(() => registry.register(new FakeProvider({ name: '   ' }))).toThrow('Provider name must not be empty')
  })

  it('looks providers up by name case-insensitively', () => {
    const amazon = new FakeProvider({ name: 'Amazon' })
    const registry = new ProviderRegistry([amazon])

    expect(registry.get('AMAZON')).toBe(amazon)
    expect(registry.get('flipkart')).toBeUndefined()
  })

  it('filters by supported country', () => {
    const registry = new ProviderRegistry([
      new FakeProvider({ name: 'Amazon', countries: ['US', 'GB'] }),
      new FakeProvider({ name: 'Flipkart', countries: ['IN'] }),
      new FakeProvider({ name: 'Argos', countries: ['GB'] }),
    ])

    expect(registry.forCountry('gb').map((p) => p.name)).toEqual(['Amazon', 'Argos'])
    expect(registry.forCountry('FR')).toEqual([])
  })

  it('describes every provider for a country', () => {
    const registry = new ProviderRegistry([
      new FakeProvider({ name: 'Amazon', countries: ['US'], priority: 2 }),
      new FakeProvider({ name: 'Flipkart', countries: ['IN'], priority: 1 }),
    ])

    expect(registry.describe('US')).toEqual([
      { name: 'Amazon', priority: 2, supported: true },
      { name: 'Flipkart', priority: 999, supported: false },
    ])
  })
})
