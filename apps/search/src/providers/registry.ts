/**
 * Provider Registry
 *
 * Providers must be explicitly registered; no auto-discovery.
 * Registration order is kept because it breaks priority ties.
 */

import { ProviderRegistrationError } from '../lib/errors.js'
import type { PriceProvider, ProviderDescriptor } from './types.js'

function nameKey(name: string): string {
  return name.trim().toLowerCase()
}

/**
 * In-memory provider registry.
 * Providers are registered at startup and remain fixed during a search.
 */
export class ProviderRegistry {
  private readonly providers = new Map<string, PriceProvider>()

  constructor(providers: Iterable<PriceProvider> = []) {
    this.registerAll(providers)
  }

  /**
   * Register a provider.
   * @throws ProviderRegistrationError if the name is blank or already registered (case-insensitive)
   */
  register(provider: PriceProvider): void {
    const key = nameKey(provider.name)
    if (!key) {
      throw new ProviderRegistrationError('Provider name must not be empty')
    }

    const existing = this.providers.get(key)
    if (existing) {
      throw new ProviderRegistrationError(
        `Provider '${provider.name}' is already registered as '${existing.name}'`
      )
    }

    this.providers.set(key, provider)
  }

  registerAll(providers: Iterable<PriceProvider>): void {
    for (const provider of providers) {
      this.register(provider)
    }
  }

  get(name: string): PriceProvider | undefined {
    return this.providers.get(nameKey(name))
  }

  /**
   * All providers in registration order.
   */
  list(): PriceProvider[] {
    return Array.from(this.providers.values())
  }

  /**
   * Providers that serve a country, in registration order.
   */
  forCountry(country: string): PriceProvider[] {
    return this.list().filter((provider) => provider.supports(country))
  }

  describe(country: string): ProviderDescriptor[] {
    return this.list().map((provider) => ({
      name: provider.name,
      priority: provider.priority(country),
      supported: provider.supports(country),
    }))
  }

  size(): number {
    return this.providers.size
  }
}
