/**
 * Transport driver registry
 *
 * Maps a platform's driver identifier to the adapter that speaks its protocol.
 */

import type { AdapterFactory, TransportAdapter } from './types.js'
import { EosEapiAdapter } from './eos.js'
import { DriverNotFoundError } from '../lib/errors.js'

export class DriverRegistry {
  private readonly factories = new Map<string, AdapterFactory>()

  register(driver: string, factory: AdapterFactory): this {
    this.factories.set(driver.toLowerCase(), factory)
    return this
  }

  has(driver: string): boolean {
    return this.factories.has(driver.toLowerCase())
  }

  /**
   * @throws DriverNotFoundError
   */
  get(driver: string): TransportAdapter {
    const factory = this.factories.get(driver.toLowerCase())
    if (!factory) {
      throw new DriverNotFoundError(driver, this.drivers())
    }
    return factory()
  }

  drivers(): string[] {
    return [...this.factories.keys()].sort()
  }
}

/**
 * Registry with the built-in drivers
 */
export function createDriverRegistry(): DriverRegistry {
  return new DriverRegistry()
    .register('eos', () => new EosEapiAdapter())
}
