/**
 * Strategy registry
 *
 * Maps case-insensitive discriminators to variant constructors and builds
 * a fresh variant on every create(). Registrations are expected during
 * setup; lookups afterwards. Each register() swaps in a new map, so a
 * lookup always reads one complete snapshot.
 */

import { DuplicateDiscriminatorError, UnknownDiscriminatorError } from './errors';
import type { StrategyRegistryOptions, VariantConstructor, VariantFactory } from './types';

/**
 * Normalize a discriminator for storage and lookup
 */
export function normalizeDiscriminator(discriminator: string): string {
  return discriminator.toLowerCase();
}

export class StrategyRegistry<T> implements VariantFactory<T> {
  readonly name: string;
  private entries: ReadonlyMap<string, VariantConstructor<T>> = new Map();

  constructor(options: StrategyRegistryOptions) {
    this.name = options.name;
  }

  /**
   * Register a constructor under a discriminator.
   *
   * @throws DuplicateDiscriminatorError if the normalized discriminator is taken
   */
  register(discriminator: string, construct: VariantConstructor<T>): void {
    const key = normalizeDiscriminator(discriminator);

    if (this.entries.has(key)) {
      throw new DuplicateDiscriminatorError(key, this.name);
    }

    const next = new Map(this.entries);
    next.set(key, construct);
    this.entries = next;
  }

  /**
   * Construct the variant bound to a discriminator.
   *
   * @throws UnknownDiscriminatorError if nothing is registered under it
   */
  create(discriminator: string): T {
    const entries = this.entries;
    const construct = entries.get(normalizeDiscriminator(discriminator));

    if (!construct) {
      throw new UnknownDiscriminatorError(discriminator, sortedKeys(entries), this.name);
    }

    return construct();
  }

  has(discriminator: string): boolean {
    return this.entries.has(normalizeDiscriminator(discriminator));
  }

  discriminators(): string[] {
    return sortedKeys(this.entries);
  }

  get size(): number {
    return this.entries.size;
  }
}

function sortedKeys(entries: ReadonlyMap<string, unknown>): string[] {
  return Array.from(entries.keys()).sort();
}
