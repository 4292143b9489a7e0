/**
 * Registry types
 *
 * A registry maps a discriminator to a constructor for one variant of a
 * capability. The capability contract itself belongs to the caller.
 */

/**
 * Zero-argument constructor for a variant
 */
export type VariantConstructor<T> = () => T;

/**
 * Options for creating a registry
 */
export interface StrategyRegistryOptions {
  /** Registry name, used in error messages (e.g. 'channel', 'discount') */
  name: string;
}

/**
 * Read side of a registry, handed to code that only creates variants
 */
export interface VariantFactory<T> {
  /** Registry name */
  readonly name: string;

  /** Construct a new instance of the variant bound to a discriminator */
  create(discriminator: string): T;

  /** Check whether a discriminator is registered */
  has(discriminator: string): boolean;

  /** Registered discriminators, normalized and sorted */
  discriminators(): string[];

  /** Number of registrations */
  readonly size: number;
}
