/**
 * Registry module
 *
 * Generic discriminator-to-variant registry used by every capability.
 */

export type { VariantConstructor, StrategyRegistryOptions, VariantFactory } from './types';
export { DuplicateDiscriminatorError, UnknownDiscriminatorError } from './errors';
export { StrategyRegistry, normalizeDiscriminator } from './registry';
