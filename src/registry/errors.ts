/**
 * Registry errors
 */

/**
 * Thrown when a discriminator is registered twice (after normalization)
 */
export class DuplicateDiscriminatorError extends Error {
  constructor(
    public readonly discriminator: string,
    public readonly registryName: string,
  ) {
    super(`${registryName}: "${discriminator}" is already registered`);
    this.name = 'DuplicateDiscriminatorError';
  }
}

/**
 * Thrown when create() is asked for a discriminator nobody registered.
 * Carries the valid discriminators so callers can show the choices.
 */
export class UnknownDiscriminatorError extends Error {
  constructor(
    public readonly requested: string,
    public readonly valid: string[],
    public readonly registryName: string,
  ) {
    const available = valid.length > 0
      ? `Available: ${valid.join(', ')}`
      : 'Registry is empty';
    super(`Unknown ${registryName}: ${requested}. ${available}`);
    this.name = 'UnknownDiscriminatorError';
  }
}
