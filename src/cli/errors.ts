import chalk from 'chalk';
import { UnknownDiscriminatorError } from '../registry';

/**
 * Print an unknown-variant error with the valid choices.
 * Returns false for any other error so the caller can rethrow it.
 */
export function reportUnknownVariant(err: unknown): boolean {
  if (!(err instanceof UnknownDiscriminatorError)) {
    return false;
  }

  console.log(chalk.red(`\n  Unknown ${err.registryName}: ${err.requested}`));
  console.log(chalk.dim(`  Valid choices: ${err.valid.join(', ') || '(none)'}\n`));
  process.exitCode = 1;
  return true;
}
