/**
 * Discounts module
 */

import type { DiscountsConfig } from '../config';
import type { StrategyRegistry } from '../registry';
import { FixedAmountDiscount, NoDiscount, PercentageDiscount } from './strategies';
import type { DiscountStrategy } from './types';

export type { DiscountStrategy, DiscountQuote } from './types';

export {
  NoDiscount,
  PercentageDiscount,
  FixedAmountDiscount,
  quote,
  formatCents,
  parseAmount,
} from './strategies';

/**
 * Register the none, percentage and fixed strategies
 */
export function registerBuiltInDiscounts(
  registry: StrategyRegistry<DiscountStrategy>,
  config: DiscountsConfig,
): void {
  registry.register('none', () => new NoDiscount());
  registry.register('percentage', () => new PercentageDiscount(config.percentage.rate));
  registry.register('fixed', () => new FixedAmountDiscount(config.fixed.amount));
}
