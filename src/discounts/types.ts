/**
 * Discount types
 *
 * Amounts are integer cents throughout.
 */

/**
 * Capability contract for a pricing rule
 */
export interface DiscountStrategy {
  /** Strategy identifier */
  readonly name: string;

  /** Human-readable summary, e.g. "10% off" */
  describe(): string;

  /**
   * Price an amount
   *
   * @throws RangeError on a negative or fractional amount
   */
  apply(amount: number): number;
}

/**
 * Breakdown of a priced amount
 */
export interface DiscountQuote {
  strategy: string;
  original: number;
  discount: number;
  total: number;
}
