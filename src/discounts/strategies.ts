/**
 * Built-in discount strategies
 */

import type { DiscountStrategy, DiscountQuote } from './types';

function assertCents(amount: number): void {
  if (!Number.isSafeInteger(amount) || amount < 0) {
    throw new RangeError(`Amount must be a non-negative integer number of cents, got ${amount}`);
  }
}

/**
 * Format cents as a decimal string, e.g. 1999 -> "19.99"
 */
export function formatCents(amount: number): string {
  const sign = amount < 0 ? '-' : '';
  const abs = Math.abs(amount);
  return `${sign}${Math.floor(abs / 100)}.${String(abs % 100).padStart(2, '0')}`;
}

export class NoDiscount implements DiscountStrategy {
  readonly name = 'none';

  describe(): string {
    return 'No discount';
  }

  apply(amount: number): number {
    assertCents(amount);
    return amount;
  }
}

export class PercentageDiscount implements DiscountStrategy {
  readonly name = 'percentage';

  constructor(private readonly rate: number) {}

  describe(): string {
    return `${this.rate}% off`;
  }

  apply(amount: number): number {
    assertCents(amount);
    return amount - Math.round((amount * this.rate) / 100);
  }
}

export class FixedAmountDiscount implements DiscountStrategy {
  readonly name = 'fixed';

  constructor(private readonly off: number) {}

  describe(): string {
    return `${formatCents(this.off)} off`;
  }

  apply(amount: number): number {
    assertCents(amount);
    return Math.max(0, amount - this.off);
  }
}

/**
 * Price an amount and break down the result
 */
export function quote(strategy: DiscountStrategy, amount: number): DiscountQuote {
  const total = strategy.apply(amount);
  return {
    strategy: strategy.name,
    original: amount,
    discount: amount - total,
    total,
  };
}

/**
 * Parse a major-unit amount such as "19.99" into cents.
 * Returns null when the input is not a non-negative amount with at most two decimals,
 * or when its cents would not fit in a safe integer.
 */
export function parseAmount(input: string): number | null {
  const match = /^(\d+)(?:\.(\d{1,2}))?$/.exec(input.trim());
  if (!match) {
    return null;
  }
  const fraction = (match[2] ?? '').padEnd(2, '0');
  const cents = parseInt(match[1], 10) * 100 + parseInt(fraction, 10);
  return Number.isSafeInteger(cents) ? cents : null;
}
