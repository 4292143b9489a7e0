/**
 * Discount commands - list strategies, price an amount
 */

import chalk from 'chalk';
import type { App } from '../../app';
import { formatCents, parseAmount, quote } from '../../discounts';
import type { DiscountStrategy } from '../../discounts';
import { box, padVisible } from '../../utils/ui';
import { reportUnknownVariant } from '../errors';

export async function discountsCommand(app: App, options: { json?: boolean }): Promise<void> {
  const strategies = app.discounts.discriminators().map((name) => ({
    name,
    description: app.discounts.create(name).describe(),
  }));

  if (options.json) {
    console.log(JSON.stringify(strategies, null, 2));
    return;
  }

  console.log(box(
    strategies.map((s) => `  ${padVisible(chalk.cyan(s.name), 12)}  ${s.description}`).join('\n'),
    'Discounts'
  ));
}

export async function quoteCommand(
  app: App,
  strategyName: string,
  amountInput: string,
  options: { json?: boolean },
): Promise<void> {
  const amount = parseAmount(amountInput);
  if (amount === null) {
    console.log(chalk.red(`\n  Invalid amount: ${amountInput}`));
    console.log(chalk.dim('  Use a plain decimal such as 19.99\n'));
    process.exitCode = 1;
    return;
  }

  let strategy: DiscountStrategy;
  try {
    strategy = app.discounts.create(strategyName);
  } catch (err) {
    if (reportUnknownVariant(err)) {
      return;
    }
    throw err;
  }

  const result = quote(strategy, amount);

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log(box(
    `${padVisible('Original', 10)}${formatCents(result.original)}\n` +
    `${padVisible('Discount', 10)}${chalk.yellow('-' + formatCents(result.discount))}\n` +
    `${padVisible('Total', 10)}${chalk.bold(formatCents(result.total))}`,
    `${strategy.name}: ${strategy.describe()}`
  ));
}
