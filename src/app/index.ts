/**
 * Application wiring
 *
 * Builds the registries once from config. Commands receive the App as a
 * parameter; nothing here is held at module level.
 */

import * as path from 'path';
import { loadConfig } from '../config';
import type { DispatchConfig, LoadedConfig } from '../config';
import { registerBuiltInDiscounts } from '../discounts';
import type { DiscountStrategy } from '../discounts';
import { FileOutbox, registerBuiltInNotifiers } from '../notifications';
import type { Notifier, Outbox } from '../notifications';
import { StrategyRegistry } from '../registry';
import type { VariantFactory } from '../registry';

export interface App {
  projectRoot: string;
  config: DispatchConfig;
  /** Where the config came from */
  configSource: Omit<LoadedConfig, 'config'>;
  outbox: Outbox;
  /** Read side only: registration happens here, during setup */
  notifiers: VariantFactory<Notifier>;
  discounts: VariantFactory<DiscountStrategy>;
}

export interface CreateAppOptions {
  projectRoot?: string;
  /** Outbox to deliver into; defaults to the configured file */
  outbox?: Outbox;
}

export function createApp(options: CreateAppOptions = {}): App {
  const projectRoot = options.projectRoot ?? process.cwd();
  const { config, source, path: configPath } = loadConfig(projectRoot);
  const outbox = options.outbox ?? new FileOutbox(path.resolve(projectRoot, config.notifications.outbox));

  const notifiers = new StrategyRegistry<Notifier>({ name: 'channel' });
  registerBuiltInNotifiers(notifiers, config.notifications, outbox);

  const discounts = new StrategyRegistry<DiscountStrategy>({ name: 'discount' });
  registerBuiltInDiscounts(discounts, config.discounts);

  return {
    projectRoot,
    config,
    configSource: { source, path: configPath },
    outbox,
    notifiers,
    discounts,
  };
}
