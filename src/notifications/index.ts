/**
 * Notifications module
 *
 * Built-in delivery channels and their registration.
 */

import type { NotificationsConfig } from '../config';
import type { StrategyRegistry } from '../registry';
import { EmailNotifier, PushNotifier, SmsNotifier } from './channels';
import type { Notifier, Outbox } from './types';

export type {
  NotificationMessage,
  DeliveryResult,
  OutboxRecord,
  Notifier,
  Outbox,
} from './types';

export {
  EmailNotifier,
  SmsNotifier,
  PushNotifier,
  generateMessageId,
  normalizePhoneNumber,
  truncateText,
} from './channels';

export { MemoryOutbox, FileOutbox } from './outbox';

/**
 * Register the email, sms and push channels
 */
export function registerBuiltInNotifiers(
  registry: StrategyRegistry<Notifier>,
  config: NotificationsConfig,
  outbox: Outbox,
): void {
  registry.register('email', () => new EmailNotifier(config.email, outbox));
  registry.register('sms', () => new SmsNotifier(config.sms, outbox));
  registry.register('push', () => new PushNotifier(config.push, outbox));
}
