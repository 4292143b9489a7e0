/**
 * Delivery channels
 *
 * Each channel validates its recipient, shapes a payload and appends it to
 * the outbox. Rejections are reported in the result rather than thrown.
 */

import type { EmailConfig, PushConfig, SmsConfig } from '../config';
import type { DeliveryResult, NotificationMessage, Notifier, Outbox } from './types';

/**
 * Generate a unique message ID
 * Format: msg-{timestamp}-{6char random}
 */
export function generateMessageId(): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).substring(2, 8).padEnd(6, '0');
  return `msg-${timestamp}-${random}`;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const PHONE_PATTERN = /^\+?[0-9]{7,15}$/;

/**
 * Strip formatting characters from a phone number
 */
export function normalizePhoneNumber(input: string): string {
  return input.replace(/[\s\-.()]/g, '');
}

/**
 * Truncate text to maxLength characters (code points), marking the cut
 * with an ellipsis. Surrogate pairs are never split.
 */
export function truncateText(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }
  return chars.slice(0, maxLength - 1).join('') + '…';
}

/**
 * Shared delivery flow: channels supply validation and payload shaping
 */
async function deliverVia(
  channel: string,
  outbox: Outbox,
  recipient: string,
  message: NotificationMessage,
  buildPayload: () => Record<string, string>,
  validateRecipient: (recipient: string) => string | undefined,
): Promise<DeliveryResult> {
  const messageId = generateMessageId();
  const deliveredAt = new Date().toISOString();
  const error = !message.body.trim()
    ? 'Message body is empty'
    : validateRecipient(recipient);

  if (error) {
    return { messageId, channel, recipient, success: false, error, payload: {}, deliveredAt };
  }

  const payload = buildPayload();
  await outbox.append({ messageId, channel, recipient, payload, deliveredAt });

  return { messageId, channel, recipient, success: true, payload, deliveredAt };
}

export class EmailNotifier implements Notifier {
  readonly channel = 'email';

  constructor(
    private readonly config: EmailConfig,
    private readonly outbox: Outbox,
  ) {}

  deliver(message: NotificationMessage): Promise<DeliveryResult> {
    const to = message.to.trim();

    return deliverVia(
      this.channel,
      this.outbox,
      to,
      message,
      () => ({
        from: this.config.from,
        to,
        subject: message.subject ?? this.config.defaultSubject,
        body: message.body,
      }),
      (recipient) => (EMAIL_PATTERN.test(recipient) ? undefined : `Invalid email address: ${recipient}`),
    );
  }
}

export class SmsNotifier implements Notifier {
  readonly channel = 'sms';

  constructor(
    private readonly config: SmsConfig,
    private readonly outbox: Outbox,
  ) {}

  deliver(message: NotificationMessage): Promise<DeliveryResult> {
    const to = normalizePhoneNumber(message.to);

    return deliverVia(
      this.channel,
      this.outbox,
      to,
      message,
      () => ({
        senderId: this.config.senderId,
        to,
        text: truncateText(message.body, this.config.maxLength),
      }),
      (recipient) => (PHONE_PATTERN.test(recipient) ? undefined : `Invalid phone number: ${message.to}`),
    );
  }
}

export class PushNotifier implements Notifier {
  readonly channel = 'push';

  constructor(
    private readonly config: PushConfig,
    private readonly outbox: Outbox,
  ) {}

  deliver(message: NotificationMessage): Promise<DeliveryResult> {
    const token = message.to.trim();

    return deliverVia(
      this.channel,
      this.outbox,
      token,
      message,
      () => ({
        token,
        title: message.subject ?? this.config.defaultTitle,
        body: message.body,
      }),
      (recipient) => (recipient ? undefined : 'Device token is empty'),
    );
  }
}
