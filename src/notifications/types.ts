/**
 * Notification types
 *
 * A notifier is one delivery channel. Channels are interchangeable behind
 * the Notifier contract and are created by discriminator from a registry.
 */

/**
 * Message handed to a channel
 */
export interface NotificationMessage {
  /** Recipient: email address, phone number or device token */
  to: string;
  /** Subject (email) or title (push); ignored by sms */
  subject?: string;
  /** Message body */
  body: string;
}

/**
 * Outcome of a delivery attempt
 */
export interface DeliveryResult {
  /** Unique message ID, msg-{timestamp}-{6char random} */
  messageId: string;
  /** Channel that handled the message */
  channel: string;
  /** Recipient as normalized by the channel */
  recipient: string;
  /** Whether the message reached the outbox */
  success: boolean;
  /** Why the message was rejected */
  error?: string;
  /** Channel-specific payload */
  payload: Record<string, string>;
  /** ISO timestamp */
  deliveredAt: string;
}

/**
 * Delivered message as stored in the outbox
 */
export type OutboxRecord = Omit<DeliveryResult, 'success' | 'error'>;

/**
 * Capability contract for a delivery channel
 */
export interface Notifier {
  /** Channel identifier */
  readonly channel: string;

  /**
   * Deliver a message. Invalid messages resolve with success=false;
   * the promise only rejects when the outbox fails.
   */
  deliver(message: NotificationMessage): Promise<DeliveryResult>;
}

/**
 * Where delivered messages land
 */
export interface Outbox {
  append(record: OutboxRecord): Promise<void>;
  list(): Promise<OutboxRecord[]>;
}
