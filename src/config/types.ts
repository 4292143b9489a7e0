/**
 * Configuration types
 */

export interface EmailConfig {
  /** Sender address */
  from: string;
  /** Subject used when a message has none */
  defaultSubject: string;
}

export interface SmsConfig {
  /** Sender ID shown on the handset */
  senderId: string;
  /** Longest text sent before truncation */
  maxLength: number;
}

export interface PushConfig {
  /** Title used when a message has no subject */
  defaultTitle: string;
}

export interface NotificationsConfig {
  /** Outbox file, relative to the project root unless absolute */
  outbox: string;
  email: EmailConfig;
  sms: SmsConfig;
  push: PushConfig;
}

export interface DiscountsConfig {
  percentage: {
    /** Percent off, 0-100 */
    rate: number;
  };
  fixed: {
    /** Amount off in cents */
    amount: number;
  };
}

export interface DispatchConfig {
  notifications: NotificationsConfig;
  discounts: DiscountsConfig;
}

/**
 * Result of loading configuration
 */
export interface LoadedConfig {
  config: DispatchConfig;
  /** Whether a config file was found */
  source: 'file' | 'defaults';
  /** Path that was checked */
  path: string;
}
