/**
 * Config loader - reads .dispatchkit/config.yaml and applies env overrides
 */

import * as fs from 'fs';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { getEnvVars } from '../utils/env';
import { getConfigPath } from '../utils/paths';
import type { DispatchConfig, LoadedConfig } from './types';

/**
 * Thrown when the config file or an override holds an invalid value
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly field: string,
    public readonly source: string,
  ) {
    super(`${source}: ${field}: ${message}`);
    this.name = 'ConfigError';
  }
}

/** Environment variables that override config values */
export const ENV_OVERRIDES = {
  emailFrom: 'DISPATCHKIT_EMAIL_FROM',
  smsSenderId: 'DISPATCHKIT_SMS_SENDER_ID',
  discountRate: 'DISPATCHKIT_DISCOUNT_RATE',
  fixedDiscount: 'DISPATCHKIT_FIXED_DISCOUNT',
  outbox: 'DISPATCHKIT_OUTBOX',
} as const;

const KNOWN_SECTIONS = ['notifications', 'discounts'];

/**
 * Default configuration. Returns a fresh copy each call.
 */
export function defaultConfig(): DispatchConfig {
  return {
    notifications: {
      outbox: '.dispatchkit/outbox.jsonl',
      email: { from: 'noreply@dispatchkit.local', defaultSubject: 'Notification' },
      sms: { senderId: 'DISPATCH', maxLength: 160 },
      push: { defaultTitle: 'Notification' },
    },
    discounts: {
      percentage: { rate: 10 },
      fixed: { amount: 500 },
    },
  };
}

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Field readers. Each returns the fallback when the key is absent and
 * throws ConfigError when it is present with the wrong type or range.
 */
class FieldReader {
  constructor(private readonly source: string) {}

  section(raw: RawSection, key: string, field: string): RawSection {
    const value = raw[key];
    if (value === undefined || value === null) {
      return {};
    }
    if (!isRecord(value)) {
      throw new ConfigError('expected a mapping', field, this.source);
    }
    return value;
  }

  string(raw: RawSection, key: string, field: string, fallback: string): string {
    const value = raw[key];
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'string' || value.trim() === '') {
      throw new ConfigError('expected a non-empty string', field, this.source);
    }
    return value;
  }

  number(
    raw: RawSection,
    key: string,
    field: string,
    fallback: number,
    check: { valid: (n: number) => boolean; expected: string },
  ): number {
    const value = raw[key];
    if (value === undefined) {
      return fallback;
    }
    if (typeof value !== 'number' || !Number.isFinite(value) || !check.valid(value)) {
      throw new ConfigError(`expected ${check.expected}`, field, this.source);
    }
    return value;
  }
}

const RATE = { valid: (n: number) => n >= 0 && n <= 100, expected: 'a number between 0 and 100' };
const CENTS = { valid: (n: number) => Number.isInteger(n) && n >= 0, expected: 'a non-negative integer' };
const MAX_LENGTH = { valid: (n: number) => Number.isInteger(n) && n >= 2, expected: 'an integer of at least 2' };

/**
 * Build a config from parsed YAML, filling gaps from the defaults
 */
export function parseConfig(raw: unknown, source: string): DispatchConfig {
  const defaults = defaultConfig();

  if (raw === undefined || raw === null) {
    return defaults;
  }
  if (!isRecord(raw)) {
    throw new ConfigError('expected a mapping', '(root)', source);
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_SECTIONS.includes(key)) {
      console.warn(`Warning: ${source}: unknown config section "${key}" ignored`);
    }
  }

  const read = new FieldReader(source);
  const notifications = read.section(raw, 'notifications', 'notifications');
  const email = read.section(notifications, 'email', 'notifications.email');
  const sms = read.section(notifications, 'sms', 'notifications.sms');
  const push = read.section(notifications, 'push', 'notifications.push');
  const discounts = read.section(raw, 'discounts', 'discounts');
  const percentage = read.section(discounts, 'percentage', 'discounts.percentage');
  const fixed = read.section(discounts, 'fixed', 'discounts.fixed');
  const d = defaults.notifications;

  return {
    notifications: {
      outbox: read.string(notifications, 'outbox', 'notifications.outbox', d.outbox),
      email: {
        from: read.string(email, 'from', 'notifications.email.from', d.email.from),
        defaultSubject: read.string(email, 'defaultSubject', 'notifications.email.defaultSubject', d.email.defaultSubject),
      },
      sms: {
        senderId: read.string(sms, 'senderId', 'notifications.sms.senderId', d.sms.senderId),
        maxLength: read.number(sms, 'maxLength', 'notifications.sms.maxLength', d.sms.maxLength, MAX_LENGTH),
      },
      push: {
        defaultTitle: read.string(push, 'defaultTitle', 'notifications.push.defaultTitle', d.push.defaultTitle),
      },
    },
    discounts: {
      percentage: {
        rate: read.number(percentage, 'rate', 'discounts.percentage.rate', defaults.discounts.percentage.rate, RATE),
      },
      fixed: {
        amount: read.number(fixed, 'amount', 'discounts.fixed.amount', defaults.discounts.fixed.amount, CENTS),
      },
    },
  };
}

function parseEnvNumber(value: string, name: string, check: { valid: (n: number) => boolean; expected: string }): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || !check.valid(parsed)) {
    throw new ConfigError(`expected ${check.expected}, got "${value}"`, name, 'environment');
  }
  return parsed;
}

/**
 * Apply DISPATCHKIT_* overrides from process.env and .dispatchkit/.env
 */
export function applyEnvOverrides(config: DispatchConfig, projectRoot: string): DispatchConfig {
  const env = getEnvVars(Object.values(ENV_OVERRIDES), projectRoot);
  const { notifications, discounts } = config;

  return {
    notifications: {
      ...notifications,
      outbox: env[ENV_OVERRIDES.outbox] ?? notifications.outbox,
      email: { ...notifications.email, from: env[ENV_OVERRIDES.emailFrom] ?? notifications.email.from },
      sms: { ...notifications.sms, senderId: env[ENV_OVERRIDES.smsSenderId] ?? notifications.sms.senderId },
    },
    discounts: {
      percentage: {
        rate: env[ENV_OVERRIDES.discountRate] !== undefined
          ? parseEnvNumber(env[ENV_OVERRIDES.discountRate], ENV_OVERRIDES.discountRate, RATE)
          : discounts.percentage.rate,
      },
      fixed: {
        amount: env[ENV_OVERRIDES.fixedDiscount] !== undefined
          ? parseEnvNumber(env[ENV_OVERRIDES.fixedDiscount], ENV_OVERRIDES.fixedDiscount, CENTS)
          : discounts.fixed.amount,
      },
    },
  };
}

/**
 * Load configuration for a project.
 * Missing file means defaults; env overrides apply either way.
 */
export function loadConfig(projectRoot: string = process.cwd()): LoadedConfig {
  const configPath = getConfigPath(projectRoot);

  if (!fs.existsSync(configPath)) {
    return {
      config: applyEnvOverrides(defaultConfig(), projectRoot),
      source: 'defaults',
      path: configPath,
    };
  }

  let raw: unknown;
  try {
    raw = parseYaml(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`invalid YAML (${message})`, '(root)', configPath);
  }

  return {
    config: applyEnvOverrides(parseConfig(raw, configPath), projectRoot),
    source: 'file',
    path: configPath,
  };
}

/**
 * Render a config as YAML, as written by `dispatch init`
 */
export function renderConfig(config: DispatchConfig): string {
  return stringifyYaml(config);
}
