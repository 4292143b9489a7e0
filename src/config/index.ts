/**
 * Configuration module
 */

export type {
  DispatchConfig,
  NotificationsConfig,
  EmailConfig,
  SmsConfig,
  PushConfig,
  DiscountsConfig,
  LoadedConfig,
} from './types';

export {
  ConfigError,
  ENV_OVERRIDES,
  defaultConfig,
  parseConfig,
  applyEnvOverrides,
  loadConfig,
  renderConfig,
} from './loader';
