/**
 * Configuration module exports.
 */

export {
  type RelayConfig,
  type PartialRelayConfig,
  type CorsConfig,
  type LimitsConfig,
  type LoggingConfig,
  type LogLevel,
  DEFAULT_CONFIG,
} from './types.js';

export {
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  parseCorsOrigin,
  isLogLevel,
} from './loader.js';
