/**
 * Configuration module exports.
 */

export {
  type PairingConfig,
  type PartialPairingConfig,
  type SessionSettings,
  type AuthSettings,
  type SyncSettings,
  type PersistenceSettings,
  type StoreSettings,
  type LoggingSettings,
  DEFAULT_PAIRING_CONFIG,
} from './types.js';

export {
  DEFAULT_CONFIG_FILE,
  loadPairingConfig,
  loadConfigFile,
  loadEnvConfig,
  mergePairingConfig,
  validatePairingConfig,
} from './loader.js';
