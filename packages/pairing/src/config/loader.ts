/**
 * Configuration loading from multiple sources.
 *
 * Priority (highest to lowest):
 * 1. Programmatic overrides
 * 2. Environment variables (ANCHORWATCH_*)
 * 3. Config file (anchorwatch.json)
 * 4. Defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { isRecord } from '@anchorwatch/store';
import { configLog } from '../common/logger.js';
import {
  type PairingConfig,
  type PartialPairingConfig,
  DEFAULT_PAIRING_CONFIG,
} from './types.js';

export const DEFAULT_CONFIG_FILE = 'anchorwatch.json';

function parseInteger(value: string, name: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

function isNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Keep only the recognised, well-typed fields of a parsed config file.
 */
function toPartialConfig(raw: unknown, source: string): PartialPairingConfig {
  if (!isRecord(raw)) {
    throw new Error(`Config file must contain an object: ${source}`);
  }
  const config: PartialPairingConfig = {};

  if (isRecord(raw.session)) {
    const { ttlMs, creationCooldownMs, staleRetentionMs } = raw.session;
    config.session = {};
    if (isNumber(ttlMs)) config.session.ttlMs = ttlMs;
    if (isNumber(creationCooldownMs)) config.session.creationCooldownMs = creationCooldownMs;
    if (isNumber(staleRetentionMs)) config.session.staleRetentionMs = staleRetentionMs;
  }

  if (isRecord(raw.auth)) {
    const { maxRetries, retryDelayMs } = raw.auth;
    config.auth = {};
    if (isNumber(maxRetries)) config.auth.maxRetries = maxRetries;
    if (isNumber(retryDelayMs)) config.auth.retryDelayMs = retryDelayMs;
  }

  if (isRecord(raw.sync) && isNumber(raw.sync.positionIntervalMs)) {
    config.sync = { positionIntervalMs: raw.sync.positionIntervalMs };
  }

  if (isRecord(raw.persistence) && typeof raw.persistence.dataDir === 'string') {
    config.persistence = { dataDir: raw.persistence.dataDir };
  }

  if (isRecord(raw.store)) {
    const { url, requestTimeoutMs, reconnectDelayMs, maxReconnectDelayMs } = raw.store;
    config.store = {};
    if (typeof url === 'string') config.store.url = url;
    if (isNumber(requestTimeoutMs)) config.store.requestTimeoutMs = requestTimeoutMs;
    if (isNumber(reconnectDelayMs)) config.store.reconnectDelayMs = reconnectDelayMs;
    if (isNumber(maxReconnectDelayMs)) config.store.maxReconnectDelayMs = maxReconnectDelayMs;
  }

  if (isRecord(raw.logging) && typeof raw.logging.namespaces === 'string') {
    config.logging = { namespaces: raw.logging.namespaces };
  }

  return config;
}

/**
 * Load configuration from a JSON file.
 */
export function loadConfigFile(configPath: string): PartialPairingConfig {
  const resolved = resolve(configPath);
  if (!existsSync(resolved)) {
    configLog('Config file not found: %s', resolved);
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err) {
    configLog('Failed to parse config file %s: %O', resolved, err);
    throw new Error(`Failed to parse config file: ${resolved}`);
  }
  configLog('Loaded config from %s', resolved);
  return toPartialConfig(parsed, resolved);
}

/**
 * Load configuration from ANCHORWATCH_* environment variables.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialPairingConfig {
  const config: PartialPairingConfig = {};

  // Session lifecycle
  if (env.ANCHORWATCH_SESSION_TTL_MS) {
    config.session = config.session || {};
    config.session.ttlMs = parseInteger(env.ANCHORWATCH_SESSION_TTL_MS, 'ANCHORWATCH_SESSION_TTL_MS');
  }
  if (env.ANCHORWATCH_CREATION_COOLDOWN_MS) {
    config.session = config.session || {};
    config.session.creationCooldownMs = parseInteger(env.ANCHORWATCH_CREATION_COOLDOWN_MS, 'ANCHORWATCH_CREATION_COOLDOWN_MS');
  }
  if (env.ANCHORWATCH_STALE_RETENTION_MS) {
    config.session = config.session || {};
    config.session.staleRetentionMs = parseInteger(env.ANCHORWATCH_STALE_RETENTION_MS, 'ANCHORWATCH_STALE_RETENTION_MS');
  }

  // Auth retry
  if (env.ANCHORWATCH_AUTH_MAX_RETRIES) {
    config.auth = config.auth || {};
    config.auth.maxRetries = parseInteger(env.ANCHORWATCH_AUTH_MAX_RETRIES, 'ANCHORWATCH_AUTH_MAX_RETRIES');
  }
  if (env.ANCHORWATCH_AUTH_RETRY_DELAY_MS) {
    config.auth = config.auth || {};
    config.auth.retryDelayMs = parseInteger(env.ANCHORWATCH_AUTH_RETRY_DELAY_MS, 'ANCHORWATCH_AUTH_RETRY_DELAY_MS');
  }

  if (env.ANCHORWATCH_POSITION_INTERVAL_MS) {
    config.sync = {
      positionIntervalMs: parseInteger(env.ANCHORWATCH_POSITION_INTERVAL_MS, 'ANCHORWATCH_POSITION_INTERVAL_MS'),
    };
  }

  if (env.ANCHORWATCH_DATA_DIR) {
    config.persistence = { dataDir: env.ANCHORWATCH_DATA_DIR };
  }

  // Remote store
  if (env.ANCHORWATCH_STORE_URL) {
    config.store = config.store || {};
    config.store.url = env.ANCHORWATCH_STORE_URL;
  }
  if (env.ANCHORWATCH_REQUEST_TIMEOUT_MS) {
    config.store = config.store || {};
    config.store.requestTimeoutMs = parseInteger(env.ANCHORWATCH_REQUEST_TIMEOUT_MS, 'ANCHORWATCH_REQUEST_TIMEOUT_MS');
  }

  if (env.ANCHORWATCH_DEBUG) {
    config.logging = { namespaces: env.ANCHORWATCH_DEBUG };
  }

  return config;
}

/**
 * Deep merge configuration objects.
 */
export function mergePairingConfig(base: PairingConfig, ...overrides: PartialPairingConfig[]): PairingConfig {
  const result = { ...base };

  for (const override of overrides) {
    if (override.session) {
      result.session = { ...result.session, ...override.session };
    }
    if (override.auth) {
      result.auth = { ...result.auth, ...override.auth };
    }
    if (override.sync) {
      result.sync = { ...result.sync, ...override.sync };
    }
    if (override.persistence) {
      result.persistence = { ...result.persistence, ...override.persistence };
    }
    if (override.store) {
      result.store = { ...result.store, ...override.store };
    }
    if (override.logging) {
      result.logging = { ...result.logging, ...override.logging };
    }
  }

  return result;
}

/**
 * Reject settings the coordinators cannot work with.
 */
export function validatePairingConfig(config: PairingConfig): void {
  if (config.session.ttlMs <= 0) {
    throw new Error('session.ttlMs must be positive');
  }
  if (config.session.creationCooldownMs < 0 || config.session.staleRetentionMs < 0) {
    throw new Error('session cooldown and retention must not be negative');
  }
  if (config.auth.maxRetries < 0 || config.auth.retryDelayMs < 0) {
    throw new Error('auth retry settings must not be negative');
  }
  if (config.sync.positionIntervalMs < 0) {
    throw new Error('sync.positionIntervalMs must not be negative');
  }
}

/**
 * Load full configuration from all sources.
 */
export function loadPairingConfig(options: {
  configPath?: string;
  overrides?: PartialPairingConfig;
  env?: NodeJS.ProcessEnv;
} = {}): PairingConfig {
  const sources: PartialPairingConfig[] = [];

  // Load from file if specified or default exists
  const configPath = options.configPath || DEFAULT_CONFIG_FILE;
  if (options.configPath || existsSync(configPath)) {
    sources.push(loadConfigFile(configPath));
  }

  sources.push(loadEnvConfig(options.env));

  if (options.overrides) {
    sources.push(options.overrides);
  }

  const config = mergePairingConfig(DEFAULT_PAIRING_CONFIG, ...sources);
  validatePairingConfig(config);
  configLog('Final config: %O', config);

  return config;
}
