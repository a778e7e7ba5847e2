/**
 * Configuration loading from multiple sources.
 *
 * Priority (highest to lowest):
 * 1. Programmatic options (CLI flags arrive here)
 * 2. Environment variables
 * 3. Config file
 * 4. Defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { isRecord } from '@anchorwatch/store';
import { configLog } from '../common/logger.js';
import {
  type CorsConfig,
  type LogLevel,
  type PartialRelayConfig,
  type RelayConfig,
  DEFAULT_CONFIG,
} from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Parse a CORS origin setting: "true", "false" or a comma-separated list.
 */
export function parseCorsOrigin(value: string): CorsConfig['origin'] {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value.split(',').map(o => o.trim());
}

function parseInteger(value: string, name: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Keep only the recognised, well-typed fields of a parsed config file.
 */
function toPartialConfig(raw: unknown, source: string): PartialRelayConfig {
  if (!isRecord(raw)) {
    throw new Error(`Config file must contain an object: ${source}`);
  }
  const config: PartialRelayConfig = {};

  if (typeof raw.host === 'string') config.host = raw.host;
  if (typeof raw.port === 'number') config.port = raw.port;
  if (typeof raw.basePath === 'string') config.basePath = raw.basePath;

  if (isRecord(raw.cors)) {
    const { origin, credentials } = raw.cors;
    config.cors = {};
    if (typeof origin === 'boolean' || typeof origin === 'string') {
      config.cors.origin = origin;
    } else if (Array.isArray(origin)) {
      config.cors.origin = origin.filter((o): o is string => typeof o === 'string');
    }
    if (typeof credentials === 'boolean') config.cors.credentials = credentials;
  }

  if (isRecord(raw.limits)) {
    const { maxSessions, maxValueBytes, maxIdentities } = raw.limits;
    config.limits = {};
    if (typeof maxSessions === 'number') config.limits.maxSessions = maxSessions;
    if (typeof maxValueBytes === 'number') config.limits.maxValueBytes = maxValueBytes;
    if (typeof maxIdentities === 'number') config.limits.maxIdentities = maxIdentities;
  }

  if (isRecord(raw.logging)) {
    const { level, namespaces } = raw.logging;
    config.logging = {};
    if (isLogLevel(level)) config.logging.level = level;
    if (typeof namespaces === 'string') config.logging.namespaces = namespaces;
  }

  return config;
}

/**
 * Load configuration from a JSON file.
 */
export function loadConfigFile(configPath: string): PartialRelayConfig {
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
 * Load configuration from environment variables.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialRelayConfig {
  const config: PartialRelayConfig = {};

  if (env.RELAY_HOST) {
    config.host = env.RELAY_HOST;
  }
  if (env.RELAY_PORT) {
    config.port = parseInteger(env.RELAY_PORT, 'RELAY_PORT');
  }
  if (env.RELAY_BASE_PATH) {
    config.basePath = env.RELAY_BASE_PATH;
  }

  // CORS
  if (env.RELAY_CORS_ORIGIN) {
    config.cors = { origin: parseCorsOrigin(env.RELAY_CORS_ORIGIN) };
  }
  if (env.RELAY_CORS_CREDENTIALS) {
    config.cors = config.cors || {};
    config.cors.credentials = env.RELAY_CORS_CREDENTIALS === 'true';
  }

  // Limits
  if (env.RELAY_MAX_SESSIONS) {
    config.limits = config.limits || {};
    config.limits.maxSessions = parseInteger(env.RELAY_MAX_SESSIONS, 'RELAY_MAX_SESSIONS');
  }
  if (env.RELAY_MAX_VALUE_BYTES) {
    config.limits = config.limits || {};
    config.limits.maxValueBytes = parseInteger(env.RELAY_MAX_VALUE_BYTES, 'RELAY_MAX_VALUE_BYTES');
  }
  if (env.RELAY_MAX_IDENTITIES) {
    config.limits = config.limits || {};
    config.limits.maxIdentities = parseInteger(env.RELAY_MAX_IDENTITIES, 'RELAY_MAX_IDENTITIES');
  }

  // Logging
  const level = env.RELAY_LOG_LEVEL;
  if (isLogLevel(level)) {
    config.logging = { level };
  }
  if (env.RELAY_DEBUG) {
    config.logging = config.logging || {};
    config.logging.namespaces = env.RELAY_DEBUG;
  }

  return config;
}

/**
 * Deep merge configuration objects.
 */
function mergeConfig(base: RelayConfig, ...overrides: PartialRelayConfig[]): RelayConfig {
  const result = { ...base };

  for (const override of overrides) {
    if (override.host !== undefined) result.host = override.host;
    if (override.port !== undefined) result.port = override.port;
    if (override.basePath !== undefined) result.basePath = override.basePath;

    if (override.cors) {
      result.cors = { ...result.cors, ...override.cors };
    }
    if (override.limits) {
      result.limits = { ...result.limits, ...override.limits };
    }
    if (override.logging) {
      result.logging = { ...result.logging, ...override.logging };
    }
  }

  return result;
}

/**
 * Load full configuration from all sources.
 */
export function loadConfig(options: {
  configPath?: string;
  overrides?: PartialRelayConfig;
  env?: NodeJS.ProcessEnv;
} = {}): RelayConfig {
  const sources: PartialRelayConfig[] = [];

  // Load from file if specified or default exists
  const configPath = options.configPath || 'anchor-relay.json';
  if (options.configPath || existsSync(configPath)) {
    sources.push(loadConfigFile(configPath));
  }

  sources.push(loadEnvConfig(options.env));

  if (options.overrides) {
    sources.push(options.overrides);
  }

  const config = mergeConfig(DEFAULT_CONFIG, ...sources);
  configLog('Final config: %O', config);

  return config;
}
