/**
 * Configuration types for the relay.
 */

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Allowed origins. true = all, false = none, string/array = specific origins */
  origin: boolean | string | string[];
  /** Whether to allow credentials (cookies, auth headers) */
  credentials: boolean;
}

/**
 * Resource limits reported to clients as 'resource-exhausted'.
 */
export interface LimitsConfig {
  /** Maximum number of session records; unset = unlimited */
  maxSessions?: number;
  /** Maximum serialized size of a single write */
  maxValueBytes: number;
  /** Anonymous credentials kept; the least recently used is dropped first */
  maxIdentities: number;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggingConfig {
  level: LogLevel;
  /** Debug namespace filter (e.g., 'anchorwatch:relay:*') */
  namespaces?: string;
}

/**
 * Full relay configuration.
 */
export interface RelayConfig {
  /** Host to bind to */
  host: string;
  /** Port to listen on */
  port: number;
  /** Base path for all routes */
  basePath: string;
  cors: CorsConfig;
  limits: LimitsConfig;
  logging: LoggingConfig;
}

export const DEFAULT_CONFIG: RelayConfig = {
  host: '0.0.0.0',
  port: 8080,
  basePath: '/relay',
  cors: {
    origin: true,
    credentials: true,
  },
  limits: {
    maxValueBytes: 64 * 1024,
    maxIdentities: 10_000,
  },
  logging: {
    level: 'info',
  },
};

/**
 * Partial configuration for merging.
 */
export type PartialRelayConfig = {
  host?: string;
  port?: number;
  basePath?: string;
  cors?: Partial<CorsConfig>;
  limits?: Partial<LimitsConfig>;
  logging?: Partial<LoggingConfig>;
};
