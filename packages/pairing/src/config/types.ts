/**
 * Configuration types for the pairing client.
 */

export interface SessionSettings {
  /** Lifetime of a new session */
  ttlMs: number;
  /** Minimum gap between two successful session creations */
  creationCooldownMs: number;
  /** Inactive sessions older than this are garbage collected */
  staleRetentionMs: number;
}

export interface AuthSettings {
  /** Retries after a permission failure */
  maxRetries: number;
  /** Pause after refreshing credentials */
  retryDelayMs: number;
}

export interface SyncSettings {
  /** Minimum gap between position publications; 0 publishes every change */
  positionIntervalMs: number;
}

export interface PersistenceSettings {
  /** Directory of the local LevelDB database */
  dataDir: string;
}

/**
 * Remote store connection, used when the client connects by URL.
 */
export interface StoreSettings {
  /** WebSocket URL of the relay (e.g., 'ws://localhost:8080/relay/ws') */
  url?: string;
  requestTimeoutMs: number;
  reconnectDelayMs: number;
  maxReconnectDelayMs: number;
}

export interface LoggingSettings {
  /** Debug namespace filter (e.g., 'anchorwatch:pairing:*') */
  namespaces?: string;
}

export interface PairingConfig {
  session: SessionSettings;
  auth: AuthSettings;
  sync: SyncSettings;
  persistence: PersistenceSettings;
  store: StoreSettings;
  logging: LoggingSettings;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_PAIRING_CONFIG: PairingConfig = {
  session: {
    ttlMs: DAY_MS,
    creationCooldownMs: 5000,
    staleRetentionMs: DAY_MS,
  },
  auth: {
    maxRetries: 1,
    retryDelayMs: 2000,
  },
  sync: {
    positionIntervalMs: 0,
  },
  persistence: {
    dataDir: './.anchorwatch',
  },
  store: {
    requestTimeoutMs: 10_000,
    reconnectDelayMs: 1000,
    maxReconnectDelayMs: 60_000,
  },
  logging: {},
};

/**
 * Partial configuration for merging.
 */
export type PartialPairingConfig = {
  session?: Partial<SessionSettings>;
  auth?: Partial<AuthSettings>;
  sync?: Partial<SyncSettings>;
  persistence?: Partial<PersistenceSettings>;
  store?: Partial<StoreSettings>;
  logging?: Partial<LoggingSettings>;
};
