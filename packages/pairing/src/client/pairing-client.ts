/**
 * Pairing client: wires the notifier, role coordinator, sync coordinator
 * and stream views over one remote store and one local persistence.
 */

import { WebSocketRemoteStore, type RemoteStore } from '@anchorwatch/store';
import { errorMessage } from '../common/errors.js';
import { clientLog, enableLogging } from '../common/logger.js';
import type { ReadonlyValueStream } from '../common/value-stream.js';
import { DEFAULT_PAIRING_CONFIG, type PairingConfig } from '../config/types.js';
import type { PairingPhase, PairingRole, PairingRoleState } from '../model/role-state.js';
import type { Session } from '../model/session.js';
import { LevelLocalPersistence } from '../persistence/level-persistence.js';
import type { LocalPersistence } from '../persistence/local-persistence.js';
import { PairingRoleCoordinator } from '../role/role-coordinator.js';
import { PairingSessionNotifier } from '../session/session-notifier.js';
import { SessionRepository } from '../session/session-repository.js';
import { SessionStreamViews } from '../streams/session-streams.js';
import { DomainDataSource, type DomainDataProducer } from '../sync/domain-source.js';
import { SyncCoordinator } from '../sync/sync-coordinator.js';

/** Persistence key of the relay credential. */
export const STORE_CREDENTIAL_KEY = 'storeCredential';

export interface PairingClientOptions {
  store: RemoteStore;
  persistence: LocalPersistence;
  /** Source of monitoring data; an empty DomainDataSource by default */
  producer?: DomainDataProducer;
  config?: PairingConfig;
  /** Clock (default Date.now) */
  now?: () => number;
  /** Token generator for new sessions */
  generateToken?: () => string;
}

export interface PairingClient {
  readonly repository: SessionRepository;
  readonly notifier: PairingSessionNotifier;
  readonly roles: PairingRoleCoordinator;
  readonly sync: SyncCoordinator;
  readonly views: SessionStreamViews;
  readonly producer: DomainDataProducer;

  readonly role: PairingRole;
  readonly phase: PairingPhase;
  readonly effectiveSessionToken: string | undefined;
  readonly states: ReadonlyValueStream<PairingRoleState>;

  startPrimarySession(): Promise<string>;
  joinSecondarySession(token: string): Promise<Session>;
  disconnect(): Promise<void>;
  endSession(): Promise<void>;
  syncOfflineData(): Promise<boolean>;

  /** Cancel every watch, listener and timer. The store is left open. */
  dispose(): void;
}

/**
 * Build a client over an existing store and persistence.
 */
export async function createPairingClient(options: PairingClientOptions): Promise<PairingClient> {
  const config = options.config ?? DEFAULT_PAIRING_CONFIG;
  const producer = options.producer ?? new DomainDataSource();

  const repository = new SessionRepository({ store: options.store, auth: config.auth });
  const notifier = new PairingSessionNotifier({
    repository,
    settings: config.session,
    now: options.now,
    generateToken: options.generateToken,
  });
  const roles = await PairingRoleCoordinator.open({
    notifier,
    repository,
    persistence: options.persistence,
    now: options.now,
  });
  const sync = new SyncCoordinator({ roles, repository, producer, settings: config.sync, now: options.now });
  const views = new SessionStreamViews({ roles, repository, now: options.now });

  clientLog('Pairing client ready (%s)', roles.phase);

  return {
    repository,
    notifier,
    roles,
    sync,
    views,
    producer,
    get role() {
      return roles.role;
    },
    get phase() {
      return roles.phase;
    },
    get effectiveSessionToken() {
      return roles.effectiveSessionToken;
    },
    get states() {
      return roles.states;
    },
    startPrimarySession: () => roles.startPrimarySession(),
    joinSecondarySession: token => roles.joinSecondarySession(token),
    disconnect: () => roles.disconnect(),
    endSession: () => roles.endSession(),
    syncOfflineData: () => roles.syncOfflineData(),
    dispose: () => {
      views.dispose();
      sync.dispose();
      roles.dispose();
    },
  };
}

export interface ConnectedPairingClient extends PairingClient {
  readonly store: WebSocketRemoteStore;
  /** Dispose the client, then close the store and the database. */
  close(): Promise<void>;
}

/**
 * Connect to a relay by URL with LevelDB persistence under
 * `persistence.dataDir`. The relay credential is kept in the same database
 * so the device identity survives restarts.
 */
export async function connectPairingClient(options: {
  config: PairingConfig;
  producer?: DomainDataProducer;
}): Promise<ConnectedPairingClient> {
  const { config } = options;
  if (!config.store.url) {
    throw new Error('store.url is required to connect');
  }
  if (config.logging.namespaces) {
    enableLogging(config.logging.namespaces);
  }

  const persistence = await LevelLocalPersistence.open({ path: config.persistence.dataDir });
  const credential = await persistence.getString(STORE_CREDENTIAL_KEY);
  let credentialSaved: Promise<void> = Promise.resolve();

  const store = new WebSocketRemoteStore({
    url: config.store.url,
    credential,
    requestTimeoutMs: config.store.requestTimeoutMs,
    reconnectDelayMs: config.store.reconnectDelayMs,
    maxReconnectDelayMs: config.store.maxReconnectDelayMs,
    onCredential: next => {
      credentialSaved = persistence.setString(STORE_CREDENTIAL_KEY, next).catch(err => {
        clientLog('Could not save relay credential: %s', errorMessage(err));
      });
    },
  });

  let client: PairingClient;
  try {
    client = await createPairingClient({ store, persistence, producer: options.producer, config });
  } catch (err) {
    await store.close();
    await persistence.close();
    throw err;
  }

  return {
    ...client,
    get role() {
      return client.role;
    },
    get phase() {
      return client.phase;
    },
    get effectiveSessionToken() {
      return client.effectiveSessionToken;
    },
    get states() {
      return client.states;
    },
    store,
    close: async () => {
      client.dispose();
      await store.close();
      await credentialSaved;
      await persistence.close();
    },
  };
}
