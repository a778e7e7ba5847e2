/**
 * @anchorwatch/pairing - pairing sessions between an anchor-watching
 * primary device and its observers.
 *
 * @example
 * ```typescript
 * import { MemoryBackend } from '@anchorwatch/store';
 * import { createPairingClient, MemoryLocalPersistence, DomainDataSource } from '@anchorwatch/pairing';
 *
 * const producer = new DomainDataSource();
 * const client = await createPairingClient({
 *   store: new MemoryBackend().connect('boat'),
 *   persistence: new MemoryLocalPersistence(),
 *   producer,
 * });
 * const token = await client.startPrimarySession();
 * producer.updatePosition({ latitude: 43.5, longitude: 16.4, timestamp: Date.now() });
 * ```
 */

// Configuration
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
  DEFAULT_CONFIG_FILE,
  loadPairingConfig,
  loadConfigFile,
  loadEnvConfig,
  mergePairingConfig,
  validatePairingConfig,
} from './config/index.js';

// Errors
export {
  type PairingErrorCode,
  PairingError,
  InvalidTokenError,
  NotFoundError,
  ExpiredError,
  InactiveError,
  PermissionDeniedError,
  RateLimitedError,
  QuotaExceededError,
  CorruptedStateError,
  NotPrimaryError,
  isPairingError,
  toPairingError,
} from './common/errors.js';

// Observables
export {
  type Listener,
  type SubscribeOptions,
  type ReadonlyValueStream,
  type Equality,
  ValueStream,
  DerivedStream,
  jsonEqual,
} from './common/value-stream.js';
export { SerialQueue } from './common/serial-queue.js';

// Model
export {
  SESSION_TOKEN_ALPHABET,
  SESSION_TOKEN_LENGTH,
  generateSessionToken,
  isValidSessionToken,
} from './model/token.js';
export {
  type DeviceRole,
  type Device,
  type Session,
  createSession,
  isSessionExpired,
  isSessionUsable,
  primaryDevice,
  secondaryDevices,
  parseSession,
  serializeSession,
  serializeDevice,
} from './model/session.js';
export {
  type PairingRole,
  type PairingRoleState,
  type PairingPhase,
  UNPAIRED_STATE,
  effectiveSessionToken,
  phaseOf,
  primaryState,
  secondaryState,
} from './model/role-state.js';
export {
  type Anchor,
  type RemoteAnchor,
  type PositionUpdate,
  type AlarmEvent,
  type AlarmType,
  type AlarmSeverity,
  serializeAnchor,
  serializePosition,
  serializeAlarm,
  parseRemoteAnchor,
  parsePosition,
  parseAlarm,
  parseAlarms,
} from './model/domain.js';

// Persistence
export {
  type LocalPersistence,
  type PersistenceEntries,
  MemoryLocalPersistence,
} from './persistence/local-persistence.js';
export { type LevelPersistenceOptions, LevelLocalPersistence } from './persistence/level-persistence.js';
export { PERSISTENCE_KEYS, loadRoleState, saveRoleState } from './persistence/role-state-store.js';

// Sessions and roles
export { type SessionRepositoryOptions, SessionRepository } from './session/session-repository.js';
export { type SessionNotifierOptions, PairingSessionNotifier } from './session/session-notifier.js';
export {
  type RoleCoordinatorOptions,
  type LeavingContext,
  type LeavingHook,
  type ResetOptions,
  PairingRoleCoordinator,
} from './role/role-coordinator.js';

// Sync and views
export { type DomainDataProducer, DomainDataSource } from './sync/domain-source.js';
export { type SyncCoordinatorOptions, type SyncStatus, SyncCoordinator } from './sync/sync-coordinator.js';
export {
  type SessionData,
  type SessionStreamViewsOptions,
  parseSessionData,
  SessionStreamViews,
} from './streams/session-streams.js';

// Client
export {
  type PairingClientOptions,
  type PairingClient,
  type ConnectedPairingClient,
  STORE_CREDENTIAL_KEY,
  createPairingClient,
  connectPairingClient,
} from './client/pairing-client.js';

export { createLogger, enableLogging } from './common/logger.js';
