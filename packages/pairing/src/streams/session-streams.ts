/**
 * Session Stream Views
 *
 * Live views of session records, each following whichever token the role
 * state points at. A token change cancels the old watch before the new one
 * opens; late deliveries for an old token are dropped.
 */

import { isStoreObject, type StoreValue, type Unsubscribe } from '@anchorwatch/store';
import { errorMessage } from '../common/errors.js';
import { streamLog } from '../common/logger.js';
import { DerivedStream, ValueStream, jsonEqual, type ReadonlyValueStream } from '../common/value-stream.js';
import {
  parseAlarms,
  parsePosition,
  parseRemoteAnchor,
  type AlarmEvent,
  type PositionUpdate,
  type RemoteAnchor,
} from '../model/domain.js';
import { effectiveSessionToken, type PairingRoleState } from '../model/role-state.js';
import { isSessionExpired, parseSession, type Session } from '../model/session.js';
import type { PairingRoleCoordinator } from '../role/role-coordinator.js';
import type { SessionRepository } from '../session/session-repository.js';

/**
 * A session record together with what the primary publishes into it.
 */
export interface SessionData {
  token: string;
  session: Session;
  monitoringActive: boolean;
  anchor?: RemoteAnchor;
  position?: PositionUpdate;
  alarms: AlarmEvent[];
}

/**
 * Throws CorruptedStateError when the session part is malformed.
 */
export function parseSessionData(token: string, raw: StoreValue | undefined): SessionData | undefined {
  const session = parseSession(token, raw);
  if (!session || !isStoreObject(raw)) return undefined;

  const data: SessionData = {
    token,
    session,
    monitoringActive: raw.monitoringActive === true,
    alarms: parseAlarms(raw.alarms),
  };
  const anchor = parseRemoteAnchor(raw.anchor);
  if (anchor) data.anchor = anchor;
  const position = parsePosition(raw.boatPosition);
  if (position) data.position = position;
  return data;
}

type SnapshotHandler = (token: string, raw: StoreValue | undefined) => void;

/**
 * One watch that can be pointed at a different session.
 */
class SessionWatch {
  private token: string | undefined;
  private unwatch: Unsubscribe | undefined;
  private generation = 0;

  constructor(
    private readonly repository: SessionRepository,
    private readonly onSnapshot: SnapshotHandler,
    private readonly onClear: () => void
  ) {}

  follow(token: string | undefined, force = false): void {
    if (!force && token === this.token) return;
    this.cancel();
    this.token = token;
    this.onClear();
    if (!token) return;

    const generation = this.generation;
    this.unwatch = this.repository.watchSession(
      token,
      raw => {
        if (generation === this.generation) this.onSnapshot(token, raw);
      },
      err => {
        if (generation === this.generation) {
          streamLog('Watch on session %s failed: %s', token, err.message);
        }
      }
    );
  }

  cancel(): void {
    this.generation++;
    const unwatch = this.unwatch;
    this.unwatch = undefined;
    unwatch?.();
  }
}

export interface SessionStreamViewsOptions {
  roles: PairingRoleCoordinator;
  repository: SessionRepository;
  /** Clock for expiry checks (default Date.now) */
  now?: () => number;
}

type TokenSelector = (state: PairingRoleState) => string | undefined;

interface Follower {
  select: TokenSelector;
  watch: SessionWatch;
}

export class SessionStreamViews {
  private readonly roles: PairingRoleCoordinator;
  private readonly repository: SessionRepository;
  private readonly now: () => number;

  private readonly local = new ValueStream<SessionData | undefined>(undefined, jsonEqual);
  private readonly remote = new ValueStream<SessionData | undefined>(undefined, jsonEqual);
  private readonly effective = new ValueStream<SessionData | undefined>(undefined, jsonEqual);
  private readonly primary = new ValueStream<Session | undefined>(undefined, jsonEqual);
  private readonly secondary = new ValueStream<Session | undefined>(undefined, jsonEqual);

  /** Data of the session this device owns (primary). */
  readonly localSessionData: ReadonlyValueStream<SessionData | undefined> = this.local;
  /** Data of the session this device joined (secondary). */
  readonly remoteSessionData: ReadonlyValueStream<SessionData | undefined> = this.remote;
  /** Data of whichever session is in effect. */
  readonly effectiveSessionData: ReadonlyValueStream<SessionData | undefined> = this.effective;
  /** The owned session while primary; expired or corrupted sessions read as absent. */
  readonly primarySession: ReadonlyValueStream<Session | undefined> = this.primary;
  /** The joined session while secondary; absent once it ends. */
  readonly secondarySession: ReadonlyValueStream<Session | undefined> = this.secondary;

  readonly remoteAnchor: DerivedStream<SessionData | undefined, RemoteAnchor | undefined>;
  readonly remotePosition: DerivedStream<SessionData | undefined, PositionUpdate | undefined>;
  readonly remoteAlarms: DerivedStream<SessionData | undefined, AlarmEvent[]>;
  readonly remoteMonitoringActive: DerivedStream<SessionData | undefined, boolean>;

  private readonly followers: Follower[];
  private readonly detach: Unsubscribe[] = [];
  private healing: Set<string> = new Set();
  private disposed = false;

  constructor(options: SessionStreamViewsOptions) {
    this.roles = options.roles;
    this.repository = options.repository;
    this.now = options.now ?? Date.now;

    this.remoteAnchor = new DerivedStream(this.remote, data => data?.anchor, jsonEqual);
    this.remotePosition = new DerivedStream(this.remote, data => data?.position, jsonEqual);
    this.remoteAlarms = new DerivedStream(this.remote, data => data?.alarms ?? [], jsonEqual);
    this.remoteMonitoringActive = new DerivedStream(this.remote, data => data?.monitoringActive ?? false);

    this.followers = [
      {
        select: state => state.localSessionToken,
        watch: this.dataWatch(this.local),
      },
      {
        select: state => state.remoteSessionToken,
        watch: this.dataWatch(this.remote),
      },
      {
        select: effectiveSessionToken,
        watch: this.dataWatch(this.effective),
      },
      {
        select: state => (state.role === 'primary' ? state.localSessionToken : undefined),
        watch: new SessionWatch(
          this.repository,
          (token, raw) => this.handlePrimarySnapshot(token, raw),
          () => this.primary.set(undefined)
        ),
      },
      {
        select: state => (state.role === 'secondary' ? state.remoteSessionToken : undefined),
        watch: new SessionWatch(
          this.repository,
          (token, raw) => this.handleSecondarySnapshot(token, raw),
          () => this.secondary.set(undefined)
        ),
      },
    ];

    this.detach.push(
      this.roles.subscribe(state => this.follow(state, false), { emitCurrent: true }),
      this.roles.onInvalidate(state => this.follow(state, true))
    );
  }

  /**
   * Cancel every watch and pending cleanup.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    for (const detach of this.detach.splice(0)) detach();
    for (const follower of this.followers) follower.watch.cancel();
    for (const derived of [this.remoteAnchor, this.remotePosition, this.remoteAlarms, this.remoteMonitoringActive]) {
      derived.dispose();
    }
    for (const stream of [this.local, this.remote, this.effective]) stream.clear();
    this.primary.clear();
    this.secondary.clear();
  }

  private follow(state: PairingRoleState, force: boolean): void {
    if (this.disposed) return;
    for (const follower of this.followers) {
      follower.watch.follow(follower.select(state), force);
    }
  }

  /** Expired or unreadable records read as absent; the monitors clean them up. */
  private dataWatch(target: ValueStream<SessionData | undefined>): SessionWatch {
    return new SessionWatch(
      this.repository,
      (token, raw) => {
        try {
          const data = parseSessionData(token, raw);
          target.set(data && !isSessionExpired(data.session, this.now()) ? data : undefined);
        } catch (err) {
          streamLog('Unreadable session %s: %s', token, errorMessage(err));
          target.set(undefined);
        }
      },
      () => target.set(undefined)
    );
  }

  private handlePrimarySnapshot(token: string, raw: StoreValue | undefined): void {
    let session: Session | undefined;
    try {
      session = parseSession(token, raw);
    } catch (err) {
      streamLog('Unreadable session %s: %s', token, errorMessage(err));
      this.primary.set(undefined);
      this.heal(token, 'owned session is corrupted', true);
      return;
    }

    if (session && isSessionExpired(session, this.now())) {
      this.primary.set(undefined);
      this.heal(token, 'owned session expired', true);
      return;
    }
    this.primary.set(session);
  }

  private handleSecondarySnapshot(token: string, raw: StoreValue | undefined): void {
    let session: Session | undefined;
    try {
      session = parseSession(token, raw);
    } catch (err) {
      streamLog('Unreadable session %s: %s', token, errorMessage(err));
      this.secondary.set(undefined);
      this.heal(token, 'joined session is corrupted', true);
      return;
    }

    if (!session) {
      this.secondary.set(undefined);
      this.heal(token, 'joined session was removed', false);
      return;
    }
    if (isSessionExpired(session, this.now())) {
      this.secondary.set(undefined);
      this.heal(token, 'joined session expired', true);
      return;
    }
    if (!session.isActive) {
      this.secondary.set(undefined);
      this.heal(token, 'joined session was ended', false);
      return;
    }
    this.secondary.set(session);
  }

  /**
   * Background cleanup: optionally delete the record, then reset the device
   * if it is still in that session. Failures are logged.
   */
  private heal(token: string, reason: string, deleteRecord: boolean): void {
    if (this.disposed || this.healing.has(token)) return;
    this.healing.add(token);
    streamLog('Self-healing session %s: %s', token, reason);

    void this.runHeal(token, reason, deleteRecord).finally(() => {
      this.healing.delete(token);
    });
  }

  private async runHeal(token: string, reason: string, deleteRecord: boolean): Promise<void> {
    let sessionGone = false;
    if (deleteRecord) {
      try {
        await this.repository.deleteSession(token);
        sessionGone = true;
      } catch (err) {
        streamLog('Could not delete session %s: %s', token, errorMessage(err));
      }
    }
    if (this.disposed) return;
    try {
      await this.roles.resetToUnpaired(reason, { expectedToken: token, sessionGone });
    } catch (err) {
      streamLog('Reset after %s failed: %s', reason, errorMessage(err));
    }
  }
}
