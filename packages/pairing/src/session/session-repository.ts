/**
 * Typed access to pairing documents in the remote store.
 *
 * Every call signs in first and retries once after a permission failure;
 * permission and quota failures come out as PairingErrors.
 */

import {
  SESSIONS_ROOT,
  isStoreObject,
  joinPath,
  ownedSessionPath,
  sessionAlarmPath,
  sessionDevicePath,
  sessionPath,
  withAuthRetry,
  type AuthRetryOptions,
  type RemoteStore,
  type StoreUpdate,
  type StoreValue,
  type Unsubscribe,
  type WatchErrorListener,
  type WatchListener,
} from '@anchorwatch/store';
import { errorMessage, toPairingError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { parseSession, serializeDevice, serializeSession, type Device, type Session } from '../model/session.js';

const log = createLogger('repository');

export interface SessionRepositoryOptions {
  store: RemoteStore;
  auth?: Omit<AuthRetryOptions, 'label'>;
}

export class SessionRepository {
  readonly store: RemoteStore;
  private readonly auth: Omit<AuthRetryOptions, 'label'>;

  constructor(options: SessionRepositoryOptions) {
    this.store = options.store;
    this.auth = options.auth ?? {};
  }

  /** The signed-in identity, if sign-in has happened. */
  get currentIdentity(): string | undefined {
    return this.store.identity;
  }

  /** Sign in if needed and return the stable device identity. */
  async identity(): Promise<string> {
    return this.store.ensureAuthenticated();
  }

  // ==========================================================================
  // Sessions
  // ==========================================================================

  /**
   * Fetch and validate a session; undefined when absent.
   * Throws CorruptedStateError for a malformed record.
   */
  async getSession(token: string): Promise<Session | undefined> {
    const raw = await this.run('getSession', () => this.store.get(sessionPath(token)));
    return parseSession(token, raw);
  }

  /**
   * Cheap read of one field, used to learn whether the session can be read
   * at all before fetching it.
   */
  async probeSession(token: string): Promise<void> {
    await this.run('probeSession', () => this.store.get(joinPath(sessionPath(token), 'ownerIdentity')));
  }

  async writeSession(session: Session): Promise<void> {
    await this.run('writeSession', () => this.store.set(sessionPath(session.token), serializeSession(session)));
  }

  async deactivateSession(token: string): Promise<void> {
    await this.run('deactivateSession', () => this.store.update(sessionPath(token), { isActive: false }));
  }

  async deleteSession(token: string): Promise<void> {
    await this.run('deleteSession', () => this.store.delete(sessionPath(token)));
  }

  /**
   * Update publication fields of a session record.
   */
  async updateSession(token: string, changes: StoreUpdate): Promise<void> {
    await this.run('updateSession', () => this.store.update(sessionPath(token), changes));
  }

  async putAlarm(token: string, alarmId: string, value: StoreValue): Promise<void> {
    await this.run('putAlarm', () => this.store.set(sessionAlarmPath(token, alarmId), value));
  }

  async deleteAlarm(token: string, alarmId: string): Promise<void> {
    await this.run('deleteAlarm', () => this.store.delete(sessionAlarmPath(token, alarmId)));
  }

  // ==========================================================================
  // Devices
  // ==========================================================================

  async putDevice(token: string, device: Device): Promise<void> {
    await this.run('putDevice', () => this.store.set(sessionDevicePath(token, device.deviceId), serializeDevice(device)));
  }

  async removeDevice(token: string, deviceId: string): Promise<void> {
    await this.run('removeDevice', () => this.store.delete(sessionDevicePath(token, deviceId)));
  }

  // ==========================================================================
  // Reverse index (owner -> token)
  // ==========================================================================

  async getOwnedSessionToken(identity: string): Promise<string | undefined> {
    const raw = await this.run('getOwnedSessionToken', () => this.store.get(ownedSessionPath(identity)));
    return typeof raw === 'string' ? raw : undefined;
  }

  async setOwnedSessionToken(identity: string, token: string | null): Promise<void> {
    await this.run('setOwnedSessionToken', () =>
      token === null
        ? this.store.delete(ownedSessionPath(identity))
        : this.store.set(ownedSessionPath(identity), token)
    );
  }

  // ==========================================================================
  // Maintenance
  // ==========================================================================

  /**
   * Delete every session that has expired, or that is inactive and older
   * than the retention window. Individual failures are logged and skipped.
   * Returns the number of sessions deleted.
   */
  async deleteStaleSessions(now: number, retentionMs: number): Promise<number> {
    const all = await this.run('listSessions', () => this.store.get(SESSIONS_ROOT));
    if (!isStoreObject(all)) return 0;

    let deleted = 0;
    for (const [token, record] of Object.entries(all)) {
      if (!isStoreObject(record)) continue;
      const { expiresAt, createdAt, isActive } = record;
      const expired = typeof expiresAt === 'number' && expiresAt < now;
      const stale = isActive === false && typeof createdAt === 'number' && createdAt < now - retentionMs;
      if (!expired && !stale) continue;

      try {
        await this.deleteSession(token);
        deleted++;
      } catch (err) {
        log('Could not delete stale session %s: %s', token, errorMessage(err));
      }
    }
    if (deleted > 0) {
      log('Deleted %d stale session(s)', deleted);
    }
    return deleted;
  }

  /**
   * Watch the raw session record once signed in. Cancelling before sign-in
   * completes means the watch never opens.
   */
  watchSession(token: string, listener: WatchListener, onError?: WatchErrorListener): Unsubscribe {
    let active = true;
    let cancel: Unsubscribe | undefined;

    void this.store.ensureAuthenticated().then(
      () => {
        if (active) cancel = this.store.watch(sessionPath(token), listener, onError);
      },
      err => {
        if (active) onError?.(err instanceof Error ? err : new Error(String(err)));
      }
    );

    return () => {
      active = false;
      cancel?.();
    };
  }

  private async run<T>(label: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await withAuthRetry(this.store, operation, { ...this.auth, label });
    } catch (err) {
      throw toPairingError(err);
    }
  }
}
