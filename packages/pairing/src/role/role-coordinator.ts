/**
 * Pairing Role Coordinator
 *
 * Owns the device's pairing role (primary or secondary) and the session
 * token that goes with it. Operations run one at a time; every state change
 * is persisted before it becomes visible.
 *
 *   Unpaired-Primary --startPrimarySession--> Active-Primary
 *   Unpaired-Primary --joinSecondarySession--> Active-Secondary
 *   Active-Primary   --endSession-----------> Unpaired-Primary
 *   Active-Secondary --disconnect-----------> Unpaired-Primary
 */

import { isStoreError, type Unsubscribe } from '@anchorwatch/store';
import { CorruptedStateError, NotPrimaryError, errorMessage } from '../common/errors.js';
import { roleLog } from '../common/logger.js';
import { SerialQueue } from '../common/serial-queue.js';
import { ValueStream, type Listener, type ReadonlyValueStream, type SubscribeOptions } from '../common/value-stream.js';
import {
  UNPAIRED_STATE,
  effectiveSessionToken,
  phaseOf,
  primaryState,
  roleStatesEqual,
  secondaryState,
  type PairingPhase,
  type PairingRole,
  type PairingRoleState,
} from '../model/role-state.js';
import { isSessionExpired, isSessionUsable, type Session } from '../model/session.js';
import type { LocalPersistence } from '../persistence/local-persistence.js';
import { loadRoleState, saveRoleState } from '../persistence/role-state-store.js';
import type { PairingSessionNotifier } from '../session/session-notifier.js';
import type { SessionRepository } from '../session/session-repository.js';

export interface RoleCoordinatorOptions {
  notifier: PairingSessionNotifier;
  repository: SessionRepository;
  persistence: LocalPersistence;
  /** Clock (default Date.now) */
  now?: () => number;
}

export interface LeavingContext {
  /** The session record was deleted; writes to it would be rejected. */
  sessionGone: boolean;
}

/** Awaited before the device leaves a session. */
export type LeavingHook = (state: PairingRoleState, context: LeavingContext) => Promise<void> | void;

export interface ResetOptions {
  /** Skip the reset unless this is still the effective token */
  expectedToken?: string;
  /** Passed on to leaving hooks */
  sessionGone?: boolean;
}

interface OwnedSession {
  token: string;
  ownerIdentity?: string;
}

export class PairingRoleCoordinator {
  private readonly notifier: PairingSessionNotifier;
  private readonly repository: SessionRepository;
  private readonly persistence: LocalPersistence;
  private readonly now: () => number;
  private readonly stateStream: ValueStream<PairingRoleState>;
  private readonly queue = new SerialQueue();
  private leavingHooks: Set<LeavingHook> = new Set();
  private invalidateListeners: Set<Listener<PairingRoleState>> = new Set();
  private restoreCheck: Promise<void> = Promise.resolve();
  private disposed = false;

  private constructor(options: RoleCoordinatorOptions, initial: PairingRoleState) {
    this.notifier = options.notifier;
    this.repository = options.repository;
    this.persistence = options.persistence;
    this.now = options.now ?? Date.now;
    this.stateStream = new ValueStream(initial, roleStatesEqual);
  }

  /**
   * Restore the persisted role and start a background check of the restored
   * session. Startup does not wait for the check.
   */
  static async open(options: RoleCoordinatorOptions): Promise<PairingRoleCoordinator> {
    const initial = await loadRoleState(options.persistence);
    const coordinator = new PairingRoleCoordinator(options, initial);
    roleLog('Restored %s state', phaseOf(initial));

    const token = effectiveSessionToken(initial);
    if (token) {
      coordinator.restoreCheck = coordinator.checkRestoredSession(token).catch(err => {
        roleLog('Restored session check failed: %s', errorMessage(err));
      });
    }
    return coordinator;
  }

  // ==========================================================================
  // State
  // ==========================================================================

  get state(): PairingRoleState {
    return this.stateStream.value;
  }

  get role(): PairingRole {
    return this.state.role;
  }

  get phase(): PairingPhase {
    return phaseOf(this.state);
  }

  get effectiveSessionToken(): string | undefined {
    return effectiveSessionToken(this.state);
  }

  get states(): ReadonlyValueStream<PairingRoleState> {
    return this.stateStream;
  }

  subscribe(listener: Listener<PairingRoleState>, options?: SubscribeOptions): Unsubscribe {
    return this.stateStream.subscribe(listener, options);
  }

  /**
   * Called after a change of session or role; views restart their watches.
   */
  onInvalidate(listener: Listener<PairingRoleState>): Unsubscribe {
    this.invalidateListeners.add(listener);
    return () => {
      this.invalidateListeners.delete(listener);
    };
  }

  onLeaving(hook: LeavingHook): Unsubscribe {
    this.leavingHooks.add(hook);
    return () => {
      this.leavingHooks.delete(hook);
    };
  }

  /** Settles once the background check of the restored session is done. */
  whenRestored(): Promise<void> {
    return this.restoreCheck;
  }

  /** Settles once every queued operation has finished. */
  whenIdle(): Promise<void> {
    return this.queue.whenIdle();
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /**
   * Become (or stay) the primary of a session and return its token. A
   * persisted token is reused when its session is still usable.
   */
  startPrimarySession(): Promise<string> {
    return this.enqueue(async () => {
      const previous = this.state;
      const local = previous.role === 'primary' ? previous.localSessionToken : undefined;

      const reused = local ? await this.verifyOwnedSession(local) : undefined;
      const token = reused ? reused.token : await this.notifier.createSession();
      const ownerIdentity = reused ? reused.ownerIdentity : this.notifier.session?.ownerIdentity;

      const previousToken = effectiveSessionToken(previous);
      if (previousToken && previousToken !== token) {
        await this.runLeavingHooks(previous);
        if (previous.role === 'secondary') {
          await this.notifier.leaveSession(previousToken);
        }
      }

      await this.commit(primaryState(token, ownerIdentity));
      roleLog('Primary of session %s', token);
      return token;
    });
  }

  /**
   * Join another device's session as a secondary. A session this device
   * held before is left (or ended, when it was the primary).
   */
  joinSecondarySession(token: string): Promise<Session> {
    return this.enqueue(async () => {
      const previous = this.state;
      const session = await this.notifier.joinSession(token);

      const previousToken = effectiveSessionToken(previous);
      if (previousToken && previousToken !== token) {
        await this.runLeavingHooks(previous);
        if (previous.role === 'primary') {
          await this.notifier.endSession(previousToken);
        } else {
          await this.notifier.leaveSession(previousToken);
        }
      }

      await this.commit(secondaryState(token, session.ownerIdentity));
      roleLog('Secondary in session %s', token);
      return session;
    });
  }

  /**
   * Leave the joined session and return to unpaired. Ignored while primary.
   */
  disconnect(): Promise<void> {
    return this.enqueue(async () => {
      const previous = this.state;
      if (previous.role !== 'secondary' || !previous.remoteSessionToken) {
        roleLog('disconnect ignored: not a secondary');
        return;
      }

      await this.runLeavingHooks(previous);
      await this.notifier.leaveSession(previous.remoteSessionToken);
      await this.commit(UNPAIRED_STATE);
      roleLog('Disconnected from session %s', previous.remoteSessionToken);
    });
  }

  /**
   * End the owned session for every device.
   *
   * @throws NotPrimaryError while secondary
   */
  endSession(): Promise<void> {
    return this.enqueue(async () => {
      const previous = this.state;
      if (previous.role !== 'primary') {
        throw new NotPrimaryError();
      }

      const token = previous.localSessionToken;
      if (token) {
        await this.notifier.endSession(token);
        await this.runLeavingHooks(previous);
      }
      await this.commit(UNPAIRED_STATE);
    });
  }

  /**
   * Return to unpaired without any remote writes other than what leaving
   * hooks do. Skipped when `expectedToken` is no longer the effective token,
   * and after dispose.
   */
  async resetToUnpaired(reason: string, options: ResetOptions = {}): Promise<void> {
    const { expectedToken, sessionGone = false } = options;
    if (this.disposed) return;
    await this.queue.run(async () => {
      if (this.disposed) return;
      const previous = this.state;
      const token = effectiveSessionToken(previous);
      if (!token) return;
      if (expectedToken !== undefined && token !== expectedToken) {
        roleLog('Reset for %s skipped: now in %s', expectedToken, token);
        return;
      }

      roleLog('Resetting to unpaired: %s', reason);
      await this.runLeavingHooks(previous, { sessionGone });
      if (previous.role === 'primary') {
        this.notifier.forget();
      }
      await this.commit(UNPAIRED_STATE);
    });
  }

  /**
   * Push a session created while the store was unreachable. Returns true
   * when something was written.
   */
  syncOfflineData(): Promise<boolean> {
    return this.enqueue(async () => {
      if (this.phase !== 'active-primary') return false;
      return this.notifier.publishPendingSession();
    });
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.stateStream.clear();
    this.leavingHooks.clear();
    this.invalidateListeners.clear();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    if (this.disposed) {
      return Promise.reject(new Error('Role coordinator is disposed'));
    }
    return this.queue.run(task);
  }

  /**
   * Persist, then publish. If persisting fails the previous persisted values
   * are put back and the in-memory state stays as it was.
   */
  private async commit(next: PairingRoleState): Promise<void> {
    const previous = this.state;
    try {
      await saveRoleState(this.persistence, next);
    } catch (err) {
      roleLog('Persisting role state failed: %s', errorMessage(err));
      try {
        await saveRoleState(this.persistence, previous);
      } catch (restoreErr) {
        roleLog('Restoring persisted role state failed: %s', errorMessage(restoreErr));
      }
      throw err;
    }

    if (this.disposed) return;
    this.stateStream.set(next);

    if (previous.role !== next.role || effectiveSessionToken(previous) !== effectiveSessionToken(next)) {
      for (const listener of [...this.invalidateListeners]) {
        try {
          listener(next);
        } catch (err) {
          roleLog('Invalidate listener threw: %O', err);
        }
      }
    }
  }

  private async runLeavingHooks(
    state: PairingRoleState,
    context: LeavingContext = { sessionGone: false }
  ): Promise<void> {
    for (const hook of [...this.leavingHooks]) {
      try {
        await hook(state, context);
      } catch (err) {
        roleLog('Leaving hook failed: %s', errorMessage(err));
      }
    }
  }

  /**
   * Decide whether a persisted primary token can be reused. Unusable
   * sessions are deleted; an unreachable store keeps the token.
   */
  private async verifyOwnedSession(token: string): Promise<OwnedSession | undefined> {
    let session: Session | undefined;
    try {
      session = await this.repository.getSession(token);
    } catch (err) {
      if (err instanceof CorruptedStateError) {
        await this.deleteSessionQuietly(token);
        return undefined;
      }
      if (isStoreError(err, 'unavailable')) {
        roleLog('Store unreachable, keeping session %s', token);
        return { token, ownerIdentity: this.state.ownerIdentity ?? this.repository.currentIdentity };
      }
      throw err;
    }

    if (!session) return undefined;

    const identity = await this.repository.identity();
    if (session.ownerIdentity === identity && isSessionUsable(session, this.now())) {
      this.notifier.track(session);
      return { token, ownerIdentity: identity };
    }

    roleLog('Session %s can no longer be used', token);
    await this.deleteSessionQuietly(token);
    return undefined;
  }

  /** Returns whether the record is gone. */
  private async deleteSessionQuietly(token: string): Promise<boolean> {
    try {
      await this.repository.deleteSession(token);
      return true;
    } catch (err) {
      roleLog('Could not delete session %s: %s', token, errorMessage(err));
      return false;
    }
  }

  /**
   * Background check after rehydration: an expired or corrupted session is
   * deleted and the device reset; a live one fills in the owner identity.
   */
  private async checkRestoredSession(token: string): Promise<void> {
    let session: Session | undefined;
    try {
      session = await this.repository.getSession(token);
    } catch (err) {
      if (!(err instanceof CorruptedStateError)) {
        roleLog('Could not verify restored session %s: %s', token, errorMessage(err));
        return;
      }
      if (this.disposed) return;
      const sessionGone = await this.deleteSessionQuietly(token);
      await this.resetToUnpaired('restored session is corrupted', { expectedToken: token, sessionGone });
      return;
    }

    if (this.disposed || !session) return;

    if (isSessionExpired(session, this.now())) {
      roleLog('Restored session %s has expired', token);
      const sessionGone = await this.deleteSessionQuietly(token);
      await this.resetToUnpaired('restored session expired', { expectedToken: token, sessionGone });
      return;
    }

    const restored = session;
    await this.queue.run(async () => {
      const state = this.state;
      if (this.disposed || effectiveSessionToken(state) !== token) return;

      if (state.role === 'primary' && restored.ownerIdentity === this.repository.currentIdentity) {
        this.notifier.track(restored);
      }
      if (state.ownerIdentity === undefined) {
        await this.commit(state.role === 'secondary'
          ? secondaryState(token, restored.ownerIdentity)
          : primaryState(token, restored.ownerIdentity));
      }
    });
  }
}
