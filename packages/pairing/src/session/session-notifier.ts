/**
 * Pairing Session Notifier
 *
 * Creates, joins and ends sessions against the remote store and holds the
 * session this device currently owns.
 */

import {
  CorruptedStateError,
  ExpiredError,
  InactiveError,
  InvalidTokenError,
  NotFoundError,
  QuotaExceededError,
  RateLimitedError,
  errorMessage,
} from '../common/errors.js';
import { sessionLog } from '../common/logger.js';
import { ValueStream, type ReadonlyValueStream } from '../common/value-stream.js';
import { DEFAULT_PAIRING_CONFIG, type SessionSettings } from '../config/types.js';
import { createSession, isSessionExpired, isSessionUsable, type Session } from '../model/session.js';
import { generateSessionToken, isValidSessionToken } from '../model/token.js';
import type { SessionRepository } from './session-repository.js';

export interface SessionNotifierOptions {
  repository: SessionRepository;
  settings?: Partial<SessionSettings>;
  /** Clock (default Date.now) */
  now?: () => number;
  /** Token generator (default: 32 random characters of A-Z0-9) */
  generateToken?: () => string;
}

export class PairingSessionNotifier {
  private readonly repository: SessionRepository;
  private readonly settings: SessionSettings;
  private readonly now: () => number;
  private readonly generateToken: () => string;
  private readonly current = new ValueStream<Session | undefined>(undefined);
  private lastCreatedAt: number | undefined;

  constructor(options: SessionNotifierOptions) {
    this.repository = options.repository;
    this.settings = { ...DEFAULT_PAIRING_CONFIG.session, ...options.settings };
    this.now = options.now ?? Date.now;
    this.generateToken = options.generateToken ?? generateSessionToken;
  }

  /** The session this device owns, if any. */
  get session(): Session | undefined {
    return this.current.value;
  }

  get sessions(): ReadonlyValueStream<Session | undefined> {
    return this.current;
  }

  /**
   * Start (or resume) the session this device owns and return its token.
   *
   * @throws RateLimitedError within the cooldown of the previous creation
   * @throws QuotaExceededError when the store refuses another session
   */
  async createSession(): Promise<string> {
    const now = this.now();
    if (this.lastCreatedAt !== undefined) {
      const elapsed = now - this.lastCreatedAt;
      if (elapsed < this.settings.creationCooldownMs) {
        throw new RateLimitedError(this.settings.creationCooldownMs - elapsed);
      }
    }

    const identity = await this.repository.identity();

    const owned = await this.findOwnedSession(identity, now);
    if (owned) {
      sessionLog('Resuming owned session %s', owned.token);
      this.lastCreatedAt = now;
      this.current.set(owned);
      return owned.token;
    }

    await this.collectStaleSessions(now);

    const session = createSession(this.generateToken(), identity, now, this.settings.ttlMs);
    try {
      await this.repository.writeSession(session);
      sessionLog('Created session %s', session.token);
    } catch (err) {
      if (err instanceof QuotaExceededError) throw err;
      sessionLog('Session %s kept local-only: %s', session.token, errorMessage(err));
    }

    try {
      await this.repository.setOwnedSessionToken(identity, session.token);
    } catch (err) {
      sessionLog('Could not index session %s: %s', session.token, errorMessage(err));
    }

    this.lastCreatedAt = now;
    this.current.set(session);
    return session.token;
  }

  /**
   * Join another device's session as a secondary.
   *
   * @throws InvalidTokenError before any store access when the token is malformed
   * @throws PermissionDeniedError | NotFoundError | ExpiredError | InactiveError
   */
  async joinSession(token: string): Promise<Session> {
    if (!isValidSessionToken(token)) {
      throw new InvalidTokenError();
    }

    const identity = await this.repository.identity();
    await this.repository.probeSession(token);

    const session = await this.repository.getSession(token);
    const now = this.now();
    if (!session) throw new NotFoundError(token);
    if (isSessionExpired(session, now)) throw new ExpiredError(token);
    if (!session.isActive) throw new InactiveError(token);
    if (session.ownerIdentity === identity) {
      throw new InvalidTokenError('Cannot join a session this device owns');
    }

    await this.repository.putDevice(token, {
      deviceId: identity,
      role: 'secondary',
      joinedAt: now,
      lastSeenAt: now,
    });
    sessionLog('Joined session %s as %s', token, identity);

    const joined = await this.repository.getSession(token);
    if (!joined) throw new NotFoundError(token);
    return joined;
  }

  /**
   * Mark a session inactive. Without a token the owned session is ended;
   * with none, nothing happens. Remote failures are logged; local state is
   * cleared regardless.
   */
  async endSession(token?: string): Promise<void> {
    const target = token ?? this.current.value?.token;
    if (!target) {
      sessionLog('endSession: no session to end');
      return;
    }

    try {
      await this.repository.deactivateSession(target);
      sessionLog('Ended session %s', target);
    } catch (err) {
      sessionLog('Could not deactivate session %s: %s', target, errorMessage(err));
    }

    const identity = this.repository.currentIdentity;
    if (identity) {
      try {
        if (await this.repository.getOwnedSessionToken(identity) === target) {
          await this.repository.setOwnedSessionToken(identity, null);
        }
      } catch (err) {
        sessionLog('Could not clear session index for %s: %s', identity, errorMessage(err));
      }
    }

    if (this.current.value?.token === target) {
      this.current.set(undefined);
    }
  }

  /**
   * Remove this device's entry from a session it joined. Best-effort.
   */
  async leaveSession(token: string): Promise<void> {
    try {
      const identity = await this.repository.identity();
      await this.repository.removeDevice(token, identity);
      sessionLog('Left session %s', token);
    } catch (err) {
      sessionLog('Could not leave session %s: %s', token, errorMessage(err));
    }
  }

  /**
   * Write the owned session to the store if it only exists locally (it was
   * created while the store was unreachable). Returns true when written.
   */
  async publishPendingSession(): Promise<boolean> {
    const session = this.current.value;
    if (!session || !isSessionUsable(session, this.now())) return false;

    const existing = await this.repository.getSession(session.token);
    if (existing) return false;

    await this.repository.writeSession(session);
    await this.repository.setOwnedSessionToken(session.ownerIdentity, session.token);
    sessionLog('Published offline session %s', session.token);
    return true;
  }

  /** Adopt a session verified elsewhere (e.g. restored from persistence). */
  track(session: Session): void {
    this.current.set(session);
  }

  /** Drop the owned session without touching the store. */
  forget(): void {
    this.current.set(undefined);
  }

  /**
   * Follow the reverse index to a session this identity already owns. A
   * stale entry (missing, foreign, ended, expired or corrupted session) is
   * cleaned up and ignored.
   */
  private async findOwnedSession(identity: string, now: number): Promise<Session | undefined> {
    let token: string | undefined;
    try {
      token = await this.repository.getOwnedSessionToken(identity);
    } catch (err) {
      sessionLog('Session index lookup failed: %s', errorMessage(err));
      return undefined;
    }
    if (!token || !isValidSessionToken(token)) return undefined;

    let session: Session | undefined;
    let corrupted = false;
    try {
      session = await this.repository.getSession(token);
    } catch (err) {
      if (!(err instanceof CorruptedStateError)) {
        sessionLog('Could not read indexed session %s: %s', token, errorMessage(err));
        return undefined;
      }
      corrupted = true;
    }

    if (session && session.ownerIdentity === identity && isSessionUsable(session, now)) {
      return session;
    }

    sessionLog('Discarding stale indexed session %s', token);
    if (session || corrupted) {
      try {
        await this.repository.deleteSession(token);
      } catch (err) {
        sessionLog('Could not delete indexed session %s: %s', token, errorMessage(err));
      }
    }
    try {
      await this.repository.setOwnedSessionToken(identity, null);
    } catch (err) {
      sessionLog('Could not clear session index for %s: %s', identity, errorMessage(err));
    }
    return undefined;
  }

  private async collectStaleSessions(now: number): Promise<void> {
    try {
      await this.repository.deleteStaleSessions(now, this.settings.staleRetentionMs);
    } catch (err) {
      sessionLog('Stale session cleanup failed: %s', errorMessage(err));
    }
  }
}
