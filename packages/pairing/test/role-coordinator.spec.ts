import { expect } from 'chai';
import { MemoryBackend, StoreError, type MemoryRemoteStore } from '@anchorwatch/store';
import { NotPrimaryError } from '../src/common/errors.js';
import type { PairingRoleState } from '../src/model/role-state.js';
import { MemoryLocalPersistence } from '../src/persistence/local-persistence.js';
import { PairingRoleCoordinator, type LeavingContext } from '../src/role/role-coordinator.js';
import { PairingSessionNotifier } from '../src/session/session-notifier.js';
import { SessionRepository } from '../src/session/session-repository.js';
import { DAY_MS, START_TIME, TestClock, rejectionOf, sessionRecord, token, tokenSequence } from './helpers.js';

describe('PairingRoleCoordinator', () => {
  let clock: TestClock;
  let backend: MemoryBackend;
  let ownerStore: MemoryRemoteStore;
  let ownerPersistence: MemoryLocalPersistence;
  let owner: PairingRoleCoordinator;

  async function openCoordinator(
    store: MemoryRemoteStore,
    persistence: MemoryLocalPersistence,
    prefix: string
  ): Promise<PairingRoleCoordinator> {
    const repository = new SessionRepository({ store, auth: { retryDelayMs: 0 } });
    const notifier = new PairingSessionNotifier({ repository, now: clock.now, generateToken: tokenSequence(prefix) });
    return PairingRoleCoordinator.open({ notifier, repository, persistence, now: clock.now });
  }

  beforeEach(async () => {
    clock = new TestClock();
    backend = new MemoryBackend({ now: clock.now });
    ownerStore = backend.connect('owner');
    ownerPersistence = new MemoryLocalPersistence();
    owner = await openCoordinator(ownerStore, ownerPersistence, 'A');
  });

  afterEach(() => {
    owner.dispose();
  });

  it('should start unpaired as primary', () => {
    expect(owner.state).to.deep.equal({ role: 'primary' });
    expect(owner.phase).to.equal('unpaired');
    expect(owner.effectiveSessionToken).to.be.undefined;
  });

  describe('startPrimarySession', () => {
    it('should create a session and persist the token', async () => {
      const created = await owner.startPrimarySession();

      expect(created).to.equal(token(1, 'A'));
      expect(owner.state).to.deep.equal({ role: 'primary', localSessionToken: created, ownerIdentity: 'owner' });
      expect(ownerPersistence.snapshot()).to.deep.equal({ sessionToken: created, role: 'primary' });
    });

    it('should reuse a usable session instead of creating another', async () => {
      const created = await owner.startPrimarySession();
      expect(await owner.startPrimarySession()).to.equal(created);
      expect(Object.keys(backend.peek('sessions') ?? {})).to.have.length(1);
    });

    it('should reuse the persisted session after a restart', async () => {
      const created = await owner.startPrimarySession();
      owner.dispose();

      owner = await openCoordinator(backend.connect('owner'), ownerPersistence, 'B');
      expect(owner.effectiveSessionToken).to.equal(created);

      expect(await owner.startPrimarySession()).to.equal(created);
      expect(owner.state.ownerIdentity).to.equal('owner');
    });

    it('should replace a persisted session that was ended', async () => {
      const created = await owner.startPrimarySession();
      backend.seed(`sessions/${created}/isActive`, false);
      clock.advance(5000);

      const replacement = await owner.startPrimarySession();
      expect(replacement).to.equal(token(2, 'A'));
      expect(backend.peek(`sessions/${created}`)).to.be.undefined;
    });

    it('should keep the persisted token while the store is unreachable', async () => {
      const persisted = new MemoryLocalPersistence({ sessionToken: token(4, 'P'), role: 'primary' });
      backend.setOffline(true);
      const offline = await openCoordinator(backend.connect('owner'), persisted, 'C');

      expect(await offline.startPrimarySession()).to.equal(token(4, 'P'));
      expect(offline.phase).to.equal('active-primary');
      offline.dispose();
    });

    it('should leave the joined session when switching from secondary', async () => {
      const hosted = await owner.startPrimarySession();
      const guest = await openCoordinator(backend.connect('guest'), new MemoryLocalPersistence(), 'G');
      await guest.joinSecondarySession(hosted);

      const own = await guest.startPrimarySession();

      expect(guest.state).to.deep.equal({ role: 'primary', localSessionToken: own, ownerIdentity: 'guest' });
      expect(backend.peek(`sessions/${hosted}/devices/guest`)).to.be.undefined;
      guest.dispose();
    });
  });

  describe('joinSecondarySession', () => {
    let hosted: string;
    let guestPersistence: MemoryLocalPersistence;
    let guest: PairingRoleCoordinator;

    beforeEach(async () => {
      hosted = await owner.startPrimarySession();
      guestPersistence = new MemoryLocalPersistence();
      guest = await openCoordinator(backend.connect('guest'), guestPersistence, 'G');
    });

    afterEach(() => {
      guest.dispose();
    });

    it('should switch to secondary with the remote token', async () => {
      await guest.joinSecondarySession(hosted);

      expect(guest.state).to.deep.equal({ role: 'secondary', remoteSessionToken: hosted, ownerIdentity: 'owner' });
      expect(guest.phase).to.equal('active-secondary');
      expect(guestPersistence.snapshot()).to.deep.equal({ sessionToken: hosted, role: 'secondary' });
    });

    it('should end its own session when a primary joins elsewhere', async () => {
      const own = await guest.startPrimarySession();
      await guest.joinSecondarySession(hosted);

      expect(guest.state.localSessionToken).to.be.undefined;
      expect(backend.peek(`sessions/${own}/isActive`)).to.be.false;
    });

    it('should leave the state untouched when the join fails', async () => {
      await rejectionOf(guest.joinSecondarySession(token(8, 'X')));
      expect(guest.state).to.deep.equal({ role: 'primary' });
      expect(guestPersistence.snapshot()).to.deep.equal({});
    });

    it('should invalidate views on join and disconnect', async () => {
      const seen: PairingRoleState[] = [];
      guest.onInvalidate(state => seen.push(state));

      await guest.joinSecondarySession(hosted);
      await guest.disconnect();

      expect(seen.map(s => s.role)).to.deep.equal(['secondary', 'primary']);
    });

    describe('disconnect', () => {
      it('should remove the device and return to unpaired', async () => {
        await guest.joinSecondarySession(hosted);
        await guest.disconnect();

        expect(guest.state).to.deep.equal({ role: 'primary' });
        expect(guestPersistence.snapshot()).to.deep.equal({});
        expect(backend.peek(`sessions/${hosted}/devices/guest`)).to.be.undefined;
        expect(backend.peek(`sessions/${hosted}/isActive`)).to.be.true;
      });

      it('should run leaving hooks before the device is removed', async () => {
        await guest.joinSecondarySession(hosted);
        const present: unknown[] = [];
        guest.onLeaving(() => {
          present.push(backend.peek(`sessions/${hosted}/devices/guest/role`));
        });

        await guest.disconnect();
        expect(present).to.deep.equal(['secondary']);
      });

      it('should be a no-op while primary', async () => {
        await owner.disconnect();
        expect(owner.state).to.deep.equal({ role: 'primary', localSessionToken: hosted, ownerIdentity: 'owner' });
      });
    });
  });

  describe('endSession', () => {
    it('should end the session and return to unpaired', async () => {
      const created = await owner.startPrimarySession();
      await owner.endSession();

      expect(owner.state).to.deep.equal({ role: 'primary' });
      expect(ownerPersistence.snapshot()).to.deep.equal({});
      expect(backend.peek(`sessions/${created}/isActive`)).to.be.false;
    });

    it('should refuse while secondary', async () => {
      const hosted = await owner.startPrimarySession();
      const guest = await openCoordinator(backend.connect('guest'), new MemoryLocalPersistence(), 'G');
      await guest.joinSecondarySession(hosted);

      expect(await rejectionOf(guest.endSession())).to.be.instanceOf(NotPrimaryError);
      expect(guest.state.remoteSessionToken).to.equal(hosted);
      guest.dispose();
    });

    it('should still reset when the store cannot be reached', async () => {
      await owner.startPrimarySession();
      ownerStore.failNext('update', new StoreError('unavailable', 'offline'));

      await owner.endSession();
      expect(owner.phase).to.equal('unpaired');
    });
  });

  describe('persistence', () => {
    it('should keep the previous state when the write fails', async () => {
      ownerPersistence.failWrites(1);

      await rejectionOf(owner.startPrimarySession());
      expect(owner.state).to.deep.equal({ role: 'primary' });
      expect(ownerPersistence.snapshot()).to.deep.equal({});
    });

    it('should restore a secondary role', async () => {
      const persisted = new MemoryLocalPersistence({ sessionToken: token(3, 'R'), role: 'secondary' });
      const restored = await openCoordinator(backend.connect('guest'), persisted, 'G');
      expect(restored.state).to.deep.equal({ role: 'secondary', remoteSessionToken: token(3, 'R') });
      restored.dispose();
    });
  });

  describe('restored session check', () => {
    const restoredToken = token(5, 'R');

    it('should clear an expired session', async () => {
      backend.seed(`sessions/${restoredToken}`, sessionRecord('owner', START_TIME - 2 * DAY_MS));
      const persisted = new MemoryLocalPersistence({ sessionToken: restoredToken, role: 'primary' });

      const restored = await openCoordinator(backend.connect('owner'), persisted, 'C');
      expect(restored.effectiveSessionToken).to.equal(restoredToken);

      await restored.whenRestored();
      expect(restored.state).to.deep.equal({ role: 'primary' });
      expect(persisted.snapshot()).to.deep.equal({});
      expect(backend.peek(`sessions/${restoredToken}`)).to.be.undefined;
      restored.dispose();
    });

    it('should tell leaving hooks that the expired session is gone', async () => {
      backend.seed(`sessions/${restoredToken}`, sessionRecord('owner', START_TIME - 2 * DAY_MS));
      const persisted = new MemoryLocalPersistence({ sessionToken: restoredToken, role: 'primary' });

      const restored = await openCoordinator(backend.connect('owner'), persisted, 'C');
      const contexts: LeavingContext[] = [];
      restored.onLeaving((_state, context) => {
        contexts.push(context);
      });
      await restored.whenRestored();

      expect(contexts).to.deep.equal([{ sessionGone: true }]);
      restored.dispose();
    });

    it('should treat the session as present unless told otherwise', async () => {
      const hosted = await owner.startPrimarySession();
      const contexts: LeavingContext[] = [];
      owner.onLeaving((_state, context) => {
        contexts.push(context);
      });

      await owner.resetToUnpaired('test reset', { expectedToken: hosted });
      expect(contexts).to.deep.equal([{ sessionGone: false }]);
      expect(owner.phase).to.equal('unpaired');
    });

    it('should skip a reset meant for another session', async () => {
      const hosted = await owner.startPrimarySession();
      await owner.resetToUnpaired('test reset', { expectedToken: token(7, 'Z') });
      expect(owner.effectiveSessionToken).to.equal(hosted);
    });

    it('should fill in the owner of a live session', async () => {
      backend.seed(`sessions/${restoredToken}`, sessionRecord('owner', START_TIME));
      const persisted = new MemoryLocalPersistence({ sessionToken: restoredToken, role: 'secondary' });

      const restored = await openCoordinator(backend.connect('guest'), persisted, 'G');
      await restored.whenRestored();

      expect(restored.state).to.deep.equal({
        role: 'secondary',
        remoteSessionToken: restoredToken,
        ownerIdentity: 'owner',
      });
      restored.dispose();
    });

    it('should do nothing once disposed', async () => {
      backend.seed(`sessions/${restoredToken}`, sessionRecord('owner', START_TIME - 2 * DAY_MS));
      const persisted = new MemoryLocalPersistence({ sessionToken: restoredToken, role: 'primary' });

      const restored = await openCoordinator(backend.connect('owner'), persisted, 'C');
      restored.dispose();
      await restored.whenRestored();

      expect(persisted.snapshot()).to.deep.equal({ sessionToken: restoredToken, role: 'primary' });
      expect(backend.peek(`sessions/${restoredToken}`)).to.not.be.undefined;
    });
  });
});
