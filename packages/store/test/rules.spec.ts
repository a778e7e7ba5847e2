import { expect } from 'chai';
import { MemoryBackend, type MemoryRemoteStore } from '../src/memory/memory-store.js';
import { StoreError } from '../src/common/errors.js';
import type { StoreObject } from '../src/common/types.js';
import { rejectionOf } from './helpers.js';

function sessionRecord(owner: string, overrides: StoreObject = {}): StoreObject {
  return {
    ownerIdentity: owner,
    createdAt: 1000,
    expiresAt: 100_000,
    isActive: true,
    devices: {
      [owner]: { deviceId: owner, role: 'primary', joinedAt: 1000 },
    },
    ...overrides,
  };
}

async function expectCode(promise: Promise<unknown>, code: string): Promise<void> {
  const err = await rejectionOf(promise);
  expect(err).to.be.instanceOf(StoreError);
  expect(err).to.have.property('code', code);
}

describe('Pairing access rules', () => {
  let now: number;
  let backend: MemoryBackend;
  let owner: MemoryRemoteStore;
  let other: MemoryRemoteStore;

  beforeEach(async () => {
    now = 5000;
    backend = new MemoryBackend({ now: () => now });
    owner = backend.connect('owner');
    other = backend.connect('other');
    await owner.ensureAuthenticated();
    await other.ensureAuthenticated();
    await owner.set('sessions/T1', sessionRecord('owner'));
  });

  it('should require sign-in for reads and writes', async () => {
    const anonymous = backend.connect('anon');
    await expectCode(anonymous.get('sessions/T1'), 'unauthenticated');
    await expectCode(anonymous.set('deviceSessions/anon', 'T1'), 'unauthenticated');
  });

  it('should let any signed-in device read a session', async () => {
    const value = await other.get('sessions/T1/ownerIdentity');
    expect(value).to.equal('owner');
  });

  it('should reserve the session record for its owner', async () => {
    await expectCode(other.set('sessions/T1', sessionRecord('other')), 'permission-denied');
    await expectCode(other.update('sessions/T1', { isActive: false }), 'permission-denied');
    await owner.update('sessions/T1', { isActive: false });
    expect(backend.peek('sessions/T1/isActive')).to.equal(false);
  });

  it('should require a new record to name its writer as owner', async () => {
    await expectCode(other.set('sessions/T2', sessionRecord('owner')), 'permission-denied');
    await expectCode(other.set('sessions/T2/anchor', { lat: 1 }), 'permission-denied');
    await other.set('sessions/T2', sessionRecord('other'));
    expect(backend.peek('sessions/T2/ownerIdentity')).to.equal('other');
  });

  it('should let a device write only its own device entry', async () => {
    const entry = { deviceId: 'other', role: 'secondary', joinedAt: 2000 };
    await other.set('sessions/T1/devices/other', entry);
    expect(backend.peek('sessions/T1/devices/other')).to.deep.equal(entry);

    await expectCode(other.set('sessions/T1/devices/owner', entry), 'permission-denied');
    await expectCode(other.set('sessions/MISSING/devices/other', entry), 'permission-denied');

    await owner.delete('sessions/T1/devices/other');
    expect(backend.peek('sessions/T1/devices/other')).to.be.undefined;
  });

  it('should keep reverse-index entries private to their identity', async () => {
    await owner.set('deviceSessions/owner', 'T1');
    await expectCode(other.set('deviceSessions/owner', 'T9'), 'permission-denied');
    expect(backend.peek('deviceSessions/owner')).to.equal('T1');
  });

  it('should let anyone delete expired or ended sessions only', async () => {
    await expectCode(other.delete('sessions/T1'), 'permission-denied');

    now = 200_000;
    await other.delete('sessions/T1');
    expect(backend.peek('sessions/T1')).to.be.undefined;

    now = 5000;
    await owner.set('sessions/T3', sessionRecord('owner', { isActive: false }));
    await other.delete('sessions/T3');
    expect(backend.peek('sessions/T3')).to.be.undefined;
  });

  it('should enforce the session quota', async () => {
    const limited = new MemoryBackend({ maxSessions: 1 });
    const store = limited.connect('owner');
    await store.ensureAuthenticated();
    await store.set('sessions/A', sessionRecord('owner'));
    await expectCode(store.set('sessions/B', sessionRecord('owner')), 'resource-exhausted');
  });
});
