import { expect } from 'chai';
import { MemoryBackend } from '@anchorwatch/store';
import { DAY_MS, TestClock, openDevice, settle, waitUntil } from './helpers.js';

describe('Pairing scenarios', () => {
  let clock: TestClock;
  let backend: MemoryBackend;

  beforeEach(() => {
    clock = new TestClock();
    backend = new MemoryBackend({ now: clock.now });
  });

  it('should pair a fresh primary with a guest that sees the boat', async () => {
    const owner = await openDevice(backend, 'boat', clock);
    const guest = await openDevice(backend, 'phone', clock, { tokenPrefix: 'P' });

    const hosted = await owner.client.startPrimarySession();
    const joined = await guest.client.joinSecondarySession(hosted);
    expect(Object.keys(joined.devices).sort()).to.deep.equal(['boat', 'phone']);
    expect(joined.devices.boat?.role).to.equal('primary');
    expect(joined.devices.phone?.role).to.equal('secondary');
    expect(joined.ownerIdentity).to.equal('boat');

    owner.producer.updatePosition({ latitude: 54.5, longitude: 10.3, timestamp: clock.now() });
    await waitUntil(() => guest.client.views.remotePosition.value?.latitude === 54.5);

    expect(guest.client.phase).to.equal('active-secondary');
    expect(guest.client.effectiveSessionToken).to.equal(hosted);
    expect(guest.client.views.remoteMonitoringActive.value).to.be.true;

    owner.client.dispose();
    guest.client.dispose();
  });

  it('should return the guest to unpaired when the owner ends the session', async () => {
    const owner = await openDevice(backend, 'boat', clock);
    const guest = await openDevice(backend, 'phone', clock, { tokenPrefix: 'P' });
    const hosted = await owner.client.startPrimarySession();
    await guest.client.joinSecondarySession(hosted);
    await settle();

    await owner.client.endSession();
    await waitUntil(() => guest.client.phase === 'unpaired');

    expect(owner.persistence.snapshot()).to.deep.equal({});
    expect(guest.persistence.snapshot()).to.deep.equal({});
    expect(backend.peek(`sessions/${hosted}/isActive`)).to.be.false;

    owner.client.dispose();
    guest.client.dispose();
  });

  it('should resume the owned session after a restart', async () => {
    const first = await openDevice(backend, 'boat', clock);
    const hosted = await first.client.startPrimarySession();
    first.client.dispose();

    const second = await openDevice(backend, 'boat', clock, { persistence: first.persistence, tokenPrefix: 'S' });
    expect(second.client.effectiveSessionToken).to.equal(hosted);
    expect(await second.client.startPrimarySession()).to.equal(hosted);
    expect(Object.keys(backend.peek('sessions') ?? {})).to.deep.equal([hosted]);

    second.client.dispose();
  });

  it('should reset on restart when the owned session expired meanwhile', async () => {
    const first = await openDevice(backend, 'boat', clock);
    const hosted = await first.client.startPrimarySession();
    first.client.dispose();

    clock.advance(DAY_MS + 1);
    const second = await openDevice(backend, 'boat', clock, { persistence: first.persistence });
    await second.client.roles.whenRestored();
    await waitUntil(() => second.client.phase === 'unpaired');

    expect(first.persistence.snapshot()).to.deep.equal({});
    await waitUntil(() => backend.peek(`sessions/${hosted}`) === undefined);
    second.client.dispose();
  });
});
