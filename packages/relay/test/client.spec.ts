/**
 * End-to-end tests: WebSocketRemoteStore against a live relay.
 */

import { expect } from 'chai';
import { StoreError, WebSocketRemoteStore, type StoreValue } from '@anchorwatch/store';
import { createRelayServer, loadConfig, type RelayServer } from '../src/index.js';

async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) expect.fail('Condition not met in time');
    await new Promise(resolve => setTimeout(resolve, 5));
  }
}

describe('WebSocketRemoteStore with relay', () => {
  let server: RelayServer;
  let wsUrl: string;
  const stores: WebSocketRemoteStore[] = [];

  before(async () => {
    const config = loadConfig({
      env: {},
      overrides: { host: '127.0.0.1', port: 0, basePath: '/relay' },
    });
    server = await createRelayServer({ config });
    await server.start();

    const address = server.app.server.address();
    const port = typeof address === 'object' && address ? address.port : 8080;
    wsUrl = `ws://127.0.0.1:${port}/relay/ws`;
  });

  afterEach(async () => {
    await Promise.all(stores.splice(0).map(store => store.close()));
  });

  after(async () => {
    await server.stop();
  });

  function createStore(credential?: string, onCredential?: (credential: string) => void): WebSocketRemoteStore {
    const store = new WebSocketRemoteStore({ url: wsUrl, credential, onCredential, autoReconnect: false });
    stores.push(store);
    return store;
  }

  it('should keep the identity across connections via the credential', async () => {
    let saved: string | undefined;
    const first = createStore(undefined, credential => { saved = credential; });
    const identity = await first.ensureAuthenticated();
    await first.close();

    const second = createStore(saved);
    expect(await second.ensureAuthenticated()).to.equal(identity);
  });

  it('should replicate writes to watchers on other devices', async () => {
    const owner = createStore();
    const observer = createStore();
    const ownerId = await owner.ensureAuthenticated();
    await observer.ensureAuthenticated();

    await owner.set('sessions/T1', {
      ownerIdentity: ownerId,
      createdAt: Date.now(),
      expiresAt: Date.now() + 60_000,
      isActive: true,
      devices: { [ownerId]: { deviceId: ownerId, role: 'primary', joinedAt: Date.now() } },
    });

    const seen: (StoreValue | undefined)[] = [];
    observer.watch('sessions/T1/monitoringActive', value => seen.push(value));
    await waitFor(() => seen.length === 1);

    await owner.update('sessions/T1', { monitoringActive: true });
    await waitFor(() => seen.length === 2);
    expect(seen).to.deep.equal([undefined, true]);

    await owner.delete('sessions/T1');
  });

  it('should surface rule violations as StoreError', async () => {
    const store = createStore();
    await store.ensureAuthenticated();
    try {
      await store.set('deviceSessions/someone-else', 'T1');
      expect.fail('Should have thrown');
    } catch (err) {
      expect(err).to.be.instanceOf(StoreError);
      expect(err).to.have.property('code', 'permission-denied');
    }
  });
});
