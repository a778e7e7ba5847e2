/**
 * connectPairingClient against a live relay with on-disk persistence.
 */

import { expect } from 'chai';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createRelayServer, loadConfig, type RelayServer } from '@anchorwatch/relay';
import { STORE_CREDENTIAL_KEY, connectPairingClient } from '../src/client/pairing-client.js';
import { mergePairingConfig } from '../src/config/loader.js';
import { DEFAULT_PAIRING_CONFIG, type PairingConfig } from '../src/config/types.js';
import { LevelLocalPersistence } from '../src/persistence/level-persistence.js';
import { PERSISTENCE_KEYS } from '../src/persistence/role-state-store.js';

describe('connectPairingClient', () => {
  let server: RelayServer;
  let testDir: string;
  let config: PairingConfig;

  beforeEach(async () => {
    server = await createRelayServer({
      config: loadConfig({ env: {}, overrides: { host: '127.0.0.1', port: 0, basePath: '/relay' } }),
    });
    await server.start();
    const address = server.app.server.address();
    const port = typeof address === 'object' && address ? address.port : 8080;

    testDir = path.join(os.tmpdir(), `anchorwatch-connect-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    config = mergePairingConfig(DEFAULT_PAIRING_CONFIG, {
      store: { url: `ws://127.0.0.1:${port}/relay/ws` },
      persistence: { dataDir: testDir },
      auth: { retryDelayMs: 0 },
    });
  });

  afterEach(async () => {
    await server.stop();
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('should keep identity and session across a restart', async () => {
    const first = await connectPairingClient({ config });
    const hosted = await first.startPrimarySession();
    const identity = first.store.identity;
    expect(identity).to.match(/^anon-/);
    await first.close();

    const second = await connectPairingClient({ config });
    expect(second.effectiveSessionToken).to.equal(hosted);
    expect(await second.startPrimarySession()).to.equal(hosted);
    expect(second.store.identity).to.equal(identity);
    expect(second.roles.state.ownerIdentity).to.equal(identity);
    await second.close();
  });

  it('should store the credential beside the role state', async () => {
    const client = await connectPairingClient({ config });
    const hosted = await client.startPrimarySession();
    await client.close();

    const persistence = await LevelLocalPersistence.open({ path: testDir });
    expect(await persistence.getString(PERSISTENCE_KEYS.sessionToken)).to.equal(hosted);
    expect(await persistence.getString(PERSISTENCE_KEYS.role)).to.equal('primary');
    expect(await persistence.getString(STORE_CREDENTIAL_KEY)).to.be.a('string');
    await persistence.close();
  });

  it('should require a store url', async () => {
    const offline = mergePairingConfig(DEFAULT_PAIRING_CONFIG, { persistence: { dataDir: testDir } });
    let message: string | undefined;
    try {
      await connectPairingClient({ config: offline });
    } catch (err) {
      message = err instanceof Error ? err.message : String(err);
    }
    expect(message).to.equal('store.url is required to connect');
  });
});
