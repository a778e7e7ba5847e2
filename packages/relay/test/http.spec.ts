/**
 * Integration tests for HTTP routes.
 */

import { expect } from 'chai';
import { isRecord } from '@anchorwatch/store';
import { createRelayServer, loadConfig, type RelayServer } from '../src/index.js';

function field(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

describe('HTTP Routes', () => {
  let server: RelayServer;
  let baseUrl: string;

  before(async () => {
    const config = loadConfig({
      env: {},
      overrides: {
        host: '127.0.0.1',
        port: 0, // Random available port
        basePath: '/relay',
      },
    });

    server = await createRelayServer({ config });
    await server.start();

    const address = server.app.server.address();
    const port = typeof address === 'object' && address ? address.port : 8080;
    baseUrl = `http://127.0.0.1:${port}/relay`;
  });

  after(async () => {
    await server.stop();
  });

  async function signIn(): Promise<unknown> {
    const response = await fetch(`${baseUrl}/auth/anonymous`, { method: 'POST' });
    expect(response.ok).to.be.true;
    return response.json();
  }

  describe('GET /status', () => {
    it('should return relay status', async () => {
      const response = await fetch(`${baseUrl}/status`);
      expect(response.ok).to.be.true;

      const body = await response.json();
      expect(body).to.have.property('ok', true);
      expect(body).to.have.nested.property('data.connectedClients', 0);
      expect(body).to.have.nested.property('data.sessions', 0);
      expect(body).to.have.nested.property('data.watchers', 0);
      expect(body).to.have.nested.property('data.uptime');
    });
  });

  describe('POST /auth/anonymous', () => {
    it('should issue distinct identities', async () => {
      const first = await signIn();
      const second = await signIn();

      expect(first).to.have.property('ok', true);
      expect(field(first, 'data', 'identity')).to.match(/^anon-/);
      expect(field(first, 'data', 'credential')).to.be.a('string');
      expect(field(second, 'data', 'identity')).to.not.equal(field(first, 'data', 'identity'));
    });

    it('should issue credentials the service recognises', async () => {
      const body = await signIn();
      const credential = field(body, 'data', 'credential');
      if (typeof credential !== 'string') expect.fail('credential missing');

      const resumed = server.service.authenticate(credential);
      expect(resumed.identity).to.equal(field(body, 'data', 'identity'));
    });
  });
});
