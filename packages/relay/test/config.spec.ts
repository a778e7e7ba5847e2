/**
 * Tests for configuration loading.
 */

import { expect } from 'chai';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_CONFIG, loadConfig, loadConfigFile, loadEnvConfig, parseCorsOrigin } from '../src/config/index.js';

describe('Configuration', () => {
  describe('DEFAULT_CONFIG', () => {
    it('should have sensible defaults', () => {
      expect(DEFAULT_CONFIG.host).to.equal('0.0.0.0');
      expect(DEFAULT_CONFIG.port).to.equal(8080);
      expect(DEFAULT_CONFIG.basePath).to.equal('/relay');
      expect(DEFAULT_CONFIG.cors.origin).to.equal(true);
      expect(DEFAULT_CONFIG.limits.maxSessions).to.be.undefined;
      expect(DEFAULT_CONFIG.limits.maxValueBytes).to.equal(65536);
    });
  });

  describe('parseCorsOrigin', () => {
    it('should parse booleans and lists', () => {
      expect(parseCorsOrigin('true')).to.equal(true);
      expect(parseCorsOrigin('false')).to.equal(false);
      expect(parseCorsOrigin('https://a.test, https://b.test')).to.deep.equal(['https://a.test', 'https://b.test']);
    });
  });

  describe('loadEnvConfig', () => {
    it('should read relay variables', () => {
      const config = loadEnvConfig({
        RELAY_HOST: 'localhost',
        RELAY_PORT: '9090',
        RELAY_BASE_PATH: '/r',
        RELAY_CORS_ORIGIN: 'false',
        RELAY_CORS_CREDENTIALS: 'false',
        RELAY_MAX_SESSIONS: '25',
        RELAY_MAX_IDENTITIES: '500',
        RELAY_LOG_LEVEL: 'debug',
        RELAY_DEBUG: 'anchorwatch:*',
      });

      expect(config).to.deep.equal({
        host: 'localhost',
        port: 9090,
        basePath: '/r',
        cors: { origin: false, credentials: false },
        limits: { maxSessions: 25, maxIdentities: 500 },
        logging: { level: 'debug', namespaces: 'anchorwatch:*' },
      });
    });

    it('should ignore unknown log levels', () => {
      expect(loadEnvConfig({ RELAY_LOG_LEVEL: 'loud' })).to.deep.equal({});
    });

    it('should reject a non-numeric port', () => {
      expect(() => loadEnvConfig({ RELAY_PORT: 'eighty' })).to.throw(/RELAY_PORT/);
    });
  });

  describe('config files', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'relay-config-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('should keep only recognised fields', async () => {
      const path = join(dir, 'relay.json');
      await writeFile(path, JSON.stringify({
        port: 7000,
        host: 42,
        limits: { maxSessions: 3, maxValueBytes: 'big' },
        extra: true,
      }));

      expect(loadConfigFile(path)).to.deep.equal({
        port: 7000,
        limits: { maxSessions: 3 },
      });
    });

    it('should return nothing for a missing file', () => {
      expect(loadConfigFile(join(dir, 'absent.json'))).to.deep.equal({});
    });

    it('should fail on malformed JSON', async () => {
      const path = join(dir, 'broken.json');
      await writeFile(path, '{ port: ');
      expect(() => loadConfigFile(path)).to.throw(/Failed to parse config file/);
    });

    it('should layer file, environment and overrides', async () => {
      const path = join(dir, 'relay.json');
      await writeFile(path, JSON.stringify({ port: 7000, basePath: '/file', limits: { maxSessions: 3 } }));

      const config = loadConfig({
        configPath: path,
        env: { RELAY_PORT: '7100' },
        overrides: { limits: { maxValueBytes: 1024 } },
      });

      expect(config.port).to.equal(7100);
      expect(config.basePath).to.equal('/file');
      expect(config.limits).to.deep.equal({ maxSessions: 3, maxValueBytes: 1024, maxIdentities: 10_000 });
      expect(config.host).to.equal('0.0.0.0');
    });
  });
});
