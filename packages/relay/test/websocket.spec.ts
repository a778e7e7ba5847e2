/**
 * Integration tests for the WebSocket handler.
 */

import { expect } from 'chai';
import WebSocket from 'ws';
import { isRecord } from '@anchorwatch/store';
import { createRelayServer, loadConfig, type RelayServer } from '../src/index.js';

type Message = Record<string, unknown>;

describe('WebSocket Handler', () => {
  let server: RelayServer;
  let wsUrl: string;
  const sockets: WebSocket[] = [];

  before(async () => {
    const config = loadConfig({
      env: {},
      overrides: {
        host: '127.0.0.1',
        port: 0,
        basePath: '/relay',
      },
    });

    server = await createRelayServer({ config });
    await server.start();

    const address = server.app.server.address();
    const port = typeof address === 'object' && address ? address.port : 8080;
    wsUrl = `ws://127.0.0.1:${port}/relay/ws`;
  });

  afterEach(() => {
    for (const ws of sockets.splice(0)) ws.close();
  });

  after(async () => {
    await server.stop();
  });

  /**
   * Helper to create a WebSocket and wait for connection.
   */
  function connectWs(): Promise<WebSocket> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(wsUrl);
      sockets.push(ws);
      ws.on('open', () => resolve(ws));
      ws.on('error', reject);
    });
  }

  /**
   * Wait for the next message matching the predicate.
   */
  function nextMessage(ws: WebSocket, predicate: (message: Message) => boolean = () => true): Promise<Message> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        ws.off('message', onMessage);
        reject(new Error('Timeout'));
      }, 5000);
      const onMessage = (data: WebSocket.RawData) => {
        const parsed: unknown = JSON.parse(data.toString());
        if (!isRecord(parsed) || !predicate(parsed)) return;
        clearTimeout(timeout);
        ws.off('message', onMessage);
        resolve(parsed);
      };
      ws.on('message', onMessage);
    });
  }

  function sendAndReceive(ws: WebSocket, message: Message): Promise<Message> {
    const reply = nextMessage(ws, m => m.id === message.id);
    ws.send(JSON.stringify(message));
    return reply;
  }

  async function hello(ws: WebSocket, credential?: string): Promise<Message> {
    const ack = await sendAndReceive(ws, { type: 'hello', id: 'h1', credential });
    expect(ack.type).to.equal('hello_ack');
    return ack;
  }

  describe('Handshake', () => {
    it('should issue an identity and credential', async () => {
      const ws = await connectWs();
      const ack = await hello(ws);
      expect(ack.identity).to.match(/^anon-/);
      expect(ack.credential).to.be.a('string');
    });

    it('should resume an identity from its credential', async () => {
      const first = await hello(await connectWs());
      const second = await hello(await connectWs(), String(first.credential));
      expect(second.identity).to.equal(first.identity);
    });

    it('should reject operations before hello', async () => {
      const ws = await connectWs();
      const reply = await sendAndReceive(ws, { type: 'get', id: 'g1', path: 'sessions' });
      expect(reply).to.deep.equal({
        type: 'error',
        id: 'g1',
        code: 'unauthenticated',
        message: 'Must say hello first',
      });
    });

    it('should answer ping without hello', async () => {
      const ws = await connectWs();
      const reply = await sendAndReceive(ws, { type: 'ping', id: 'p1' });
      expect(reply).to.deep.equal({ type: 'pong', id: 'p1' });
    });
  });

  describe('Documents', () => {
    it('should round-trip a write', async () => {
      const ws = await connectWs();
      const { identity } = await hello(ws);
      const path = `deviceSessions/${String(identity)}`;

      expect(await sendAndReceive(ws, { type: 'set', id: 's1', path, value: 'T1' }))
        .to.deep.equal({ type: 'result', id: 's1' });
      expect(await sendAndReceive(ws, { type: 'get', id: 'g1', path }))
        .to.deep.equal({ type: 'result', id: 'g1', value: 'T1' });
    });

    it('should report rule violations', async () => {
      const ws = await connectWs();
      await hello(ws);
      const reply = await sendAndReceive(ws, { type: 'set', id: 's1', path: 'deviceSessions/someone-else', value: 'T1' });
      expect(reply.type).to.equal('error');
      expect(reply.code).to.equal('permission-denied');
    });

    it('should reject malformed messages', async () => {
      const ws = await connectWs();
      const reply = nextMessage(ws);
      ws.send('not json');
      expect(await reply).to.deep.equal({
        type: 'error',
        code: 'invalid-argument',
        message: 'Message is not valid JSON',
      });
    });
  });

  describe('Watches', () => {
    it('should push snapshots until unwatched', async () => {
      const ws = await connectWs();
      const { identity } = await hello(ws);
      const path = `deviceSessions/${String(identity)}`;
      const isSnapshot = (m: Message) => m.type === 'snapshot';

      const initial = nextMessage(ws, isSnapshot);
      ws.send(JSON.stringify({ type: 'watch', id: 'w1', path }));
      expect(await initial).to.deep.equal({ type: 'snapshot', watchId: 'w1' });

      const changed = nextMessage(ws, isSnapshot);
      await sendAndReceive(ws, { type: 'set', id: 's1', path, value: 'T1' });
      expect(await changed).to.deep.equal({ type: 'snapshot', watchId: 'w1', value: 'T1' });
      expect(server.service.getStatus().watchers).to.equal(1);

      ws.send(JSON.stringify({ type: 'unwatch', id: 'u1', watchId: 'w1' }));
      await sendAndReceive(ws, { type: 'ping', id: 'p1' });
      expect(server.service.getStatus().watchers).to.equal(0);
    });
  });
});
