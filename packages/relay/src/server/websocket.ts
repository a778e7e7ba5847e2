/**
 * WebSocket handler for the document relay.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { WebSocket, RawData } from 'ws';
import {
  ProtocolError,
  StoreError,
  parseClientMessage,
  type ClientMessage,
  type ServerMessage,
  type StoreErrorCode,
  type StoreValue,
  type Unsubscribe,
} from '@anchorwatch/store';
import type { RelayService } from '../service/relay-service.js';
import { wsLog } from '../common/logger.js';

/**
 * Register WebSocket handler.
 */
export function registerWebSocket(
  app: FastifyInstance,
  service: RelayService,
  basePath: string
): void {
  app.get(`${basePath}/ws`, { websocket: true }, (socket: WebSocket, request: FastifyRequest) => {
    wsLog('New WebSocket connection from %s', request.ip);
    service.connectionOpened();

    let identity: string | undefined;
    const watches: Map<string, Unsubscribe> = new Map();

    const sendMessage = (message: ServerMessage) => {
      if (socket.readyState === socket.OPEN) {
        socket.send(JSON.stringify(message));
      }
    };

    const sendError = (id: string | undefined, code: StoreErrorCode, message: string) => {
      sendMessage(id === undefined ? { type: 'error', code, message } : { type: 'error', id, code, message });
    };

    const snapshot = (watchId: string, value: StoreValue | undefined) => {
      sendMessage(value === undefined ? { type: 'snapshot', watchId } : { type: 'snapshot', watchId, value });
    };

    socket.on('message', (data: RawData) => {
      let message: ClientMessage;
      try {
        message = parseClientMessage(data.toString());
      } catch (err) {
        const msg = err instanceof Error ? err.message : 'Malformed message';
        wsLog('Rejected message: %s', msg);
        sendError(undefined, 'invalid-argument', msg);
        return;
      }

      wsLog('Received message: %s', message.type);
      try {
        handleMessage(message);
      } catch (err) {
        const { code, text } = describeError(err);
        wsLog('%s %s failed: %s (%s)', message.type, message.id, text, code);
        sendError(message.id, code, text);
      }
    });

    socket.on('close', () => {
      wsLog('WebSocket closed: %s', identity ?? 'anonymous');
      for (const unsubscribe of watches.values()) unsubscribe();
      watches.clear();
      service.connectionClosed();
    });

    socket.on('error', (err) => {
      wsLog('WebSocket error: %O', err);
    });

    function handleMessage(message: ClientMessage): void {
      switch (message.type) {
        case 'hello': {
          const issued = service.authenticate(message.credential);
          identity = issued.identity;
          sendMessage({ type: 'hello_ack', id: message.id, identity: issued.identity, credential: issued.credential });
          return;
        }
        case 'ping':
          sendMessage({ type: 'pong', id: message.id });
          return;
      }

      const caller = identity;
      if (caller === undefined) {
        throw new StoreError('unauthenticated', 'Must say hello first');
      }

      switch (message.type) {
        case 'get': {
          const value = service.read(caller, message.path);
          sendMessage(value === undefined
            ? { type: 'result', id: message.id }
            : { type: 'result', id: message.id, value });
          break;
        }
        case 'set':
          service.write({ identity: caller, operation: 'set', path: message.path, value: message.value });
          sendMessage({ type: 'result', id: message.id });
          break;
        case 'update':
          service.write({ identity: caller, operation: 'update', path: message.path, changes: message.changes });
          sendMessage({ type: 'result', id: message.id });
          break;
        case 'delete':
          service.write({ identity: caller, operation: 'delete', path: message.path });
          sendMessage({ type: 'result', id: message.id });
          break;
        case 'watch': {
          const watchId = message.id;
          watches.get(watchId)?.();
          watches.set(watchId, service.watch(caller, message.path, value => snapshot(watchId, value)));
          break;
        }
        case 'unwatch':
          watches.get(message.watchId)?.();
          watches.delete(message.watchId);
          break;
      }
    }
  });
}

function describeError(err: unknown): { code: StoreErrorCode; text: string } {
  if (err instanceof StoreError) {
    return { code: err.code, text: err.message };
  }
  if (err instanceof ProtocolError || err instanceof TypeError) {
    return { code: 'invalid-argument', text: err.message };
  }
  return { code: 'internal', text: err instanceof Error ? err.message : 'Message processing failed' };
}
