/**
 * Minimal socket seam so the client can run over `ws` or a test double.
 */

import WebSocket, { type RawData } from 'ws';

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

export interface SocketLike {
  readonly isOpen: boolean;
  send(data: string): void;
  close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketLike;

/**
 * Open a socket with the `ws` package.
 */
export const connectWebSocket: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data: RawData) => handlers.onMessage(data.toString()));
  ws.on('close', (code: number, reason: Buffer) => handlers.onClose(code, reason.toString()));
  ws.on('error', (err: Error) => handlers.onError(err));

  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send: (data: string) => ws.send(data),
    close: () => ws.close(),
  };
};
