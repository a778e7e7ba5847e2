/**
 * Fastify server setup for the relay.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyWebsocket from '@fastify/websocket';
import debug from 'debug';
import type { RelayConfig } from '../config/types.js';
import { RelayService } from '../service/relay-service.js';
import { registerRoutes } from './routes.js';
import { registerWebSocket } from './websocket.js';
import { serverLog } from '../common/logger.js';

export interface RelayServerOptions {
  /** Full configuration */
  config: RelayConfig;
  /** Clock used for expiry rules */
  now?: () => number;
}

export interface RelayServer {
  app: FastifyInstance;
  service: RelayService;
  /** Start listening; resolves to the bound address */
  start(): Promise<string>;
  stop(): Promise<void>;
}

/**
 * Create a relay server.
 */
export async function createRelayServer(options: RelayServerOptions): Promise<RelayServer> {
  const { config } = options;

  if (config.logging.namespaces) {
    debug.enable(config.logging.namespaces);
  }

  serverLog('Creating relay server');

  const app = Fastify({
    logger: config.logging.level === 'debug',
  });

  await app.register(fastifyCors, {
    origin: config.cors.origin,
    credentials: config.cors.credentials,
  });

  await app.register(fastifyWebsocket);

  const service = new RelayService({ config, now: options.now });

  registerRoutes(app, service, config.basePath);
  registerWebSocket(app, service, config.basePath);

  serverLog('Routes registered at %s', config.basePath);

  const start = async () => {
    const address = await app.listen({
      host: config.host,
      port: config.port,
    });
    serverLog('Server listening at %s', address);
    return address;
  };

  const stop = async () => {
    serverLog('Stopping server');
    await app.close();
    await service.shutdown();
    serverLog('Server stopped');
  };

  return { app, service, start, stop };
}
