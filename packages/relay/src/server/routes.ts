/**
 * HTTP routes for the relay.
 */

import type { FastifyInstance, FastifyReply } from 'fastify';
import type { RelayService } from '../service/relay-service.js';
import { httpLog } from '../common/logger.js';

/**
 * Register relay HTTP routes.
 */
export function registerRoutes(
  app: FastifyInstance,
  service: RelayService,
  basePath: string
): void {
  const errorResponse = (reply: FastifyReply, code: string, message: string, status = 400) => {
    return reply.status(status).send({
      ok: false,
      error: { code, message },
    });
  };

  // GET /status - Health check and stats
  app.get(`${basePath}/status`, async (_request, reply) => {
    httpLog('GET %s/status', basePath);
    return reply.send({ ok: true, data: service.getStatus() });
  });

  // POST /auth/anonymous - Issue an identity and credential for a new device
  app.post(`${basePath}/auth/anonymous`, async (_request, reply) => {
    httpLog('POST %s/auth/anonymous', basePath);
    try {
      return reply.send({ ok: true, data: service.issueIdentity() });
    } catch (err) {
      const message = err instanceof Error ? err.message : 'Sign-in failed';
      httpLog('POST /auth/anonymous error: %s', message);
      return errorResponse(reply, 'AUTH_FAILED', message, 500);
    }
  });
}
