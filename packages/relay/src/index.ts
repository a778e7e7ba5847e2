/**
 * @anchorwatch/relay - passive document backend for anchorwatch pairing.
 *
 * @example
 * ```typescript
 * import { createRelayServer, loadConfig } from '@anchorwatch/relay';
 *
 * const config = loadConfig({ overrides: { port: 8080 } });
 * const server = await createRelayServer({ config });
 * await server.start();
 * ```
 */

// Configuration
export {
  type RelayConfig,
  type PartialRelayConfig,
  type CorsConfig,
  type LimitsConfig,
  type LoggingConfig,
  type LogLevel,
  DEFAULT_CONFIG,
  loadConfig,
  loadConfigFile,
  loadEnvConfig,
  parseCorsOrigin,
  isLogLevel,
} from './config/index.js';

// Service layer
export {
  RelayService,
  type RelayServiceOptions,
  type RelayIdentity,
  type RelayStatus,
} from './service/index.js';

// Server
export {
  createRelayServer,
  type RelayServer,
  type RelayServerOptions,
  registerRoutes,
  registerWebSocket,
} from './server/index.js';

export { createLogger } from './common/index.js';
