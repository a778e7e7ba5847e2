#!/usr/bin/env node
/**
 * CLI entry point for the relay.
 */

import { Command } from 'commander';
import debug from 'debug';
import { loadConfig, parseCorsOrigin, type PartialRelayConfig } from '../config/index.js';
import { createRelayServer } from '../server/server.js';

type CliOptions = {
  config?: string;
  host?: string;
  port?: number;
  basePath?: string;
  corsOrigin?: string;
  maxSessions?: number;
  maxValueBytes?: number;
  maxIdentities?: number;
  debug?: string;
};

const toInteger = (value: string) => parseInt(value, 10);

const program = new Command();

program
  .name('anchor-relay')
  .description('Document relay backend for anchorwatch pairing sessions')
  .version('0.1.0')
  .option('-c, --config <path>', 'Path to config file (JSON)')
  .option('-H, --host <host>', 'Host to bind to')
  .option('-p, --port <port>', 'Port to listen on', toInteger)
  .option('-b, --base-path <path>', 'Base path for all routes')
  .option('--cors-origin <origins>', 'CORS allowed origins (comma-separated, or "true"/"false")')
  .option('--max-sessions <count>', 'Maximum number of session records', toInteger)
  .option('--max-value-bytes <bytes>', 'Maximum size of a single write', toInteger)
  .option('--max-identities <count>', 'Anonymous credentials to remember', toInteger)
  .option('--debug <namespaces>', 'Debug namespaces (e.g., "anchorwatch:relay:*")')
  .action(async () => {
    const options = program.opts<CliOptions>();

    if (options.debug) {
      debug.enable(options.debug);
    }

    // Build overrides from CLI options
    const overrides: PartialRelayConfig = {};

    if (options.host) overrides.host = options.host;
    if (options.port !== undefined) overrides.port = options.port;
    if (options.basePath) overrides.basePath = options.basePath;
    if (options.corsOrigin) overrides.cors = { origin: parseCorsOrigin(options.corsOrigin) };
    const { maxSessions, maxValueBytes, maxIdentities } = options;
    if (maxSessions !== undefined || maxValueBytes !== undefined || maxIdentities !== undefined) {
      overrides.limits = {};
      if (maxSessions !== undefined) overrides.limits.maxSessions = maxSessions;
      if (maxValueBytes !== undefined) overrides.limits.maxValueBytes = maxValueBytes;
      if (maxIdentities !== undefined) overrides.limits.maxIdentities = maxIdentities;
    }

    const config = loadConfig({
      configPath: options.config,
      overrides,
    });

    console.log('Starting anchor-relay...');
    console.log(`  Host: ${config.host}`);
    console.log(`  Port: ${config.port}`);
    console.log(`  Base path: ${config.basePath}`);
    console.log(`  Session quota: ${config.limits.maxSessions ?? 'unlimited'}`);

    try {
      const server = await createRelayServer({ config });

      const shutdown = () => {
        console.log('\nShutting down...');
        server.stop().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error('Shutdown failed:', err);
            process.exit(1);
          }
        );
      };

      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);

      const address = await server.start();
      console.log(`anchor-relay listening at ${address}${config.basePath}`);
    } catch (err) {
      console.error('Failed to start server:', err);
      process.exit(1);
    }
  });

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
