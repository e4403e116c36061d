/**
 * HTTP Server entry point
 */

// Load .env FIRST, before anything reads process.env
import { config } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync } from 'node:fs';

const __dirname = dirname(fileURLToPath(import.meta.url));

// Monorepo root, the package directory, then the working directory
const envPaths = [
  resolve(__dirname, '..', '..', '..', '.env'),
  resolve(__dirname, '..', '..', '.env'),
  resolve(process.cwd(), '.env'),
];

for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    config({ path: envPath });
    break;
  }
}

import { serve } from '@hono/node-server';
import { getErrorMessage } from '@content-intel/core';
import { createApp } from './app.js';
import { getServerConfig } from './config/env.js';
import { SHUTDOWN_TIMEOUT_MS } from './config/defaults.js';
import { startIntelRuntime, stopIntelRuntime } from './services/intel-runtime.js';
import { getLog } from './services/log.js';

const log = getLog('Server');

export async function startServer(): Promise<void> {
  const runtime = await startIntelRuntime();
  const serverConfig = getServerConfig();
  const app = createApp(serverConfig);

  if (serverConfig.corsOrigins?.includes('*')) {
    log.warn('CORS is set to wildcard (*). Any website can make API requests.');
  }

  log.info('Starting Content Intel...', {
    port: serverConfig.port,
    host: serverConfig.host,
    plugins: runtime.intel.getPlugins().map((plugin) => plugin.id),
    registeredServices: runtime.services.list(),
  });

  const server = serve(
    {
      fetch: app.fetch,
      port: serverConfig.port,
      hostname: serverConfig.host,
    },
    (info) => {
      log.info(`Server running at http://${info.address}:${info.port}`);
      log.info(`Health: http://${info.address}:${info.port}/health`);
    }
  );

  let isShuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) return;
    isShuttingDown = true;

    log.info(`Received ${signal}, shutting down gracefully...`);

    // Force exit if cleanup hangs
    setTimeout(() => process.exit(1), SHUTDOWN_TIMEOUT_MS).unref();

    await new Promise<void>((done) => server.close(() => done()));

    try {
      await stopIntelRuntime();
    } catch (e) {
      log.warn('Runtime shutdown error', { error: getErrorMessage(e) });
    }

    log.info('Cleanup complete, exiting.');
    process.exit(0);
  }

  const onSignal = (signal: string) => {
    gracefulShutdown(signal).catch((e: unknown) => {
      log.error('Shutdown failed', { error: getErrorMessage(e) });
      process.exit(1);
    });
  };
  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled Promise Rejection', { reason: getErrorMessage(reason) });
  });
}

const isEntryPoint = process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntryPoint) {
  startServer().catch((err: unknown) => {
    log.error('Fatal: server startup failed', {
      error: getErrorMessage(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    process.exit(1);
  });
}
