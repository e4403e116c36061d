/**
 * Server command - starts the HTTP API server
 *
 * --port and --host override PORT and HOST from the environment.
 */

import { startServer } from '@content-intel/gateway';
import { fail } from '../runtime.js';

export interface ServerOptions {
  port?: string;
  host?: string;
}

export async function serverStart(options: ServerOptions = {}): Promise<void> {
  if (options.port !== undefined) {
    const port = Number(options.port);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      fail(new Error(`Invalid port: ${options.port}`));
      return;
    }
    process.env.PORT = String(port);
  }
  if (options.host !== undefined) {
    process.env.HOST = options.host;
  }

  try {
    await startServer();
  } catch (err) {
    fail(err);
  }
}
