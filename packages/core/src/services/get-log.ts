/**
 * Logging Utility
 *
 * Provides scoped loggers anywhere in the codebase.
 * Falls back to console if the ServiceRegistry isn't initialized yet
 * (tests, CLI commands that run before bootstrap).
 *
 * Usage:
 *   import { getLog } from '@content-intel/core';
 *   const log = getLog('Registry');
 *   log.info('Registered plugin', { id: 'word_count' });
 */

import { hasServiceRegistry, getServiceRegistry } from './registry.js';
import { Services } from './tokens.js';
import type { ILogService } from './log-service.js';

const fallbackLoggers = new Map<string, ILogService>();

function createFallbackLogger(module: string): ILogService {
  return {
    debug(msg, data) { if (data) console.debug(`[${module}]`, msg, data); else console.debug(`[${module}]`, msg); },
    info(msg, data) { if (data) console.log(`[${module}]`, msg, data); else console.log(`[${module}]`, msg); },
    warn(msg, data) { if (data) console.warn(`[${module}]`, msg, data); else console.warn(`[${module}]`, msg); },
    error(msg, data) { if (data) console.error(`[${module}]`, msg, data); else console.error(`[${module}]`, msg); },
    child(sub: string) { return getLog(`${module}:${sub}`); },
  };
}

/**
 * Get a scoped logger for a module.
 * Uses the registered Services.Log when available, falls back to console.
 */
export function getLog(module: string): ILogService {
  if (hasServiceRegistry()) {
    const registered = getServiceRegistry().tryGet(Services.Log);
    if (registered) {
      return registered.child(module);
    }
  }

  let logger = fallbackLoggers.get(module);
  if (!logger) {
    logger = createFallbackLogger(module);
    fallbackLoggers.set(module, logger);
  }
  return logger;
}
