/**
 * Health check routes
 */

import { Hono } from 'hono';
import { VERSION, Services, hasServiceRegistry, getServiceRegistry } from '@content-intel/core';
import type { HealthCheck, HealthStatus } from '../types/index.js';
import { getAdapterSync } from '../db/adapters/index.js';
import { apiResponse, apiError, ERROR_CODES } from './helpers.js';

const startTime = Date.now();

export const healthRoutes = new Hono();

function databaseConnected(): boolean {
  try {
    return getAdapterSync().isConnected();
  } catch {
    // Adapter not initialized yet
    return false;
  }
}

function intelReady(): boolean {
  return hasServiceRegistry() && getServiceRegistry().has(Services.Intel);
}

function collectChecks(): HealthCheck[] {
  const connected = databaseConnected();
  const checks: HealthCheck[] = [
    {
      name: 'database',
      status: connected ? 'pass' : 'fail',
      message: connected ? 'POSTGRES connected' : 'POSTGRES not connected',
    },
  ];

  if (intelReady()) {
    const plugins = getServiceRegistry().get(Services.Intel).getPlugins();
    const available = plugins.filter((plugin) => plugin.available).length;
    checks.push({
      name: 'intel',
      status: available === plugins.length ? 'pass' : 'warn',
      message: `${available}/${plugins.length} plugins available`,
    });
  } else {
    checks.push({ name: 'intel', status: 'fail', message: 'Intel service not registered' });
  }

  return checks;
}

/**
 * Basic health check
 */
healthRoutes.get('/', (c) => {
  const checks = collectChecks();
  const status: HealthStatus['status'] = checks.some((check) => check.status === 'fail')
    ? 'unhealthy'
    : checks.every((check) => check.status === 'pass')
      ? 'healthy'
      : 'degraded';

  const health: HealthStatus = {
    status,
    version: VERSION,
    uptime: (Date.now() - startTime) / 1000,
    checks,
  };
  return apiResponse(c, health);
});

/**
 * Liveness probe
 */
healthRoutes.get('/live', (c) => {
  return apiResponse(c, { status: 'ok' });
});

/**
 * Readiness probe: database connected and intel service registered
 */
healthRoutes.get('/ready', (c) => {
  if (!databaseConnected() || !intelReady()) {
    return apiError(c, { code: ERROR_CODES.SERVICE_UNAVAILABLE, message: 'Not ready' }, 503);
  }
  return apiResponse(c, { status: 'ok' });
});
