/**
 * Hono application setup
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';

import { VERSION } from '@content-intel/core';
import type { GatewayConfig } from './types/index.js';
import { requestId, timing, errorHandler, notFoundHandler } from './middleware/index.js';
import {
  healthRoutes,
  entityTypeRoutes,
  pluginsRoutes,
  settingsRoutes,
  entityRoutes,
  searchRoutes,
  apiError,
  ERROR_CODES,
} from './routes/index.js';
import {
  CORS_MAX_AGE_SECONDS,
  HTTP_BODY_LIMIT_BYTES,
  HTTP_DEFAULT_HOST,
  HTTP_DEFAULT_PORT,
} from './config/defaults.js';
import { getLog } from './services/log.js';

const log = getLog('Http');

/**
 * Default configuration: localhost only, no cross-origin access
 */
const DEFAULT_CONFIG: GatewayConfig = {
  port: HTTP_DEFAULT_PORT,
  host: HTTP_DEFAULT_HOST,
  corsOrigins: [],
  bodyLimit: HTTP_BODY_LIMIT_BYTES,
};

/**
 * Create the Hono application
 */
export function createApp(config: Partial<GatewayConfig> = {}): Hono {
  const fullConfig: GatewayConfig = { ...DEFAULT_CONFIG, ...config };
  const maxBodySize = fullConfig.bodyLimit ?? HTTP_BODY_LIMIT_BYTES;

  const app = new Hono();

  app.use('*', secureHeaders());

  // CORS - never default to wildcard
  app.use(
    '*',
    cors({
      origin: fullConfig.corsOrigins ?? [],
      allowMethods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'X-Request-ID'],
      exposeHeaders: ['X-Request-ID', 'X-Response-Time'],
      maxAge: CORS_MAX_AGE_SECONDS,
    })
  );

  // Request ID first so every later response, including 413, carries it
  app.use('*', requestId);

  app.use(
    '/api/*',
    bodyLimit({
      maxSize: maxBodySize,
      onError: (c) =>
        apiError(
          c,
          {
            code: ERROR_CODES.PAYLOAD_TOO_LARGE,
            message: `Request body exceeds ${maxBodySize} bytes`,
          },
          413
        ),
    })
  );

  app.use('*', timing);

  // Access log (skip in test environment)
  if (process.env.NODE_ENV !== 'test') {
    app.use('*', logger((message, ...rest) => log.info(message, rest.length > 0 ? rest : undefined)));
  }

  // Mount routes
  app.route('/health', healthRoutes);
  app.route('/api/v1/health', healthRoutes);
  app.route('/api/v1/entity-types', entityTypeRoutes);
  app.route('/api/v1/plugins', pluginsRoutes);
  app.route('/api/v1/settings', settingsRoutes);
  app.route('/api/v1/entities', entityRoutes);
  app.route('/api/v1/search', searchRoutes);

  // API info
  app.get('/api/v1', (c) => {
    return c.json({
      name: 'content-intel',
      version: VERSION,
      endpoints: {
        health: '/health',
        entityTypes: '/api/v1/entity-types',
        plugins: '/api/v1/plugins',
        settings: '/api/v1/settings/enabled-plugins',
        entities: '/api/v1/entities/:type',
        search: '/api/v1/search',
      },
    });
  });

  // Error handling
  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return app;
}

/**
 * Export types for Hono context
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    startTime: number;
  }
}
