/**
 * Request timing middleware
 */

import { createMiddleware } from 'hono/factory';
import { getLog } from '../services/log.js';

const log = getLog('Http');

export const timing = createMiddleware(async (c, next) => {
  const start = performance.now();
  c.set('startTime', start);

  await next();

  const duration = performance.now() - start;
  c.header('X-Response-Time', `${duration.toFixed(2)}ms`);
  log.debug(`${c.req.method} ${c.req.path} ${c.res.status}`, { durationMs: Math.round(duration) });
});
