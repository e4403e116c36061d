/**
 * Request ID middleware
 *
 * Reuses a well-formed X-Request-ID (or X-Correlation-ID) from the caller,
 * otherwise generates one. Echoed back on the response.
 */

import { createMiddleware } from 'hono/factory';
import { randomUUID } from 'node:crypto';

const VALID_REQUEST_ID = /^[a-zA-Z0-9._:=-]{1,128}$/;

export const requestId = createMiddleware(async (c, next) => {
  const incoming = c.req.header('X-Request-ID') ?? c.req.header('X-Correlation-ID');
  const id = incoming && VALID_REQUEST_ID.test(incoming) ? incoming : randomUUID();
  c.set('requestId', id);
  c.header('X-Request-ID', id);
  await next();
});
