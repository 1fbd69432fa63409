/**
 * Request ID Middleware
 * Tags every request with an id, echoed in responses and the X-Request-Id
 * header
 */

import type { Context, Next } from 'hono';
import { nanoid } from 'nanoid';

/**
 * Generate a unique request ID
 */
function generateRequestId(): string {
  return nanoid();
}

export function createRequestIdMiddleware() {
  return async function requestIdMiddleware(c: Context, next: Next) {
    const incoming = c.req.header('x-request-id');
    const requestId =
      incoming !== undefined && /^[\w-]{1,64}$/.test(incoming)
        ? incoming
        : generateRequestId();

    c.set('requestId', requestId);
    await next();
    c.header('X-Request-Id', requestId);
  };
}

/**
 * Request id for the current request
 */
export function getRequestId(c: Context): string {
  return c.get('requestId') || 'unknown';
}
