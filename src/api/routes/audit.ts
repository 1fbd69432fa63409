/**
 * Audit Routes
 * Read-only access to the lifecycle trail
 */

import { Hono } from 'hono';

import type { AuditLog } from '@/types/index.js';

import { getRequestId } from '../middleware/request-id.js';
import { auditQuerySchema } from '../schemas.js';
import type { ApiServices } from '../types.js';
import {
  errorResponse,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

interface AuditRoutesDeps {
  audit: ApiServices['audit'];
}

function formatLog(log: AuditLog) {
  return {
    ...log,
    timestamp: log.timestamp.toISOString(),
  };
}

/**
 * Create audit routes
 */
export function createAuditRoutes(deps: AuditRoutesDeps): Hono {
  const { audit } = deps;
  const app = new Hono();

  /**
   * GET /audit?action=&resourceType=&resourceId=&since=&limit=
   * Matching entries, newest first
   */
  app.get('/audit', async (c) => {
    const requestId = getRequestId(c);
    const validation = auditQuerySchema.safeParse(c.req.query());
    if (!validation.success) {
      return validationErrorResponse(
        c,
        validation.error,
        requestId,
        'Invalid audit query'
      );
    }

    const { since, ...filters } = validation.data;
    const result = await audit.query({
      ...filters,
      ...(since !== undefined && { since: new Date(since) }),
    });
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data.map(formatLog), requestId);
  });

  /**
   * GET /audit/:resourceType/:resourceId
   * Full trail of one task, workflow, agent or memory record, oldest first
   */
  app.get('/audit/:resourceType/:resourceId', async (c) => {
    const requestId = getRequestId(c);
    const result = await audit.getResourceHistory(
      c.req.param('resourceType'),
      c.req.param('resourceId')
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data.map(formatLog), requestId);
  });

  return app;
}
