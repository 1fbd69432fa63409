/**
 * Agent Routes
 * Read-only view of the registry
 */

import { Hono } from 'hono';

import type { RegisteredAgent } from '@/types/index.js';

import { getRequestId } from '../middleware/request-id.js';
import type { ApiServices } from '../types.js';
import { errorResponse, successResponse } from '../utils/response.js';

interface AgentRoutesDeps {
  registry: ApiServices['registry'];
}

function formatAgent(entry: RegisteredAgent) {
  return {
    id: entry.agent.id,
    description: entry.agent.description ?? null,
    priority: entry.priority,
    capabilities: entry.capabilities.map((capability) => ({
      name: capability.name,
      accepts: [...capability.accepts],
    })),
    registeredAt: entry.registeredAt.toISOString(),
  };
}

/**
 * Create agent routes
 */
export function createAgentRoutes(deps: AgentRoutesDeps): Hono {
  const { registry } = deps;
  const app = new Hono();

  /**
   * GET /agents
   * Registered agents in routing order; ?taskType= narrows to candidates
   */
  app.get('/agents', (c) => {
    const requestId = getRequestId(c);
    const taskType = c.req.query('taskType');
    const capability = c.req.query('capability');

    const entries = taskType
      ? registry.find({
          taskType,
          ...(capability !== undefined && { capability }),
        })
      : registry.all();

    return successResponse(c, entries.map(formatAgent), requestId);
  });

  /**
   * GET /agents/:id
   */
  app.get('/agents/:id', (c) => {
    const requestId = getRequestId(c);
    const entry = registry.get(c.req.param('id'));
    if (!entry) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Agent not found' },
        requestId
      );
    }
    return successResponse(c, formatAgent(entry), requestId);
  });

  return app;
}
