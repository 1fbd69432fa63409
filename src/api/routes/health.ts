/**
 * Health Route
 * Public endpoint for health checks
 */

import { Hono } from 'hono';

import type { ApiServices } from '../types.js';

interface HealthRoutesDeps {
  orchestrator: ApiServices['orchestrator'];
  memory: ApiServices['memory'];
}

/**
 * Create health check routes
 */
export function createHealthRoutes(deps: HealthRoutesDeps): Hono {
  const { orchestrator, memory } = deps;
  const app = new Hono();

  /**
   * GET /health
   * Liveness plus queue and memory counters
   */
  app.get('/health', (c) => {
    const stats = orchestrator.stats();
    return c.json({
      status: stats.accepting ? 'ok' : 'draining',
      timestamp: new Date().toISOString(),
      version: 'v1',
      orchestrator: stats,
      memory: memory.stats(),
    });
  });

  return app;
}
