/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import {
  createRequestIdMiddleware,
  getRequestId,
} from './middleware/request-id.js';
import { createAgentRoutes } from './routes/agents.js';
import { createAuditRoutes } from './routes/audit.js';
import { createCommandRoutes } from './routes/commands.js';
import { createHealthRoutes } from './routes/health.js';
import { createMemoryRoutes } from './routes/memories.js';
import { createTaskRoutes } from './routes/tasks.js';
import { createWorkflowRoutes } from './routes/workflows.js';
import type { ApiServices } from './types.js';

/**
 * App configuration
 */
interface AppConfig {
  services: ApiServices;
  allowedOrigins?: string[];
  /** Request logging (default true) */
  logRequests?: boolean;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { services, allowedOrigins, logRequests = true } = config;
  const app = new Hono();

  // Global middleware
  if (logRequests) {
    app.use('*', logger());
  }
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
      credentials: true,
    })
  );
  app.use('*', createRequestIdMiddleware());

  app.route(
    '/api/v1',
    createHealthRoutes({
      orchestrator: services.orchestrator,
      memory: services.memory,
    })
  );
  app.route('/api/v1', createCommandRoutes({ commands: services.commands }));
  app.route('/api/v1', createTaskRoutes({ orchestrator: services.orchestrator }));
  app.route(
    '/api/v1',
    createWorkflowRoutes({ orchestrator: services.orchestrator })
  );
  app.route('/api/v1', createAgentRoutes({ registry: services.registry }));
  app.route('/api/v1', createMemoryRoutes({ memory: services.memory }));
  app.route('/api/v1', createAuditRoutes({ audit: services.audit }));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: getRequestId(c),
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: getRequestId(c),
        },
      },
      500
    );
  });

  return app;
}
