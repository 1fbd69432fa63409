/**
 * Task Routes
 * Submit tasks, inspect them and cancel them
 */

import { Hono } from 'hono';

import type { TaskSnapshot } from '@/types/index.js';
import { createTask } from '@/orchestrator/task.js';

import { getRequestId } from '../middleware/request-id.js';
import { taskBodySchema } from '../schemas.js';
import type { ApiServices } from '../types.js';
import {
  errorResponse,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

interface TaskRoutesDeps {
  orchestrator: ApiServices['orchestrator'];
}

/**
 * Format snapshot for response
 */
function formatSnapshot(snapshot: TaskSnapshot) {
  return {
    task: {
      ...snapshot.task,
      createdAt: snapshot.task.createdAt.toISOString(),
    },
    agentId: snapshot.agentId,
    result: snapshot.result,
    updatedAt: snapshot.updatedAt.toISOString(),
  };
}

/**
 * Create task routes
 */
export function createTaskRoutes(deps: TaskRoutesDeps): Hono {
  const { orchestrator } = deps;
  const app = new Hono();

  /**
   * POST /tasks
   * Submit a task and wait for its terminal result. Failed and cancelled
   * tasks are still a 200: the outcome is in data.success / data.error.
   */
  app.post('/tasks', async (c) => {
    const requestId = getRequestId(c);
    const validation = taskBodySchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(
        c,
        validation.error,
        requestId,
        'Invalid task'
      );
    }

    const body = validation.data;
    const task = createTask({
      type: body.type,
      ...(body.priority !== undefined && { priority: body.priority }),
      ...(body.payload !== undefined && { payload: body.payload }),
      ...(body.capability !== undefined && { capability: body.capability }),
    });

    const result = await orchestrator.submit(task, {
      ...(body.timeoutMs !== undefined && { timeoutMs: body.timeoutMs }),
    });
    return successResponse(c, result, requestId);
  });

  /**
   * GET /tasks/:id
   * Current snapshot of a tracked task
   */
  app.get('/tasks/:id', (c) => {
    const requestId = getRequestId(c);
    const snapshot = orchestrator.getTask(c.req.param('id'));
    if (!snapshot) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Task not found' },
        requestId
      );
    }
    return successResponse(c, formatSnapshot(snapshot), requestId);
  });

  /**
   * POST /tasks/:id/cancel
   */
  app.post('/tasks/:id/cancel', (c) => {
    const requestId = getRequestId(c);
    const taskId = c.req.param('id');
    const snapshot = orchestrator.getTask(taskId);
    if (!snapshot) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Task not found' },
        requestId
      );
    }
    if (!orchestrator.cancel(taskId)) {
      return errorResponse(
        c,
        {
          code: 'CONFLICT',
          message: `Task is already ${snapshot.task.status}`,
        },
        requestId
      );
    }
    return successResponse(c, { taskId, cancelled: true }, requestId);
  });

  return app;
}
