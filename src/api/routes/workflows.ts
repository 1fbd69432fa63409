/**
 * Workflow Routes
 */

import { Hono } from 'hono';

import type {
  Result,
  Workflow,
  WorkflowRunResult,
} from '@/types/index.js';
import { CoreError, failure, success } from '@/types/index.js';

import { getRequestId } from '../middleware/request-id.js';
import { workflowBodySchema } from '../schemas.js';
import type { ApiServices } from '../types.js';
import {
  errorResponse,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

interface WorkflowRoutesDeps {
  orchestrator: ApiServices['orchestrator'];
}

/**
 * Definition errors are thrown before any step runs; surface them as a
 * failure instead
 */
function startWorkflow(
  orchestrator: ApiServices['orchestrator'],
  workflow: Workflow
): Result<Promise<WorkflowRunResult>> {
  try {
    return success(orchestrator.runWorkflow(workflow));
  } catch (error) {
    if (error instanceof CoreError) {
      return failure(error.kind, error.message, error.details);
    }
    throw error;
  }
}

/**
 * Create workflow routes
 */
export function createWorkflowRoutes(deps: WorkflowRoutesDeps): Hono {
  const { orchestrator } = deps;
  const app = new Hono();

  /**
   * POST /workflows
   * Run a workflow to completion; results follow step declaration order
   */
  app.post('/workflows', async (c) => {
    const requestId = getRequestId(c);
    const validation = workflowBodySchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(
        c,
        validation.error,
        requestId,
        'Invalid workflow'
      );
    }

    const started = startWorkflow(orchestrator, validation.data);
    if (!started.success) {
      return errorResponse(c, started.error, requestId);
    }
    return successResponse(c, await started.data, requestId);
  });

  /**
   * POST /workflows/:id/cancel
   */
  app.post('/workflows/:id/cancel', (c) => {
    const requestId = getRequestId(c);
    const workflowId = c.req.param('id');
    if (!orchestrator.cancelWorkflow(workflowId)) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'No running workflow with that id' },
        requestId
      );
    }
    return successResponse(c, { workflowId, cancelled: true }, requestId);
  });

  return app;
}
