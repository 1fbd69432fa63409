/**
 * Command Routes
 * Classify instructions and run them end to end
 */

import { Hono } from 'hono';
import { z } from 'zod';

import { MAX_TIMER_MS } from '@/types/index.js';

import { getRequestId } from '../middleware/request-id.js';
import { prioritySchema } from '../schemas.js';
import type { ApiServices } from '../types.js';
import {
  errorResponse,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

interface CommandRoutesDeps {
  commands: ApiServices['commands'];
}

const classifySchema = z.object({
  text: z.string().max(2000),
  useContext: z.boolean().optional(),
});

const commandSchema = z.object({
  text: z.string().max(2000),
  priority: prioritySchema.optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMER_MS).optional(),
  useContext: z.boolean().optional(),
});

/**
 * Create command routes
 */
export function createCommandRoutes(deps: CommandRoutesDeps): Hono {
  const { commands } = deps;
  const app = new Hono();

  /**
   * POST /classify
   * Classify text without executing it
   */
  app.post('/classify', async (c) => {
    const requestId = getRequestId(c);
    const validation = classifySchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(
        c,
        validation.error,
        requestId,
        'Invalid classify request'
      );
    }

    const intent = await commands.interpret(
      validation.data.text,
      validation.data.useContext ?? true
    );
    return successResponse(c, intent, requestId);
  });

  /**
   * POST /commands
   * Classify, route and execute; unknown intents come back as a
   * clarification instead of a task result
   */
  app.post('/commands', async (c) => {
    const requestId = getRequestId(c);
    const validation = commandSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(
        c,
        validation.error,
        requestId,
        'Invalid command'
      );
    }

    const body = validation.data;
    const result = await commands.process(body.text, {
      ...(body.priority !== undefined && { priority: body.priority }),
      ...(body.timeoutMs !== undefined && { timeoutMs: body.timeoutMs }),
      ...(body.useContext !== undefined && { useContext: body.useContext }),
    });

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    return successResponse(c, result.data, requestId);
  });

  return app;
}
