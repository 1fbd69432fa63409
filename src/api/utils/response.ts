/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';
import type { z } from 'zod';

import { getErrorStatus } from '../types.js';

/**
 * Service error shape (matches Result pattern)
 */
interface ServiceError {
  code: string;
  message: string;
  details?: unknown;
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: ServiceError,
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 | 202 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}

/**
 * 400 response for a failed schema check
 */
export function validationErrorResponse(
  c: Context,
  error: z.ZodError,
  requestId: string,
  fallback: string
): Response {
  const issue = error.issues[0];
  const message = issue
    ? `${issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''}${issue.message}`
    : fallback;
  return errorResponse(c, { code: 'VALIDATION_ERROR', message }, requestId);
}

/**
 * Read a JSON body; malformed or missing bodies read as {}
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    const body: unknown = await c.req.json();
    return body;
  } catch {
    return {};
  }
}
