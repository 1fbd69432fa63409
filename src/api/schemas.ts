/**
 * Request body schemas shared by several routes
 */

import { z } from 'zod';

import { MAX_TIMER_MS } from '@/types/index.js';

export const prioritySchema = z.enum(['LOW', 'NORMAL', 'HIGH', 'CRITICAL']);

/**
 * Arbitrary JSON object (task payloads, metadata)
 */
export const jsonObjectSchema = z.record(z.string(), z.unknown());

export const taskBodySchema = z.object({
  type: z.string().trim().min(1, 'type is required').max(100),
  priority: prioritySchema.optional(),
  payload: jsonObjectSchema.optional(),
  capability: z.string().trim().min(1).max(100).optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMER_MS).optional(),
});

export const workflowBodySchema = z.object({
  id: z.string().trim().min(1).max(100).optional(),
  name: z.string().trim().min(1, 'name is required').max(200),
  steps: z
    .array(
      z.object({
        id: z.string().trim().min(1).max(100),
        type: z.string().trim().min(1).max(100),
        capability: z.string().trim().min(1).max(100),
        priority: prioritySchema.optional(),
        payload: jsonObjectSchema.optional(),
        dependsOn: z.array(z.string()).optional(),
        timeoutMs: z
          .number()
          .int()
          .positive()
          .max(MAX_TIMER_MS)
          .optional(),
      })
    )
    .min(1, 'steps must not be empty')
    .max(50),
});

export const memoryBodySchema = z.object({
  text: z.string().trim().min(1, 'text is required').max(10000),
  metadata: jsonObjectSchema.optional(),
});

export const auditQuerySchema = z.object({
  action: z.string().trim().min(1).max(100).optional(),
  resourceType: z.string().trim().min(1).max(100).optional(),
  resourceId: z.string().trim().min(1).max(100).optional(),
  since: z.string().datetime({ offset: true }).optional(),
  limit: z.coerce.number().int().positive().optional(),
});
