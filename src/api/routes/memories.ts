/**
 * Memory Routes
 * Add, search and delete semantic memory records
 */

import { Hono } from 'hono';

import type { MemoryRecord, MetadataFilter } from '@/types/index.js';

import { getRequestId } from '../middleware/request-id.js';
import { memoryBodySchema } from '../schemas.js';
import type { ApiServices } from '../types.js';
import {
  errorResponse,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

const DEFAULT_K = 5;
const MAX_K = 50;

/** Query parameters that are not metadata filters */
const RESERVED_PARAMS = new Set(['q', 'k']);

interface MemoryRoutesDeps {
  memory: ApiServices['memory'];
}

/**
 * Parse k query param
 */
function parseK(value: string | undefined): number {
  if (!value) {
    return DEFAULT_K;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 0) {
    return DEFAULT_K;
  }
  return Math.min(parsed, MAX_K);
}

/**
 * Format memory record for response (vectors are not returned)
 */
function formatRecord(record: MemoryRecord) {
  return {
    id: record.id,
    text: record.text,
    metadata: record.metadata,
    createdAt: record.createdAt.toISOString(),
  };
}

/**
 * Create memory routes
 */
export function createMemoryRoutes(deps: MemoryRoutesDeps): Hono {
  const { memory } = deps;
  const app = new Hono();

  /**
   * POST /memories
   * Store a record
   */
  app.post('/memories', async (c) => {
    const requestId = getRequestId(c);
    const validation = memoryBodySchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(
        c,
        validation.error,
        requestId,
        'Invalid memory'
      );
    }

    const result = await memory.add(
      validation.data.text,
      validation.data.metadata ?? {}
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    const record = memory.get(result.data);
    return successResponse(
      c,
      record ? formatRecord(record) : { id: result.data },
      requestId,
      201
    );
  });

  /**
   * GET /memories/search?q=...&k=5&<metadata key>=<value>
   * Every other query parameter is an exact-match (string) metadata filter
   */
  app.get('/memories/search', async (c) => {
    const requestId = getRequestId(c);
    const query = c.req.query('q');
    if (!query || !query.trim()) {
      return errorResponse(
        c,
        { code: 'VALIDATION_ERROR', message: 'q is required' },
        requestId
      );
    }

    const filter: MetadataFilter = {};
    for (const [key, value] of Object.entries(c.req.query())) {
      if (!RESERVED_PARAMS.has(key)) {
        filter[key] = value;
      }
    }

    const result = await memory.search(
      query,
      parseK(c.req.query('k')),
      Object.keys(filter).length > 0 ? filter : undefined
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(
      c,
      result.data.map((hit) => ({
        ...formatRecord(hit.record),
        similarity: hit.similarity,
      })),
      requestId
    );
  });

  /**
   * GET /memories/:id
   */
  app.get('/memories/:id', (c) => {
    const requestId = getRequestId(c);
    const record = memory.get(c.req.param('id'));
    if (!record) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Memory not found' },
        requestId
      );
    }
    return successResponse(c, formatRecord(record), requestId);
  });

  /**
   * DELETE /memories/:id
   */
  app.delete('/memories/:id', async (c) => {
    const requestId = getRequestId(c);
    const result = await memory.delete(c.req.param('id'));
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }
    if (!result.data) {
      return errorResponse(
        c,
        { code: 'NOT_FOUND', message: 'Memory not found' },
        requestId
      );
    }
    return c.body(null, 204);
  });

  return app;
}
