/**
 * Workflow Routes Unit Tests
 */

import type { Hono } from 'hono';
import { describe, it, expect, beforeEach } from 'vitest';

import type { ApiServices } from '@/api/types.js';

import {
  createTestApp,
  createTestServices,
  jsonRequest,
} from '../../helpers/api-utils.js';
import {
  createTestAgent,
  deferred,
  flushMicrotasks,
} from '../../helpers/test-utils.js';

describe('Workflow Routes', () => {
  let services: ApiServices;
  let app: Hono;

  beforeEach(() => {
    services = createTestServices();
    services.registry.register(
      createTestAgent('fetcher', ['fetch'], () => ({ rows: 3 }), 'data')
    );
    services.registry.register(
      createTestAgent(
        'reporter',
        ['report'],
        (task) => ({ received: task.payload.inputs }),
        'reporting'
      )
    );
    app = createTestApp(services);
  });

  describe('POST /workflows', () => {
    it('should run the steps and pass dependency results on', async () => {
      const res = await app.request(
        '/api/v1/workflows',
        jsonRequest('POST', {
          id: 'wf_report',
          name: 'nightly report',
          steps: [
            {
              id: 'summary',
              type: 'report',
              capability: 'reporting',
              dependsOn: ['load'],
            },
            { id: 'load', type: 'fetch', capability: 'data' },
          ],
        })
      );

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.data).toMatchObject({
        workflowId: 'wf_report',
        name: 'nightly report',
        state: 'completed',
        success: true,
      });
      expect(
        body.data.results.map((r: { stepId: string }) => r.stepId)
      ).toEqual(['summary', 'load']);
      expect(body.data.results[0].data).toEqual({
        received: { load: { rows: 3 } },
      });
    });

    it('should reject a dependency cycle before running anything', async () => {
      const res = await app.request(
        '/api/v1/workflows',
        jsonRequest('POST', {
          name: 'loop',
          steps: [
            { id: 'a', type: 'fetch', capability: 'data', dependsOn: ['b'] },
            { id: 'b', type: 'fetch', capability: 'data', dependsOn: ['a'] },
          ],
        })
      );

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error).toMatchObject({
        code: 'WorkflowDefinitionError',
        message: 'Workflow loop contains a dependency cycle',
        details: { workflow: 'loop', steps: ['a', 'b'] },
      });
      expect(services.orchestrator.stats().tracked).toBe(0);
    });

    it('should reject an unknown dependency', async () => {
      const res = await app.request(
        '/api/v1/workflows',
        jsonRequest('POST', {
          name: 'broken',
          steps: [
            { id: 'a', type: 'fetch', capability: 'data', dependsOn: ['z'] },
          ],
        })
      );

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error.message).toBe('Step a depends on unknown step z');
    });

    it('should reject a step deadline beyond the timer limit', async () => {
      const res = await app.request(
        '/api/v1/workflows',
        jsonRequest('POST', {
          name: 'patient',
          steps: [
            {
              id: 'a',
              type: 'fetch',
              capability: 'data',
              timeoutMs: 3_000_000_000,
            },
          ],
        })
      );

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error.message).toBe(
        'steps.0.timeoutMs: Number must be less than or equal to 2147483647'
      );
    });

    it('should require at least one step', async () => {
      const res = await app.request(
        '/api/v1/workflows',
        jsonRequest('POST', { name: 'empty', steps: [] })
      );

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error).toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'steps: steps must not be empty',
      });
    });
  });

  describe('POST /workflows/:id/cancel', () => {
    it('should cancel a running workflow', async () => {
      const gate = deferred<Record<string, unknown>>();
      services.registry.register(
        createTestAgent('held', ['hold'], () => gate.promise, 'slow')
      );
      const run = services.orchestrator.runWorkflow({
        id: 'wf_hold',
        name: 'held',
        steps: [
          { id: 'wait', type: 'hold', capability: 'slow' },
          { id: 'after', type: 'fetch', capability: 'data', dependsOn: ['wait'] },
        ],
      });
      await flushMicrotasks();

      const res = await app.request('/api/v1/workflows/wf_hold/cancel', {
        method: 'POST',
      });

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.data).toEqual({ workflowId: 'wf_hold', cancelled: true });
      const outcome = await run;
      expect(outcome.state).toBe('cancelled');
      expect(outcome.results.map((r) => r.status)).toEqual([
        'CANCELLED',
        'CANCELLED',
      ]);
      gate.resolve({});
    });

    it('should return 404 when nothing is running under the id', async () => {
      const res = await app.request('/api/v1/workflows/wf_none/cancel', {
        method: 'POST',
      });

      expect(res.status).toBe(404);
      const body = await res.json();
      expect(body.error.message).toBe('No running workflow with that id');
    });
  });
});
