/**
 * Command Routes Unit Tests
 *
 * Uses the bundled training data, so classification is real.
 */

import type { Hono } from 'hono';
import { describe, it, expect, beforeEach } from 'vitest';

import type { ApiServices } from '@/api/types.js';
import { CLARIFICATION_MESSAGE } from '@/services/command.service.js';

import {
  createTestApp,
  createTestServices,
  jsonRequest,
} from '../../helpers/api-utils.js';
import { createTestAgent } from '../../helpers/test-utils.js';

describe('Command Routes', () => {
  let services: ApiServices;
  let app: Hono;

  beforeEach(() => {
    services = createTestServices();
    services.registry.register(
      createTestAgent('scanner', ['port_scan'], (task) => ({
        target: task.payload.target,
        ports: task.payload.ports,
      }))
    );
    app = createTestApp(services);
  });

  describe('POST /classify', () => {
    it('should classify without executing', async () => {
      const res = await app.request(
        '/api/v1/classify',
        jsonRequest('POST', { text: 'scan 192.168.1.10 ports 22 and 80' })
      );

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.data).toMatchObject({
        label: 'port_scan',
        slots: { target: '192.168.1.10', ports: '22,80' },
        source: 'model',
        ambiguous: false,
      });
      expect(services.orchestrator.stats().tracked).toBe(0);
    });

    it('should require text', async () => {
      const res = await app.request('/api/v1/classify', jsonRequest('POST', {}));

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error.message).toBe('text: Required');
    });
  });

  describe('POST /commands', () => {
    it('should execute a recognised command', async () => {
      const res = await app.request(
        '/api/v1/commands',
        jsonRequest('POST', {
          text: 'scan 192.168.1.10 ports 22 and 80',
          priority: 'HIGH',
        })
      );

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.data.kind).toBe('executed');
      expect(body.data.intent.label).toBe('port_scan');
      expect(body.data.result).toMatchObject({
        success: true,
        status: 'SUCCEEDED',
        agentId: 'scanner',
        data: { target: '192.168.1.10', ports: '22,80' },
      });
      expect(
        services.orchestrator.getTask(body.data.result.taskId)?.task.priority
      ).toBe('HIGH');
    });

    it('should ask for clarification on unrecognised text', async () => {
      const res = await app.request(
        '/api/v1/commands',
        jsonRequest('POST', { text: 'zxqv blorf' })
      );

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.data).toMatchObject({
        kind: 'clarification',
        message: CLARIFICATION_MESSAGE,
        intent: { label: 'unknown', ambiguous: true },
      });
    });

    it('should reject an unknown priority', async () => {
      const res = await app.request(
        '/api/v1/commands',
        jsonRequest('POST', { text: 'scan ports', priority: 'ASAP' })
      );

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error.code).toBe('VALIDATION_ERROR');
      expect(body.error.message).toMatch(/^priority: /);
    });

    it('should reject a deadline beyond the timer limit', async () => {
      const res = await app.request(
        '/api/v1/commands',
        jsonRequest('POST', { text: 'scan ports', timeoutMs: 2 ** 31 })
      );

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error.message).toBe(
        'timeoutMs: Number must be less than or equal to 2147483647'
      );
    });
  });
});
