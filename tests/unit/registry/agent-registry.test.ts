/**
 * Agent Registry Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

import type { AgentRegistry } from '@/registry/agent-registry.js';
import { createAgentRegistry } from '@/registry/agent-registry.js';
import { createAuditService } from '@/services/audit.service.js';
import type { Agent } from '@/types/index.js';
import { DuplicateAgentError, InvalidAgentError } from '@/types/index.js';

import { createTestAgent } from '../../helpers/test-utils.js';
import { createMockAuditDb } from '../../mocks/index.js';

describe('AgentRegistry', () => {
  let registry: AgentRegistry;

  beforeEach(() => {
    registry = createAgentRegistry({
      now: () => new Date('2026-03-01T12:00:00Z'),
    });
  });

  describe('register', () => {
    it('should store a frozen copy of the capabilities', () => {
      const agent = createTestAgent('scanner', ['port_scan']);

      const entry = registry.register(agent, { priority: 5 });

      expect(entry.priority).toBe(5);
      expect(entry.registeredAt.toISOString()).toBe('2026-03-01T12:00:00.000Z');
      expect(entry.capabilities).toEqual([
        { name: 'test', accepts: ['port_scan'] },
      ]);
      expect(Object.isFrozen(entry.capabilities)).toBe(true);
      expect(Object.isFrozen(entry)).toBe(true);
    });

    it('should not let later mutation of the agent change routing', () => {
      const capabilities = [{ name: 'scan', accepts: ['port_scan'] }];
      const agent: Agent = {
        id: 'mutable',
        capabilities,
        execute: async () => ({ success: true, data: {} }),
      };
      registry.register(agent);

      capabilities.push({ name: 'weather', accepts: ['weather'] });

      expect(registry.find({ taskType: 'weather' })).toEqual([]);
      expect(registry.find({ taskType: 'port_scan' })).toHaveLength(1);
    });

    it('should default the priority to 0', () => {
      expect(registry.register(createTestAgent('a', ['x'])).priority).toBe(0);
    });

    it('should reject a duplicate id', () => {
      registry.register(createTestAgent('scanner', ['port_scan']));

      expect(() =>
        registry.register(createTestAgent('scanner', ['network_scan']))
      ).toThrow(DuplicateAgentError);
      expect(registry.find({ taskType: 'network_scan' })).toEqual([]);
    });

    it.each([
      ['a blank id', createTestAgent('  ', ['x']), 'Agent id is required'],
      [
        'no capabilities',
        { id: 'bare', capabilities: [], execute: async () => ({ success: true, data: {} }) },
        'Agent bare must declare at least one capability',
      ],
      [
        'a capability without task types',
        createTestAgent('lazy', []),
        'Capability test of agent lazy accepts no task types',
      ],
      [
        'a nameless capability',
        createTestAgent('nameless', ['x'], undefined, ' '),
        'Capability 0 of agent nameless has no name',
      ],
    ])('should reject an agent with %s', (_case, agent, message) => {
      expect(() => registry.register(agent)).toThrow(message);
      expect(() => registry.register(agent)).toThrow(InvalidAgentError);
    });

    it('should reject a capability declared twice', () => {
      const agent: Agent = {
        id: 'twice',
        capabilities: [
          { name: 'scan', accepts: ['port_scan'] },
          { name: 'scan', accepts: ['network_scan'] },
        ],
        execute: async () => ({ success: true, data: {} }),
      };

      expect(() => registry.register(agent)).toThrow(
        'Agent twice declares capability scan twice'
      );
    });

    it('should reject a non-finite priority', () => {
      expect(() =>
        registry.register(createTestAgent('a', ['x']), {
          priority: Number.NaN,
        })
      ).toThrow('Agent a has a non-finite priority');
      expect(registry.get('a')).toBeNull();
    });
  });

  describe('find', () => {
    it('should order by priority, then by registration order', () => {
      registry.register(createTestAgent('low', ['port_scan']), { priority: 1 });
      registry.register(createTestAgent('first', ['port_scan']), {
        priority: 5,
      });
      registry.register(createTestAgent('second', ['port_scan']), {
        priority: 5,
      });
      registry.register(createTestAgent('other', ['weather']), {
        priority: 9,
      });

      const ids = registry
        .find({ taskType: 'port_scan' })
        .map((entry) => entry.agent.id);

      expect(ids).toEqual(['first', 'second', 'low']);
    });

    it('should narrow by capability name', () => {
      registry.register(
        createTestAgent('fast', ['port_scan'], undefined, 'quick-scan')
      );
      registry.register(
        createTestAgent('deep', ['port_scan'], undefined, 'deep-scan')
      );

      const ids = registry
        .find({ taskType: 'port_scan', capability: 'deep-scan' })
        .map((entry) => entry.agent.id);

      expect(ids).toEqual(['deep']);
    });

    it('should require the type and capability on the same declaration', () => {
      registry.register({
        id: 'split',
        capabilities: [
          { name: 'scan', accepts: ['port_scan'] },
          { name: 'weather', accepts: ['weather'] },
        ],
        execute: async () => ({ success: true, data: {} }),
      });

      expect(
        registry.find({ taskType: 'weather', capability: 'scan' })
      ).toEqual([]);
    });

    it('should return an empty list when nothing matches', () => {
      expect(registry.find({ taskType: 'port_scan' })).toEqual([]);
    });
  });

  describe('replace and unregister', () => {
    it('should swap the definition of an existing agent', () => {
      registry.register(createTestAgent('scanner', ['port_scan']));

      registry.replace(createTestAgent('scanner', ['network_scan']), {
        priority: 3,
      });

      expect(registry.find({ taskType: 'port_scan' })).toEqual([]);
      expect(registry.get('scanner')?.priority).toBe(3);
    });

    it('should refuse to replace an unknown agent', () => {
      expect(() =>
        registry.replace(createTestAgent('ghost', ['x']))
      ).toThrow('Agent ghost is not registered');
    });

    it('should remove an agent from routing', () => {
      registry.register(createTestAgent('scanner', ['port_scan']));

      expect(registry.unregister('scanner')).toBe(true);
      expect(registry.unregister('scanner')).toBe(false);
      expect(registry.find({ taskType: 'port_scan' })).toEqual([]);
      expect(registry.all()).toEqual([]);
    });
  });

  describe('audit trail', () => {
    it('should record registrations and removals', async () => {
      const db = createMockAuditDb();
      const audited = createAgentRegistry({
        auditService: createAuditService({ db }),
      });

      audited.register(createTestAgent('scanner', ['port_scan']), {
        priority: 2,
      });
      audited.unregister('scanner');
      await vi.waitFor(() => expect(db.insertLog).toHaveBeenCalledTimes(2));

      expect(db.insertLog).toHaveBeenNthCalledWith(1, {
        action: 'agent:registered',
        resourceType: 'agent',
        resourceId: 'scanner',
        details: { priority: 2, capabilities: ['test'] },
      });
      expect(db.insertLog).toHaveBeenNthCalledWith(2, {
        action: 'agent:unregistered',
        resourceType: 'agent',
        resourceId: 'scanner',
        details: {},
      });
    });
  });
});
