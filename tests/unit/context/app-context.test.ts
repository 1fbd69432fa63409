/**
 * Application Context Unit Tests
 *
 * Contexts are built without Supabase or an embedding key, so every
 * collaborator runs in process.
 */

import { describe, it, expect, vi } from 'vitest';

import { loadConfig } from '@/config/index.js';
import { createAppContext } from '@/context/app-context.js';
import { createInMemoryMemoryDb } from '@/services/memory.db.js';

import { createKeywordEmbedder, createTestAgent } from '../../helpers/test-utils.js';
import { createMockMemoryDb } from '../../mocks/index.js';

describe('createAppContext', () => {
  it('should build local collaborators without external services', async () => {
    const context = await createAppContext(loadConfig({}));

    expect(context.embedder.model).toBe('local-hashing-256');
    expect(context.memory.stats()).toEqual({
      totalRecords: 0,
      dimensions: 256,
      embeddingModel: 'local-hashing-256',
      pendingWrites: 0,
    });
    expect(context.classifier.labels()).toHaveLength(14);
    expect(context.registry.all().map((entry) => entry.agent.id)).toEqual([
      'memory',
    ]);

    await context.dispose();
  });

  it('should register extra agents after the memory agent', async () => {
    const context = await createAppContext(loadConfig({}), {
      agents: [createTestAgent('scanner', ['port_scan'])],
    });

    expect(context.registry.all().map((entry) => entry.agent.id)).toEqual([
      'memory',
      'scanner',
    ]);

    await context.dispose();
  });

  it('should load persisted memory at startup', async () => {
    const context = await createAppContext(loadConfig({}), {
      embedder: createKeywordEmbedder(['backup', 'vpn']),
      memoryDb: createInMemoryMemoryDb([
        {
          id: 'mem_seed',
          text: 'the backup server is 10.0.0.9',
          vector: [1, 0],
          metadata: { kind: 'note' },
          createdAt: new Date('2026-01-01T00:00:00Z'),
        },
      ]),
    });

    expect(context.memory.get('mem_seed')?.text).toBe(
      'the backup server is 10.0.0.9'
    );

    await context.dispose();
  });

  it('should start with an empty index when loading fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const memoryDb = createMockMemoryDb();
    memoryDb.loadRecords.mockRejectedValueOnce(new Error('db down'));

    const context = await createAppContext(loadConfig({}), { memoryDb });

    expect(context.memory.size()).toBe(0);
    expect(errorSpy).toHaveBeenCalledWith(
      'Memory records not loaded: Failed to load memory records: db down'
    );

    await context.dispose();
  });

  it('should pass configuration through to the orchestrator', async () => {
    const context = await createAppContext(
      loadConfig({ ORCHESTRATOR_MAX_CONCURRENCY: '2' })
    );

    expect(context.config.orchestrator.maxConcurrency).toBe(2);
    expect(context.orchestrator.stats().accepting).toBe(true);

    await context.dispose();
  });

  it('should dispose once', async () => {
    const context = await createAppContext(loadConfig({}));

    const first = context.dispose();
    const second = context.dispose();

    expect(second).toBe(first);
    await first;
    expect(context.orchestrator.stats().accepting).toBe(false);
  });
});
