/**
 * Task construction tests
 */

import { describe, it, expect } from 'vitest';

import { createTask } from '@/orchestrator/task.js';

describe('createTask', () => {
  it('should build a pending task with defaults', () => {
    const createdAt = new Date('2026-02-01T09:30:00Z');

    const task = createTask({ type: ' port_scan ' }, createdAt);

    expect(task.id).toMatch(/^task_[\w-]+$/);
    expect(task).toMatchObject({
      type: 'port_scan',
      priority: 'NORMAL',
      payload: {},
      status: 'PENDING',
      attempts: 0,
      createdAt,
    });
    expect('capability' in task).toBe(false);
  });

  it('should copy the payload', () => {
    const payload = { target: '10.0.0.1' };

    const task = createTask({ type: 'port_scan', payload, capability: 'scan' });
    payload.target = '10.0.0.2';

    expect(task.payload).toEqual({ target: '10.0.0.1' });
    expect(task.capability).toBe('scan');
  });

  it('should give every task its own id', () => {
    expect(createTask({ type: 'a' }).id).not.toBe(createTask({ type: 'a' }).id);
  });
});
