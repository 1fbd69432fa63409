/**
 * Task construction
 */

import { nanoid } from 'nanoid';

import type { CreateTaskParams, Task } from '@/types/index.js';

/**
 * Build a PENDING task with a fresh id
 */
export function createTask(params: CreateTaskParams, now = new Date()): Task {
  const task: Task = {
    id: `task_${nanoid()}`,
    type: params.type.trim(),
    priority: params.priority ?? 'NORMAL',
    payload: { ...params.payload },
    createdAt: now,
    status: 'PENDING',
    attempts: 0,
  };
  if (params.capability !== undefined) {
    task.capability = params.capability;
  }
  return task;
}
