/**
 * Memory Agent
 *
 * Lets notes and recall travel through the same dispatch path as every
 * other task.
 *
 * memory_note   payload.note (or payload.text)  -> { id }
 * memory_recall payload.query, optional payload.k -> { matches }
 */

import type { Agent, AgentExecutionContext, Task } from '@/types/index.js';

import { defineAgent, throwIfAborted } from './define-agent.js';

export const MEMORY_AGENT_ID = 'memory';
export const MEMORY_NOTE_TASK = 'memory_note';
export const MEMORY_RECALL_TASK = 'memory_recall';

const DEFAULT_RECALL_SIZE = 5;

function stringField(task: Readonly<Task>, ...keys: string[]): string | null {
  for (const key of keys) {
    const value = task.payload[key];
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return null;
}

async function storeNote(
  task: Readonly<Task>,
  context: AgentExecutionContext
): Promise<Record<string, unknown>> {
  const note = stringField(task, 'note', 'text');
  if (!note) {
    throw new Error('Nothing to remember: payload.note is empty');
  }
  throwIfAborted(context.signal);

  const result = await context.memory.add(note, { kind: 'note' });
  if (!result.success) {
    throw new Error(result.error.message);
  }
  return { id: result.data, note };
}

async function recall(
  task: Readonly<Task>,
  context: AgentExecutionContext
): Promise<Record<string, unknown>> {
  const query = stringField(task, 'query', 'text');
  if (!query) {
    throw new Error('Nothing to recall: payload.query is empty');
  }
  const k =
    typeof task.payload.k === 'number' && task.payload.k > 0
      ? Math.floor(task.payload.k)
      : DEFAULT_RECALL_SIZE;
  throwIfAborted(context.signal);

  const result = await context.memory.search(query, k, { kind: 'note' });
  if (!result.success) {
    throw new Error(result.error.message);
  }
  return {
    query,
    matches: result.data.map((hit) => ({
      id: hit.record.id,
      text: hit.record.text,
      similarity: hit.similarity,
    })),
  };
}

export function createMemoryAgent(): Agent {
  return defineAgent(
    MEMORY_AGENT_ID,
    [
      { name: 'note', accepts: [MEMORY_NOTE_TASK] },
      { name: 'recall', accepts: [MEMORY_RECALL_TASK] },
    ],
    (task, context) =>
      task.type === MEMORY_NOTE_TASK
        ? storeNote(task, context)
        : recall(task, context),
    { description: 'Stores notes and recalls them by similarity' }
  );
}
