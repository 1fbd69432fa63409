/**
 * Test Utilities
 * Common helpers for writing tests
 */

import { nanoid } from 'nanoid';

import { defineAgent } from '@/agents/define-agent.js';
import type { AgentHandler } from '@/agents/define-agent.js';
import type {
  Agent,
  AgentExecutionContext,
  AgentExecutionResult,
  AgentMemory,
  EmbeddingProvider,
  Task,
} from '@/types/index.js';
import { success } from '@/types/index.js';

/**
 * Wait for a specified number of milliseconds
 */
export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Let queued microtasks (dispatch, agent continuations) run
 */
export async function flushMicrotasks(rounds = 20): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await Promise.resolve();
  }
}

/**
 * Generate a unique test ID
 */
export function testId(prefix: string = 'test'): string {
  return `${prefix}_${nanoid(8)}`;
}

/**
 * Promise with its settle functions exposed
 */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Embedder with one dimension per keyword; each dimension counts how often
 * the keyword occurs in the text. Similarities are exact and predictable.
 */
export function createKeywordEmbedder(
  keywords: readonly string[]
): EmbeddingProvider {
  return {
    model: 'test-keywords',
    dimensions: keywords.length,
    async embed(text: string): Promise<number[]> {
      const words = text.toLowerCase().split(/[^a-z0-9.]+/);
      return keywords.map(
        (keyword) => words.filter((word) => word === keyword).length
      );
    },
  };
}

/**
 * Agent for a single capability, answering from a handler
 */
export function createTestAgent(
  id: string,
  taskTypes: readonly string[],
  handler: AgentHandler = (task) => ({ handledBy: id, type: task.type }),
  capability = 'test'
): Agent {
  return defineAgent(id, [{ name: capability, accepts: taskTypes }], handler);
}

/**
 * Agent whose execute() is supplied directly, for malformed or failing
 * outcomes that defineAgent cannot express
 */
export function createRawAgent(
  id: string,
  taskTypes: readonly string[],
  execute: (
    task: Readonly<Task>,
    context: AgentExecutionContext
  ) => Promise<AgentExecutionResult>,
  capability = 'test'
): Agent {
  return {
    id,
    capabilities: [{ name: capability, accepts: taskTypes }],
    execute,
  };
}

/**
 * AgentMemory that accepts everything and finds nothing
 */
export function createNullMemory(): AgentMemory {
  return {
    add: async () => success(testId('mem')),
    search: async () => success([]),
  };
}
