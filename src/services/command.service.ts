/**
 * CommandService Implementation
 *
 * Purpose: Turn one free-form instruction into a classified, executed task
 * Flow: memory context -> classify -> route -> submit -> record exchange
 * Dependencies: IntentClassifier, Orchestrator, MemoryStore
 *
 * Unknown intents are never submitted; the caller gets a clarification
 * prompt instead.
 */

import type {
  Intent,
  MemorySearchHit,
  Result,
  TaskPriority,
  TaskResult,
} from '@/types/index.js';
import { success, failure, UNKNOWN_INTENT } from '@/types/index.js';
import type { IntentClassifier } from '@/classifier/intent-classifier.js';
import type { Orchestrator } from '@/orchestrator/orchestrator.js';
import { createTask } from '@/orchestrator/task.js';

import type { MemoryStore } from './memory.service.js';

/**
 * Where a label is dispatched. Labels without a route use the label itself
 * as the task type.
 */
export interface CommandRoute {
  taskType: string;
  capability?: string;
  priority?: TaskPriority;
}

export interface ProcessCommandOptions {
  priority?: TaskPriority;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Consult recent memory for pronoun resolution (default true) */
  useContext?: boolean;
}

export type CommandOutcome =
  | {
      kind: 'executed';
      intent: Intent;
      result: TaskResult;
    }
  | {
      kind: 'clarification';
      intent: Intent;
      message: string;
    };

/**
 * CommandService interface
 */
export interface CommandService {
  process(
    text: string,
    options?: ProcessCommandOptions
  ): Promise<Result<CommandOutcome>>;
  /** Classify with memory context, without executing anything */
  interpret(text: string, useContext?: boolean): Promise<Intent>;
}

export interface CommandServiceDeps {
  classifier: IntentClassifier;
  orchestrator: Orchestrator;
  memory: MemoryStore;
  routes?: Readonly<Record<string, CommandRoute>>;
  /** How many memory hits to hand the classifier */
  contextSize?: number;
}

export const CLARIFICATION_MESSAGE =
  "I'm not sure what you want me to do. Could you rephrase that?";

const DEFAULT_CONTEXT_SIZE = 3;

/**
 * Create CommandService instance
 */
export function createCommandService(
  deps: CommandServiceDeps
): CommandService {
  const { classifier, orchestrator, memory } = deps;
  const routes = deps.routes ?? {};
  const contextSize = deps.contextSize ?? DEFAULT_CONTEXT_SIZE;

  async function recentContext(text: string): Promise<MemorySearchHit[]> {
    if (!text.trim() || contextSize < 1) {
      return [];
    }
    const result = await memory.search(text, contextSize);
    if (!result.success) {
      console.error(`Context lookup failed: ${result.error.message}`);
      return [];
    }
    return result.data;
  }

  async function record(
    input: string,
    response: string,
    metadata: Record<string, unknown>
  ): Promise<void> {
    const result = await memory.recordInteraction(input, response, metadata);
    if (!result.success) {
      console.error(`Failed to record interaction: ${result.error.message}`);
    }
  }

  async function interpret(text: string, useContext = true): Promise<Intent> {
    const context = useContext ? await recentContext(text) : [];
    return classifier.classify(text, context);
  }

  return {
    interpret,

    async process(
      text: string,
      options: ProcessCommandOptions = {}
    ): Promise<Result<CommandOutcome>> {
      if (typeof text !== 'string') {
        return failure('VALIDATION_ERROR', 'Command text must be a string');
      }

      const intent = await interpret(text, options.useContext ?? true);

      if (intent.label === UNKNOWN_INTENT) {
        if (text.trim()) {
          await record(text, CLARIFICATION_MESSAGE, {
            intent: UNKNOWN_INTENT,
            confidence: intent.confidence,
          });
        }
        return success({
          kind: 'clarification',
          intent,
          message: CLARIFICATION_MESSAGE,
        });
      }

      const route = routes[intent.label] ?? { taskType: intent.label };
      const priority = options.priority ?? route.priority ?? 'NORMAL';
      const task = createTask({
        type: route.taskType,
        priority,
        payload: {
          ...intent.slots,
          text: text.trim(),
          intent: intent.label,
          confidence: intent.confidence,
        },
        ...(route.capability !== undefined
          ? { capability: route.capability }
          : {}),
      });

      const submitOptions = {
        ...(options.timeoutMs !== undefined
          ? { timeoutMs: options.timeoutMs }
          : {}),
        ...(options.signal !== undefined ? { signal: options.signal } : {}),
      };
      const result = await orchestrator.submit(task, submitOptions);

      const response = result.success
        ? `Completed ${route.taskType}`
        : `${route.taskType} ${result.status.toLowerCase()}: ${
            result.error?.message ?? 'no details'
          }`;
      await record(text, response, {
        intent: intent.label,
        taskId: result.taskId,
        status: result.status,
      });

      return success({ kind: 'executed', intent, result });
    },
  };
}
