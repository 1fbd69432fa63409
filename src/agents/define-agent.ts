/**
 * Function agents
 *
 * Wraps a plain handler as an Agent. Handlers return the data to report;
 * throwing marks the attempt as failed.
 */

import type {
  Agent,
  AgentExecutionContext,
  AgentExecutionResult,
  Capability,
  Task,
} from '@/types/index.js';

export type AgentHandler = (
  task: Readonly<Task>,
  context: AgentExecutionContext
) => Promise<Record<string, unknown>> | Record<string, unknown>;

export interface DefineAgentOptions {
  description?: string;
}

export function defineAgent(
  id: string,
  capabilities: readonly Capability[],
  handler: AgentHandler,
  options: DefineAgentOptions = {}
): Agent {
  const agent: Agent = {
    id,
    capabilities,
    async execute(task, context): Promise<AgentExecutionResult> {
      const data = await handler(task, context);
      return { success: true, data };
    },
  };
  return options.description !== undefined
    ? { ...agent, description: options.description }
    : agent;
}

/**
 * Throw when the orchestrator has cancelled or timed out the task
 */
export function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw signal.reason instanceof Error
      ? signal.reason
      : new Error('Task was aborted');
  }
}
