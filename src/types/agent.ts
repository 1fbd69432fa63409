/**
 * Agent Domain Types
 *
 * Agents are opaque executors. The core only reads their declared
 * capabilities and calls execute(); it never inspects internal state.
 */

import type { MemorySearchHit, MetadataFilter, MetadataInput } from './memory.js';
import type { Result } from './result.js';
import type { Task } from './task.js';

/**
 * Declared ability to accept a set of task types
 */
export interface Capability {
  name: string;
  accepts: readonly string[];
}

/**
 * Memory access handed to agents while they execute
 */
export interface AgentMemory {
  add(text: string, metadata?: MetadataInput): Promise<Result<string>>;
  search(
    query: string,
    k: number,
    filter?: MetadataFilter
  ): Promise<Result<MemorySearchHit[]>>;
}

/**
 * Context passed to Agent.execute
 */
export interface AgentExecutionContext {
  /** Aborted on cancel or timeout; check it at safe checkpoints */
  signal: AbortSignal;
  /** 1-based execution attempt */
  attempt: number;
  memory: AgentMemory;
}

/**
 * What an agent reports back for one execution
 */
export interface AgentExecutionResult {
  success: boolean;
  data: Record<string, unknown>;
  errorMessage?: string;
}

/**
 * Executor contract
 */
export interface Agent {
  readonly id: string;
  readonly description?: string;
  readonly capabilities: readonly Capability[];
  execute(
    task: Readonly<Task>,
    context: AgentExecutionContext
  ): Promise<AgentExecutionResult>;
}

/**
 * Registration options
 */
export interface RegisterAgentOptions {
  /** Higher is preferred; ties fall back to registration order */
  priority?: number;
}

/**
 * Registry entry
 */
export interface RegisteredAgent {
  agent: Agent;
  /** Frozen copy taken at registration; routing reads only this */
  capabilities: readonly Capability[];
  priority: number;
  /** Monotonic registration sequence */
  order: number;
  registeredAt: Date;
}

/**
 * Routing query
 */
export interface AgentQuery {
  taskType: string;
  /** When set, only capabilities with this name are considered */
  capability?: string;
}
