/**
 * Orchestrator Exports
 *
 * The orchestrator owns task execution:
 * - Priority queue and bounded concurrency
 * - Capability routing through the agent registry
 * - Retries with exponential backoff
 * - Cancellation and deadlines
 * - Workflow DAGs
 */

export { createOrchestrator, summarizeExchange, exchangeMetadata } from './orchestrator.js';
export type { Orchestrator, OrchestratorDeps } from './orchestrator.js';
export { createTask } from './task.js';
export { createTaskQueue } from './task-queue.js';
export type { TaskQueue } from './task-queue.js';
export { computeBackoff } from './backoff.js';
export { validateWorkflow } from './workflow.js';
