/**
 * Core type definitions
 * This file exports all shared types used across the application
 */

export type { Result, Success, Failure } from './result.js';
export {
  success,
  failure,
  isSuccess,
  isFailure,
  errorMessage,
} from './result.js';
export type {
  MetadataValue,
  RecordMetadata,
  MetadataInput,
  MetadataFilter,
  MemoryRecord,
  MemorySearchHit,
  SearchMemoryParams,
  MemoryStats,
} from './memory.js';
export type { EmbeddingProvider, EmbeddingConfig } from './embedding.js';
export {
  DEFAULT_EMBEDDING_CONFIG,
  LOCAL_EMBEDDING_DIMENSIONS,
} from './embedding.js';
export type { Intent, IntentSource, ClassifierConfig } from './intent.js';
export { UNKNOWN_INTENT, DEFAULT_CLASSIFIER_CONFIG } from './intent.js';
export type {
  TaskPriority,
  TaskStatus,
  TerminalStatus,
  Task,
  CreateTaskParams,
  ErrorKind,
  TaskError,
  TaskResult,
  TaskSnapshot,
  SubmitOptions,
} from './task.js';
export { TASK_PRIORITIES, PRIORITY_RANK } from './task.js';
export type {
  Capability,
  AgentMemory,
  AgentExecutionContext,
  AgentExecutionResult,
  Agent,
  RegisterAgentOptions,
  RegisteredAgent,
  AgentQuery,
} from './agent.js';
export type {
  WorkflowStep,
  Workflow,
  WorkflowStepResult,
  WorkflowState,
  WorkflowRunResult,
} from './workflow.js';
export type { AuditEvent, AuditLog, AuditQueryParams } from './audit.js';
export {
  DEFAULT_AUDIT_QUERY_LIMIT,
  MAX_AUDIT_QUERY_LIMIT,
} from './audit.js';
export type { OrchestratorConfig, OrchestratorStats } from './orchestrator.js';
export { DEFAULT_ORCHESTRATOR_CONFIG, MAX_TIMER_MS } from './orchestrator.js';
export {
  CoreError,
  DuplicateAgentError,
  InvalidAgentError,
  WorkflowDefinitionError,
  taskError,
} from './errors.js';
