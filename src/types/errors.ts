/**
 * Core Errors
 *
 * Only configuration and programming errors are thrown. Routing and
 * execution failures travel inside TaskResult.error instead.
 */

import type { ErrorKind, TaskError } from './task.js';

export class CoreError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = kind;
  }

  toTaskError(): TaskError {
    const error: TaskError = { kind: this.kind, message: this.message };
    if (this.details !== undefined) {
      error.details = this.details;
    }
    return error;
  }
}

/**
 * An agent with the same id is already registered
 */
export class DuplicateAgentError extends CoreError {
  constructor(agentId: string) {
    super('DuplicateAgentError', `Agent already registered: ${agentId}`, {
      agentId,
    });
  }
}

/**
 * Agent definition is unusable (blank id, malformed capability)
 */
export class InvalidAgentError extends CoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('InvalidAgentError', message, details);
  }
}

/**
 * Workflow definition is malformed (duplicate ids, unknown dependency, cycle)
 */
export class WorkflowDefinitionError extends CoreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('WorkflowDefinitionError', message, details);
  }
}

/**
 * Build a TaskError without throwing
 */
export function taskError(
  kind: ErrorKind,
  message: string,
  details?: Record<string, unknown>
): TaskError {
  const error: TaskError = { kind, message };
  if (details !== undefined) {
    error.details = details;
  }
  return error;
}
