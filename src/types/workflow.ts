/**
 * Workflow Domain Types
 *
 * A workflow is a DAG of task templates. Each step names the capability it
 * needs and may depend on earlier steps; a dependent receives the
 * dependencies' result data under payload.inputs.
 */

import type { TaskPriority, TaskResult } from './task.js';

export interface WorkflowStep {
  id: string;
  type: string;
  capability: string;
  priority?: TaskPriority;
  payload?: Record<string, unknown>;
  dependsOn?: string[];
  timeoutMs?: number;
}

export interface Workflow {
  id?: string;
  name: string;
  steps: WorkflowStep[];
}

/**
 * Result of a single step, tagged with its step id
 */
export interface WorkflowStepResult extends TaskResult {
  stepId: string;
}

export type WorkflowState = 'running' | 'completed' | 'failed' | 'cancelled';

/**
 * Outcome of a workflow run. `results` follows step declaration order.
 */
export interface WorkflowRunResult {
  workflowId: string;
  name: string;
  state: Exclude<WorkflowState, 'running'>;
  success: boolean;
  results: WorkflowStepResult[];
  durationMs: number;
}
