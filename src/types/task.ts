/**
 * Task Domain Types
 *
 * Tasks are created by callers or workflow steps and mutated only by the
 * orchestrator (status, attempts).
 *
 * State machine:
 *   PENDING -> RUNNING -> SUCCEEDED | FAILED
 *   FAILED  -> RUNNING                      (retry)
 *   any non-terminal -> CANCELLED           (cancel / timeout)
 */

export type TaskPriority = 'LOW' | 'NORMAL' | 'HIGH' | 'CRITICAL';

export const TASK_PRIORITIES: readonly TaskPriority[] = [
  'LOW',
  'NORMAL',
  'HIGH',
  'CRITICAL',
];

/**
 * Dispatch rank, higher runs first
 */
export const PRIORITY_RANK: Record<TaskPriority, number> = {
  LOW: 0,
  NORMAL: 1,
  HIGH: 2,
  CRITICAL: 3,
};

export type TaskStatus =
  | 'PENDING'
  | 'RUNNING'
  | 'SUCCEEDED'
  | 'FAILED'
  | 'CANCELLED';

export type TerminalStatus = 'SUCCEEDED' | 'FAILED' | 'CANCELLED';

/**
 * Unit of work routed to an agent
 */
export interface Task {
  id: string;
  type: string;
  priority: TaskPriority;
  payload: Record<string, unknown>;
  /** Restrict routing to agents declaring this capability name */
  capability?: string;
  createdAt: Date;
  status: TaskStatus;
  attempts: number;
}

/**
 * Parameters for creating a task
 */
export interface CreateTaskParams {
  type: string;
  priority?: TaskPriority;
  payload?: Record<string, unknown>;
  capability?: string;
}

/**
 * Error kinds reported on task and classification outcomes
 */
export type ErrorKind =
  | 'ClassificationAmbiguous'
  | 'DuplicateAgentError'
  | 'InvalidAgentError'
  | 'NoCapableAgentError'
  | 'AgentExecutionError'
  | 'RetryExhaustedError'
  | 'TimeoutError'
  | 'CancelledError'
  | 'InvalidTaskError'
  | 'WorkflowDefinitionError';

/**
 * Error carried on a failed or cancelled TaskResult
 */
export interface TaskError {
  kind: ErrorKind;
  message: string;
  details?: Record<string, unknown>;
  /** Underlying error, e.g. the last agent failure behind RetryExhaustedError */
  cause?: TaskError;
}

/**
 * Terminal outcome of a task
 */
export interface TaskResult {
  taskId: string;
  success: boolean;
  status: TerminalStatus;
  data: Record<string, unknown>;
  error?: TaskError;
  durationMs: number;
  attempts: number;
  /** Agent that produced the outcome; null when none was invoked */
  agentId: string | null;
}

/**
 * Read-only view of a tracked task
 */
export interface TaskSnapshot {
  task: Readonly<Task>;
  agentId: string | null;
  result: TaskResult | null;
  updatedAt: Date;
}

/**
 * Per-call submit options
 */
export interface SubmitOptions {
  /** Deadline for the task; on expiry it is cancelled with TimeoutError */
  timeoutMs?: number;
  /** Caller-side cancellation */
  signal?: AbortSignal;
}
