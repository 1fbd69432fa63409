/**
 * Orchestrator Configuration Types
 */

export interface OrchestratorConfig {
  /** Maximum tasks in RUNNING at once; the rest wait in the queue */
  maxConcurrency: number;

  /** Retry ceiling: a task's attempts never exceed this */
  maxAttempts: number;

  /** Base backoff before retrying the same agent (ms) */
  backoffMs: number;

  /** Upper bound for the exponential backoff (ms) */
  maxBackoffMs: number;

  /** Default per-task deadline (ms); null for none */
  taskTimeoutMs: number | null;

  /** How long terminal tasks stay queryable (ms) */
  retentionMs: number;

  /** Write a summary of each successful exchange into memory */
  recordExchanges: boolean;
}

/**
 * Longest delay a timer accepts; Node fires larger delays after 1ms
 */
export const MAX_TIMER_MS = 2_147_483_647;

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  maxConcurrency: 4,
  maxAttempts: 3,
  backoffMs: 250,
  maxBackoffMs: 5000,
  taskTimeoutMs: null,
  retentionMs: 10 * 60 * 1000,
  recordExchanges: true,
};

/**
 * Queue and pool counters
 */
export interface OrchestratorStats {
  queued: number;
  running: number;
  backingOff: number;
  tracked: number;
  activeWorkflows: number;
  accepting: boolean;
}
