/**
 * Orchestrator
 *
 * SCOPE: Queue, dispatch, retry, cancel and time out tasks; run workflows
 * NOT IN SCOPE: Classification (see classifier/), what agents actually do
 *
 * GUARDRAILS:
 * - submit() never rejects: every outcome is a TaskResult
 * - At most maxConcurrency agent executions are in flight; the slot of a
 *   cancelled task is released only once its agent settles
 * - A task's attempts never exceed maxAttempts
 * - A cancelled task stays CANCELLED; a late agent result is discarded
 * - Queue mutation happens on the event loop only, never across an await
 *
 * Dependencies: AgentRegistry, AgentMemory, AuditService (optional)
 */

import { nanoid } from 'nanoid';

import type {
  AgentExecutionResult,
  AgentMemory,
  ErrorKind,
  MetadataValue,
  OrchestratorConfig,
  OrchestratorStats,
  RegisteredAgent,
  SubmitOptions,
  Task,
  TaskError,
  TaskResult,
  TaskSnapshot,
  TerminalStatus,
  Workflow,
  WorkflowRunResult,
  WorkflowStep,
  WorkflowStepResult,
} from '@/types/index.js';
import {
  CoreError,
  DEFAULT_ORCHESTRATOR_CONFIG,
  MAX_TIMER_MS,
  PRIORITY_RANK,
  TASK_PRIORITIES,
  WorkflowDefinitionError,
  errorMessage,
  taskError,
} from '@/types/index.js';
import type { AgentRegistry } from '@/registry/agent-registry.js';
import type { AuditService } from '@/services/audit.service.js';
import { emitAudit } from '@/services/audit.service.js';

import { computeBackoff } from './backoff.js';
import { createTask } from './task.js';
import { createTaskQueue } from './task-queue.js';
import { validateWorkflow } from './workflow.js';

/**
 * Orchestrator interface
 */
export interface Orchestrator {
  /** Resolves once the task is terminal */
  submit(task: Task, options?: SubmitOptions): Promise<TaskResult>;

  /**
   * Run a workflow. Throws WorkflowDefinitionError synchronously for a
   * malformed definition; `results` follows declaration order.
   */
  runWorkflow(workflow: Workflow): Promise<WorkflowRunResult>;

  /** false when the task is unknown or already terminal */
  cancel(taskId: string): boolean;
  cancelWorkflow(workflowId: string): boolean;

  getTask(taskId: string): TaskSnapshot | null;
  stats(): OrchestratorStats;

  /** Forget terminal tasks older than the retention window */
  pruneTasks(now?: number): number;

  /** Stop accepting work, cancel what has not started, wait for the rest */
  shutdown(): Promise<void>;
}

/**
 * Dependencies for orchestrator
 */
export interface OrchestratorDeps {
  registry: AgentRegistry;
  memory: AgentMemory;
  auditService?: AuditService;
  config?: Partial<OrchestratorConfig>;
  now?: () => number;
}

type Phase = 'queued' | 'running' | 'backoff' | 'done';

interface TrackedTask {
  task: Task;
  seq: number;
  candidates: RegisteredAgent[];
  candidateIndex: number;
  agentId: string | null;
  phase: Phase;
  submittedAt: number;
  updatedAt: number;
  /** Controller of the attempt in flight */
  controller: AbortController | null;
  timeoutTimer: ReturnType<typeof setTimeout> | null;
  backoffTimer: ReturnType<typeof setTimeout> | null;
  detachSignal: (() => void) | null;
  result: TaskResult | null;
  resolve: (result: TaskResult) => void;
  done: Promise<TaskResult>;
}

interface ActiveWorkflow {
  id: string;
  name: string;
  cancelled: boolean;
  taskIds: Set<string>;
}

const SUMMARY_MAX_LENGTH = 500;

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Agents are external code; check the shape before trusting it
 */
function normalizeOutcome(value: unknown): AgentExecutionResult | null {
  if (!isRecord(value) || typeof value.success !== 'boolean') {
    return null;
  }
  const outcome: AgentExecutionResult = {
    success: value.success,
    data: isRecord(value.data) ? value.data : {},
  };
  if (typeof value.errorMessage === 'string') {
    outcome.errorMessage = value.errorMessage;
  }
  return outcome;
}

function describe(value: Record<string, unknown>): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function truncate(text: string, max: number): string {
  return text.length <= max ? text : `${text.slice(0, max - 3)}...`;
}

/**
 * Condensed, searchable description of a successful exchange
 */
export function summarizeExchange(task: Task, result: TaskResult): string {
  const request = Object.fromEntries(
    Object.entries(task.payload).filter(([key]) => key !== 'inputs')
  );
  const summary =
    `[${task.priority}] ${task.type} handled by ${result.agentId ?? 'unknown'}.` +
    ` Request: ${describe(request)}. Outcome: ${describe(result.data)}`;
  return truncate(summary, SUMMARY_MAX_LENGTH);
}

/**
 * Scalar payload values plus routing facts. Payload keys come first so the
 * fixed keys always win.
 */
export function exchangeMetadata(
  task: Task,
  result: TaskResult
): Record<string, MetadataValue> {
  const metadata: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(task.payload)) {
    if (
      typeof value === 'string' ||
      typeof value === 'boolean' ||
      (typeof value === 'number' && Number.isFinite(value))
    ) {
      metadata[key] = value;
    }
  }
  return Object.assign(metadata, {
    kind: 'task_exchange',
    taskId: task.id,
    taskType: task.type,
    priority: task.priority,
    agentId: result.agentId,
  });
}

function validateSubmission(
  task: Task,
  timeoutMs: number | undefined
): string | null {
  if (typeof task.id !== 'string' || !task.id.trim()) {
    return 'Task id is required';
  }
  if (typeof task.type !== 'string' || !task.type.trim()) {
    return 'Task type is required';
  }
  if (!TASK_PRIORITIES.includes(task.priority)) {
    return `Unknown priority: ${String(task.priority)}`;
  }
  if (task.status !== 'PENDING') {
    return `Task must be PENDING to be submitted, got ${task.status}`;
  }
  if (timeoutMs === undefined) {
    return null;
  }
  if (!(Number.isFinite(timeoutMs) && timeoutMs > 0)) {
    return 'timeoutMs must be a positive number';
  }
  if (timeoutMs > MAX_TIMER_MS) {
    return `timeoutMs must not exceed ${MAX_TIMER_MS}`;
  }
  return null;
}

// ─────────────────────────────────────────────────────────────
// FACTORY
// ─────────────────────────────────────────────────────────────

/**
 * Create an orchestrator instance
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { registry, memory, auditService } = deps;
  const config: OrchestratorConfig = {
    ...DEFAULT_ORCHESTRATOR_CONFIG,
    ...deps.config,
  };
  const now = deps.now ?? (() => Date.now());
  const maxConcurrency = Math.max(1, Math.floor(config.maxConcurrency));
  const maxAttempts = Math.max(1, Math.floor(config.maxAttempts));
  const maxBackoffMs = Math.min(config.maxBackoffMs, MAX_TIMER_MS);
  const defaultTimeoutMs =
    config.taskTimeoutMs === null
      ? null
      : Math.min(config.taskTimeoutMs, MAX_TIMER_MS);

  const tracked = new Map<string, TrackedTask>();
  const queue = createTaskQueue<TrackedTask>();
  const executions = new Set<Promise<void>>();
  const workflows = new Map<string, ActiveWorkflow>();
  let running = 0;
  let nextSeq = 0;
  let drainScheduled = false;
  let accepting = true;

  function audit(
    action: string,
    resourceType: string,
    resourceId: string,
    details: Record<string, unknown>
  ): void {
    if (auditService) {
      void emitAudit(auditService, {
        action,
        resourceType,
        resourceId,
        details,
      });
    }
  }

  function track(task: Task): TrackedTask {
    let resolve: (result: TaskResult) => void = () => undefined;
    const done = new Promise<TaskResult>((settle) => {
      resolve = settle;
    });
    const at = now();
    const entry: TrackedTask = {
      task,
      seq: nextSeq++,
      candidates: [],
      candidateIndex: 0,
      agentId: null,
      phase: 'queued',
      submittedAt: at,
      updatedAt: at,
      controller: null,
      timeoutTimer: null,
      backoffTimer: null,
      detachSignal: null,
      result: null,
      resolve,
      done,
    };
    tracked.set(task.id, entry);
    return entry;
  }

  function finish(
    entry: TrackedTask,
    status: TerminalStatus,
    data: Record<string, unknown>,
    error?: TaskError
  ): TaskResult {
    entry.phase = 'done';
    entry.task.status = status;
    if (entry.timeoutTimer) {
      clearTimeout(entry.timeoutTimer);
      entry.timeoutTimer = null;
    }
    if (entry.backoffTimer) {
      clearTimeout(entry.backoffTimer);
      entry.backoffTimer = null;
    }
    entry.detachSignal?.();
    entry.detachSignal = null;

    const result: TaskResult = {
      taskId: entry.task.id,
      success: status === 'SUCCEEDED',
      status,
      data,
      durationMs: Math.max(0, now() - entry.submittedAt),
      attempts: entry.task.attempts,
      agentId: entry.agentId,
    };
    if (error) {
      result.error = error;
    }
    entry.result = result;
    entry.updatedAt = now();

    audit(`task:${status.toLowerCase()}`, 'task', entry.task.id, {
      taskType: entry.task.type,
      attempts: result.attempts,
      agentId: result.agentId,
      ...(error ? { errorKind: error.kind, message: error.message } : {}),
    });
    return result;
  }

  function fail(entry: TrackedTask, kind: ErrorKind, message: string): void {
    entry.resolve(finish(entry, 'FAILED', {}, taskError(kind, message)));
  }

  function cancelEntry(
    entry: TrackedTask,
    kind: 'CancelledError' | 'TimeoutError',
    message: string
  ): boolean {
    if (entry.phase === 'done') {
      return false;
    }
    if (entry.phase === 'queued') {
      queue.remove((item) => item === entry);
    }
    // The agent sees the abort at its next checkpoint; its slot stays
    // occupied until it settles
    entry.controller?.abort(new CoreError(kind, message));
    const error = taskError(kind, message, { taskId: entry.task.id });
    entry.resolve(finish(entry, 'CANCELLED', {}, error));
    return true;
  }

  function scheduleDrain(): void {
    if (drainScheduled) {
      return;
    }
    drainScheduled = true;
    // Deferred so tasks submitted in the same tick compete by priority
    queueMicrotask(drain);
  }

  function drain(): void {
    drainScheduled = false;
    while (running < maxConcurrency) {
      const next = queue.shift();
      if (!next) {
        return;
      }
      launch(next);
    }
  }

  function enqueue(entry: TrackedTask): void {
    entry.phase = 'queued';
    queue.push(entry, PRIORITY_RANK[entry.task.priority], entry.seq);
    scheduleDrain();
  }

  function launch(entry: TrackedTask): void {
    const registered = entry.candidates[entry.candidateIndex];
    if (!registered) {
      fail(
        entry,
        'NoCapableAgentError',
        `No agent left for ${entry.task.type}`
      );
      return;
    }

    const controller = new AbortController();
    const attempt = entry.task.attempts + 1;
    entry.controller = controller;
    entry.phase = 'running';
    entry.agentId = registered.agent.id;
    entry.task.status = 'RUNNING';
    entry.task.attempts = attempt;
    entry.updatedAt = now();
    running++;

    audit('task:started', 'task', entry.task.id, {
      taskType: entry.task.type,
      agentId: registered.agent.id,
      attempt,
    });

    const execution: Promise<void> = runAttempt(
      entry,
      registered,
      controller,
      attempt
    )
      .catch((error: unknown) => {
        console.error(`Task ${entry.task.id} could not be completed:`, error);
        if (entry.phase !== 'done') {
          fail(entry, 'AgentExecutionError', errorMessage(error));
        }
      })
      .finally(() => {
        executions.delete(execution);
      });
    executions.add(execution);
  }

  async function runAttempt(
    entry: TrackedTask,
    registered: RegisteredAgent,
    controller: AbortController,
    attempt: number
  ): Promise<void> {
    const agentId = registered.agent.id;
    let outcome: AgentExecutionResult | null = null;
    let failureMessage: string | null = null;

    try {
      const raw: unknown = await registered.agent.execute(
        Object.freeze({ ...entry.task }),
        { signal: controller.signal, attempt, memory }
      );
      outcome = normalizeOutcome(raw);
      if (!outcome) {
        failureMessage = `Agent ${agentId} returned a malformed result`;
      } else if (!outcome.success) {
        failureMessage =
          outcome.errorMessage ?? `Agent ${agentId} reported failure`;
      }
    } catch (error) {
      failureMessage = errorMessage(error, `Agent ${agentId} threw`);
    } finally {
      running--;
      scheduleDrain();
    }

    // Cancelled or timed out while the agent was working
    if (entry.phase === 'done' || entry.controller !== controller) {
      return;
    }
    entry.controller = null;

    if (outcome && failureMessage === null) {
      const result = finish(entry, 'SUCCEEDED', outcome.data);
      if (config.recordExchanges) {
        await recordExchange(entry.task, result);
      }
      entry.resolve(result);
      return;
    }

    const lastError = taskError(
      'AgentExecutionError',
      failureMessage ?? `Agent ${agentId} failed`,
      { agentId, attempt }
    );
    entry.task.status = 'FAILED';
    entry.updatedAt = now();

    if (attempt >= maxAttempts) {
      const exhausted = taskError(
        'RetryExhaustedError',
        `Task ${entry.task.type} failed after ${attempt} attempt(s): ` +
          lastError.message,
        { attempts: attempt }
      );
      exhausted.cause = lastError;
      entry.resolve(finish(entry, 'FAILED', {}, exhausted));
      return;
    }

    if (!accepting) {
      cancelEntry(entry, 'CancelledError', 'Orchestrator is shutting down');
      return;
    }

    // Prefer the next-ranked agent; otherwise back off and retry this one
    if (entry.candidateIndex + 1 < entry.candidates.length) {
      entry.candidateIndex++;
      audit('task:retry_scheduled', 'task', entry.task.id, {
        attempt,
        error: lastError.message,
        nextAgentId: entry.candidates[entry.candidateIndex]?.agent.id ?? null,
        delayMs: 0,
      });
      enqueue(entry);
      return;
    }

    const delayMs = computeBackoff(
      attempt,
      config.backoffMs,
      maxBackoffMs
    );
    entry.phase = 'backoff';
    audit('task:retry_scheduled', 'task', entry.task.id, {
      attempt,
      error: lastError.message,
      nextAgentId: agentId,
      delayMs,
    });
    entry.backoffTimer = setTimeout(() => {
      entry.backoffTimer = null;
      if (entry.phase === 'backoff') {
        enqueue(entry);
      }
    }, delayMs);
  }

  async function recordExchange(
    task: Task,
    result: TaskResult
  ): Promise<void> {
    try {
      const stored = await memory.add(
        summarizeExchange(task, result),
        exchangeMetadata(task, result)
      );
      if (!stored.success) {
        console.error(
          `Failed to record exchange for task ${task.id}: ${stored.error.message}`
        );
      }
    } catch (error) {
      console.error(`Failed to record exchange for task ${task.id}:`, error);
    }
  }

  function pruneTasks(at: number = now()): number {
    let removed = 0;
    for (const [id, entry] of tracked) {
      if (
        entry.phase === 'done' &&
        at - entry.updatedAt >= config.retentionMs
      ) {
        tracked.delete(id);
        removed++;
      }
    }
    return removed;
  }

  function submit(
    task: Task,
    options: SubmitOptions = {}
  ): Promise<TaskResult> {
    pruneTasks();

    const invalid = validateSubmission(task, options.timeoutMs);
    if (invalid === null && tracked.has(task.id)) {
      // Leave the tracked task untouched
      return Promise.resolve({
        taskId: task.id,
        success: false,
        status: 'FAILED',
        data: {},
        error: taskError(
          'InvalidTaskError',
          `Task ${task.id} was already submitted`
        ),
        durationMs: 0,
        attempts: 0,
        agentId: null,
      });
    }

    const hasId = typeof task.id === 'string' && task.id.trim() !== '';
    const own: Task = {
      ...task,
      id: hasId ? task.id : `task_${nanoid()}`,
      payload: { ...task.payload },
      attempts: 0,
    };
    const entry = track(own);
    audit('task:submitted', 'task', own.id, {
      taskType: own.type,
      priority: own.priority,
    });

    if (!accepting) {
      cancelEntry(entry, 'CancelledError', 'Orchestrator is shutting down');
      return entry.done;
    }
    if (invalid !== null) {
      fail(entry, 'InvalidTaskError', invalid);
      return entry.done;
    }
    if (options.signal?.aborted) {
      cancelEntry(entry, 'CancelledError', 'Cancelled before submission');
      return entry.done;
    }

    const query =
      own.capability !== undefined
        ? { taskType: own.type, capability: own.capability }
        : { taskType: own.type };
    entry.candidates = registry.find(query);
    if (entry.candidates.length === 0) {
      fail(
        entry,
        'NoCapableAgentError',
        own.capability !== undefined
          ? `No agent with capability ${own.capability} accepts ${own.type}`
          : `No agent accepts ${own.type}`
      );
      return entry.done;
    }

    const timeoutMs = options.timeoutMs ?? defaultTimeoutMs;
    if (timeoutMs !== null && timeoutMs > 0) {
      entry.timeoutTimer = setTimeout(() => {
        entry.timeoutTimer = null;
        cancelEntry(
          entry,
          'TimeoutError',
          `Task ${own.type} timed out after ${timeoutMs}ms`
        );
      }, timeoutMs);
    }

    const { signal } = options;
    if (signal) {
      const onAbort = (): void => {
        cancelEntry(entry, 'CancelledError', 'Cancelled by caller');
      };
      signal.addEventListener('abort', onAbort, { once: true });
      entry.detachSignal = () => signal.removeEventListener('abort', onAbort);
    }

    enqueue(entry);
    return entry.done;
  }

  async function executeWorkflow(
    workflow: Workflow,
    ordered: WorkflowStep[],
    active: ActiveWorkflow
  ): Promise<WorkflowRunResult> {
    const startedAt = now();
    const stepsById = new Map(ordered.map((step) => [step.id, step]));
    const pending = new Map<string, Promise<WorkflowStepResult>>();

    audit('workflow:started', 'workflow', active.id, {
      name: active.name,
      steps: ordered.length,
    });

    const resultOf = (step: WorkflowStep): Promise<WorkflowStepResult> => {
      const existing = pending.get(step.id);
      if (existing) {
        return existing;
      }
      const created = runStep(step);
      pending.set(step.id, created);
      return created;
    };

    const runStep = async (
      step: WorkflowStep
    ): Promise<WorkflowStepResult> => {
      const dependencySteps = (step.dependsOn ?? []).flatMap((id) => {
        const dependency = stepsById.get(id);
        return dependency ? [dependency] : [];
      });
      const dependencies = await Promise.all(dependencySteps.map(resultOf));

      const payload: Record<string, unknown> = { ...step.payload };
      if (dependencies.length > 0) {
        const inputs: Record<string, unknown> = {};
        for (const dependency of dependencies) {
          inputs[dependency.stepId] = dependency.data;
        }
        payload.inputs = inputs;
      }

      const params =
        step.priority !== undefined
          ? { type: step.type, priority: step.priority }
          : { type: step.type };
      const task = createTask(
        { ...params, payload, capability: step.capability },
        new Date(now())
      );
      active.taskIds.add(task.id);

      const blocked = dependencies.find((dependency) => !dependency.success);
      if (active.cancelled || blocked) {
        const entry = track(task);
        const message = blocked
          ? `Dependency ${blocked.stepId} did not succeed (${blocked.status})`
          : `Workflow ${active.id} was cancelled`;
        const error = taskError('CancelledError', message, {
          stepId: step.id,
          ...(blocked ? { dependency: blocked.stepId } : {}),
        });
        entry.resolve(finish(entry, 'CANCELLED', {}, error));
        return { ...(await entry.done), stepId: step.id };
      }

      const result = await submit(
        task,
        step.timeoutMs !== undefined ? { timeoutMs: step.timeoutMs } : {}
      );
      return { ...result, stepId: step.id };
    };

    try {
      for (const step of ordered) {
        void resultOf(step);
      }
      const results = await Promise.all(workflow.steps.map(resultOf));
      const succeeded = results.every((result) => result.success);
      const state = active.cancelled
        ? 'cancelled'
        : succeeded
          ? 'completed'
          : 'failed';

      audit('workflow:completed', 'workflow', active.id, {
        name: active.name,
        state,
        succeeded: results.filter((result) => result.success).length,
        total: results.length,
      });

      return {
        workflowId: active.id,
        name: active.name,
        state,
        success: succeeded,
        results,
        durationMs: Math.max(0, now() - startedAt),
      };
    } finally {
      workflows.delete(active.id);
    }
  }

  return {
    submit,

    runWorkflow(workflow: Workflow): Promise<WorkflowRunResult> {
      const ordered = validateWorkflow(workflow);
      const id = workflow.id ?? `wf_${nanoid()}`;
      if (workflows.has(id)) {
        throw new WorkflowDefinitionError(
          `Workflow ${id} is already running`,
          { workflowId: id }
        );
      }
      const active: ActiveWorkflow = {
        id,
        name: workflow.name,
        cancelled: false,
        taskIds: new Set(),
      };
      workflows.set(id, active);
      return executeWorkflow(workflow, ordered, active);
    },

    cancel(taskId: string): boolean {
      const entry = tracked.get(taskId);
      if (!entry) {
        return false;
      }
      return cancelEntry(entry, 'CancelledError', 'Cancelled on request');
    },

    cancelWorkflow(workflowId: string): boolean {
      const active = workflows.get(workflowId);
      if (!active || active.cancelled) {
        return false;
      }
      active.cancelled = true;
      for (const taskId of active.taskIds) {
        const entry = tracked.get(taskId);
        if (entry) {
          cancelEntry(
            entry,
            'CancelledError',
            `Workflow ${workflowId} was cancelled`
          );
        }
      }
      return true;
    },

    getTask(taskId: string): TaskSnapshot | null {
      const entry = tracked.get(taskId);
      if (!entry) {
        return null;
      }
      return {
        task: Object.freeze({
          ...entry.task,
          payload: { ...entry.task.payload },
        }),
        agentId: entry.agentId,
        result: entry.result,
        updatedAt: new Date(entry.updatedAt),
      };
    },

    stats(): OrchestratorStats {
      let backingOff = 0;
      for (const entry of tracked.values()) {
        if (entry.phase === 'backoff') {
          backingOff++;
        }
      }
      return {
        queued: queue.size(),
        running,
        backingOff,
        tracked: tracked.size,
        activeWorkflows: workflows.size,
        accepting,
      };
    },

    pruneTasks,

    async shutdown(): Promise<void> {
      accepting = false;
      for (const entry of queue.drain()) {
        cancelEntry(entry, 'CancelledError', 'Orchestrator is shutting down');
      }
      for (const entry of tracked.values()) {
        if (entry.phase === 'backoff') {
          cancelEntry(entry, 'CancelledError', 'Orchestrator is shutting down');
        }
      }
      await Promise.allSettled([...executions]);
    },
  };
}
