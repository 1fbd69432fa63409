/**
 * Agent Registry
 *
 * SCOPE: Holds registered agents and answers routing queries
 * NOT IN SCOPE: Executing agents, task state
 *
 * GUARDRAILS:
 * - Duplicate ids are rejected; replacing an agent is an explicit call
 * - Capabilities are copied and frozen at registration, so later mutation
 *   of the agent object cannot change routing
 * - find() is ordered by priority (higher first), then registration order
 *
 * Dependencies: AuditService (optional)
 */

import type {
  Agent,
  AgentQuery,
  Capability,
  RegisterAgentOptions,
  RegisteredAgent,
} from '@/types/index.js';
import { DuplicateAgentError, InvalidAgentError } from '@/types/index.js';
import type { AuditService } from '@/services/audit.service.js';
import { emitAudit } from '@/services/audit.service.js';

/**
 * AgentRegistry interface
 */
export interface AgentRegistry {
  /** Throws DuplicateAgentError or InvalidAgentError */
  register(agent: Agent, options?: RegisterAgentOptions): RegisteredAgent;
  /** Swap an existing registration for a new definition of the same id */
  replace(agent: Agent, options?: RegisterAgentOptions): RegisteredAgent;
  unregister(agentId: string): boolean;
  find(query: AgentQuery): RegisteredAgent[];
  get(agentId: string): RegisteredAgent | null;
  all(): RegisteredAgent[];
}

export interface AgentRegistryDeps {
  auditService?: AuditService;
  now?: () => Date;
}

// ─────────────────────────────────────────────────────────────
// VALIDATION
// ─────────────────────────────────────────────────────────────

function freezeCapabilities(agent: Agent): readonly Capability[] {
  if (!Array.isArray(agent.capabilities) || agent.capabilities.length === 0) {
    throw new InvalidAgentError(
      `Agent ${agent.id} must declare at least one capability`,
      { agentId: agent.id }
    );
  }

  const names = new Set<string>();
  const frozen = agent.capabilities.map((capability: Capability, index: number) => {
    const name =
      typeof capability.name === 'string' ? capability.name.trim() : '';
    if (!name) {
      throw new InvalidAgentError(
        `Capability ${index} of agent ${agent.id} has no name`,
        { agentId: agent.id, index }
      );
    }
    if (names.has(name)) {
      throw new InvalidAgentError(
        `Agent ${agent.id} declares capability ${name} twice`,
        { agentId: agent.id, capability: name }
      );
    }
    names.add(name);

    const accepts = Array.isArray(capability.accepts)
      ? capability.accepts.filter(
          (type): type is string =>
            typeof type === 'string' && type.trim() !== ''
        )
      : [];
    if (accepts.length === 0) {
      throw new InvalidAgentError(
        `Capability ${name} of agent ${agent.id} accepts no task types`,
        { agentId: agent.id, capability: name }
      );
    }

    return Object.freeze({
      name,
      accepts: Object.freeze([...new Set(accepts.map((type) => type.trim()))]),
    });
  });

  return Object.freeze(frozen);
}

function validateAgent(agent: Agent): string {
  const id = typeof agent.id === 'string' ? agent.id.trim() : '';
  if (!id) {
    throw new InvalidAgentError('Agent id is required');
  }
  if (typeof agent.execute !== 'function') {
    throw new InvalidAgentError(`Agent ${id} has no execute function`, {
      agentId: id,
    });
  }
  return id;
}

function compareEntries(a: RegisteredAgent, b: RegisteredAgent): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  return a.order - b.order;
}

// ─────────────────────────────────────────────────────────────
// FACTORY
// ─────────────────────────────────────────────────────────────

export function createAgentRegistry(
  deps: AgentRegistryDeps = {}
): AgentRegistry {
  const { auditService } = deps;
  const now = deps.now ?? (() => new Date());
  const entries = new Map<string, RegisteredAgent>();
  let nextOrder = 0;

  function audit(
    action: string,
    agentId: string,
    details: Record<string, unknown>
  ): void {
    if (auditService) {
      void emitAudit(auditService, {
        action,
        resourceType: 'agent',
        resourceId: agentId,
        details,
      });
    }
  }

  function buildEntry(
    agent: Agent,
    options: RegisterAgentOptions
  ): RegisteredAgent {
    const priority = options.priority ?? 0;
    if (!Number.isFinite(priority)) {
      throw new InvalidAgentError(
        `Agent ${agent.id} has a non-finite priority`,
        { agentId: agent.id }
      );
    }
    return Object.freeze({
      agent,
      capabilities: freezeCapabilities(agent),
      priority,
      order: nextOrder++,
      registeredAt: now(),
    });
  }

  function store(id: string, entry: RegisteredAgent, action: string): void {
    entries.set(id, entry);
    audit(action, id, {
      priority: entry.priority,
      capabilities: entry.capabilities.map((capability) => capability.name),
    });
  }

  return {
    register(
      agent: Agent,
      options: RegisterAgentOptions = {}
    ): RegisteredAgent {
      const id = validateAgent(agent);
      if (entries.has(id)) {
        throw new DuplicateAgentError(id);
      }
      const entry = buildEntry(agent, options);
      store(id, entry, 'agent:registered');
      return entry;
    },

    replace(
      agent: Agent,
      options: RegisterAgentOptions = {}
    ): RegisteredAgent {
      const id = validateAgent(agent);
      if (!entries.has(id)) {
        throw new InvalidAgentError(`Agent ${id} is not registered`, {
          agentId: id,
        });
      }
      const entry = buildEntry(agent, options);
      store(id, entry, 'agent:replaced');
      return entry;
    },

    unregister(agentId: string): boolean {
      const removed = entries.delete(agentId);
      if (removed) {
        audit('agent:unregistered', agentId, {});
      }
      return removed;
    },

    find(query: AgentQuery): RegisteredAgent[] {
      return [...entries.values()]
        .filter((entry) =>
          entry.capabilities.some(
            (capability) =>
              (query.capability === undefined ||
                capability.name === query.capability) &&
              capability.accepts.includes(query.taskType)
          )
        )
        .sort(compareEntries);
    },

    get(agentId: string): RegisteredAgent | null {
      return entries.get(agentId) ?? null;
    },

    all(): RegisteredAgent[] {
      return [...entries.values()].sort(compareEntries);
    },
  };
}
