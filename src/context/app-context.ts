/**
 * Application Context
 *
 * Builds every long-lived component exactly once and hands them out
 * explicitly. Nothing here is a module-level singleton; tests build as many
 * contexts as they like.
 *
 * Teardown order: stop the orchestrator (drains running tasks), then flush
 * pending memory writes.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

import type { Agent, EmbeddingProvider } from '@/types/index.js';
import type { CoreConfig } from '@/config/index.js';
import { createSupabaseAdmin } from '@/lib/index.js';
import type {
  AuditService,
  AuditServiceDb,
  CommandRoute,
  CommandService,
  MemoryStore,
  MemoryStoreDb,
} from '@/services/index.js';
import {
  createAuditService,
  createAuditServiceDb,
  createCommandService,
  createHashingEmbeddingProvider,
  createInMemoryAuditDb,
  createInMemoryMemoryDb,
  createMemoryStore,
  createMemoryStoreDb,
  createOpenAIEmbeddingClient,
  createRemoteEmbeddingProvider,
} from '@/services/index.js';
import type {
  IntentClassifier,
  IntentTrainingData,
} from '@/classifier/index.js';
import {
  createIntentClassifier,
  loadIntentTrainingData,
} from '@/classifier/index.js';
import type { AgentRegistry } from '@/registry/index.js';
import { createAgentRegistry } from '@/registry/index.js';
import type { Orchestrator } from '@/orchestrator/index.js';
import { createOrchestrator } from '@/orchestrator/index.js';
import { createMemoryAgent } from '@/agents/index.js';

export interface AppContext {
  config: CoreConfig;
  embedder: EmbeddingProvider;
  memory: MemoryStore;
  auditService: AuditService;
  classifier: IntentClassifier;
  registry: AgentRegistry;
  orchestrator: Orchestrator;
  commands: CommandService;
  /** Idempotent */
  dispose(): Promise<void>;
}

/**
 * Replace individual collaborators (mainly for tests)
 */
export interface AppContextOverrides {
  supabase?: SupabaseClient;
  embedder?: EmbeddingProvider;
  memoryDb?: MemoryStoreDb;
  auditDb?: AuditServiceDb;
  training?: IntentTrainingData;
  routes?: Readonly<Record<string, CommandRoute>>;
  /** Registered after the built-in memory agent */
  agents?: Agent[];
}

function createEmbedder(config: CoreConfig): EmbeddingProvider {
  const { apiKey, baseUrl, model, dimensions } = config.embedding;
  if (!apiKey) {
    return createHashingEmbeddingProvider(dimensions);
  }
  return createRemoteEmbeddingProvider({
    client: createOpenAIEmbeddingClient({ apiKey, baseURL: baseUrl }),
    config: { model, dimensions },
  });
}

export async function createAppContext(
  config: CoreConfig,
  overrides: AppContextOverrides = {}
): Promise<AppContext> {
  const supabase =
    overrides.supabase ??
    (config.supabase
      ? createSupabaseAdmin(config.supabase.url, config.supabase.serviceKey)
      : null);

  const auditDb =
    overrides.auditDb ??
    (supabase ? createAuditServiceDb(supabase) : createInMemoryAuditDb());
  const memoryDb =
    overrides.memoryDb ??
    (supabase ? createMemoryStoreDb(supabase) : createInMemoryMemoryDb());

  const auditService = createAuditService({ db: auditDb });
  const embedder = overrides.embedder ?? createEmbedder(config);
  const memory = createMemoryStore({ embedder, db: memoryDb, auditService });

  const loaded = await memory.load();
  if (!loaded.success) {
    console.error(`Memory records not loaded: ${loaded.error.message}`);
  }

  const classifier = createIntentClassifier({
    training: overrides.training ?? loadIntentTrainingData(),
    config: config.classifier,
  });

  const registry = createAgentRegistry({ auditService });
  registry.register(createMemoryAgent());
  for (const agent of overrides.agents ?? []) {
    registry.register(agent);
  }

  const orchestrator = createOrchestrator({
    registry,
    memory,
    auditService,
    config: config.orchestrator,
  });

  const commands = createCommandService({
    classifier,
    orchestrator,
    memory,
    contextSize: config.memoryContextSize,
    ...(overrides.routes !== undefined ? { routes: overrides.routes } : {}),
  });

  let disposing: Promise<void> | null = null;

  return {
    config,
    embedder,
    memory,
    auditService,
    classifier,
    registry,
    orchestrator,
    commands,
    dispose(): Promise<void> {
      disposing ??= (async () => {
        await orchestrator.shutdown();
        await memory.flush();
      })();
      return disposing;
    },
  };
}
