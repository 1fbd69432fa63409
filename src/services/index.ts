/**
 * Service Layer Exports
 *
 * Services are the ONLY gateway to persistence.
 * Each service takes its database adapter as a dependency.
 */

// AuditService
export type {
  AuditService,
  AuditServiceDb,
  AuditLogEntry,
} from './audit.service.js';
export { createAuditService, emitAudit } from './audit.service.js';
export { createAuditServiceDb, createInMemoryAuditDb } from './audit.db.js';

// Embedding providers
export type {
  EmbeddingClient,
  EmbeddingClientConfig,
  EmbeddingResponse,
} from './embedding.service.js';
export {
  createOpenAIEmbeddingClient,
  createRemoteEmbeddingProvider,
  createHashingEmbeddingProvider,
} from './embedding.service.js';

// MemoryStore
export type { MemoryStore, MemoryStoreDb } from './memory.service.js';
export { createMemoryStore, normalizeMetadata } from './memory.service.js';
export { createMemoryStoreDb, createInMemoryMemoryDb } from './memory.db.js';

// CommandService
export type {
  CommandService,
  CommandServiceDeps,
  CommandRoute,
  CommandOutcome,
  ProcessCommandOptions,
} from './command.service.js';
export {
  createCommandService,
  CLARIFICATION_MESSAGE,
} from './command.service.js';
