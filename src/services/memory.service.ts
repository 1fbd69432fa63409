/**
 * Semantic Memory Store
 *
 * SCOPE: Generic similarity index over (text, vector, metadata) records
 * NOT IN SCOPE: Tasks or intents - the orchestrator decides what to store
 *
 * GUARDRAILS:
 * - add() is total for any metadata: non-scalar values are stringified
 * - Every stored vector has the embedder's fixed dimension
 * - Records are frozen; the index array is replaced on every write, so a
 *   search running concurrently sees either the old or the new snapshot
 * - search() on an empty store returns [] rather than an error
 *
 * Dependencies: EmbeddingProvider, MemoryStoreDb (persistence), AuditService
 */

import { nanoid } from 'nanoid';

import { cosineSimilarity } from '@/lib/text.js';
import type {
  AgentMemory,
  EmbeddingProvider,
  MemoryRecord,
  MemorySearchHit,
  MemoryStats,
  MetadataFilter,
  MetadataInput,
  MetadataValue,
  Result,
} from '@/types/index.js';
import { success, failure, errorMessage } from '@/types/index.js';

import type { AuditService } from './audit.service.js';
import { emitAudit } from './audit.service.js';

/**
 * Persistence abstraction for MemoryStore
 */
export interface MemoryStoreDb {
  loadRecords: () => Promise<MemoryRecord[]>;
  insertRecord: (record: MemoryRecord) => Promise<void>;
  deleteRecord: (id: string) => Promise<boolean>;
}

/**
 * MemoryStore interface
 */
export interface MemoryStore extends AgentMemory {
  add(text: string, metadata?: MetadataInput): Promise<Result<string>>;
  search(
    query: string,
    k: number,
    filter?: MetadataFilter
  ): Promise<Result<MemorySearchHit[]>>;
  delete(id: string): Promise<Result<boolean>>;
  get(id: string): MemoryRecord | null;
  size(): number;
  stats(): MemoryStats;
  /** Hydrate the index from the persistence adapter */
  load(): Promise<Result<number>>;
  /** Wait for in-flight writes */
  flush(): Promise<void>;
  /** Store one user/assistant turn as a conversation record */
  recordInteraction(
    input: string,
    response: string,
    metadata?: MetadataInput
  ): Promise<Result<string>>;
}

interface IndexEntry {
  record: MemoryRecord;
  seq: number;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

/**
 * Convert one metadata value to a scalar
 */
function toScalar(value: unknown): MetadataValue | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value);
    } catch {
      // circular structures
      return String(value);
    }
  }
  return String(value);
}

/**
 * Normalise metadata to scalar values, dropping undefined entries
 */
export function normalizeMetadata(
  metadata: MetadataInput = {}
): Record<string, MetadataValue> {
  const normalized: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(metadata)) {
    const scalar = toScalar(value);
    if (scalar !== undefined) {
      normalized[key] = scalar;
    }
  }
  return normalized;
}

/**
 * Exact-match filter over record metadata
 */
function matchesFilter(record: MemoryRecord, filter: MetadataFilter): boolean {
  return Object.entries(filter).every(
    ([key, expected]) =>
      Object.prototype.hasOwnProperty.call(record.metadata, key) &&
      record.metadata[key] === expected
  );
}

/**
 * Most similar first; ties go to the more recent record
 */
function compareHits(
  a: { hit: MemorySearchHit; seq: number },
  b: { hit: MemorySearchHit; seq: number }
): number {
  if (b.hit.similarity !== a.hit.similarity) {
    return b.hit.similarity - a.hit.similarity;
  }
  const byTime =
    b.hit.record.createdAt.getTime() - a.hit.record.createdAt.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  return b.seq - a.seq;
}

function freezeRecord(record: MemoryRecord): MemoryRecord {
  return Object.freeze({
    id: record.id,
    text: record.text,
    vector: Object.freeze([...record.vector]),
    metadata: Object.freeze({ ...record.metadata }),
    createdAt: new Date(record.createdAt.getTime()),
  });
}

// ─────────────────────────────────────────────────────────────
// STORE IMPLEMENTATION
// ─────────────────────────────────────────────────────────────

/**
 * Create MemoryStore instance
 */
export function createMemoryStore(deps: {
  embedder: EmbeddingProvider;
  db: MemoryStoreDb;
  auditService?: AuditService;
  generateId?: () => string;
  now?: () => Date;
}): MemoryStore {
  const { embedder, db, auditService } = deps;
  const generateId = deps.generateId ?? (() => `mem_${nanoid()}`);
  const now = deps.now ?? (() => new Date());

  let entries: readonly IndexEntry[] = [];
  let nextSeq = 0;
  const pendingWrites = new Set<Promise<unknown>>();

  function track<T>(promise: Promise<T>): Promise<T> {
    pendingWrites.add(promise);
    const untrack = (): void => {
      pendingWrites.delete(promise);
    };
    void promise.then(untrack, untrack);
    return promise;
  }

  async function embedChecked(text: string): Promise<Result<number[]>> {
    let vector: number[];
    try {
      vector = await embedder.embed(text);
    } catch (error) {
      return failure(
        'EMBEDDING_ERROR',
        `Failed to embed text: ${errorMessage(error)}`
      );
    }
    if (vector.length !== embedder.dimensions) {
      return failure(
        'DIMENSION_MISMATCH',
        `Embedding has ${vector.length} dimensions, expected ${embedder.dimensions}`,
        { expected: embedder.dimensions, actual: vector.length }
      );
    }
    return success(vector);
  }

  async function add(
    text: string,
    metadata?: MetadataInput
  ): Promise<Result<string>> {
    const embedded = await embedChecked(text);
    if (!embedded.success) {
      return embedded;
    }

    const record = freezeRecord({
      id: generateId(),
      text,
      vector: embedded.data,
      metadata: normalizeMetadata(metadata),
      createdAt: now(),
    });

    try {
      await track(db.insertRecord(record));
    } catch (error) {
      return failure(
        'PERSISTENCE_ERROR',
        `Failed to persist memory record: ${errorMessage(error)}`
      );
    }

    entries = [...entries, { record, seq: nextSeq++ }];

    if (auditService !== undefined) {
      await emitAudit(auditService, {
        action: 'memory:added',
        resourceType: 'memory',
        resourceId: record.id,
        details: { length: text.length, keys: Object.keys(record.metadata) },
      });
    }

    return success(record.id);
  }

  return {
    add,

    async search(
      query: string,
      k: number,
      filter?: MetadataFilter
    ): Promise<Result<MemorySearchHit[]>> {
      if (!Number.isFinite(k) || k < 1) {
        return success([]);
      }
      const limit = Math.floor(k);

      const snapshot = entries;
      const candidates =
        filter === undefined
          ? snapshot
          : snapshot.filter((entry) => matchesFilter(entry.record, filter));
      if (candidates.length === 0) {
        return success([]);
      }

      const embedded = await embedChecked(query);
      if (!embedded.success) {
        return embedded;
      }
      const queryVector = embedded.data;

      const ranked = candidates
        .map((entry) => ({
          hit: {
            record: entry.record,
            similarity: cosineSimilarity(queryVector, entry.record.vector),
          },
          seq: entry.seq,
        }))
        .sort(compareHits);

      return success(ranked.slice(0, limit).map((item) => item.hit));
    },

    async delete(id: string): Promise<Result<boolean>> {
      if (!entries.some((entry) => entry.record.id === id)) {
        return success(false);
      }

      try {
        await track(db.deleteRecord(id));
      } catch (error) {
        return failure(
          'PERSISTENCE_ERROR',
          `Failed to delete memory record: ${errorMessage(error)}`
        );
      }

      entries = entries.filter((entry) => entry.record.id !== id);

      if (auditService !== undefined) {
        await emitAudit(auditService, {
          action: 'memory:deleted',
          resourceType: 'memory',
          resourceId: id,
        });
      }

      return success(true);
    },

    get(id: string): MemoryRecord | null {
      return entries.find((entry) => entry.record.id === id)?.record ?? null;
    },

    size(): number {
      return entries.length;
    },

    stats(): MemoryStats {
      return {
        totalRecords: entries.length,
        dimensions: embedder.dimensions,
        embeddingModel: embedder.model,
        pendingWrites: pendingWrites.size,
      };
    },

    async load(): Promise<Result<number>> {
      let records: MemoryRecord[];
      try {
        records = await db.loadRecords();
      } catch (error) {
        return failure(
          'PERSISTENCE_ERROR',
          `Failed to load memory records: ${errorMessage(error)}`
        );
      }

      const known = new Set(entries.map((entry) => entry.record.id));
      const loaded = records
        .filter((record) => {
          if (known.has(record.id)) {
            return false;
          }
          if (record.vector.length !== embedder.dimensions) {
            console.error(
              `Skipping memory record ${record.id}: ${record.vector.length} dimensions, expected ${embedder.dimensions}`
            );
            return false;
          }
          return true;
        })
        .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
        .map((record) => ({ record: freezeRecord(record), seq: nextSeq++ }));

      entries = [...loaded, ...entries];
      return success(loaded.length);
    },

    async flush(): Promise<void> {
      await Promise.allSettled([...pendingWrites]);
    },

    recordInteraction(
      input: string,
      response: string,
      metadata?: MetadataInput
    ): Promise<Result<string>> {
      return add(`User: ${input}\nAssistant: ${response}`, {
        kind: 'conversation',
        ...metadata,
      });
    },
  };
}
