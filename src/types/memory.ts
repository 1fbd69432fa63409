/**
 * Semantic Memory Domain Types
 *
 * SCOPE: (text, vector, metadata) records and similarity queries
 * NOT IN SCOPE: Embedding generation (see embedding.ts for the provider contract)
 *
 * Records are immutable once created; the only mutation is deletion.
 */

/**
 * Scalar metadata value. Anything else is stringified before storage.
 */
export type MetadataValue = string | number | boolean | null;

/**
 * Stored metadata map
 */
export type RecordMetadata = Readonly<Record<string, MetadataValue>>;

/**
 * Metadata accepted by add() - values are normalised to scalars
 */
export type MetadataInput = Record<string, unknown>;

/**
 * Exact-match metadata filter applied before similarity ranking
 */
export type MetadataFilter = Record<string, MetadataValue>;

/**
 * A stored memory record
 */
export interface MemoryRecord {
  readonly id: string;
  readonly text: string;
  readonly vector: readonly number[];
  readonly metadata: RecordMetadata;
  readonly createdAt: Date;
}

/**
 * One similarity match
 */
export interface MemorySearchHit {
  record: MemoryRecord;
  similarity: number; // cosine, -1..1
}

/**
 * Parameters for a similarity search
 */
export interface SearchMemoryParams {
  query: string;
  k: number;
  filter?: MetadataFilter;
}

/**
 * Memory store statistics
 */
export interface MemoryStats {
  totalRecords: number;
  dimensions: number;
  embeddingModel: string;
  pendingWrites: number;
}
