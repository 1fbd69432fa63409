/**
 * Embedding Domain Types
 *
 * The core consumes an embedding provider; it does not implement one.
 * Every vector a provider returns must have exactly `dimensions` entries.
 */

/**
 * Contract an embedding provider must satisfy
 */
export interface EmbeddingProvider {
  /** Model identifier, recorded in stats */
  readonly model: string;
  /** Fixed output dimension */
  readonly dimensions: number;
  embed(text: string): Promise<number[]>;
}

/**
 * Remote embedding configuration
 */
export interface EmbeddingConfig {
  /** Embedding model to use */
  model: string;
  /** Vector dimensions */
  dimensions: number;
}

/**
 * Default remote embedding configuration
 */
export const DEFAULT_EMBEDDING_CONFIG: EmbeddingConfig = {
  model: 'text-embedding-3-small',
  dimensions: 1536,
};

/**
 * Dimension used by the local hashing embedder
 */
export const LOCAL_EMBEDDING_DIMENSIONS = 256;
