/**
 * Embedding Providers
 *
 * SCOPE: Adapters that satisfy the EmbeddingProvider contract
 * - Remote: OpenAI-compatible embeddings endpoint (OpenRouter by default)
 * - Local: deterministic feature hashing, used when no API key is configured
 *
 * GUARDRAILS:
 * - Every returned vector has exactly `dimensions` entries
 * - Blank text embeds to the zero vector without a remote call
 */

import OpenAI from 'openai';

import { featureTokens, fnv1a } from '@/lib/text.js';
import type { EmbeddingConfig, EmbeddingProvider } from '@/types/index.js';
import {
  DEFAULT_EMBEDDING_CONFIG,
  LOCAL_EMBEDDING_DIMENSIONS,
} from '@/types/index.js';

/**
 * OpenRouter base URL
 */
const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

/**
 * Single embedding response from a remote client
 */
export interface EmbeddingResponse {
  embedding: number[];
  model: string;
  tokenCount: number;
}

/**
 * Embedding client interface (abstraction over OpenAI/OpenRouter)
 */
export interface EmbeddingClient {
  createEmbedding: (
    text: string,
    config: EmbeddingConfig
  ) => Promise<EmbeddingResponse>;
}

/**
 * Remote client configuration options
 */
export interface EmbeddingClientConfig {
  apiKey: string;
  /** Base URL override (default: OpenRouter) */
  baseURL?: string;
  /** Request timeout in milliseconds */
  timeout?: number;
}

/**
 * Create an embedding client backed by the OpenAI SDK
 */
export function createOpenAIEmbeddingClient(
  config: EmbeddingClientConfig
): EmbeddingClient {
  if (!config.apiKey || config.apiKey.trim() === '') {
    throw new Error('API key is required');
  }

  const openai = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseURL ?? OPENROUTER_BASE_URL,
    timeout: config.timeout ?? 30000,
  });

  return {
    async createEmbedding(
      text: string,
      embeddingConfig: EmbeddingConfig
    ): Promise<EmbeddingResponse> {
      const response = await openai.embeddings.create({
        model: embeddingConfig.model,
        input: text,
        dimensions: embeddingConfig.dimensions,
      });

      const first = response.data[0];
      if (first === undefined) {
        throw new Error('Embedding response contained no vectors');
      }

      return {
        embedding: first.embedding,
        model: response.model,
        tokenCount: response.usage.prompt_tokens,
      };
    },
  };
}

/**
 * Wrap a remote client as an EmbeddingProvider
 */
export function createRemoteEmbeddingProvider(deps: {
  client: EmbeddingClient;
  config?: EmbeddingConfig;
}): EmbeddingProvider {
  const config = deps.config ?? DEFAULT_EMBEDDING_CONFIG;

  return {
    model: config.model,
    dimensions: config.dimensions,

    async embed(text: string): Promise<number[]> {
      const trimmed = text.trim();
      if (!trimmed) {
        return new Array<number>(config.dimensions).fill(0);
      }

      const response = await deps.client.createEmbedding(trimmed, config);
      if (response.embedding.length !== config.dimensions) {
        throw new Error(
          `Embedding has ${response.embedding.length} dimensions, expected ${config.dimensions}`
        );
      }
      return response.embedding;
    },
  };
}

/**
 * Local hashing embedder.
 * Each unigram/bigram feature is hashed to a bucket with a hashed sign,
 * then the vector is L2-normalised. Lexical, not semantic.
 */
export function createHashingEmbeddingProvider(
  dimensions: number = LOCAL_EMBEDDING_DIMENSIONS
): EmbeddingProvider {
  if (!Number.isInteger(dimensions) || dimensions < 1) {
    throw new Error('Embedding dimensions must be a positive integer');
  }

  return {
    model: `local-hashing-${dimensions}`,
    dimensions,

    async embed(text: string): Promise<number[]> {
      const vector = new Array<number>(dimensions).fill(0);

      for (const feature of featureTokens(text)) {
        const bucket = fnv1a(feature) % dimensions;
        const sign = (fnv1a(feature, 0x9747b28c) & 1) === 0 ? 1 : -1;
        const weight = feature.includes('_') ? 0.5 : 1;
        vector[bucket] = (vector[bucket] ?? 0) + sign * weight;
      }

      const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
      if (norm === 0) {
        return vector;
      }
      return vector.map((v) => v / norm);
    },
  };
}
