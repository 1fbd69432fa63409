/**
 * Process configuration
 *
 * Environment variables are parsed once at startup. Every invalid key is
 * reported together so a misconfigured deployment fails in one pass.
 */

import { z } from 'zod';

import type { ClassifierConfig, OrchestratorConfig } from '@/types/index.js';
import {
  DEFAULT_CLASSIFIER_CONFIG,
  DEFAULT_EMBEDDING_CONFIG,
  DEFAULT_ORCHESTRATOR_CONFIG,
  LOCAL_EMBEDDING_DIMENSIONS,
  MAX_TIMER_MS,
} from '@/types/index.js';

export const DEFAULT_EMBEDDING_BASE_URL = 'https://openrouter.ai/api/v1';

const DEFAULT_ALLOWED_ORIGINS = [
  'http://localhost:5173',
  'http://localhost:3000',
];

export interface CoreConfig {
  port: number;
  allowedOrigins: string[];
  embedding: {
    apiKey: string | null;
    baseUrl: string;
    model: string;
    /** Remote dimensions when an API key is set, otherwise local */
    dimensions: number;
  };
  supabase: {
    url: string;
    serviceKey: string;
  } | null;
  orchestrator: OrchestratorConfig;
  classifier: ClassifierConfig;
  /** Memory hits handed to the classifier per command */
  memoryContextSize: number;
}

/**
 * Raised for unusable configuration; lists every offending key
 */
export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

// An empty variable counts as unset
const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const positiveInt = (fallback: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(fallback)
  );

const nonNegativeInt = (fallback: number, max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().nonnegative().max(max).default(fallback)
  );

const optionalPositiveInt = (max = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().max(max).optional()
  );

const ratio = (fallback: number) =>
  z.preprocess(
    blankToUndefined,
    z.coerce.number().min(0).max(1).default(fallback)
  );

const envSchema = z
  .object({
    PORT: positiveInt(3000),
    ALLOWED_ORIGINS: optionalString,
    EMBEDDING_API_KEY: optionalString,
    EMBEDDING_BASE_URL: z.preprocess(
      blankToUndefined,
      z.string().url().default(DEFAULT_EMBEDDING_BASE_URL)
    ),
    EMBEDDING_MODEL: z.preprocess(
      blankToUndefined,
      z.string().default(DEFAULT_EMBEDDING_CONFIG.model)
    ),
    EMBEDDING_DIMENSIONS: optionalPositiveInt(),
    SUPABASE_URL: optionalString,
    SUPABASE_SERVICE_KEY: optionalString,
    ORCHESTRATOR_MAX_CONCURRENCY: positiveInt(
      DEFAULT_ORCHESTRATOR_CONFIG.maxConcurrency
    ),
    ORCHESTRATOR_MAX_ATTEMPTS: positiveInt(
      DEFAULT_ORCHESTRATOR_CONFIG.maxAttempts
    ),
    ORCHESTRATOR_BACKOFF_MS: nonNegativeInt(
      DEFAULT_ORCHESTRATOR_CONFIG.backoffMs,
      MAX_TIMER_MS
    ),
    ORCHESTRATOR_MAX_BACKOFF_MS: nonNegativeInt(
      DEFAULT_ORCHESTRATOR_CONFIG.maxBackoffMs,
      MAX_TIMER_MS
    ),
    ORCHESTRATOR_TASK_TIMEOUT_MS: optionalPositiveInt(MAX_TIMER_MS),
    TASK_RETENTION_MS: nonNegativeInt(DEFAULT_ORCHESTRATOR_CONFIG.retentionMs),
    CLASSIFIER_CONFIDENCE_THRESHOLD: ratio(
      DEFAULT_CLASSIFIER_CONFIG.confidenceThreshold
    ),
    CLASSIFIER_FALLBACK_CONFIDENCE: ratio(
      DEFAULT_CLASSIFIER_CONFIG.fallbackConfidence
    ),
    MEMORY_CONTEXT_SIZE: nonNegativeInt(3),
  })
  .superRefine((env, ctx) => {
    if (Boolean(env.SUPABASE_URL) !== Boolean(env.SUPABASE_SERVICE_KEY)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['SUPABASE_SERVICE_KEY'],
        message: 'SUPABASE_URL and SUPABASE_SERVICE_KEY must be set together',
      });
    }
    if (env.ORCHESTRATOR_MAX_BACKOFF_MS < env.ORCHESTRATOR_BACKOFF_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['ORCHESTRATOR_MAX_BACKOFF_MS'],
        message: 'must be at least ORCHESTRATOR_BACKOFF_MS',
      });
    }
    // A keyword match must score below anything the model accepts
    if (
      env.CLASSIFIER_FALLBACK_CONFIDENCE > 0 &&
      env.CLASSIFIER_FALLBACK_CONFIDENCE >= env.CLASSIFIER_CONFIDENCE_THRESHOLD
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CLASSIFIER_FALLBACK_CONFIDENCE'],
        message: 'must be below CLASSIFIER_CONFIDENCE_THRESHOLD',
      });
    }
  });

/**
 * Parse configuration from an environment map (normally process.env)
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): CoreConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(env)'}: ${issue.message}`
      )
    );
  }
  const values = parsed.data;
  const apiKey = values.EMBEDDING_API_KEY ?? null;

  return {
    port: values.PORT,
    allowedOrigins: values.ALLOWED_ORIGINS
      ? values.ALLOWED_ORIGINS.split(',')
          .map((origin) => origin.trim())
          .filter((origin) => origin !== '')
      : DEFAULT_ALLOWED_ORIGINS,
    embedding: {
      apiKey,
      baseUrl: values.EMBEDDING_BASE_URL,
      model: values.EMBEDDING_MODEL,
      dimensions:
        values.EMBEDDING_DIMENSIONS ??
        (apiKey
          ? DEFAULT_EMBEDDING_CONFIG.dimensions
          : LOCAL_EMBEDDING_DIMENSIONS),
    },
    supabase:
      values.SUPABASE_URL && values.SUPABASE_SERVICE_KEY
        ? { url: values.SUPABASE_URL, serviceKey: values.SUPABASE_SERVICE_KEY }
        : null,
    orchestrator: {
      ...DEFAULT_ORCHESTRATOR_CONFIG,
      maxConcurrency: values.ORCHESTRATOR_MAX_CONCURRENCY,
      maxAttempts: values.ORCHESTRATOR_MAX_ATTEMPTS,
      backoffMs: values.ORCHESTRATOR_BACKOFF_MS,
      maxBackoffMs: values.ORCHESTRATOR_MAX_BACKOFF_MS,
      taskTimeoutMs: values.ORCHESTRATOR_TASK_TIMEOUT_MS ?? null,
      retentionMs: values.TASK_RETENTION_MS,
    },
    classifier: {
      confidenceThreshold: values.CLASSIFIER_CONFIDENCE_THRESHOLD,
      fallbackConfidence: values.CLASSIFIER_FALLBACK_CONFIDENCE,
    },
    memoryContextSize: values.MEMORY_CONTEXT_SIZE,
  };
}
