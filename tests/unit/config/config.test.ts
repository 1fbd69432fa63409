/**
 * Configuration Unit Tests
 */

import { describe, it, expect } from 'vitest';

import {
  ConfigError,
  DEFAULT_EMBEDDING_BASE_URL,
  loadConfig,
} from '@/config/index.js';
import {
  DEFAULT_CLASSIFIER_CONFIG,
  DEFAULT_ORCHESTRATOR_CONFIG,
  MAX_TIMER_MS,
} from '@/types/index.js';

function configIssues(env: Record<string, string>): string[] {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 3000,
      allowedOrigins: ['http://localhost:5173', 'http://localhost:3000'],
      embedding: {
        apiKey: null,
        baseUrl: DEFAULT_EMBEDDING_BASE_URL,
        model: 'text-embedding-3-small',
        dimensions: 256,
      },
      supabase: null,
      orchestrator: DEFAULT_ORCHESTRATOR_CONFIG,
      classifier: DEFAULT_CLASSIFIER_CONFIG,
      memoryContextSize: 3,
    });
  });

  it('should treat blank variables as unset', () => {
    const config = loadConfig({ PORT: '', EMBEDDING_API_KEY: '  ' });

    expect(config.port).toBe(3000);
    expect(config.embedding.apiKey).toBeNull();
  });

  it('should use remote dimensions when an API key is set', () => {
    const config = loadConfig({ EMBEDDING_API_KEY: 'test-secret' });

    expect(config.embedding.apiKey).toBe('test-secret');
    expect(config.embedding.dimensions).toBe(1536);
  });

  it('should honour explicit dimensions', () => {
    const config = loadConfig({ EMBEDDING_DIMENSIONS: '64' });

    expect(config.embedding.dimensions).toBe(64);
  });

  it('should split allowed origins', () => {
    const config = loadConfig({
      ALLOWED_ORIGINS: ' http://a.test, ,http://b.test ',
    });

    expect(config.allowedOrigins).toEqual(['http://a.test', 'http://b.test']);
  });

  it('should read orchestrator settings', () => {
    const config = loadConfig({
      ORCHESTRATOR_MAX_CONCURRENCY: '8',
      ORCHESTRATOR_MAX_ATTEMPTS: '5',
      ORCHESTRATOR_BACKOFF_MS: '0',
      ORCHESTRATOR_MAX_BACKOFF_MS: '100',
      ORCHESTRATOR_TASK_TIMEOUT_MS: '5000',
      TASK_RETENTION_MS: '60000',
    });

    expect(config.orchestrator).toEqual({
      maxConcurrency: 8,
      maxAttempts: 5,
      backoffMs: 0,
      maxBackoffMs: 100,
      taskTimeoutMs: 5000,
      retentionMs: 60000,
      recordExchanges: true,
    });
  });

  it('should read classifier thresholds', () => {
    const config = loadConfig({
      CLASSIFIER_CONFIDENCE_THRESHOLD: '0.6',
      CLASSIFIER_FALLBACK_CONFIDENCE: '0.3',
      MEMORY_CONTEXT_SIZE: '0',
    });

    expect(config.classifier).toEqual({
      confidenceThreshold: 0.6,
      fallbackConfidence: 0.3,
    });
    expect(config.memoryContextSize).toBe(0);
  });

  it('should enable persistence when both Supabase keys are set', () => {
    const config = loadConfig({
      SUPABASE_URL: 'http://localhost:54321',
      SUPABASE_SERVICE_KEY: 'test-secret',
    });

    expect(config.supabase).toEqual({
      url: 'http://localhost:54321',
      serviceKey: 'test-secret',
    });
  });

  describe('validation', () => {
    it('should require both Supabase keys together', () => {
      expect(configIssues({ SUPABASE_URL: 'http://localhost:54321' })).toEqual(
        [
          'SUPABASE_SERVICE_KEY: SUPABASE_URL and SUPABASE_SERVICE_KEY must be set together',
        ]
      );
    });

    it('should reject a maximum backoff below the base', () => {
      expect(
        configIssues({
          ORCHESTRATOR_BACKOFF_MS: '1000',
          ORCHESTRATOR_MAX_BACKOFF_MS: '10',
        })
      ).toEqual([
        'ORCHESTRATOR_MAX_BACKOFF_MS: must be at least ORCHESTRATOR_BACKOFF_MS',
      ]);
    });

    it('should reject a fallback confidence at or above the threshold', () => {
      expect(
        configIssues({
          CLASSIFIER_CONFIDENCE_THRESHOLD: '0.6',
          CLASSIFIER_FALLBACK_CONFIDENCE: '0.9',
        })
      ).toEqual([
        'CLASSIFIER_FALLBACK_CONFIDENCE: must be below CLASSIFIER_CONFIDENCE_THRESHOLD',
      ]);
      expect(
        configIssues({
          CLASSIFIER_CONFIDENCE_THRESHOLD: '0.5',
          CLASSIFIER_FALLBACK_CONFIDENCE: '0.5',
        })
      ).toHaveLength(1);
    });

    it.each([
      'ORCHESTRATOR_TASK_TIMEOUT_MS',
      'ORCHESTRATOR_BACKOFF_MS',
      'ORCHESTRATOR_MAX_BACKOFF_MS',
    ])('should reject %s beyond the timer limit', (key) => {
      const issues = configIssues({
        ORCHESTRATOR_BACKOFF_MS: '0',
        [key]: '3000000000',
      });

      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(new RegExp(`^${key}: `));
    });

    it('should accept a task timeout at the timer limit', () => {
      const config = loadConfig({
        ORCHESTRATOR_TASK_TIMEOUT_MS: String(MAX_TIMER_MS),
      });

      expect(config.orchestrator.taskTimeoutMs).toBe(MAX_TIMER_MS);
    });

    it('should report every invalid key at once', () => {
      const issues = configIssues({
        PORT: '0',
        ORCHESTRATOR_MAX_ATTEMPTS: 'many',
        CLASSIFIER_CONFIDENCE_THRESHOLD: '1.5',
      });

      expect(issues).toHaveLength(3);
      expect(issues[0]).toMatch(/^PORT: /);
      expect(issues[1]).toMatch(/^ORCHESTRATOR_MAX_ATTEMPTS: /);
      expect(issues[2]).toMatch(/^CLASSIFIER_CONFIDENCE_THRESHOLD: /);
    });

    it('should reject a malformed base URL', () => {
      const issues = configIssues({ EMBEDDING_BASE_URL: 'not a url' });

      expect(issues).toHaveLength(1);
      expect(issues[0]).toMatch(/^EMBEDDING_BASE_URL: /);
    });

    it('should list the issues in the error message', () => {
      expect(() => loadConfig({ PORT: '-1' })).toThrow(
        /^Invalid configuration:\n {2}PORT: /
      );
    });
  });
});
