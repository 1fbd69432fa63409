/**
 * Intent Classifier
 *
 * SCOPE: Map free text to a routing label, a confidence and extracted slots
 * NOT IN SCOPE: Executing anything, persisting intents
 *
 * GUARDRAILS:
 * - Never throws; low-confidence input degrades to `unknown`
 * - The label comes from the text alone; recent context only fills pronoun
 *   slots ("scan it") from earlier records carrying the same slot name
 * - Blank input is `unknown` with confidence 0
 */

import type {
  ClassifierConfig,
  Intent,
  MemorySearchHit,
  Result,
} from '@/types/index.js';
import {
  DEFAULT_CLASSIFIER_CONFIG,
  UNKNOWN_INTENT,
  failure,
  success,
} from '@/types/index.js';

import { createNaiveBayesModel } from './naive-bayes.js';
import type { FallbackPattern, SlotExtractor } from './patterns.js';
import {
  DEFAULT_FALLBACK_PATTERNS,
  DEFAULT_SLOT_EXTRACTORS,
  PRONOUNS,
} from './patterns.js';
import type { IntentTrainingData } from './training-data.js';

/**
 * IntentClassifier interface
 */
export interface IntentClassifier {
  classify(
    text: string,
    recentContext?: readonly MemorySearchHit[]
  ): Intent;
  /** Add examples for a label, creating it if new; returns examples used */
  train(label: string, examples: readonly string[]): Result<number>;
  labels(): string[];
}

export interface IntentClassifierDeps {
  training: IntentTrainingData;
  config?: Partial<ClassifierConfig>;
  patterns?: readonly FallbackPattern[];
  slotExtractors?: Readonly<Record<string, SlotExtractor>>;
}

// ─────────────────────────────────────────────────────────────
// HELPER FUNCTIONS
// ─────────────────────────────────────────────────────────────

function resolveFromContext(
  slot: string,
  context: readonly MemorySearchHit[]
): string | null {
  for (const hit of context) {
    const value = hit.record.metadata[slot];
    if (value === null || value === undefined || typeof value === 'boolean') {
      continue;
    }
    const text = String(value).trim();
    if (text && !PRONOUNS.has(text.toLowerCase())) {
      return text;
    }
  }
  return null;
}

function resolvePronouns(
  slots: Record<string, string>,
  context: readonly MemorySearchHit[]
): Record<string, string> {
  const resolved: Record<string, string> = {};
  for (const [name, value] of Object.entries(slots)) {
    if (!PRONOUNS.has(value.toLowerCase())) {
      resolved[name] = value;
      continue;
    }
    const replacement = resolveFromContext(name, context);
    if (replacement !== null) {
      resolved[name] = replacement;
    }
  }
  return resolved;
}

// ─────────────────────────────────────────────────────────────
// FACTORY
// ─────────────────────────────────────────────────────────────

export function createIntentClassifier(
  deps: IntentClassifierDeps
): IntentClassifier {
  const config: ClassifierConfig = {
    ...DEFAULT_CLASSIFIER_CONFIG,
    ...deps.config,
  };
  // Pattern matches never outrank an accepted model prediction
  const fallbackConfidence = Math.min(
    config.fallbackConfidence,
    config.confidenceThreshold
  );
  const patterns = deps.patterns ?? DEFAULT_FALLBACK_PATTERNS;
  const extractors = deps.slotExtractors ?? DEFAULT_SLOT_EXTRACTORS;
  const model = createNaiveBayesModel();

  for (const [label, examples] of Object.entries(deps.training.intents)) {
    model.train(label, examples);
  }

  function extractSlots(
    label: string,
    text: string,
    context: readonly MemorySearchHit[]
  ): Record<string, string> {
    const extractor = extractors[label];
    if (!extractor) {
      return {};
    }
    return resolvePronouns(extractor(text), context);
  }

  return {
    classify(
      text: string,
      recentContext: readonly MemorySearchHit[] = []
    ): Intent {
      const trimmed = text.trim();
      if (!trimmed) {
        return {
          label: UNKNOWN_INTENT,
          confidence: 0,
          slots: {},
          source: 'empty',
          ambiguous: true,
        };
      }

      const prediction = model.predict(trimmed);
      const confidence = prediction?.confidence ?? 0;

      if (prediction && confidence >= config.confidenceThreshold) {
        return {
          label: prediction.label,
          confidence,
          slots: extractSlots(prediction.label, trimmed, recentContext),
          source: 'model',
          ambiguous: false,
        };
      }

      const fallback = patterns.find((entry) => entry.pattern.test(trimmed));
      if (fallback) {
        return {
          label: fallback.label,
          confidence: fallbackConfidence,
          slots: extractSlots(fallback.label, trimmed, recentContext),
          source: 'pattern',
          ambiguous: false,
        };
      }

      return {
        label: UNKNOWN_INTENT,
        confidence,
        slots: {},
        source: 'none',
        ambiguous: true,
      };
    },

    train(label: string, examples: readonly string[]): Result<number> {
      const name = label.trim();
      if (!name) {
        return failure('VALIDATION_ERROR', 'Label is required');
      }
      if (name === UNKNOWN_INTENT) {
        return failure(
          'VALIDATION_ERROR',
          `Label "${UNKNOWN_INTENT}" is reserved`
        );
      }
      return success(model.train(name, examples));
    },

    labels(): string[] {
      return model.labels();
    },
  };
}
