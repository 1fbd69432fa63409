/**
 * Intent training examples, read from data/intents.json at run time
 */

import { readFileSync } from 'node:fs';

import { z } from 'zod';

import { UNKNOWN_INTENT } from '@/types/index.js';

export const intentTrainingDataSchema = z.object({
  version: z.number().int().positive(),
  intents: z
    .record(z.string().min(1), z.array(z.string().min(1)).min(1))
    .refine((intents) => !(UNKNOWN_INTENT in intents), {
      message: `"${UNKNOWN_INTENT}" is reserved and cannot be trained`,
    }),
});

export type IntentTrainingData = z.infer<typeof intentTrainingDataSchema>;

export const DEFAULT_TRAINING_DATA_URL = new URL(
  '../../data/intents.json',
  import.meta.url
);

/**
 * Parse and validate training data; throws with the zod issues on bad input
 */
export function parseIntentTrainingData(raw: unknown): IntentTrainingData {
  const parsed = intentTrainingDataSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid intent training data: ${issues}`);
  }
  return parsed.data;
}

export function loadIntentTrainingData(
  source: URL | string = DEFAULT_TRAINING_DATA_URL
): IntentTrainingData {
  const raw: unknown = JSON.parse(readFileSync(source, 'utf-8'));
  return parseIntentTrainingData(raw);
}
