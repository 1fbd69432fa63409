/**
 * Intent Domain Types
 *
 * An Intent is produced per classification call and embedded in a Task;
 * it is never persisted on its own.
 */

/**
 * Label returned when nothing can be classified with confidence
 */
export const UNKNOWN_INTENT = 'unknown';

/**
 * Where the chosen label came from
 * - empty: blank input, never classified
 * - model: statistical model above threshold
 * - pattern: keyword fallback overrode a low-confidence prediction
 * - none: low confidence and no fallback match (ambiguous)
 */
export type IntentSource = 'empty' | 'model' | 'pattern' | 'none';

/**
 * Classified instruction
 */
export interface Intent {
  label: string;
  confidence: number; // 0-1
  slots: Record<string, string>;
  source: IntentSource;
  /** True when the label degraded to `unknown` (ClassificationAmbiguous) */
  ambiguous: boolean;
}

/**
 * Classifier thresholds
 */
export interface ClassifierConfig {
  /** Predictions below this consult the keyword fallback */
  confidenceThreshold: number;
  /** Fixed confidence reported for a fallback match */
  fallbackConfidence: number;
}

export const DEFAULT_CLASSIFIER_CONFIG: ClassifierConfig = {
  confidenceThreshold: 0.45,
  fallbackConfidence: 0.4,
};
