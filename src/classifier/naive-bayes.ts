/**
 * Multinomial naive Bayes over unigram + bigram features
 *
 * Laplace smoothing; features never seen in training are ignored.
 * Confidence is the posterior of the best label (softmax over log scores).
 */

import { featureTokens } from '@/lib/text.js';

export interface LabelPrediction {
  label: string;
  confidence: number;
}

export interface NaiveBayesModel {
  /** Returns how many examples produced at least one feature */
  train(label: string, examples: readonly string[]): number;
  /** null until at least one label has been trained */
  predict(text: string): LabelPrediction | null;
  labels(): string[];
}

interface LabelStats {
  documents: number;
  totalFeatures: number;
  counts: Map<string, number>;
}

export function createNaiveBayesModel(alpha = 1): NaiveBayesModel {
  // Insertion order doubles as the tie-break order
  const stats = new Map<string, LabelStats>();
  const vocabulary = new Set<string>();
  let totalDocuments = 0;

  return {
    train(label: string, examples: readonly string[]): number {
      let entry = stats.get(label);
      if (!entry) {
        entry = { documents: 0, totalFeatures: 0, counts: new Map() };
        stats.set(label, entry);
      }

      let used = 0;
      for (const example of examples) {
        const features = featureTokens(example);
        if (features.length === 0) {
          continue;
        }
        used++;
        entry.documents++;
        totalDocuments++;
        for (const feature of features) {
          vocabulary.add(feature);
          entry.counts.set(feature, (entry.counts.get(feature) ?? 0) + 1);
          entry.totalFeatures++;
        }
      }
      return used;
    },

    predict(text: string): LabelPrediction | null {
      const trained = [...stats.entries()].filter(
        ([, entry]) => entry.documents > 0
      );
      if (trained.length === 0) {
        return null;
      }

      const features = featureTokens(text).filter((f) => vocabulary.has(f));
      const vocabularySize = vocabulary.size;

      const scores = trained.map(([label, entry]) => {
        let score = Math.log(entry.documents / totalDocuments);
        const denominator = entry.totalFeatures + alpha * vocabularySize;
        for (const feature of features) {
          const count = entry.counts.get(feature) ?? 0;
          score += Math.log((count + alpha) / denominator);
        }
        return { label, score };
      });

      let best = scores[0];
      for (const candidate of scores) {
        if (best === undefined || candidate.score > best.score) {
          best = candidate;
        }
      }
      if (best === undefined) {
        return null;
      }

      const top = best.score;
      let normalizer = 0;
      for (const candidate of scores) {
        normalizer += Math.exp(candidate.score - top);
      }

      return { label: best.label, confidence: 1 / normalizer };
    },

    labels(): string[] {
      return [...stats.keys()];
    },
  };
}
