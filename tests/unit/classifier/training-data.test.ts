/**
 * Intent training data loading tests
 */

import { describe, it, expect } from 'vitest';

import {
  loadIntentTrainingData,
  parseIntentTrainingData,
} from '@/classifier/training-data.js';

describe('intent training data', () => {
  it('should load the bundled examples', () => {
    const data = loadIntentTrainingData();

    expect(data.version).toBe(1);
    expect(Object.keys(data.intents)).toContain('port_scan');
    expect(Object.keys(data.intents)).toHaveLength(14);
    for (const examples of Object.values(data.intents)) {
      expect(examples.length).toBeGreaterThanOrEqual(5);
    }
  });

  it('should accept a minimal document', () => {
    const data = parseIntentTrainingData({
      version: 2,
      intents: { weather: ['weather in lima'] },
    });

    expect(data).toEqual({
      version: 2,
      intents: { weather: ['weather in lima'] },
    });
  });

  it('should refuse the reserved unknown label', () => {
    expect(() =>
      parseIntentTrainingData({
        version: 1,
        intents: { unknown: ['anything'] },
      })
    ).toThrow('"unknown" is reserved and cannot be trained');
  });

  it('should refuse a label without examples', () => {
    expect(() =>
      parseIntentTrainingData({ version: 1, intents: { weather: [] } })
    ).toThrow('Invalid intent training data: intents.weather:');
  });

  it('should refuse a document without a version', () => {
    expect(() => parseIntentTrainingData({ intents: {} })).toThrow(
      'Invalid intent training data: version:'
    );
  });
});
