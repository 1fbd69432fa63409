/**
 * Text helper tests
 */

import { describe, it, expect } from 'vitest';

import {
  contentTokens,
  cosineSimilarity,
  featureTokens,
  fnv1a,
  tokenize,
} from '@/lib/text.js';

describe('text helpers', () => {
  describe('tokenize', () => {
    it('should lowercase and keep addresses whole', () => {
      expect(tokenize('Scan 192.168.1.10 ports 22, 80!')).toEqual([
        'scan',
        '192.168.1.10',
        'ports',
        '22',
        '80',
      ]);
    });

    it('should keep hostnames and CIDR ranges whole', () => {
      expect(tokenize('sweep 10.0.0.0/24 and db.internal.lan')).toEqual([
        'sweep',
        '10.0.0.0/24',
        'and',
        'db.internal.lan',
      ]);
    });

    it('should return nothing for punctuation only', () => {
      expect(tokenize('?!...')).toEqual([]);
    });
  });

  describe('contentTokens', () => {
    it('should drop stop words', () => {
      expect(contentTokens('Please scan the router for me')).toEqual([
        'scan',
        'router',
      ]);
    });
  });

  describe('featureTokens', () => {
    it('should add adjacent bigrams after the unigrams', () => {
      expect(featureTokens('port scan the router')).toEqual([
        'port',
        'scan',
        'router',
        'port_scan',
        'scan_router',
      ]);
    });

    it('should produce no bigram for a single word', () => {
      expect(featureTokens('hello')).toEqual(['hello']);
    });
  });

  describe('fnv1a', () => {
    it('should match the reference 32-bit values', () => {
      expect(fnv1a('')).toBe(0x811c9dc5);
      expect(fnv1a('a')).toBe(0xe40c292c);
    });

    it('should change with the seed', () => {
      expect(fnv1a('scan', 1)).not.toBe(fnv1a('scan'));
    });
  });

  describe('cosineSimilarity', () => {
    it('should be 1 for parallel vectors and 0 for orthogonal ones', () => {
      expect(cosineSimilarity([2, 0], [5, 0])).toBe(1);
      expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    });

    it('should be 0 when a vector has no magnitude', () => {
      expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it('should handle partial overlap', () => {
      expect(cosineSimilarity([1, 1], [1, 0])).toBeCloseTo(Math.SQRT1_2, 10);
    });
  });
});
