/**
 * Text helpers shared by the classifier and the local embedder
 */

const TOKEN_PATTERN = /[a-z0-9]+(?:[.:/-][a-z0-9]+)*/g;

/**
 * Words that carry no routing signal
 */
const STOP_WORDS = new Set([
  'a',
  'an',
  'the',
  'please',
  'can',
  'could',
  'would',
  'you',
  'me',
  'my',
  'for',
  'to',
  'of',
  'on',
  'and',
  'is',
  'are',
  'be',
  'i',
  'we',
]);

/**
 * Lowercase and split into word tokens. IPs, hostnames and paths stay whole.
 */
export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN_PATTERN) ?? [];
}

/**
 * Tokens with stop words removed
 */
export function contentTokens(text: string): string[] {
  return tokenize(text).filter((token) => !STOP_WORDS.has(token));
}

/**
 * Unigrams plus adjacent bigrams ("port scan" -> port, scan, port_scan)
 */
export function featureTokens(text: string): string[] {
  const tokens = contentTokens(text);
  const features = [...tokens];
  for (let i = 0; i + 1 < tokens.length; i++) {
    features.push(`${tokens[i]}_${tokens[i + 1]}`);
  }
  return features;
}

/**
 * 32-bit FNV-1a hash
 */
export function fnv1a(value: string, seed = 0x811c9dc5): number {
  let hash = seed >>> 0;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193) >>> 0;
  }
  return hash >>> 0;
}

/**
 * Cosine similarity; 0 when either vector has no magnitude
 */
export function cosineSimilarity(
  a: readonly number[],
  b: readonly number[]
): number {
  const length = Math.min(a.length, b.length);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}
