/**
 * Shared Library Exports
 * Common utilities used across the application
 */

export { createSupabaseAdmin } from './supabase.js';
export {
  tokenize,
  contentTokens,
  featureTokens,
  fnv1a,
  cosineSimilarity,
} from './text.js';
