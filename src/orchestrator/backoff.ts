/**
 * Exponential backoff for retrying the same agent
 *
 * delay = base * 2^(attempts - 1), capped at max
 */
export function computeBackoff(
  attempts: number,
  baseMs: number,
  maxMs: number
): number {
  if (baseMs <= 0) {
    return 0;
  }
  const exponent = Math.max(0, attempts - 1);
  return Math.min(maxMs, baseMs * 2 ** exponent);
}
