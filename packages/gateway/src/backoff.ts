/**
 * Randomized exponential backoff: half the exponential step is fixed and the
 * other half random, capped at `maxMs`.
 */
export function computeBackoff(
  attempt: number,
  baseMs: number,
  maxMs: number,
  random: () => number = Math.random,
): number {
  const ceiling = Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt));
  return Math.round(ceiling / 2 + (random() * ceiling) / 2);
}

export const INVALID_SESSION_MIN_DELAY_MS = 1000;
export const INVALID_SESSION_MAX_DELAY_MS = 5000;

/** Delay before re-identifying after the server dropped the session. */
export function invalidSessionDelay(random: () => number = Math.random): number {
  return Math.round(
    INVALID_SESSION_MIN_DELAY_MS + random() * (INVALID_SESSION_MAX_DELAY_MS - INVALID_SESSION_MIN_DELAY_MS),
  );
}
