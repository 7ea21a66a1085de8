/**
 * Small timing helpers shared by the REST and streaming clients.
 */

/**
 * Sleep for a duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Exponential backoff: `baseDelayMs * 2^(attempt - 1)`, capped at `maxDelayMs`.
 * `attempt` starts at 1.
 */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number
): number {
  const exponent = Math.max(0, Math.min(attempt - 1, 30));
  return Math.min(baseDelayMs * Math.pow(2, exponent), maxDelayMs);
}

/**
 * Backoff with jitter: 75-100% of the capped delay.
 */
export function jitteredDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  random: () => number = Math.random
): number {
  const capped = backoffDelay(attempt, baseDelayMs, maxDelayMs);
  const jitterRange = capped * 0.25;
  return capped - jitterRange + random() * jitterRange;
}

/**
 * Drop `undefined` and `null` entries and stringify the rest.
 */
export function toQueryParams(params: object): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      result[key] = String(value);
    }
  }
  return result;
}
