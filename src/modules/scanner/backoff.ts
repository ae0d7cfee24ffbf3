const MAX_BACKOFF_FACTOR = 60;

/**
 * Delay before the next scan after `consecutiveFailures` failed cycles in a
 * row: the regular sleep doubled per failure, capped at 60 regular sleeps.
 */
export function computeBackoffSeconds(sleepSeconds: number, consecutiveFailures: number): number {
  if (consecutiveFailures <= 0) {
    return sleepSeconds;
  }
  const factor = 2 ** Math.min(consecutiveFailures - 1, 30);
  return Math.min(sleepSeconds * factor, sleepSeconds * MAX_BACKOFF_FACTOR);
}
