export interface RetrySchedule {
  maxDeliveryAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export function computeRetryDelayMs(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(baseDelayMs * 2 ** exponent, maxDelayMs);
}

/**
 * Distinct backoff delays for every attempt that can still be retried, ascending. Each delay gets
 * its own retry queue with a queue-level TTL, so every message in a retry queue expires in order.
 */
export function retryDelayTiersMs(schedule: RetrySchedule): number[] {
  const delays = new Set<number>();
  for (let attempt = 1; attempt < schedule.maxDeliveryAttempts; attempt += 1) {
    delays.add(computeRetryDelayMs(attempt, schedule.baseDelayMs, schedule.maxDelayMs));
  }
  return [...delays].sort((left, right) => left - right);
}
