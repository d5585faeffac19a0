import { DEFAULT_FAILURE_BACKOFF_MS } from '../shared/constants.js';
import { addMs } from '../shared/utils.js';

/**
 * Delay before a domain that has failed `failureCount` times may be retried.
 * The last step of the schedule repeats for every later failure.
 */
export function backoffDelayMs(
  failureCount: number,
  schedule: readonly number[] = DEFAULT_FAILURE_BACKOFF_MS,
): number {
  if (schedule.length === 0) {
    return 0;
  }
  const step = Math.min(Math.max(failureCount, 1), schedule.length) - 1;
  return schedule[step] ?? 0;
}

export function computeRetryAfter(
  failureCount: number,
  now: Date,
  schedule: readonly number[] = DEFAULT_FAILURE_BACKOFF_MS,
): Date {
  return addMs(now, backoffDelayMs(failureCount, schedule));
}
