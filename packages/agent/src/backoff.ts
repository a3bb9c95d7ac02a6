/**
 * Retry delays after failed polling cycles
 */

export interface BackoffOptions {
  /** Delay after the first failure in milliseconds (default: 60000) */
  initialDelay?: number;
  /** Upper bound for any delay in milliseconds (default: 900000) */
  maxDelay?: number;
  /** Growth factor per consecutive failure (default: 2) */
  multiplier?: number;
  /** Consecutive failures tolerated before giving up (default: unlimited) */
  maxAttempts?: number;
}

export const CYCLE_BACKOFF: Required<BackoffOptions> = {
  initialDelay: 60 * 1000,
  maxDelay: 15 * 60 * 1000,
  multiplier: 2,
  maxAttempts: Number.POSITIVE_INFINITY,
};

/**
 * Delay after `failures` consecutive failed cycles, or null once
 * `maxAttempts` failures have been retried
 */
export function retryDelay(failures: number, options: BackoffOptions = {}): number | null {
  const { initialDelay, maxDelay, multiplier, maxAttempts } = { ...CYCLE_BACKOFF, ...options };
  if (failures < 1) return 0;
  if (failures > maxAttempts) return null;
  return Math.min(initialDelay * multiplier ** (failures - 1), maxDelay);
}

export interface CycleBackoff {
  /** Record a failure; the delay before the next try, or null to give up */
  failed: () => number | null;
  /** Current run of consecutive failures */
  failures: () => number;
  /** Forget earlier failures */
  reset: () => void;
}

export function createCycleBackoff(options: BackoffOptions = {}): CycleBackoff {
  let failures = 0;

  return {
    failed: () => retryDelay(++failures, options),
    failures: () => failures,
    reset: () => {
      failures = 0;
    },
  };
}
