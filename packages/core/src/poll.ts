/**
 * Fixed-interval polling against an injectable clock
 */

import type { Clock, PollingOptions } from './types';

export const DEFAULT_POLLING: PollingOptions = {
  intervalMs: 6_000,
  maxAttempts: 100,
};

export const systemClock: Clock = {
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface PollOutcome {
  satisfied: boolean;
  attempts: number;
}

/**
 * Run `check` until it returns true or the attempt budget is spent.
 *
 * The clock sleeps between attempts only, so a budget of N performs exactly
 * N checks and N - 1 sleeps.
 */
export async function pollUntil(
  check: (attempt: number) => Promise<boolean>,
  options: PollingOptions = DEFAULT_POLLING,
  clock: Clock = systemClock
): Promise<PollOutcome> {
  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    if (await check(attempt)) {
      return { satisfied: true, attempts: attempt };
    }
    if (attempt < options.maxAttempts) {
      await clock.sleep(options.intervalMs);
    }
  }

  return { satisfied: false, attempts: options.maxAttempts };
}
