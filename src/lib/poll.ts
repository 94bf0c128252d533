export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export interface PollOptions {
  /** Seconds between consecutive probes. */
  interval: number;
  /** Total budget in seconds. */
  maxWait: number;
  /** Called before each probe after the first, with the seconds waited so far. */
  onRetry?: (waited: number, maxWait: number) => void;
  /** Stops polling with the signal's reason once aborted. */
  signal?: AbortSignal;
  sleep?: Sleep;
}

export interface PollResult {
  attempts: number;
  ok: boolean;
  waited: number;
}

/**
 * Number of probes a budget allows: ceil(maxWait / interval), never less than one.
 */
export function maxAttempts(interval: number, maxWait: number): number {
  if (interval <= 0) {
    return 1;
  }

  return Math.max(1, Math.ceil(maxWait / interval));
}

/**
 * Re-runs `probe` until it resolves true or the budget runs out. A probe that
 * throws counts as a failed attempt.
 */
export async function pollUntil(probe: () => Promise<boolean>, options: PollOptions): Promise<PollResult> {
  const wait = options.sleep ?? sleep;
  const limit = maxAttempts(options.interval, options.maxWait);

  for (let attempt = 1; attempt <= limit; attempt++) {
    const waited = (attempt - 1) * options.interval;
    if (attempt > 1) {
      // eslint-disable-next-line no-await-in-loop
      await wait(options.interval * 1000);
      options.onRetry?.(waited, options.maxWait);
    }

    options.signal?.throwIfAborted();

    // eslint-disable-next-line no-await-in-loop
    if (await attemptProbe(probe)) {
      return { attempts: attempt, ok: true, waited };
    }
  }

  return { attempts: limit, ok: false, waited: limit * options.interval };
}

async function attemptProbe(probe: () => Promise<boolean>): Promise<boolean> {
  try {
    return await probe();
  } catch {
    return false;
  }
}
