export type BackoffPolicy = {
  baseDelayMs: number;
  maxDelayMs: number;
  /** ±20% of the capped delay. */
  jitter: boolean;
  /** Consecutive failures tolerated before giving up. */
  maxAttempts: number;
};

/**
 * Delay before reconnect attempt `attempt` (1-based):
 * `baseDelayMs * 2^(attempt - 1)`, capped at `maxDelayMs`.
 */
export function backoffDelay(policy: BackoffPolicy, attempt: number, random: () => number = Math.random): number {
  const exponent = Math.max(0, attempt - 1);
  const capped = Math.min(policy.baseDelayMs * Math.pow(2, exponent), policy.maxDelayMs);

  if (!policy.jitter) {
    return capped;
  }

  const jitterRange = capped * 0.2;
  return Math.max(0, Math.round(capped + (random() * jitterRange * 2 - jitterRange)));
}

/** Resolves `true` after `ms`, or `false` as soon as `signal` aborts. */
export function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) {
    return Promise.resolve(false);
  }

  return new Promise<boolean>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
