/**
 * Exponential backoff with jitter for remote reads that may briefly lag behind the API server.
 */

export interface BackoffPolicy {
  /** Delay before the second attempt. */
  initialDelayMs: number;
  /** Multiplier applied to the delay after each wait. */
  factor: number;
  /** Each wait is scaled by a random factor in [1 - jitter, 1 + jitter]. */
  jitter: number;
  /** Maximum number of attempts, the first included. */
  steps: number;
  /** Upper bound for the unjittered delay. */
  capMs: number;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  /** Returns a number in [0, 1). Defaults to Math.random. */
  random?: () => number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

/** Delay for the wait that follows attempt number `attempt` (1-based), before jitter. */
export function backoffDelay(policy: BackoffPolicy, attempt: number): number {
  let delay = policy.initialDelayMs;
  for (let i = 1; i < attempt; i++) {
    delay = Math.min(delay * policy.factor, policy.capMs);
  }
  return Math.min(delay, policy.capMs);
}

/**
 * Calls fn until it resolves, it throws an error isRetriable rejects, or policy.steps attempts are used.
 * The last error is rethrown.
 */
export async function retryOnError<T>(
  policy: BackoffPolicy,
  isRetriable: (err: unknown) => boolean,
  fn: (attempt: number) => Promise<T>,
  hooks: RetryHooks = {}
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  const random = hooks.random ?? Math.random;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (!isRetriable(err) || attempt >= policy.steps) {
        throw err;
      }
      const base = backoffDelay(policy, attempt);
      const jittered = base * (1 + policy.jitter * (2 * random() - 1));
      await sleep(jittered);
    }
  }
}
