/**
 * Exponential backoff with jitter, modelled as a small bounded state machine
 * so retry loops can be driven in tests without real time passing.
 */

export interface BackoffPolicy {
  initialDelayMs: number;
  maxDelayMs: number;
  factor: number;
  jitter: number; // 0..1, fraction of the delay that may be shaved off at random
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;
export type Random = () => number;

export type RetryStep =
  | { kind: 'retry'; retry: number; delayMs: number }
  | { kind: 'exhausted'; retries: number };

/**
 * Delay before the given retry (1-based). Never exceeds `maxDelayMs`.
 */
export function backoffDelay(policy: BackoffPolicy, retry: number, random: Random = Math.random): number {
  const exponential = policy.initialDelayMs * Math.pow(policy.factor, Math.max(0, retry - 1));
  const capped = Math.min(policy.maxDelayMs, exponential);
  return Math.round(capped * (1 - policy.jitter * random()));
}

export class RetrySchedule {
  private retries = 0;

  constructor(
    private readonly policy: BackoffPolicy,
    private readonly maxRetries: number,
    private readonly random: Random = Math.random
  ) {}

  get retriesUsed(): number {
    return this.retries;
  }

  /**
   * Advance the schedule. A server-supplied hint replaces the computed delay.
   */
  next(hintMs?: number): RetryStep {
    if (this.retries >= this.maxRetries) {
      return { kind: 'exhausted', retries: this.retries };
    }
    this.retries += 1;
    const delayMs = hintMs !== undefined && hintMs >= 0
      ? hintMs
      : backoffDelay(this.policy, this.retries, this.random);
    return { kind: 'retry', retry: this.retries, delayMs };
  }
}

/**
 * Resolves after `ms`, or as soon as `signal` aborts. Never rejects.
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
