import { setTimeout as delay } from 'node:timers/promises';

export interface BackoffPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/** Exponential delay for a zero-based attempt index, without jitter. */
export function computeBackoffDelay(attempt: number, policy: Pick<BackoffPolicy, 'baseDelayMs' | 'maxDelayMs'>): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt);
  return Math.min(policy.maxDelayMs, exponential);
}

/** Adds uniform jitter in `[0, baseDelayMs)`; `random` must return a value in `[0, 1)`. */
export function withJitter(delayMs: number, baseDelayMs: number, random: () => number = Math.random): number {
  return delayMs + Math.floor(random() * baseDelayMs);
}

export type RetryState<T> =
  | { phase: 'attempting'; attempt: number }
  | { phase: 'waiting'; attempt: number; delayMs: number; lastError: unknown }
  | { phase: 'succeeded'; attempt: number; value: T }
  | { phase: 'failed'; attempt: number; lastError: unknown; exhausted: boolean };

/**
 * Transition function of the retry loop. `attempt` counts from zero; a failure
 * on the last allowed attempt (or a non-retryable one) is terminal.
 */
export function nextRetryState<T>(
  current: { attempt: number },
  outcome: { ok: true; value: T } | { ok: false; error: unknown; retryable: boolean },
  policy: BackoffPolicy,
  random: () => number = Math.random
): RetryState<T> {
  if (outcome.ok) {
    return { phase: 'succeeded', attempt: current.attempt, value: outcome.value };
  }
  const isLast = current.attempt + 1 >= policy.maxAttempts;
  if (!outcome.retryable || isLast) {
    return { phase: 'failed', attempt: current.attempt, lastError: outcome.error, exhausted: outcome.retryable };
  }
  return {
    phase: 'waiting',
    attempt: current.attempt,
    delayMs: withJitter(computeBackoffDelay(current.attempt, policy), policy.baseDelayMs, random),
    lastError: outcome.error
  };
}

export interface RetryHooks {
  isRetryable: (error: unknown) => boolean;
  onRetry?: (attempt: number, delayMs: number, error: unknown) => void;
  sleep?: (ms: number) => Promise<unknown>;
  random?: () => number;
}

export type RetryResult<T> = Extract<RetryState<T>, { phase: 'succeeded' | 'failed' }>;

export async function runWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: BackoffPolicy,
  hooks: RetryHooks
): Promise<RetryResult<T>> {
  const sleep = hooks.sleep ?? ((ms: number) => delay(ms));
  let state: RetryState<T> = { phase: 'attempting', attempt: 0 };

  for (;;) {
    switch (state.phase) {
      case 'attempting': {
        let outcome: { ok: true; value: T } | { ok: false; error: unknown; retryable: boolean };
        try {
          outcome = { ok: true, value: await operation(state.attempt) };
        } catch (error) {
          outcome = { ok: false, error, retryable: hooks.isRetryable(error) };
        }
        state = nextRetryState(state, outcome, policy, hooks.random);
        break;
      }
      case 'waiting':
        hooks.onRetry?.(state.attempt, state.delayMs, state.lastError);
        await sleep(state.delayMs);
        state = { phase: 'attempting', attempt: state.attempt + 1 };
        break;
      case 'succeeded':
      case 'failed':
        return state;
    }
  }
}
