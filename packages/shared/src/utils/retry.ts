/**
 * @wp-promote/shared - Retry with fallback
 *
 * attempting(1..n) -> succeeded | degraded | failed
 *
 * The fallback is a second implementation of the same contract. It runs
 * once, after the primary has used up its attempts.
 */

import { RETRY_ATTEMPTS, RETRY_DELAY_MS } from '../constants/settings.js';
import { errorMessage } from '../errors/index.js';

export type RetryOutcome<T> =
  | { state: 'succeeded'; value: T; attempts: number }
  | { state: 'degraded'; value: T; attempts: number; cause: string }
  | { state: 'failed'; attempts: number; error: string };

export type RetryState<T> = { state: 'attempting'; attempt: number } | RetryOutcome<T>;

export interface FallbackPlan<T> {
  primary: () => Promise<T>;
  fallback?: () => Promise<T>;
  attempts?: number;
  delayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  onTransition?: (state: RetryState<T>) => void;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export async function runWithFallback<T>(plan: FallbackPlan<T>): Promise<RetryOutcome<T>> {
  const attempts = plan.attempts ?? RETRY_ATTEMPTS;
  const delayMs = plan.delayMs ?? RETRY_DELAY_MS;
  const wait = plan.sleep ?? sleep;
  const emit = plan.onTransition ?? (() => {});

  let lastError = 'no attempts made';

  for (let attempt = 1; attempt <= attempts; attempt++) {
    emit({ state: 'attempting', attempt });
    try {
      const value = await plan.primary();
      const outcome: RetryOutcome<T> = { state: 'succeeded', value, attempts: attempt };
      emit(outcome);
      return outcome;
    } catch (error) {
      lastError = errorMessage(error);
      if (attempt < attempts) {
        await wait(delayMs);
      }
    }
  }

  if (plan.fallback) {
    try {
      const value = await plan.fallback();
      const outcome: RetryOutcome<T> = { state: 'degraded', value, attempts, cause: lastError };
      emit(outcome);
      return outcome;
    } catch (error) {
      lastError = `${lastError}; fallback: ${errorMessage(error)}`;
    }
  }

  const outcome: RetryOutcome<T> = { state: 'failed', attempts, error: lastError };
  emit(outcome);
  return outcome;
}
