import { z } from 'zod';

import type { ClassifiedError } from './classified-error';

export type BackoffPolicy = {
  minDelayMs: number;
  factor: number;
  maxDelayMs: number;
  /** Total attempts, including the first one. */
  maxAttempts: number;
  /** Stop retrying once the next backoff would end past this many ms since the first attempt. */
  maxElapsedMs?: number;
};

export const BackoffPolicySchema = z.object({
  minDelayMs: z.number().nonnegative(),
  factor: z.number().min(1),
  maxDelayMs: z.number().nonnegative(),
  maxAttempts: z.number().int().min(1),
  maxElapsedMs: z.number().positive().optional()
});

export const DEFAULT_BACKOFF_POLICY: Readonly<BackoffPolicy> = {
  minDelayMs: 1_000,
  factor: 2,
  maxDelayMs: 60_000,
  maxAttempts: 4
};

export type RetryNotice<E> = {
  attempt: number;
  delayMs: number;
  error: E;
};

export interface RetryOptions<E> {
  classify: (error: unknown) => ClassifiedError<E>;
  policy?: Partial<BackoffPolicy>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  onRetry?: (notice: RetryNotice<E>) => void;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retry number `retry` (1-based).
 */
export const backoffDelayMs = (policy: BackoffPolicy, retry: number): number =>
  Math.min(policy.minDelayMs * policy.factor ** (retry - 1), policy.maxDelayMs);

/**
 * Runs `operation` until it resolves, its failure is classified permanent, or the policy is exhausted.
 * The last error is rethrown as-is; there is no separate "gave up" error.
 */
export const executeWithRetry = async <T, E>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions<E>
): Promise<T> => {
  const policy: BackoffPolicy = { ...DEFAULT_BACKOFF_POLICY, ...options.policy };
  const sleepImpl = options.sleep ?? sleep;
  const now = options.now ?? Date.now;
  const startedAt = now();

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      const classified = options.classify(error);

      if (classified.kind === 'permanent' || attempt >= policy.maxAttempts) {
        throw classified.error;
      }

      const delayMs = backoffDelayMs(policy, attempt);

      if (policy.maxElapsedMs !== undefined && now() - startedAt + delayMs > policy.maxElapsedMs) {
        throw classified.error;
      }

      options.onRetry?.({ attempt, delayMs, error: classified.error });
      await sleepImpl(delayMs);
    }
  }
};
