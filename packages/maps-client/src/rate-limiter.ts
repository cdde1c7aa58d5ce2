import { createLogger, type Logger } from '@wayfarer/logger';
import pLimit, { type LimitFunction } from 'p-limit';
import { z } from 'zod';

import { API_CATEGORIES, type Api, apiLabel } from './api';
import { MapsClientError } from './errors';
import { durationToString, rateToString } from './format';
import { sleep } from './retry';

/**
 * Budget and running totals for one API category. `firstRequestAt` is never reset: the limiter
 * compares the average rate since the first request against the budget.
 */
export interface ApiLimit {
  requests: number;
  perDurationMs: number;
  firstRequestAt: number | null;
  totalRequestCount: number;
}

export const RateLimitSettingSchema = z.object({
  api: z.enum(API_CATEGORIES),
  requests: z.number().int().positive(),
  perDurationMs: z.number().positive()
});

export type RateLimitSetting = z.infer<typeof RateLimitSettingSchema>;

export interface RateLimiterOptions {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Longest delay `setTimeout` accepts, rounded down to whole seconds.
 */
export const MAX_THROTTLE_MS = Math.floor((2 ** 31 - 1) / 1_000) * 1_000;

/**
 * How long a request must wait, in ms, given the state before it is counted:
 * whole seconds of `1 / target + (current - target)`.
 * With no time elapsed since the first request the current rate is undefined, so the wait is one
 * request interval (at least a second).
 */
export const computeThrottleMs = (limit: ApiLimit, now: number): number => {
  if (limit.firstRequestAt === null) {
    return 0;
  }

  const targetRate = limit.requests / (limit.perDurationMs / 1_000);
  const elapsedSeconds = (now - limit.firstRequestAt) / 1_000;

  if (elapsedSeconds <= 0) {
    return Math.min(Math.max(1, Math.round(1 / targetRate)) * 1_000, MAX_THROTTLE_MS);
  }

  const currentRate = limit.totalRequestCount / elapsedSeconds;
  const overrun = currentRate - targetRate;

  if (overrun <= 0) {
    return 0;
  }

  const sleepSeconds = Math.round(1 / targetRate + overrun);
  return Math.min(sleepSeconds * 1_000, MAX_THROTTLE_MS);
};

/**
 * Per-client registry of request budgets. Categories without a budget are never throttled.
 */
export class RateLimiter {
  private readonly limits = new Map<Api, ApiLimit>();
  private readonly gates = new Map<Api, LimitFunction>();
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(options: RateLimiterOptions = {}) {
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.log = options.logger ?? createLogger('rate-limiter');
  }

  /**
   * Registers a budget of `requests` per `perDurationMs` for `api`. Replacing an existing budget keeps
   * the counters already observed.
   */
  withRate(api: Api, requests: number, perDurationMs: number): this {
    const parsed = RateLimitSettingSchema.safeParse({ api, requests, perDurationMs });
    if (!parsed.success) {
      throw new MapsClientError(`Invalid rate limit for the ${apiLabel(api)} API`, 'INVALID_REQUEST', {
        details: parsed.error.flatten()
      });
    }

    const existing = this.limits.get(api);
    if (existing) {
      existing.requests = requests;
      existing.perDurationMs = perDurationMs;
    } else {
      this.limits.set(api, { requests, perDurationMs, firstRequestAt: null, totalRequestCount: 0 });
    }

    this.log.debug(
      { api, target: rateToString(requests, perDurationMs) },
      `Rate limit set for the ${apiLabel(api)} API`
    );
    return this;
  }

  snapshot(api: Api): ApiLimit | undefined {
    const limit = this.limits.get(api);
    return limit ? { ...limit } : undefined;
  }

  /**
   * Waits, if needed, to keep `api` within its budget and counts the request. Resolves to the ms slept.
   */
  async limit(api: Api): Promise<number> {
    const limit = this.limits.get(api);
    if (!limit) {
      return 0;
    }

    return this.gateFor(api)(() => this.throttle(api, limit));
  }

  /**
   * Checks each category in turn, so waits add up rather than overlap.
   */
  async limitApis(apis: Iterable<Api>): Promise<number> {
    let waitedMs = 0;
    for (const api of new Set(apis)) {
      waitedMs += await this.limit(api);
    }
    return waitedMs;
  }

  private gateFor(api: Api): LimitFunction {
    let gate = this.gates.get(api);
    if (!gate) {
      gate = pLimit(1);
      this.gates.set(api, gate);
    }
    return gate;
  }

  private async throttle(api: Api, limit: ApiLimit): Promise<number> {
    const now = this.now();

    if (limit.firstRequestAt === null) {
      this.log.trace({ api }, `Rate limiting is enabled for the ${apiLabel(api)} API`);
      limit.firstRequestAt = now;
      limit.totalRequestCount = 1;
      return 0;
    }

    const elapsedMs = now - limit.firstRequestAt;
    this.log.trace(
      {
        api,
        totalRequestCount: limit.totalRequestCount,
        current: rateToString(limit.totalRequestCount, elapsedMs),
        target: rateToString(limit.requests, limit.perDurationMs)
      },
      `${limit.totalRequestCount} requests to the ${apiLabel(api)} API in ${durationToString(elapsedMs)}`
    );

    const waitMs = computeThrottleMs(limit, now);
    if (waitMs > 0) {
      this.log.info({ api, waitMs }, `Sleeping for ${durationToString(waitMs)}`);
      await this.sleep(waitMs);
    }

    limit.totalRequestCount += 1;
    return waitMs;
  }
}
