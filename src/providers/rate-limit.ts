/**
 * RepoPulse — GitHub Rate Limit Gate
 *
 * Client-owned quota bookkeeping. Every request passes beforeRequest(),
 * every response (including error responses) feeds afterResponse().
 * Concurrent updates are last-write-wins; GitHub's own counter is authoritative.
 */

import { setTimeout as delay } from 'timers/promises';
import { logger } from '../lib/logger';

export type HeaderBag = Record<string, string | number | undefined>;

export interface RateLimitSnapshot {
  remaining: number;
  /** Epoch seconds when the quota resets, if known */
  resetAt: number | null;
}

export interface RateLimiterOptions {
  /** Sleep when remaining quota drops below this */
  lowWaterMark?: number;
  /** Added to the wait past the reset time */
  safetyMarginMs?: number;
  initialRemaining?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const log = logger.child({ component: 'rate-limit' });

function readHeaderNumber(headers: HeaderBag, name: string): number | null {
  const raw = headers[name] ?? headers[name.toLowerCase()];
  if (raw === undefined) return null;
  const value = typeof raw === 'number' ? raw : Number.parseInt(raw, 10);
  return Number.isFinite(value) ? value : null;
}

export class RateLimiter {
  private remaining: number;
  private resetAt: number | null = null;
  private readonly lowWaterMark: number;
  private readonly safetyMarginMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions = {}) {
    this.lowWaterMark = options.lowWaterMark ?? 100;
    this.safetyMarginMs = options.safetyMarginMs ?? 5000;
    this.remaining = options.initialRemaining ?? 5000;
    this.sleep = options.sleep ?? (async (ms: number) => { await delay(ms); });
    this.now = options.now ?? Date.now;
  }

  /**
   * Wait out the reset window when the quota is nearly spent.
   * Returns the number of milliseconds slept.
   */
  async beforeRequest(): Promise<number> {
    if (this.remaining >= this.lowWaterMark || this.resetAt === null) return 0;

    const untilReset = Math.max(this.resetAt * 1000 - this.now(), 0);
    const waitMs = untilReset + this.safetyMarginMs;

    log.warn('Rate limit low, waiting for reset', {
      remaining: this.remaining,
      resetAt: new Date(this.resetAt * 1000).toISOString(),
      waitMs,
    });

    await this.sleep(waitMs);
    return waitMs;
  }

  afterResponse(headers: HeaderBag): void {
    const remaining = readHeaderNumber(headers, 'x-ratelimit-remaining');
    const reset = readHeaderNumber(headers, 'x-ratelimit-reset');

    if (remaining !== null) this.remaining = remaining;
    if (reset !== null) this.resetAt = reset;
  }

  snapshot(): RateLimitSnapshot {
    return { remaining: this.remaining, resetAt: this.resetAt };
  }
}
