/**
 * Minimum-spacing rate limiter shared by every REST call site.
 */

import { ClockGuard } from "./clock";
import { DEFAULT_MIN_INTERVAL_MS } from "./constants";
import { sleep } from "./utils";

/**
 * Rate limiter configuration.
 */
export interface RateLimiterConfig {
  /** Minimum spacing between consecutive sends (default: 100) */
  minIntervalMs?: number;
  /** Clock used to measure spacing */
  clock?: ClockGuard;
  /** Sleep implementation */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Serializes permits so that consecutive sends are at least
 * `minIntervalMs` apart.
 *
 * Callers queue on a promise chain and run the
 * read-compute-sleep-update sequence one at a time, in arrival order.
 * Callers are delayed, never rejected. The network send happens after
 * `acquire()` resolves, outside the critical section.
 *
 * One instance is meant to be shared by every pipeline talking to the same
 * account.
 */
export class RateLimiter {
  readonly minIntervalMs: number;
  private readonly clock: ClockGuard;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private lastSentMs: number | null = null;
  private tail: Promise<void> = Promise.resolve();

  constructor(config: RateLimiterConfig = {}) {
    this.minIntervalMs = config.minIntervalMs ?? DEFAULT_MIN_INTERVAL_MS;
    if (!Number.isFinite(this.minIntervalMs) || this.minIntervalMs < 0) {
      throw new RangeError(`minIntervalMs must be >= 0, got ${this.minIntervalMs}`);
    }
    this.clock = config.clock ?? new ClockGuard();
    this.sleepFn = config.sleep ?? sleep;
  }

  /**
   * Wait until a send is permitted.
   */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.reserve());
    // The caller still sees a rejection; later callers must not.
    this.tail = turn.catch(() => undefined);
    return turn;
  }

  /**
   * Time of the last permitted send, or null if none yet.
   */
  lastSent(): number | null {
    return this.lastSentMs;
  }

  private async reserve(): Promise<void> {
    if (this.lastSentMs !== null) {
      const elapsed = this.clock.nowMs() - this.lastSentMs;
      const wait = Math.max(0, this.minIntervalMs - elapsed);
      if (wait > 0) {
        await this.sleepFn(wait);
      }
    }
    this.lastSentMs = this.clock.nowMs();
  }
}
