/**
 * Millisecond clock used for request signing and pacing.
 */

/**
 * Wall-clock based timestamps that never go backwards within a process.
 *
 * If the underlying source steps back (NTP slew, manual change), the last
 * returned value is repeated until the source catches up. No attempt is made
 * to correct drift against the exchange.
 */
export class ClockGuard {
  private last = 0;

  constructor(private readonly source: () => number = Date.now) {}

  /** Current time in integer milliseconds, non-decreasing. */
  nowMs(): number {
    const now = Math.floor(this.source());
    if (now > this.last) {
      this.last = now;
    }
    return this.last;
  }
}
