/**
 * Sliding-window admission control for reasoning calls.
 *
 * One instance is shared by every query in the process. Admission is a
 * single synchronous check-and-record (`tryAcquire`), so two queries
 * interleaving on the event loop cannot jointly exceed the cap.
 */

export interface RateLimiterOptions {
  /** Calls admitted per window */
  maxCalls: number;
  windowSeconds: number;
  /** Clock in milliseconds; injectable for tests */
  now?: () => number;
}

export interface RateLimiterStatus {
  used: number;
  limit: number;
  remaining: number;
  windowSeconds: number;
}

export class RateLimiter {
  private readonly maxCalls: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  /** Admission timestamps, oldest first */
  private readonly admitted: number[] = [];

  constructor(opts: RateLimiterOptions) {
    if (opts.maxCalls < 1) throw new RangeError('maxCalls must be at least 1');
    if (opts.windowSeconds <= 0) throw new RangeError('windowSeconds must be positive');
    this.maxCalls = opts.maxCalls;
    this.windowMs = opts.windowSeconds * 1000;
    this.now = opts.now ?? Date.now;
  }

  canProceed(): boolean {
    this.evict(this.now());
    return this.admitted.length < this.maxCalls;
  }

  recordCall(): void {
    const now = this.now();
    this.evict(now);
    this.admitted.push(now);
  }

  /** Check and record in one step. Returns false without recording when the window is full. */
  tryAcquire(): boolean {
    const now = this.now();
    this.evict(now);
    if (this.admitted.length >= this.maxCalls) return false;
    this.admitted.push(now);
    return true;
  }

  /** Seconds until the next call would be admitted; 0 when one would be admitted now. */
  waitTime(): number {
    const now = this.now();
    this.evict(now);
    if (this.admitted.length < this.maxCalls) return 0;
    const oldest = this.admitted[0] ?? now;
    return Math.max(0, (oldest + this.windowMs - now) / 1000);
  }

  status(): RateLimiterStatus {
    this.evict(this.now());
    const used = this.admitted.length;
    return {
      used,
      limit: this.maxCalls,
      remaining: Math.max(0, this.maxCalls - used),
      windowSeconds: this.windowMs / 1000,
    };
  }

  private evict(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.admitted.length > 0 && (this.admitted[0] ?? now) <= cutoff) {
      this.admitted.shift();
    }
  }
}
