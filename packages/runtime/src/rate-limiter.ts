/**
 * Sliding-window admission control.
 *
 * Keeps the monotonic timestamps of admissions inside the trailing window.
 * A timestamp expires once `now - timestamp >= windowMs`.
 */

export interface RateLimiterConfig {
  /** Maximum admissions per window */
  maxRequests: number;
  /** Window size in milliseconds */
  windowMs: number;
}

export type AdmissionResult =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfter: number };

export class RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private timestamps: number[] = [];

  constructor(config: RateLimiterConfig) {
    this.maxRequests = config.maxRequests;
    this.windowMs = config.windowMs;
  }

  /**
   * Admit a request at `now`, recording it when allowed.
   * `retryAfter` is in whole seconds.
   */
  admit(now: number): AdmissionResult {
    this.prune(now);

    if (this.timestamps.length < this.maxRequests) {
      this.timestamps.push(now);
      return { allowed: true, remaining: this.maxRequests - this.timestamps.length };
    }

    return { allowed: false, retryAfter: this.retryAfter(now) };
  }

  /**
   * Seconds until the oldest admission leaves the window.
   */
  retryAfter(now: number): number {
    if (this.timestamps.length === 0) {
      return Math.floor(this.windowMs / 1000);
    }
    const oldest = this.timestamps[0];
    return Math.max(0, Math.floor((oldest + this.windowMs - now) / 1000));
  }

  /** Admissions currently inside the window (as of the last call) */
  get inWindow(): number {
    return this.timestamps.length;
  }

  private prune(now: number): void {
    const windowStart = now - this.windowMs;
    // Timestamps are appended in order, so expired ones form a prefix
    let expired = 0;
    while (expired < this.timestamps.length && this.timestamps[expired] <= windowStart) {
      expired++;
    }
    if (expired > 0) {
      this.timestamps = this.timestamps.slice(expired);
    }
  }
}
