import { performance } from "perf_hooks";

/**
 * Time source for window and TTL arithmetic. Always monotonic milliseconds;
 * wall-clock time is used only for display fields such as `lastRequestAt`.
 */
export interface Clock {
  now(): number;
}

export const monotonicClock: Clock = {
  now: () => performance.now(),
};

/**
 * Manually advanced clock for tests and simulations.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
