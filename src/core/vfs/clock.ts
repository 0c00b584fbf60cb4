export interface Clock {
  /** Seconds elapsed since the clock's origin. Never decreases. */
  now(): number;
}

/**
 * Monotonic clock anchored at construction time.
 */
export class MonotonicClock implements Clock {
  private readonly origin: bigint = process.hrtime.bigint();

  now(): number {
    const elapsed = process.hrtime.bigint() - this.origin;
    return Number(elapsed) / 1e9;
  }
}
