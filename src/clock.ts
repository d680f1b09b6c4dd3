/**
 * Clock abstraction.
 *
 * - `now()` returns the current instant as a `Date`.
 * - `sleep(ms)` resolves after `ms` milliseconds of clock time.
 *
 * Polling loops take a `Clock` so tests can drive time without waiting.
 */
export interface Clock {
  now(): Date;
  sleep(ms: number): Promise<void>;
}

/** Real wall-clock backed by `Date.now()` and `setTimeout`. */
export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
  }
}

/**
 * Clock that only moves when slept on or advanced explicitly.
 * `sleep()` resolves immediately after advancing the clock.
 */
export class ManualClock implements Clock {
  private current: number;
  private readonly sleeps: number[] = [];

  constructor(start: Date) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): void {
    this.current += ms;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.current += Math.max(0, ms);
  }

  /** Durations passed to `sleep()` so far, in call order. */
  sleepCalls(): readonly number[] {
    return this.sleeps;
  }
}
