import type { ClockPort, RandomSourcePort } from '@rover/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Gives reproducible telemetry jitter in tests.
 */
export class SeededRng implements RandomSourcePort {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }
}

/**
 * Deterministic clock.
 * Advances by `tickMs` each call to `now()` starting from `epochMs`.
 */
export class DeterministicClock implements ClockPort {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 1_000,
  ) {
    this.currentMs = epochMs;
  }

  now(): Date {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  }
}

/** Wall-clock implementation for live serving. */
export const systemClock: ClockPort = {
  now: () => new Date(),
};

export const mathRandomSource: RandomSourcePort = {
  next: () => Math.random(),
};
