import type { Millis } from '../emulator/types';

export interface Clock {
  now(): Millis;
}

export const systemClock: Clock = {
  now: () => performance.now(),
};

// Deterministic clock for tests and headless runs; only moves when advanced.
export class ManualClock implements Clock {
  constructor(private current: Millis = 0) {}

  now(): Millis {
    return this.current;
  }

  advance(ms: Millis): void {
    if (ms < 0) throw new RangeError('ManualClock cannot move backwards');
    this.current += ms;
  }

  set(ms: Millis): void {
    this.current = ms;
  }
}
