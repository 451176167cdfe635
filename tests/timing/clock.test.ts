import { describe, it, expect } from 'vitest';
import { ManualClock, systemClock } from '../../src/timing/clock';
import { SequenceRandomSource } from '../../src/cpu/random';

describe('ManualClock', () => {
  it('only moves when advanced', () => {
    const c = new ManualClock(10);
    expect(c.now()).toBe(10);
    c.advance(5.5);
    expect(c.now()).toBe(15.5);
    c.set(0);
    expect(c.now()).toBe(0);
  });

  it('refuses to go backwards', () => {
    expect(() => new ManualClock().advance(-1)).toThrow(RangeError);
  });

  it('system clock is monotonic', () => {
    const a = systemClock.now();
    const b = systemClock.now();
    expect(b).toBeGreaterThanOrEqual(a);
  });
});

describe('SequenceRandomSource', () => {
  it('replays and wraps its sequence', () => {
    const r = new SequenceRandomSource([1, 2, 0x1ff]);
    expect([r.nextByte(), r.nextByte(), r.nextByte(), r.nextByte()]).toEqual([1, 2, 0xff, 1]);
  });

  it('needs at least one byte', () => {
    expect(() => new SequenceRandomSource([])).toThrow(RangeError);
  });
});
