import type { Memory } from '../memory/memory';
import type { Millis } from '../emulator/types';

export const JIFFIES_PER_SECOND = 60;

// A 60 Hz countdown whose visible value lives at `address` in memory but which is
// driven by wall-clock time, so it does not drift when steps are not evenly paced.
export class CountdownTimer {
  private expiry: Millis | null = null;

  constructor(readonly address: number) {}

  get expiresAt(): Millis | null {
    return this.expiry;
  }

  reset(): void {
    this.expiry = null;
  }

  set(memory: Memory, jiffies: number, now: Millis): void {
    const value = jiffies & 0xff;
    memory.write8(this.address, value);
    // Millisecond granularity is enough here.
    this.expiry = value === 0 ? null : now + Math.floor((value * 1000) / JIFFIES_PER_SECOND);
  }

  update(memory: Memory, now: Millis): void {
    if (this.expiry === null) return;
    const remaining = this.expiry - now;
    if (remaining <= 0) {
      memory.write8(this.address, 0);
      this.expiry = null;
      return;
    }
    memory.write8(this.address, Math.floor((remaining * JIFFIES_PER_SECOND) / 1000));
  }

  read(memory: Memory): number {
    return memory.read8(this.address);
  }
}
