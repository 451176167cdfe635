import { setTimeout as sleepMs } from 'node:timers/promises';
import type { Emulator } from './core';
import { Chip8Error } from './errors';
import type { PeripheralSet } from './peripherals';
import { type Clock, systemClock } from '../timing/clock';
import { envNumber } from '../utils/env';
import { hex } from '../utils/hex';
import { PROGRAM_COUNTER_ADDRESS } from '../memory/layout';

export type CpuErrorMode = 'throw' | 'record';

export interface SchedulerOptions {
  instructionsPerSecond?: number; // CHIP8_IPS, default 300
  onError?: CpuErrorMode;
  clock?: Clock;
  sleep?: (ms: number) => Promise<unknown>;
}

export const DEFAULT_INSTRUCTIONS_PER_SECOND = 300;

// Drives the emulator at a fixed instruction rate and keeps the peripherals in
// sync between instructions: screen refresh, tone edges and the current hex key.
export class Scheduler {
  readonly instructionsPerSecond: number;
  public lastError: unknown | undefined;
  private readonly onError: CpuErrorMode;
  private readonly clock: Clock;
  private readonly sleep: (ms: number) => Promise<unknown>;
  private executed = 0;

  constructor(private readonly emu: Emulator, private readonly peripherals: PeripheralSet, opts: SchedulerOptions = {}) {
    const ips = opts.instructionsPerSecond ?? envNumber('CHIP8_IPS', DEFAULT_INSTRUCTIONS_PER_SECOND);
    if (!(ips > 0)) throw new RangeError(`instructionsPerSecond must be positive, got ${ips}`);
    this.instructionsPerSecond = ips;
    this.onError = opts.onError ?? 'throw';
    this.clock = opts.clock ?? systemClock;
    this.sleep = opts.sleep ?? ((ms: number) => sleepMs(ms));
  }

  get instructionIntervalMs(): number {
    return 1000 / this.instructionsPerSecond;
  }

  get instructionsExecuted(): number {
    return this.executed;
  }

  // Returns false when an error was recorded and execution must stop. Errors
  // raised while syncing peripherals are handled the same way as CPU errors.
  stepOnce(): boolean {
    try {
      this.emu.stepInstruction();
      this.executed++;
      this.syncPeripherals();
    } catch (e) {
      this.lastError = e;
      if (this.onError === 'throw') throw e;
      const pc = hex(this.emu.memory.read16(PROGRAM_COUNTER_ADDRESS), 4);
      const msg = e instanceof Error ? e.message : String(e);
      // eslint-disable-next-line no-console
      console.log(`[SCHED] stopped after ${this.executed} instructions at PC=${pc}: ${msg}`);
      return false;
    }
    return true;
  }

  private syncPeripherals(): void {
    const { screen, tone, keyboard } = this.peripherals;
    screen.drawBuffer(this.emu.displayBuffer());

    const shouldSound = this.emu.isToneSounding();
    if (shouldSound && !tone.isToneOn()) tone.startTone();
    else if (!shouldSound && tone.isToneOn()) tone.stopTone();

    this.emu.setKey(keyboard.currentPressedKey());
  }

  // Runs up to `count` instructions back to back, without pacing.
  runInstructions(count: number): number {
    const start = this.executed;
    for (let i = 0; i < count; i++) {
      if (!this.stepOnce()) break;
    }
    return this.executed - start;
  }

  // Runs in real time until aborted or until an error stops execution.
  async run(signal?: AbortSignal): Promise<number> {
    this.lastError = undefined;
    const startedAt = this.clock.now();
    const start = this.executed;
    while (!signal?.aborted) {
      if (!this.stepOnce()) break;
      const target = startedAt + (this.executed - start) * this.instructionIntervalMs;
      const wait = target - this.clock.now();
      if (wait > 0) await this.sleep(wait);
    }
    return this.executed - start;
  }
}

export function isFatal(e: unknown): boolean {
  return e instanceof Chip8Error ? e.fatal : true;
}
