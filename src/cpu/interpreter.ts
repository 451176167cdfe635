import type { Byte, Word } from '../emulator/types';
import { MachineSubroutineError, UnknownOpcodeError } from '../emulator/errors';
import type { Memory } from '../memory/memory';
import { loadFont } from '../memory/font';
import {
  DELAY_TIMER_ADDRESS,
  GLYPH_TABLE_ADDRESS,
  I_ADDRESS,
  KEY_PRESSED_FLAG,
  KEY_STATUS_ADDRESS,
  KEY_WAIT_REGISTER_ADDRESS,
  KEY_WAIT_STATE_ADDRESS,
  MEMORY_SIZE,
  PROGRAM_COUNTER_ADDRESS,
  PROGRAM_START_ADDRESS,
  STACK_POINTER_ADDRESS,
  STACK_START_ADDRESS,
  TONE_TIMER_ADDRESS,
} from '../memory/layout';
import { type Mnemonic, decode, disassemble, n, nn, nnn, x, y } from './opcodes';
import { clearDisplay, drawSprite } from './display';
import { CountdownTimer } from './timers';
import { type RandomSource, mathRandomSource } from './random';
import { type Clock, systemClock } from '../timing/clock';
import {
  assertIndexInRange,
  assertPcInProgramRange,
  assertStackNotEmpty,
  assertStackNotFull,
} from './diagnostics';
import { envFlag } from '../utils/env';
import { hex } from '../utils/hex';

// Hex-key wait (FX0A) progress, stored in the work area.
export const KeyWait = {
  Idle: 0,
  Waiting: 1,
  WaitingSeenPress: 2,
} as const;
export type KeyWaitState = (typeof KeyWait)[keyof typeof KeyWait];

// The speaker on the VIP does not respond to a tone timer below 2.
const MIN_AUDIBLE_TONE = 2;

export interface InterpreterOptions {
  random?: RandomSource;
  clock?: Clock;
  // Range and stack checks on every step (CHIP8_DIAGNOSTICS=1)
  diagnostics?: boolean;
  // Log each instruction before it executes (CHIP8_TRACE=1)
  trace?: boolean;
}

export interface InterpreterState {
  programCounter: Word;
  instruction: Word;
  index: Word;
  stackPointer: Word;
  delayTimer: Byte;
  toneTimer: Byte;
  keyStatus: Word;
  keyWait: KeyWaitState;
  registers: Uint8Array;
  display: Uint8Array;
}

export function formatState(s: InterpreterState): string {
  return `PC=${hex(s.programCounter, 4)} OP=${hex(s.instruction, 4)} I=${hex(s.index, 4)} SP=${hex(s.stackPointer, 4)} DT=${hex(s.delayTimer, 2)} ST=${hex(s.toneTimer, 2)} K=${hex(s.keyStatus, 4)}`;
}

function toKeyWaitState(raw: number): KeyWaitState {
  switch (raw) {
    case KeyWait.Waiting:
      return KeyWait.Waiting;
    case KeyWait.WaitingSeenPress:
      return KeyWait.WaitingSeenPress;
    default:
      return KeyWait.Idle;
  }
}

// Executes CHIP-8 instructions against a Memory. Everything a CHIP-8 program can
// observe lives in memory; the interpreter itself only owns the random source,
// the clock and the two timer expiries.
export class Chip8Interpreter {
  private readonly random: RandomSource;
  private readonly clock: Clock;
  private readonly diagnostics: boolean;
  private readonly trace: boolean;
  private readonly delayTimer = new CountdownTimer(DELAY_TIMER_ADDRESS);
  private readonly toneTimer = new CountdownTimer(TONE_TIMER_ADDRESS);

  constructor(opts: InterpreterOptions = {}) {
    this.random = opts.random ?? mathRandomSource;
    this.clock = opts.clock ?? systemClock;
    this.diagnostics = opts.diagnostics ?? envFlag('CHIP8_DIAGNOSTICS');
    this.trace = opts.trace ?? envFlag('CHIP8_TRACE');
  }

  get diagnosticsEnabled(): boolean {
    return this.diagnostics;
  }

  reset(memory: Memory): void {
    memory.zero(STACK_START_ADDRESS, MEMORY_SIZE);
    loadFont(memory);
    memory.write16(PROGRAM_COUNTER_ADDRESS, PROGRAM_START_ADDRESS);
    memory.write16(STACK_POINTER_ADDRESS, STACK_START_ADDRESS);
    this.delayTimer.reset();
    this.toneTimer.reset();
  }

  // Executes the instruction at PC (or one hex-key wait transition) and commits
  // the next program counter.
  step(memory: Memory): void {
    const pc = memory.read16(PROGRAM_COUNTER_ADDRESS);
    const instruction = memory.read16(pc);

    const now = this.clock.now();
    this.delayTimer.update(memory, now);
    this.toneTimer.update(memory, now);

    if (toKeyWaitState(memory.read8(KEY_WAIT_STATE_ADDRESS)) !== KeyWait.Idle) {
      this.advanceKeyWait(memory, pc);
      return;
    }

    if (this.trace) {
      // eslint-disable-next-line no-console
      console.log(`[TRACE] ${formatState(Chip8Interpreter.getState(memory))} ${disassemble(instruction)}`);
    }

    const def = decode(instruction);
    if (!def) {
      if ((instruction & 0xf000) === 0) throw new MachineSubroutineError(instruction, pc);
      throw new UnknownOpcodeError(instruction, pc);
    }

    const next = this.execute(memory, def.mnemonic, instruction, pc);
    this.commitPc(memory, next);
  }

  static isToneSounding(memory: Memory): boolean {
    return memory.read8(TONE_TIMER_ADDRESS) >= MIN_AUDIBLE_TONE;
  }

  static setCurrentKeyPress(memory: Memory, key: number | null): void {
    if (key === null) {
      memory.write16(KEY_STATUS_ADDRESS, 0);
      return;
    }
    if (!Number.isInteger(key) || key < 0 || key > 0x0f) {
      throw new RangeError(`Hex key ${key} is outside 0-F`);
    }
    memory.write16(KEY_STATUS_ADDRESS, KEY_PRESSED_FLAG | key);
  }

  static currentKeyPress(memory: Memory): number | null {
    const status = memory.read16(KEY_STATUS_ADDRESS);
    return (status & KEY_PRESSED_FLAG) !== 0 ? status & 0x0f : null;
  }

  static getState(memory: Memory): InterpreterState {
    const programCounter = memory.read16(PROGRAM_COUNTER_ADDRESS);
    return {
      programCounter,
      instruction: memory.read16(programCounter),
      index: memory.read16(I_ADDRESS),
      stackPointer: memory.read16(STACK_POINTER_ADDRESS),
      delayTimer: memory.read8(DELAY_TIMER_ADDRESS),
      toneTimer: memory.read8(TONE_TIMER_ADDRESS),
      keyStatus: memory.read16(KEY_STATUS_ADDRESS),
      keyWait: toKeyWaitState(memory.read8(KEY_WAIT_STATE_ADDRESS)),
      registers: memory.registers().slice(),
      display: memory.displayBuffer().slice(),
    };
  }

  private execute(memory: Memory, mnemonic: Mnemonic, op: Word, pc: Word): number {
    const v = memory.registers();
    const vx = v[x(op)];
    const vy = v[y(op)];
    const next = pc + 2;
    const skip = pc + 4;

    switch (mnemonic) {
      case 'CLS':
        clearDisplay(memory);
        return next;
      case 'RET': {
        if (this.diagnostics) assertStackNotEmpty(memory);
        const sp = memory.read16(STACK_POINTER_ADDRESS) - 2;
        memory.write16(STACK_POINTER_ADDRESS, sp);
        // The stack holds the address of the CALL itself.
        return memory.read16(sp) + 2;
      }
      case 'JP':
        return nnn(op);
      case 'CALL': {
        if (this.diagnostics) assertStackNotFull(memory);
        const sp = memory.read16(STACK_POINTER_ADDRESS);
        memory.write16(sp, pc);
        memory.write16(STACK_POINTER_ADDRESS, sp + 2);
        return nnn(op);
      }
      case 'SE_VX_NN':
        return vx === nn(op) ? skip : next;
      case 'SNE_VX_NN':
        return vx !== nn(op) ? skip : next;
      case 'SE_VX_VY':
        return vx === vy ? skip : next;
      case 'SNE_VX_VY':
        return vx !== vy ? skip : next;
      case 'SKP': {
        const key = Chip8Interpreter.currentKeyPress(memory);
        return key !== null && key === (vx & 0x0f) ? skip : next;
      }
      case 'SKNP': {
        const key = Chip8Interpreter.currentKeyPress(memory);
        return key === null || key !== (vx & 0x0f) ? skip : next;
      }
      case 'LD_VX_NN':
        v[x(op)] = nn(op);
        return next;
      case 'RND':
        v[x(op)] = this.random.nextByte() & nn(op);
        return next;
      case 'ADD_VX_NN':
        v[x(op)] = (vx + nn(op)) & 0xff;
        return next;
      case 'LD_VX_VY':
        v[x(op)] = vy;
        return next;
      case 'OR':
        v[x(op)] = vx | vy;
        return next;
      case 'AND':
        v[x(op)] = vx & vy;
        return next;
      case 'XOR':
        v[x(op)] = vx ^ vy;
        return next;
      case 'ADD_VX_VY': {
        const sum = vx + vy;
        v[x(op)] = sum & 0xff;
        v[0xf] = sum > 0xff ? 1 : 0;
        return next;
      }
      // VF = 1 means no borrow.
      case 'SUB':
        v[x(op)] = (vx - vy) & 0xff;
        v[0xf] = vx >= vy ? 1 : 0;
        return next;
      case 'SUBN':
        v[x(op)] = (vy - vx) & 0xff;
        v[0xf] = vy >= vx ? 1 : 0;
        return next;
      case 'SHR':
        v[x(op)] = vy >>> 1;
        v[0xf] = vy & 0x01;
        return next;
      case 'SHL':
        v[x(op)] = (vy << 1) & 0xff;
        v[0xf] = (vy >>> 7) & 0x01;
        return next;
      case 'LD_VX_DT':
        v[x(op)] = this.delayTimer.read(memory);
        return next;
      case 'LD_DT_VX':
        this.delayTimer.set(memory, vx, this.clock.now());
        return next;
      case 'LD_ST_VX':
        this.toneTimer.set(memory, vx, this.clock.now());
        return next;
      case 'LD_VX_K':
        memory.write8(KEY_WAIT_REGISTER_ADDRESS, x(op));
        memory.write8(KEY_WAIT_STATE_ADDRESS, KeyWait.Waiting);
        return pc;
      case 'LD_I':
        this.setIndex(memory, nnn(op));
        return next;
      case 'JP_V0':
        return (nnn(op) + v[0]) & 0xffff;
      case 'ADD_I_VX':
        this.setIndex(memory, (memory.read16(I_ADDRESS) + vx) & 0xffff);
        return next;
      case 'LD_F_VX':
        this.setIndex(memory, memory.read16(GLYPH_TABLE_ADDRESS + (vx & 0x0f) * 2));
        return next;
      case 'LD_B_VX': {
        const i = memory.read16(I_ADDRESS);
        memory.write8(i, Math.floor(vx / 100));
        memory.write8(i + 1, Math.floor(vx / 10) % 10);
        memory.write8(i + 2, vx % 10);
        return next;
      }
      case 'LD_MEM_VX': {
        const i = memory.read16(I_ADDRESS);
        const last = x(op);
        for (let r = 0; r <= last; r++) memory.write8(i + r, v[r]);
        this.setIndex(memory, (i + last + 1) & 0xffff);
        return next;
      }
      case 'LD_VX_MEM': {
        const i = memory.read16(I_ADDRESS);
        const last = x(op);
        for (let r = 0; r <= last; r++) v[r] = memory.read8(i + r);
        this.setIndex(memory, (i + last + 1) & 0xffff);
        return next;
      }
      case 'DRW': {
        const collided = drawSprite(memory, memory.read16(I_ADDRESS), vx, vy, n(op));
        v[0xf] = collided ? 1 : 0;
        return next;
      }
    }
  }

  // IDLE -> WAITING (FX0A) -> WAITING_SEEN_PRESS (key down) -> IDLE (key released).
  // PC stays on the FX0A instruction until the key is released.
  private advanceKeyWait(memory: Memory, pc: Word): void {
    const state = toKeyWaitState(memory.read8(KEY_WAIT_STATE_ADDRESS));
    const target = memory.read8(KEY_WAIT_REGISTER_ADDRESS) & 0x0f;
    const key = Chip8Interpreter.currentKeyPress(memory);

    if (key !== null) {
      memory.registers()[target] = key;
      if (state === KeyWait.Waiting) memory.write8(KEY_WAIT_STATE_ADDRESS, KeyWait.WaitingSeenPress);
      return;
    }

    if (state === KeyWait.WaitingSeenPress) {
      memory.write8(KEY_WAIT_STATE_ADDRESS, KeyWait.Idle);
      memory.write8(KEY_WAIT_REGISTER_ADDRESS, 0);
      this.commitPc(memory, pc + 2);
    }
  }

  private setIndex(memory: Memory, address: number): void {
    if (this.diagnostics) assertIndexInRange(address);
    memory.write16(I_ADDRESS, address);
  }

  private commitPc(memory: Memory, address: number): void {
    if (this.diagnostics) assertPcInProgramRange(address);
    memory.write16(PROGRAM_COUNTER_ADDRESS, address & 0xffff);
  }
}
