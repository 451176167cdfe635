import type { Byte, Word } from '../emulator/types';
import { EmptyProgramError, MemoryOverflowError, ProgramTooLargeError } from '../emulator/errors';
import {
  DISPLAY_SIZE,
  DISPLAY_START_ADDRESS,
  MAX_PROGRAM_SIZE,
  MEMORY_SIZE,
  PROGRAM_START_ADDRESS,
  V_REGISTERS_ADDRESS,
} from './layout';
import { hex } from '../utils/hex';

// Flat 4K address space of the COSMAC VIP. Memory only enforces flat bounds; which
// ranges are valid for PC or I is the interpreter's concern.
export class Memory {
  private readonly mem = new Uint8Array(MEMORY_SIZE);

  get capacity(): number {
    return this.mem.length;
  }

  // Copies bytes starting at offset. Nothing is written when the range does not fit.
  load(bytes: ArrayLike<number>, offset: number): void {
    this.checkRange(offset, bytes.length);
    this.mem.set(bytes, offset);
  }

  // Zero-fills [start, end).
  zero(start: number, end: number): void {
    this.checkRange(start, end - start);
    this.mem.fill(0, start, end);
  }

  loadProgram(program: ArrayLike<number>): void {
    if (program.length === 0) throw new EmptyProgramError();
    if (program.length > MAX_PROGRAM_SIZE) throw new ProgramTooLargeError(program.length);
    this.load(program, PROGRAM_START_ADDRESS);
  }

  read8(addr: number): Byte {
    this.checkAccess(addr, 1);
    return this.mem[addr];
  }

  write8(addr: number, value: Byte): void {
    this.checkAccess(addr, 1);
    this.mem[addr] = value & 0xff;
  }

  // Big-endian, as on the CDP1802.
  read16(addr: number): Word {
    this.checkAccess(addr, 2);
    return (this.mem[addr] << 8) | this.mem[addr + 1];
  }

  write16(addr: number, value: Word): void {
    this.checkAccess(addr, 2);
    this.mem[addr] = (value >>> 8) & 0xff;
    this.mem[addr + 1] = value & 0xff;
  }

  // Live views: writes through them mutate memory in place.
  registers(): Uint8Array {
    return this.mem.subarray(V_REGISTERS_ADDRESS, V_REGISTERS_ADDRESS + 16);
  }

  displayBuffer(): Uint8Array {
    return this.mem.subarray(DISPLAY_START_ADDRESS, DISPLAY_START_ADDRESS + DISPLAY_SIZE);
  }

  bytes(): Uint8Array {
    return this.mem.subarray(0);
  }

  private checkRange(offset: number, length: number): void {
    if (!Number.isInteger(offset) || offset < 0 || length < 0 || offset + length > this.mem.length) {
      throw new MemoryOverflowError(offset, length);
    }
  }

  private checkAccess(addr: number, width: number): void {
    if (addr < 0 || addr + width > this.mem.length) {
      throw new RangeError(`Memory access of ${width} byte(s) at 0x${hex(addr)} is out of bounds`);
    }
  }
}
