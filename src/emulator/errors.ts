import type { Word } from './types';
import { hex } from '../utils/hex';

export class Chip8Error extends Error {
  // Fatal errors leave interpreter state inconsistent; the caller must not keep stepping.
  readonly fatal: boolean = false;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class EmptyProgramError extends Chip8Error {
  constructor() {
    super('CHIP-8 program is empty!');
  }
}

export class ProgramTooLargeError extends Chip8Error {
  constructor(readonly size: number) {
    super(`CHIP-8 program with size ${size} bytes is too large!`);
  }
}

export class MemoryOverflowError extends Chip8Error {
  constructor(readonly offset: number, readonly length: number) {
    super(`Operation would cause a write beyond the end of RAM (offset 0x${hex(offset, 3)}, length ${length}).`);
  }
}

export class UnknownOpcodeError extends Chip8Error {
  override readonly fatal = true;

  constructor(readonly instruction: Word, readonly address: Word) {
    super(`Unknown CHIP-8 instruction 0x${hex(instruction, 4)} at 0x${hex(address, 3)}`);
  }
}

export class MachineSubroutineError extends Chip8Error {
  override readonly fatal = true;

  constructor(readonly instruction: Word, readonly address: Word) {
    super(`Machine language subroutine 0x${hex(instruction & 0x0fff, 3)} called at 0x${hex(address, 3)} cannot be executed`);
  }
}

// Raised only when diagnostics are enabled.
export class DiagnosticError extends Chip8Error {
  override readonly fatal = true;
}
