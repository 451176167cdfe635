import { DiagnosticError } from '../emulator/errors';
import type { Memory } from '../memory/memory';
import {
  MEMORY_START_ADDRESS,
  PROGRAM_LAST_ADDRESS,
  PROGRAM_START_ADDRESS,
  STACK_FULL_ADDRESS,
  STACK_POINTER_ADDRESS,
  STACK_START_ADDRESS,
} from '../memory/layout';
import { hex } from '../utils/hex';

export function assertPcInProgramRange(address: number): void {
  if (address < PROGRAM_START_ADDRESS || address > PROGRAM_LAST_ADDRESS) {
    throw new DiagnosticError(
      `Attempt to set program counter to address 0x${hex(address)} which is outside of CHIP-8 program address range.`,
    );
  }
}

// I must reach the glyphs, which lie below the program region.
export function assertIndexInRange(address: number): void {
  if (address < MEMORY_START_ADDRESS || address > PROGRAM_LAST_ADDRESS) {
    throw new DiagnosticError(`Attempt to set I address to 0x${hex(address)} which is outside of normal operating range.`);
  }
}

export function assertStackNotEmpty(memory: Memory): void {
  if (memory.read16(STACK_POINTER_ADDRESS) === STACK_START_ADDRESS) {
    throw new DiagnosticError('Cannot return when not in a subroutine. CHIP-8 subroutine stack is empty!');
  }
}

export function assertStackNotFull(memory: Memory): void {
  if (memory.read16(STACK_POINTER_ADDRESS) === STACK_FULL_ADDRESS) {
    throw new DiagnosticError('CHIP-8 stack overflow! COSMAC VIP only allows 12 levels of subroutine nesting.');
  }
}
