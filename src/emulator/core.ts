import { Memory } from '../memory/memory';
import { Chip8Interpreter, type InterpreterOptions } from '../cpu/interpreter';
import type { Rom } from '../rom/rom';
import type { IEmulator } from './types';

export class Emulator implements IEmulator {
  constructor(public readonly memory: Memory, public readonly interpreter: Chip8Interpreter) {}

  static fromProgram(program: ArrayLike<number>, opts: InterpreterOptions = {}): Emulator {
    const memory = new Memory();
    memory.loadProgram(program);
    const emu = new Emulator(memory, new Chip8Interpreter(opts));
    emu.reset();
    return emu;
  }

  static fromRom(rom: Rom, opts: InterpreterOptions = {}): Emulator {
    return Emulator.fromProgram(rom.bytes, opts);
  }

  reset(): void {
    this.interpreter.reset(this.memory);
  }

  stepInstruction(): void {
    this.interpreter.step(this.memory);
  }

  isToneSounding(): boolean {
    return Chip8Interpreter.isToneSounding(this.memory);
  }

  setKey(key: number | null): void {
    Chip8Interpreter.setCurrentKeyPress(this.memory, key);
  }

  displayBuffer(): Uint8Array {
    return this.memory.displayBuffer();
  }
}
