import * as fs from 'fs';
import * as path from 'path';
import { EmptyProgramError, ProgramTooLargeError } from '../emulator/errors';
import { MAX_PROGRAM_SIZE } from '../memory/layout';

// A raw CHIP-8 program image, validated to fit the program region.
export class Rom {
  private constructor(readonly name: string, readonly bytes: Uint8Array) {}

  static fromBytes(name: string, bytes: ArrayLike<number>): Rom {
    if (bytes.length === 0) throw new EmptyProgramError();
    if (bytes.length > MAX_PROGRAM_SIZE) throw new ProgramTooLargeError(bytes.length);
    return new Rom(name, Uint8Array.from(bytes));
  }

  get size(): number {
    return this.bytes.length;
  }

  // Name plus up to the first 10 bytes.
  describe(): string {
    const head = Array.from(this.bytes.subarray(0, 10), b => b.toString(16).padStart(2, '0'));
    return `${this.name}: [${head.join(' ')}]`;
  }
}

export function readRomFile(romPath: string): Rom {
  const raw = fs.readFileSync(romPath);
  return Rom.fromBytes(path.basename(romPath), new Uint8Array(raw));
}
