import type { Byte } from '../emulator/types';

export interface RandomSource {
  nextByte(): Byte;
}

export const mathRandomSource: RandomSource = {
  nextByte: () => Math.floor(Math.random() * 256) & 0xff,
};

// Replays a fixed byte sequence, wrapping around at the end.
export class SequenceRandomSource implements RandomSource {
  private index = 0;

  constructor(private readonly sequence: readonly Byte[]) {
    if (sequence.length === 0) throw new RangeError('SequenceRandomSource needs at least one byte');
  }

  nextByte(): Byte {
    const value = this.sequence[this.index % this.sequence.length];
    this.index++;
    return value & 0xff;
  }
}
