import type { Memory } from './memory';
import { GLYPH_BYTES, GLYPH_START_ADDRESS, GLYPH_TABLE_ADDRESS } from './layout';

// 4x5 hex digit glyphs, MSB-first; only the high nibble of each row is lit.
export const GLYPHS: readonly (readonly number[])[] = [
  [0xf0, 0x90, 0x90, 0x90, 0xf0], // 0
  [0x20, 0x60, 0x20, 0x20, 0x70], // 1
  [0xf0, 0x10, 0xf0, 0x80, 0xf0], // 2
  [0xf0, 0x10, 0xf0, 0x10, 0xf0], // 3
  [0x90, 0x90, 0xf0, 0x10, 0x10], // 4
  [0xf0, 0x80, 0xf0, 0x10, 0xf0], // 5
  [0xf0, 0x80, 0xf0, 0x90, 0xf0], // 6
  [0xf0, 0x10, 0x20, 0x40, 0x40], // 7
  [0xf0, 0x90, 0xf0, 0x90, 0xf0], // 8
  [0xf0, 0x90, 0xf0, 0x10, 0xf0], // 9
  [0xf0, 0x90, 0xf0, 0x90, 0x90], // A
  [0xe0, 0x90, 0xe0, 0x90, 0xe0], // B
  [0xf0, 0x80, 0x80, 0x80, 0xf0], // C
  [0xe0, 0x90, 0x90, 0x90, 0xe0], // D
  [0xf0, 0x80, 0xf0, 0x80, 0xf0], // E
  [0xf0, 0x80, 0xf0, 0x80, 0x80], // F
];

export function glyphAddress(digit: number): number {
  return GLYPH_START_ADDRESS + (digit & 0x0f) * GLYPH_BYTES;
}

// Writes the glyph bitmaps and the digit -> glyph address table.
export function loadFont(memory: Memory): void {
  GLYPHS.forEach((rows, digit) => {
    memory.load(rows, glyphAddress(digit));
    memory.write16(GLYPH_TABLE_ADDRESS + digit * 2, glyphAddress(digit));
  });
}
