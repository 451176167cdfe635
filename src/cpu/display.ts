import type { Memory } from '../memory/memory';
import {
  DISPLAY_BYTES_PER_ROW,
  DISPLAY_HEIGHT_PIXELS,
  DISPLAY_WIDTH_PIXELS,
} from '../memory/layout';

export function clearDisplay(memory: Memory): void {
  memory.displayBuffer().fill(0);
}

// XOR-draws `rows` sprite bytes read from spriteAddr at pixel (px, py).
// Sprites are clipped at the right and bottom edges rather than wrapped.
// Returns true when any lit pixel was turned off.
export function drawSprite(memory: Memory, spriteAddr: number, px: number, py: number, rows: number): boolean {
  if (px >= DISPLAY_WIDTH_PIXELS || py >= DISPLAY_HEIGHT_PIXELS) return false;

  const display = memory.displayBuffer();
  const byteCol = px >>> 3;
  const shift = px & 7;
  let collision = false;

  for (let r = 0; r < rows; r++) {
    const row = py + r;
    if (row >= DISPLAY_HEIGHT_PIXELS) break;
    const sprite = memory.read8(spriteAddr + r);
    const base = row * DISPLAY_BYTES_PER_ROW + byteCol;

    const left = sprite >>> shift;
    collision = (display[base] & left) !== 0 || collision;
    display[base] ^= left;

    // Unaligned sprites spill into the next byte unless already in the last column.
    if (shift !== 0 && byteCol < DISPLAY_BYTES_PER_ROW - 1) {
      const right = (sprite << (8 - shift)) & 0xff;
      collision = (display[base + 1] & right) !== 0 || collision;
      display[base + 1] ^= right;
    }
  }

  return collision;
}
