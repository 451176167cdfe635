import { DISPLAY_SIZE } from '../memory/layout';

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

// FNV-1a digest of a 64x32 frame buffer, as 8 hex digits. Used by the headless
// runner and tests to compare whole frames.
export function frameHash(display: Uint8Array): string {
  if (display.length !== DISPLAY_SIZE) {
    throw new RangeError(`Frame buffer must be ${DISPLAY_SIZE} bytes, got ${display.length}`);
  }
  let digest = FNV_OFFSET_BASIS;
  for (const byte of display) {
    digest = Math.imul(digest ^ byte, FNV_PRIME) >>> 0;
  }
  return digest.toString(16).padStart(8, '0');
}
