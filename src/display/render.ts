import * as fs from 'fs';
import * as path from 'path';
import { PNG } from 'pngjs';
import {
  DISPLAY_BYTES_PER_ROW,
  DISPLAY_HEIGHT_PIXELS,
  DISPLAY_WIDTH_PIXELS,
} from '../memory/layout';

export function pixelAt(display: Uint8Array, x: number, y: number): boolean {
  const byte = display[y * DISPLAY_BYTES_PER_ROW + (x >>> 3)];
  return ((byte >>> (7 - (x & 7))) & 1) === 1;
}

// One text line per display row.
export function renderDisplayText(display: Uint8Array, on = '#', off = '.'): string {
  const lines: string[] = [];
  for (let y = 0; y < DISPLAY_HEIGHT_PIXELS; y++) {
    let line = '';
    for (let x = 0; x < DISPLAY_WIDTH_PIXELS; x++) line += pixelAt(display, x, y) ? on : off;
    lines.push(line);
  }
  return lines.join('\n');
}

// White-on-black RGBA, each CHIP-8 pixel scaled to a scale x scale block.
export function renderDisplayRGBA(display: Uint8Array, scale = 1): Uint8Array {
  const s = Math.max(1, scale | 0);
  const width = DISPLAY_WIDTH_PIXELS * s;
  const height = DISPLAY_HEIGHT_PIXELS * s;
  const out = new Uint8Array(width * height * 4);
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const lit = pixelAt(display, Math.floor(x / s), Math.floor(y / s));
      const o = (y * width + x) * 4;
      const c = lit ? 0xff : 0x00;
      out[o] = c;
      out[o + 1] = c;
      out[o + 2] = c;
      out[o + 3] = 0xff;
    }
  }
  return out;
}

export async function writeDisplayPng(display: Uint8Array, outPath: string, scale = 8): Promise<string> {
  const s = Math.max(1, scale | 0);
  const width = DISPLAY_WIDTH_PIXELS * s;
  const height = DISPLAY_HEIGHT_PIXELS * s;
  const rgba = renderDisplayRGBA(display, s);
  const png = new PNG({ width, height });
  Buffer.from(rgba.buffer, rgba.byteOffset, rgba.byteLength).copy(png.data);

  fs.mkdirSync(path.dirname(path.resolve(outPath)), { recursive: true });
  await new Promise<void>((resolve, reject) => {
    const stream = fs.createWriteStream(outPath);
    png.pack().pipe(stream);
    stream.on('finish', () => resolve());
    stream.on('error', (e) => reject(e));
  });
  return outPath;
}
