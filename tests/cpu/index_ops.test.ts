import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { assemble, boot } from './helpers/programKit';
import { GLYPHS, glyphAddress } from '../../src/memory/font';
import { GLYPH_TABLE_ADDRESS } from '../../src/memory/layout';

describe('index register operations', () => {
  it('ANNN sets I', () => {
    const m = boot(assemble(0xa456));
    m.run(1);
    expect(m.i()).toBe(0x456);
  });

  it('FX1E adds VX to I', () => {
    const m = boot(assemble(0xa3f0, 0x6520, 0xf51e));
    m.run(3);
    expect(m.i()).toBe(0x410);
  });

  it('FX1E wraps at 16 bits when diagnostics are off', () => {
    const m = boot(assemble(0x6aff, 0xfa1e), { diagnostics: false });
    m.memory.write16(0xed2, 0xffff);
    m.run(2);
    expect(m.i()).toBe(0x00fe);
  });

  it('FX29 points I at the glyph for the low nibble', () => {
    const m = boot(assemble(0x6c1b, 0xfc29));
    m.run(2);
    expect(m.i()).toBe(glyphAddress(0xb));
    expect(m.i()).toBe(55);
  });

  it('reset installs glyphs and the glyph address table', () => {
    const m = boot(assemble(0x1200));
    for (let d = 0; d < 16; d++) {
      expect(m.memory.read16(GLYPH_TABLE_ADDRESS + d * 2)).toBe(d * 5);
      expect(Array.from(m.memory.bytes().subarray(d * 5, d * 5 + 5))).toEqual(GLYPHS[d]);
    }
  });

  it('FX33 writes three decimal digits at I and leaves I alone', () => {
    const m = boot(assemble(0xa400, 0x6bfe, 0xfb33));
    m.run(3);
    expect(Array.from(m.memory.bytes().subarray(0x400, 0x403))).toEqual([2, 5, 4]);
    expect(m.i()).toBe(0x400);
  });

  it('FX33 matches a decimal model for every byte', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 255 }), (value) => {
        const m = boot(assemble(0xa400, 0x6000 | value, 0xf033));
        m.run(3);
        const [h, t, u] = Array.from(m.memory.bytes().subarray(0x400, 0x403));
        expect(h * 100 + t * 10 + u).toBe(value);
        expect(Math.max(h, t, u)).toBeLessThan(10);
      }),
      { numRuns: 100 }
    );
  });

  it('FX55 stores V0..VX and advances I by X+1', () => {
    const m = boot(assemble(0x6011, 0x6122, 0x6233, 0x6344, 0xa500, 0xf255));
    m.run(6);
    expect(Array.from(m.memory.bytes().subarray(0x500, 0x504))).toEqual([0x11, 0x22, 0x33, 0x00]);
    expect(m.i()).toBe(0x503);
  });

  it('FX65 loads V0..VX and advances I by X+1', () => {
    const m = boot(assemble(0xa500, 0xf165));
    m.memory.load([0x9a, 0xbc, 0xde], 0x500);
    m.run(2);
    expect(m.v[0]).toBe(0x9a);
    expect(m.v[1]).toBe(0xbc);
    expect(m.v[2]).toBe(0x00);
    expect(m.i()).toBe(0x502);
  });
});
