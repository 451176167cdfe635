import { describe, it, expect, vi } from 'vitest';
import fc from 'fast-check';
import { assemble, boot } from './helpers/programKit';

// Loads VX and VY with immediates, then runs the 8XY_ operation.
function alu(op: number, a: number, b: number, xr = 1, yr = 2) {
  const m = boot(assemble(0x6000 | (xr << 8) | a, 0x6000 | (yr << 8) | b, 0x8000 | (xr << 8) | (yr << 4) | op));
  m.run(3);
  return { vx: m.v[xr], vy: m.v[yr], vf: m.v[0xf] };
}

describe('8XY_ register arithmetic', () => {
  it('ADD with carry: 0xFF + 0x03 = 0x02, VF=1', () => {
    expect(alu(0x4, 0xff, 0x03)).toMatchObject({ vx: 0x02, vf: 1 });
  });

  it('ADD without carry clears VF', () => {
    expect(alu(0x4, 0x10, 0x20)).toMatchObject({ vx: 0x30, vf: 0 });
  });

  it('SUB with no borrow: 0xF0 - 0x0F = 0xE1, VF=1', () => {
    expect(alu(0x5, 0xf0, 0x0f)).toMatchObject({ vx: 0xe1, vf: 1 });
  });

  it('SUB with borrow: 0x0F - 0xF0 = 0x1F, VF=0', () => {
    expect(alu(0x5, 0x0f, 0xf0)).toMatchObject({ vx: 0x1f, vf: 0 });
  });

  it('SUB of equal values reports no borrow', () => {
    expect(alu(0x5, 0x33, 0x33)).toMatchObject({ vx: 0x00, vf: 1 });
  });

  it('SUBN computes VY - VX', () => {
    expect(alu(0x7, 0x0f, 0xf0)).toMatchObject({ vx: 0xe1, vf: 1 });
    expect(alu(0x7, 0xf0, 0x0f)).toMatchObject({ vx: 0x1f, vf: 0 });
  });

  it('LD/OR/AND/XOR', () => {
    expect(alu(0x0, 0x12, 0x34).vx).toBe(0x34);
    expect(alu(0x1, 0xf0, 0x0c).vx).toBe(0xfc);
    expect(alu(0x2, 0xf0, 0x3c).vx).toBe(0x30);
    expect(alu(0x3, 0xff, 0x0f).vx).toBe(0xf0);
  });

  it('SHR shifts VY into VX with the low bit in VF', () => {
    expect(alu(0x6, 0x00, 0x05)).toEqual({ vx: 0x02, vy: 0x05, vf: 1 });
    expect(alu(0x6, 0xff, 0x04)).toEqual({ vx: 0x02, vy: 0x04, vf: 0 });
  });

  it('SHL shifts VY into VX with the high bit in VF', () => {
    expect(alu(0xe, 0x00, 0x81)).toEqual({ vx: 0x02, vy: 0x81, vf: 1 });
    expect(alu(0xe, 0x00, 0x41)).toEqual({ vx: 0x82, vy: 0x41, vf: 0 });
  });

  it('flag write wins when VF is the destination', () => {
    expect(alu(0x4, 0xff, 0x03, 0xf, 0x2).vf).toBe(1);
    expect(alu(0x5, 0x01, 0x02, 0xf, 0x2).vf).toBe(0);
  });

  it('ADD matches an 8-bit model', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 255 }), fc.integer({ min: 0, max: 255 }), (a, b) => {
        const r = alu(0x4, a, b);
        expect(r.vx).toBe((a + b) & 0xff);
        expect(r.vf).toBe(a + b > 0xff ? 1 : 0);
      }),
      { numRuns: 200 }
    );
  });

  it('SUB matches an 8-bit model with inverted borrow', () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: 255 }), fc.integer({ min: 0, max: 255 }), (a, b) => {
        const r = alu(0x5, a, b);
        expect(r.vx).toBe((a - b) & 0xff);
        expect(r.vf).toBe(a >= b ? 1 : 0);
      }),
      { numRuns: 200 }
    );
  });
});

describe('immediate operations', () => {
  it('7XNN wraps without touching VF', () => {
    const m = boot(assemble(0x6f07, 0x61fe, 0x7105));
    m.run(3);
    expect(m.v[1]).toBe(0x03);
    expect(m.v[0xf]).toBe(0x07);
  });

  it('CXNN masks the random byte', () => {
    const nextByte = vi.fn(() => 0).mockReturnValueOnce(0xab).mockReturnValueOnce(0xcd);
    const m = boot(assemble(0xc30f, 0xc4f0), { random: { nextByte } });
    m.run(2);
    expect(nextByte).toHaveBeenCalledTimes(2);
    expect(m.v[3]).toBe(0x0b);
    expect(m.v[4]).toBe(0xc0);
  });
});

describe('skips', () => {
  const cases: [string, number[], number][] = [
    ['3XNN equal skips', [0x6105, 0x3105], 0x206],
    ['3XNN unequal does not', [0x6105, 0x3106], 0x204],
    ['4XNN unequal skips', [0x6105, 0x4106], 0x206],
    ['4XNN equal does not', [0x6105, 0x4105], 0x204],
    ['5XY0 equal skips', [0x6105, 0x6205, 0x5120], 0x208],
    ['5XY0 unequal does not', [0x6105, 0x6206, 0x5120], 0x206],
    ['9XY0 unequal skips', [0x6105, 0x6206, 0x9120], 0x208],
    ['9XY0 equal does not', [0x6105, 0x6205, 0x9120], 0x206],
  ];
  for (const [name, words, pc] of cases) {
    it(name, () => {
      const m = boot(assemble(...words, 0x1200, 0x1200, 0x1200));
      m.run(words.length);
      expect(m.pc()).toBe(pc);
    });
  }
});
