import type { Word } from '../emulator/types';
import { hex } from '../utils/hex';

export type Mnemonic =
  | 'CLS' | 'RET' | 'JP' | 'CALL'
  | 'SE_VX_NN' | 'SNE_VX_NN' | 'SE_VX_VY' | 'SNE_VX_VY'
  | 'LD_VX_NN' | 'ADD_VX_NN' | 'RND'
  | 'LD_VX_VY' | 'OR' | 'AND' | 'XOR' | 'ADD_VX_VY' | 'SUB' | 'SHR' | 'SUBN' | 'SHL'
  | 'LD_I' | 'JP_V0' | 'DRW'
  | 'SKP' | 'SKNP'
  | 'LD_VX_DT' | 'LD_VX_K' | 'LD_DT_VX' | 'LD_ST_VX'
  | 'ADD_I_VX' | 'LD_F_VX' | 'LD_B_VX' | 'LD_MEM_VX' | 'LD_VX_MEM';

export interface OpcodeDef {
  readonly mnemonic: Mnemonic;
  readonly mask: Word;
  readonly pattern: Word;
}

// Ordered decode table. The patterns are pairwise disjoint; the 0NNN machine
// subroutine family is not listed so that it stays disjoint from CLS/RET and is
// resolved by the decode fallback instead.
export const OPCODES: readonly OpcodeDef[] = [
  { mnemonic: 'CLS', mask: 0xffff, pattern: 0x00e0 },
  { mnemonic: 'RET', mask: 0xffff, pattern: 0x00ee },
  { mnemonic: 'JP', mask: 0xf000, pattern: 0x1000 },
  { mnemonic: 'CALL', mask: 0xf000, pattern: 0x2000 },
  { mnemonic: 'SE_VX_NN', mask: 0xf000, pattern: 0x3000 },
  { mnemonic: 'SNE_VX_NN', mask: 0xf000, pattern: 0x4000 },
  { mnemonic: 'SE_VX_VY', mask: 0xf00f, pattern: 0x5000 },
  { mnemonic: 'LD_VX_NN', mask: 0xf000, pattern: 0x6000 },
  { mnemonic: 'ADD_VX_NN', mask: 0xf000, pattern: 0x7000 },
  { mnemonic: 'LD_VX_VY', mask: 0xf00f, pattern: 0x8000 },
  { mnemonic: 'OR', mask: 0xf00f, pattern: 0x8001 },
  { mnemonic: 'AND', mask: 0xf00f, pattern: 0x8002 },
  { mnemonic: 'XOR', mask: 0xf00f, pattern: 0x8003 },
  { mnemonic: 'ADD_VX_VY', mask: 0xf00f, pattern: 0x8004 },
  { mnemonic: 'SUB', mask: 0xf00f, pattern: 0x8005 },
  { mnemonic: 'SHR', mask: 0xf00f, pattern: 0x8006 },
  { mnemonic: 'SUBN', mask: 0xf00f, pattern: 0x8007 },
  { mnemonic: 'SHL', mask: 0xf00f, pattern: 0x800e },
  { mnemonic: 'SNE_VX_VY', mask: 0xf00f, pattern: 0x9000 },
  { mnemonic: 'LD_I', mask: 0xf000, pattern: 0xa000 },
  { mnemonic: 'JP_V0', mask: 0xf000, pattern: 0xb000 },
  { mnemonic: 'RND', mask: 0xf000, pattern: 0xc000 },
  { mnemonic: 'DRW', mask: 0xf000, pattern: 0xd000 },
  { mnemonic: 'SKP', mask: 0xf0ff, pattern: 0xe09e },
  { mnemonic: 'SKNP', mask: 0xf0ff, pattern: 0xe0a1 },
  { mnemonic: 'LD_VX_DT', mask: 0xf0ff, pattern: 0xf007 },
  { mnemonic: 'LD_VX_K', mask: 0xf0ff, pattern: 0xf00a },
  { mnemonic: 'LD_DT_VX', mask: 0xf0ff, pattern: 0xf015 },
  { mnemonic: 'LD_ST_VX', mask: 0xf0ff, pattern: 0xf018 },
  { mnemonic: 'ADD_I_VX', mask: 0xf0ff, pattern: 0xf01e },
  { mnemonic: 'LD_F_VX', mask: 0xf0ff, pattern: 0xf029 },
  { mnemonic: 'LD_B_VX', mask: 0xf0ff, pattern: 0xf033 },
  { mnemonic: 'LD_MEM_VX', mask: 0xf0ff, pattern: 0xf055 },
  { mnemonic: 'LD_VX_MEM', mask: 0xf0ff, pattern: 0xf065 },
];

export function decode(instruction: Word): OpcodeDef | undefined {
  for (const def of OPCODES) {
    if ((instruction & def.mask) === def.pattern) return def;
  }
  return undefined;
}

// Operand fields of a CHIP-8 instruction word.
export const nnn = (op: Word): number => op & 0x0fff;
export const nn = (op: Word): number => op & 0x00ff;
export const n = (op: Word): number => op & 0x000f;
export const x = (op: Word): number => (op >>> 8) & 0x0f;
export const y = (op: Word): number => (op >>> 4) & 0x0f;

const h = (v: number, width: number) => '0x' + hex(v, width);
const v = (r: number) => 'V' + hex(r);

export function disassemble(op: Word): string {
  const def = decode(op);
  if (!def) {
    return (op & 0xf000) === 0 ? `SYS ${h(nnn(op), 3)}` : `DW ${h(op, 4)}`;
  }
  switch (def.mnemonic) {
    case 'CLS': return 'CLS';
    case 'RET': return 'RET';
    case 'JP': return `JP ${h(nnn(op), 3)}`;
    case 'CALL': return `CALL ${h(nnn(op), 3)}`;
    case 'SE_VX_NN': return `SE ${v(x(op))}, ${h(nn(op), 2)}`;
    case 'SNE_VX_NN': return `SNE ${v(x(op))}, ${h(nn(op), 2)}`;
    case 'SE_VX_VY': return `SE ${v(x(op))}, ${v(y(op))}`;
    case 'SNE_VX_VY': return `SNE ${v(x(op))}, ${v(y(op))}`;
    case 'LD_VX_NN': return `LD ${v(x(op))}, ${h(nn(op), 2)}`;
    case 'ADD_VX_NN': return `ADD ${v(x(op))}, ${h(nn(op), 2)}`;
    case 'RND': return `RND ${v(x(op))}, ${h(nn(op), 2)}`;
    case 'LD_VX_VY': return `LD ${v(x(op))}, ${v(y(op))}`;
    case 'OR': return `OR ${v(x(op))}, ${v(y(op))}`;
    case 'AND': return `AND ${v(x(op))}, ${v(y(op))}`;
    case 'XOR': return `XOR ${v(x(op))}, ${v(y(op))}`;
    case 'ADD_VX_VY': return `ADD ${v(x(op))}, ${v(y(op))}`;
    case 'SUB': return `SUB ${v(x(op))}, ${v(y(op))}`;
    case 'SHR': return `SHR ${v(x(op))}, ${v(y(op))}`;
    case 'SUBN': return `SUBN ${v(x(op))}, ${v(y(op))}`;
    case 'SHL': return `SHL ${v(x(op))}, ${v(y(op))}`;
    case 'LD_I': return `LD I, ${h(nnn(op), 3)}`;
    case 'JP_V0': return `JP V0, ${h(nnn(op), 3)}`;
    case 'DRW': return `DRW ${v(x(op))}, ${v(y(op))}, ${n(op)}`;
    case 'SKP': return `SKP ${v(x(op))}`;
    case 'SKNP': return `SKNP ${v(x(op))}`;
    case 'LD_VX_DT': return `LD ${v(x(op))}, DT`;
    case 'LD_VX_K': return `LD ${v(x(op))}, K`;
    case 'LD_DT_VX': return `LD DT, ${v(x(op))}`;
    case 'LD_ST_VX': return `LD ST, ${v(x(op))}`;
    case 'ADD_I_VX': return `ADD I, ${v(x(op))}`;
    case 'LD_F_VX': return `LD F, ${v(x(op))}`;
    case 'LD_B_VX': return `LD B, ${v(x(op))}`;
    case 'LD_MEM_VX': return `LD [I], ${v(x(op))}`;
    case 'LD_VX_MEM': return `LD ${v(x(op))}, [I]`;
  }
}
