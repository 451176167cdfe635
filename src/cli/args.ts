import type { KeyHold } from '../emulator/peripherals';
import { parseFlag } from '../utils/env';

export interface HeadlessOptions {
  romPath?: string;
  steps: number;
  instructionsPerSecond: number;
  scale: number;
  outPath?: string;
  seed?: number[];
  // Left undefined when not given so the interpreter falls back to CHIP8_DIAGNOSTICS.
  diagnostics?: boolean;
  holds: KeyHold[];
  text: boolean;
}

// `--name=value` pairs; a bare `--name` reads as "1".
export function parseArgs(argv: readonly string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const a of argv) {
    const m = a.match(/^--([^=]+)(?:=(.*))?$/);
    if (m) out[m[1]] = m[2] ?? '1';
  }
  return out;
}

// KEY@FROM-TO, comma separated, e.g. 5@100-140,a@300-320
export function parseHolds(holds: string | undefined): KeyHold[] {
  if (!holds) return [];
  return holds.split(',').map((part) => {
    const m = part.trim().match(/^([0-9a-fA-F])@(\d+)-(\d+)$/);
    if (!m) throw new Error(`Bad --hold entry "${part}", expected KEY@FROM-TO`);
    return { key: parseInt(m[1], 16), fromStep: Number(m[2]), toStep: Number(m[3]) };
  });
}

function positive(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return raw !== undefined && Number.isFinite(n) ? Math.max(1, n) : fallback;
}

export function parseHeadlessOptions(argv: readonly string[]): HeadlessOptions {
  const args = parseArgs(argv);
  return {
    romPath: args.rom,
    steps: positive(args.steps, 600),
    instructionsPerSecond: positive(args.ips, 300),
    scale: positive(args.scale, 8),
    outPath: args.out,
    seed: args.seed ? args.seed.split(',').map((b) => parseInt(b, 16)) : undefined,
    diagnostics: args.diagnostics === undefined ? undefined : parseFlag(args.diagnostics),
    holds: parseHolds(args.hold),
    text: args.text !== undefined && parseFlag(args.text),
  };
}
