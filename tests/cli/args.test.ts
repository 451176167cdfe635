import { describe, it, expect, afterEach, vi } from 'vitest';
import { parseArgs, parseHeadlessOptions, parseHolds } from '../../src/cli/args';
import { Emulator } from '../../src/emulator/core';
import { DiagnosticError } from '../../src/emulator/errors';
import { ManualClock } from '../../src/timing/clock';
import { assemble } from '../cpu/helpers/programKit';

describe('headless arguments', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads --name=value pairs and bare switches', () => {
    expect(parseArgs(['--rom=a.ch8', '--text', 'stray'])).toEqual({ rom: 'a.ch8', text: '1' });
  });

  it('applies defaults', () => {
    const o = parseHeadlessOptions(['--rom=a.ch8']);
    expect(o).toEqual({
      romPath: 'a.ch8',
      steps: 600,
      instructionsPerSecond: 300,
      scale: 8,
      outPath: undefined,
      seed: undefined,
      diagnostics: undefined,
      holds: [],
      text: false,
    });
  });

  it('parses seeds and key holds', () => {
    const o = parseHeadlessOptions(['--seed=01,ff', '--hold=5@100-140,a@3-4', '--steps=0']);
    expect(o.seed).toEqual([0x01, 0xff]);
    expect(o.holds).toEqual([
      { key: 5, fromStep: 100, toStep: 140 },
      { key: 10, fromStep: 3, toStep: 4 },
    ]);
    expect(o.steps).toBe(1);
    expect(() => parseHolds('g@1-2')).toThrow('Bad --hold entry "g@1-2", expected KEY@FROM-TO');
  });

  it('reads --diagnostics with the 1/true convention', () => {
    expect(parseHeadlessOptions(['--diagnostics']).diagnostics).toBe(true);
    expect(parseHeadlessOptions(['--diagnostics=true']).diagnostics).toBe(true);
    expect(parseHeadlessOptions(['--diagnostics=0']).diagnostics).toBe(false);
    expect(parseHeadlessOptions(['--diagnostics=false']).diagnostics).toBe(false);
  });

  it('leaves diagnostics to CHIP8_DIAGNOSTICS when the switch is absent', () => {
    vi.stubEnv('CHIP8_DIAGNOSTICS', 'false');
    const o = parseHeadlessOptions(['--rom=a.ch8']);
    // JP 0x100 is outside the program area and only faults with diagnostics on.
    const emu = Emulator.fromProgram(assemble(0x1100), { clock: new ManualClock(), diagnostics: o.diagnostics, trace: false });
    expect(emu.interpreter.diagnosticsEnabled).toBe(false);
    emu.stepInstruction();
    expect(emu.memory.read16(0xed0)).toBe(0x100);
  });

  it('turns diagnostics on from CHIP8_DIAGNOSTICS=1', () => {
    vi.stubEnv('CHIP8_DIAGNOSTICS', '1');
    const o = parseHeadlessOptions([]);
    const emu = Emulator.fromProgram(assemble(0x1100), { clock: new ManualClock(), diagnostics: o.diagnostics, trace: false });
    expect(emu.interpreter.diagnosticsEnabled).toBe(true);
    expect(() => emu.stepInstruction()).toThrow(DiagnosticError);
  });
});
