import { readRomFile } from '../src/rom/rom.ts';
import { Emulator } from '../src/emulator/core.ts';
import { Scheduler, isFatal } from '../src/emulator/scheduler.ts';
import { NullPeripherals, ScriptedKeyboard } from '../src/emulator/peripherals.ts';
import { ManualClock } from '../src/timing/clock.ts';
import { SequenceRandomSource, mathRandomSource } from '../src/cpu/random.ts';
import { Chip8Interpreter, formatState } from '../src/cpu/interpreter.ts';
import { renderDisplayText, writeDisplayPng } from '../src/display/render.ts';
import { frameHash } from '../src/utils/hash.ts';
import { parseHeadlessOptions } from '../src/cli/args.ts';

async function main() {
  const opts = parseHeadlessOptions(process.argv.slice(2));
  const { romPath, steps, instructionsPerSecond: ips, scale, outPath } = opts;

  if (!romPath) {
    console.error('Usage: npm run headless -- --rom=path/to/program.ch8 [--steps=600] [--ips=300] [--out=screen.png] [--scale=8] [--hold=5@100-140] [--text] [--diagnostics] [--seed=01,ff,...]');
    process.exit(1);
  }

  const rom = readRomFile(romPath);

  // Virtual time: the clock advances by one instruction interval per step, so runs are repeatable.
  const clock = new ManualClock();
  const random = opts.seed ? new SequenceRandomSource(opts.seed) : mathRandomSource;
  const emu = Emulator.fromRom(rom, { clock, random, diagnostics: opts.diagnostics });
  console.log(`[headless] ${rom.describe()} size=${rom.size} steps=${steps} ips=${ips} diagnostics=${emu.interpreter.diagnosticsEnabled}`);
  const peripherals = new NullPeripherals();
  const keyboard = new ScriptedKeyboard(opts.holds);
  const sched = new Scheduler(emu, { tone: peripherals, screen: peripherals, keyboard }, { instructionsPerSecond: ips, onError: 'record', clock });

  let toneSteps = 0;
  for (let i = 0; i < steps; i++) {
    clock.advance(sched.instructionIntervalMs);
    if (!sched.stepOnce()) break;
    if (peripherals.isToneOn()) toneSteps++;
  }

  const state = Chip8Interpreter.getState(emu.memory);
  console.log(`[headless] executed=${sched.instructionsExecuted} ${formatState(state)} toneSteps=${toneSteps} frame=${frameHash(state.display)}`);
  if (opts.text) console.log(renderDisplayText(state.display));
  if (outPath) {
    await writeDisplayPng(state.display, outPath, scale);
    console.log(`[headless] wrote ${outPath}`);
  }

  if (sched.lastError !== undefined && isFatal(sched.lastError)) process.exit(1);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
