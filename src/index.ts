export * from './memory/layout';
export { Memory } from './memory/memory';
export { GLYPHS, glyphAddress, loadFont } from './memory/font';
export { Chip8Interpreter, KeyWait, formatState } from './cpu/interpreter';
export type { InterpreterOptions, InterpreterState, KeyWaitState } from './cpu/interpreter';
export { OPCODES, decode, disassemble } from './cpu/opcodes';
export type { Mnemonic, OpcodeDef } from './cpu/opcodes';
export { mathRandomSource, SequenceRandomSource } from './cpu/random';
export type { RandomSource } from './cpu/random';
export { ManualClock, systemClock } from './timing/clock';
export type { Clock } from './timing/clock';
export * from './emulator/errors';
export { Emulator } from './emulator/core';
export { Scheduler, DEFAULT_INSTRUCTIONS_PER_SECOND, isFatal } from './emulator/scheduler';
export type { CpuErrorMode, SchedulerOptions } from './emulator/scheduler';
export { NullPeripherals, ScriptedKeyboard, nullPeripheralSet } from './emulator/peripherals';
export type { HexKeyboard, KeyHold, PeripheralSet, Screen, Tone } from './emulator/peripherals';
export { Rom, readRomFile } from './rom/rom';
export { pixelAt, renderDisplayRGBA, renderDisplayText, writeDisplayPng } from './display/render';
export { frameHash } from './utils/hash';
