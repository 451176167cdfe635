export type Byte = number; // 0..255
export type Word = number; // 0..65535
export type Millis = number; // wall-clock milliseconds

export interface IEmulator {
  reset(): void;
  stepInstruction(): void; // one CHIP-8 instruction, or one hex-key wait transition
}
