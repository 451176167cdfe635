// Capabilities the pacing loop talks to. The interpreter never calls these.

export interface Tone {
  startTone(): void;
  stopTone(): void;
  isToneOn(): boolean;
}

export interface Screen {
  // 256 bytes: 8 bytes per row, 32 rows, MSB is the leftmost pixel
  drawBuffer(buffer: Uint8Array): void;
}

export interface HexKeyboard {
  currentPressedKey(): number | null;
}

export interface PeripheralSet {
  tone: Tone;
  screen: Screen;
  keyboard: HexKeyboard;
}

export class NullPeripherals implements Tone, Screen, HexKeyboard {
  private toneOn = false;

  startTone(): void { this.toneOn = true; }
  stopTone(): void { this.toneOn = false; }
  isToneOn(): boolean { return this.toneOn; }
  drawBuffer(): void {}
  currentPressedKey(): number | null { return null; }
}

export interface KeyHold {
  key: number;
  fromStep: number; // inclusive
  toStep: number; // exclusive
}

// Presses keys over fixed windows of steps. The scheduler polls once per step, so
// each poll counts as one step.
export class ScriptedKeyboard implements HexKeyboard {
  private polls = 0;

  constructor(private readonly holds: readonly KeyHold[]) {}

  currentPressedKey(): number | null {
    const step = this.polls++;
    const hold = this.holds.find(h => step >= h.fromStep && step < h.toStep);
    return hold ? hold.key : null;
  }
}

export function nullPeripheralSet(): PeripheralSet {
  const p = new NullPeripherals();
  return { tone: p, screen: p, keyboard: p };
}
