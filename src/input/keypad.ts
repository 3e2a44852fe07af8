import { Chip8Error } from '../emulator/errors';

export const KEY_COUNT = 16;

// 16-key hex keypad. The host writes key states between steps; the CPU only reads them.
export class Keypad {
  private state = new Uint8Array(KEY_COUNT);

  private check(key: number): void {
    if (!Number.isInteger(key) || key < 0 || key >= KEY_COUNT) {
      throw new Chip8Error('OutOfBounds', `keypad index ${key} outside 0-15`);
    }
  }

  setKey(key: number, pressed: boolean): void {
    this.check(key);
    this.state[key] = pressed ? 1 : 0;
  }

  // Partial update, e.g. { 0x5: true, 0xA: false }
  setKeys(keys: Partial<Record<number, boolean>>): void {
    for (const [k, v] of Object.entries(keys)) {
      if (v !== undefined) this.setKey(Number(k), v);
    }
  }

  isPressed(key: number): boolean {
    this.check(key);
    return this.state[key] !== 0;
  }

  // Lowest-numbered key currently held, or undefined when none is.
  firstPressed(): number | undefined {
    const idx = this.state.indexOf(1);
    return idx === -1 ? undefined : idx;
  }

  releaseAll(): void {
    this.state.fill(0);
  }

  snapshot(): boolean[] {
    return Array.from(this.state, (v) => v !== 0);
  }
}
