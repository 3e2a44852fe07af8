import type { Keypad } from './keypad';

// Conventional layout: the 4x4 hex pad sits on the left-hand block of a QWERTY keyboard.
//   1 2 3 C        1 2 3 4
//   4 5 6 D   <=   Q W E R
//   7 8 9 E        A S D F
//   A 0 B F        Z X C V
// Keys are KeyboardEvent.code values, so the mapping is layout independent.
export const DEFAULT_KEYMAP: Readonly<Record<string, number>> = {
  Digit1: 0x1, Digit2: 0x2, Digit3: 0x3, Digit4: 0xc,
  KeyQ: 0x4, KeyW: 0x5, KeyE: 0x6, KeyR: 0xd,
  KeyA: 0x7, KeyS: 0x8, KeyD: 0x9, KeyF: 0xe,
  KeyZ: 0xa, KeyX: 0x0, KeyC: 0xb, KeyV: 0xf,
};

export function keyCodeToKeypad(code: string, keymap: Readonly<Record<string, number>> = DEFAULT_KEYMAP): number | undefined {
  return Object.prototype.hasOwnProperty.call(keymap, code) ? keymap[code] : undefined;
}

// Applies a host key event; returns false for keys that are not part of the pad.
export function applyKeyEvent(
  keypad: Keypad,
  code: string,
  pressed: boolean,
  keymap: Readonly<Record<string, number>> = DEFAULT_KEYMAP,
): boolean {
  const key = keyCodeToKeypad(code, keymap);
  if (key === undefined) return false;
  keypad.setKey(key, pressed);
  return true;
}
