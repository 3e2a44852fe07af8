import type { RandomSource } from './types';

export const mathRandomSource: RandomSource = {
  nextByte: () => Math.floor(Math.random() * 256) & 0xff,
};

// xorshift32; deterministic for a given seed. A zero seed would lock the generator at 0, so it is remapped.
export class SeededRandom implements RandomSource {
  private s: number;

  constructor(seed: number) {
    this.s = (seed >>> 0) || 0x9e3779b9;
  }

  nextByte(): number {
    let x = this.s;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.s = x >>> 0;
    return (this.s >>> 24) & 0xff;
  }
}

// Replays a fixed list of bytes, cycling when exhausted.
export class SequenceRandom implements RandomSource {
  private i = 0;

  constructor(private readonly bytes: readonly number[]) {
    if (bytes.length === 0) throw new Error('SequenceRandom needs at least one byte');
  }

  nextByte(): number {
    const v = this.bytes[this.i % this.bytes.length];
    this.i++;
    return v & 0xff;
  }
}

export function createRandomSource(seed: number | undefined): RandomSource {
  return seed === undefined ? mathRandomSource : new SeededRandom(seed);
}
