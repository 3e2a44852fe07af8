export type Byte = number; // 0..255
export type Word = number; // 0..65535

export interface IMemoryBus {
  readonly size: number;
  read8(addr: number): Byte;
  read16(addr: number): Word; // big-endian: high byte at addr
  write8(addr: number, value: Byte): void;
}

// Source of the byte consumed by Cxkk. Injected so runs can be replayed.
export interface RandomSource {
  nextByte(): Byte;
}

export interface IEmulator {
  reset(): void;
  stepInstruction(): void; // one fetch-decode-execute cycle
  tickTimers(): void; // 60 Hz timer clock, independent of stepInstruction
}
