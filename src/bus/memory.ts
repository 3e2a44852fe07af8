import type { IMemoryBus, Byte, Word } from '../emulator/types';
import { Chip8Error } from '../emulator/errors';

export const MEMORY_SIZE = 0x1000;
export const PROGRAM_START = 0x200;
export const MAX_ROM_SIZE = MEMORY_SIZE - PROGRAM_START;

// 4 KiB flat address space. Unlike a real bus there is no mirroring: every access outside
// 0x000-0xFFF is an OutOfBounds fault rather than a wrapped address.
export class Memory implements IMemoryBus {
  readonly bytes: Uint8Array;

  constructor(readonly size = MEMORY_SIZE) {
    this.bytes = new Uint8Array(size);
  }

  private check(addr: number, len: number): void {
    if (!Number.isInteger(addr) || addr < 0 || addr + len > this.size) {
      throw new Chip8Error('OutOfBounds', `memory access at 0x${addr.toString(16)} (+${len}) outside 0x000-0x${(this.size - 1).toString(16)}`, { addr });
    }
  }

  read8(addr: number): Byte {
    this.check(addr, 1);
    return this.bytes[addr];
  }

  read16(addr: number): Word {
    this.check(addr, 2);
    return ((this.bytes[addr] << 8) | this.bytes[addr + 1]) & 0xffff;
  }

  write8(addr: number, value: Byte): void {
    this.check(addr, 1);
    this.bytes[addr] = value & 0xff;
  }

  // Bulk copy used for font and ROM staging; checks the whole range before writing anything.
  load(addr: number, data: ArrayLike<number>): void {
    this.check(addr, data.length);
    this.bytes.set(data, addr);
  }

  slice(addr: number, len: number): Uint8Array {
    this.check(addr, len);
    return this.bytes.slice(addr, addr + len);
  }

  clear(): void {
    this.bytes.fill(0);
  }
}
