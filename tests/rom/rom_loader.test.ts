import { describe, it, expect, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { MAX_ROM_SIZE, PROGRAM_START } from '../../src/bus/memory';
import { readRom, readRomFile, readRomFrom, validateRom, type RomReader } from '../../src/rom/loader';
import { asChip8Error, catchErrorAsync, expectChip8Error, mkCpu } from '../helpers/chip8Kit';

// Reader that hands out at most `chunk` bytes per call, like a slow file descriptor.
function partialReader(data: Uint8Array, chunk: number, reportedSize = data.length): RomReader {
  return {
    stat: async () => ({ size: reportedSize }),
    read: async (buffer, offset, length, position) => {
      const n = Math.max(0, Math.min(chunk, length, data.length - position));
      buffer.set(data.subarray(position, position + n), offset);
      return { bytesRead: n };
    },
  };
}

describe('ROM staging', () => {
  it('accepts a ROM that fills memory from 0x200 to the end', () => {
    expect(MAX_ROM_SIZE).toBe(4096 - 0x200);
    const cpu = mkCpu();
    const rom = new Uint8Array(MAX_ROM_SIZE).fill(0x5a);
    cpu.loadProgram(rom);
    expect(cpu.memory.read8(PROGRAM_START)).toBe(0x5a);
    expect(cpu.memory.read8(0xfff)).toBe(0x5a);
  });

  it('rejects a ROM one byte too large without touching memory', () => {
    const cpu = mkCpu();
    expectChip8Error(() => cpu.loadProgram(new Uint8Array(MAX_ROM_SIZE + 1).fill(1)), 'RomTooLarge');
    expect(cpu.memory.read8(PROGRAM_START)).toBe(0);
    expectChip8Error(() => validateRom({ length: MAX_ROM_SIZE + 1 }), 'RomTooLarge');
  });
});

describe('readRom (streams)', () => {
  it('concatenates chunks', async () => {
    const src = Readable.from([new Uint8Array([1, 2]), new Uint8Array([3]), new Uint8Array([4, 5, 6])]);
    expect(Array.from(await readRom(src))).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('fails with TruncatedSource when the stream ends early', async () => {
    const src = Readable.from([new Uint8Array([1, 2, 3])]);
    const err = asChip8Error(await catchErrorAsync(() => readRom(src, 8)));
    expect(err.code).toBe('TruncatedSource');
  });

  it('stops once the data exceeds the address space', async () => {
    const src = Readable.from([new Uint8Array(MAX_ROM_SIZE), new Uint8Array(1)]);
    const err = asChip8Error(await catchErrorAsync(() => readRom(src)));
    expect(err.code).toBe('RomTooLarge');
  });
});

describe('readRomFrom (partial reads)', () => {
  it('keeps reading until the whole file is in', async () => {
    const data = Uint8Array.from({ length: 100 }, (_, i) => i);
    const reader = partialReader(data, 7);
    const spy = vi.spyOn(reader, 'read');
    const rom = await readRomFrom(reader);
    expect(Array.from(rom)).toEqual(Array.from(data));
    expect(spy).toHaveBeenCalledTimes(15); // ceil(100 / 7)
  });

  it('reports TruncatedSource when a read returns nothing early', async () => {
    const reader = partialReader(new Uint8Array(10), 4, 16);
    const err = asChip8Error(await catchErrorAsync(() => readRomFrom(reader)));
    expect(err.code).toBe('TruncatedSource');
    expect(err.detail).toBe('read returned no data after 10 of 16 bytes');
  });

  it('rejects an oversized file before reading', async () => {
    const reader = partialReader(new Uint8Array(0), 1, MAX_ROM_SIZE + 1);
    const spy = vi.spyOn(reader, 'read');
    const err = asChip8Error(await catchErrorAsync(() => readRomFrom(reader)));
    expect(err.code).toBe('RomTooLarge');
    expect(spy).not.toHaveBeenCalled();
  });
});

describe('readRomFile', () => {
  it('loads a ROM from disk', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'chip8-rom-'));
    const file = path.join(dir, 'test.ch8');
    try {
      fs.writeFileSync(file, Buffer.from([0x00, 0xe0, 0x12, 0x00]));
      expect(Array.from(await readRomFile(file))).toEqual([0x00, 0xe0, 0x12, 0x00]);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
