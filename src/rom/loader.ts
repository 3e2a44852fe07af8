import { open } from 'fs/promises';
import { Chip8Error } from '../emulator/errors';
import { MAX_ROM_SIZE } from '../bus/memory';

export function validateRom(rom: ArrayLike<number>): void {
  if (rom.length > MAX_ROM_SIZE) {
    throw new Chip8Error('RomTooLarge', `ROM is ${rom.length} bytes, limit is ${MAX_ROM_SIZE}`);
  }
}

export type RomChunk = Uint8Array | string;

// Collects a ROM from a chunked source such as a Readable. Stops reading as soon as the
// image exceeds the address space. With expectedLength, an early end of stream is TruncatedSource.
export async function readRom(source: AsyncIterable<RomChunk>, expectedLength?: number): Promise<Uint8Array> {
  if (expectedLength !== undefined) validateRom({ length: expectedLength });
  const chunks: Uint8Array[] = [];
  let total = 0;
  for await (const chunk of source) {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'binary') : chunk;
    total += bytes.length;
    validateRom({ length: total });
    chunks.push(bytes);
  }
  if (expectedLength !== undefined && total < expectedLength) {
    throw new Chip8Error('TruncatedSource', `source ended after ${total} of ${expectedLength} bytes`);
  }
  const out = new Uint8Array(total);
  let off = 0;
  for (const c of chunks) {
    out.set(c, off);
    off += c.length;
  }
  return out;
}

export interface RomReader {
  stat(): Promise<{ size: number }>;
  read(buffer: Uint8Array, offset: number, length: number, position: number): Promise<{ bytesRead: number }>;
}

// The OS may hand back fewer bytes than asked for, so keep reading into the remaining
// part of the buffer until the file is complete. A zero-byte read before then means the file shrank.
export async function readRomFrom(reader: RomReader): Promise<Uint8Array> {
  const { size } = await reader.stat();
  validateRom({ length: size });
  const rom = new Uint8Array(size);
  let total = 0;
  while (total < size) {
    const { bytesRead } = await reader.read(rom, total, size - total, total);
    if (bytesRead === 0) {
      throw new Chip8Error('TruncatedSource', `read returned no data after ${total} of ${size} bytes`);
    }
    total += bytesRead;
  }
  return rom;
}

export async function readRomFile(path: string): Promise<Uint8Array> {
  const handle = await open(path, 'r');
  try {
    return await readRomFrom(handle);
  } finally {
    await handle.close();
  }
}
