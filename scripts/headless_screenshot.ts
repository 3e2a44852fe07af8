#!/usr/bin/env tsx
/*
Runs a CHIP-8 ROM headlessly for a number of frames and writes the display as a PNG.

Usage:
  tsx scripts/headless_screenshot.ts --rom=path/to/game.ch8 [--out=screenshot.png] [--frames=120]
      [--ipf=10] [--scale=8] [--seed=N] [--onCpuError=throw|record|ignore] [--keys=5,A]

Environment: CHIP8_IPF, CHIP8_SEED, CHIP8_ON_CPU_ERROR, CHIP8_TRACE_EVERY, CHIP8_DEBUG.
*/
import fs from 'fs';
import { readRomFile } from '../src/rom/loader';
import { Emulator } from '../src/emulator/core';
import { Scheduler } from '../src/emulator/scheduler';
import { loadConfig, parseNumber, type Chip8Config } from '../src/emulator/config';
import { encodePNG } from '../src/display/renderer';
import { framebufferHash } from '../src/utils/hash';
import { createLogger } from '../src/utils/log';

const log = createLogger('screenshot');

function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const a of argv.slice(2)) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
  }
  return out;
}

function parseKeys(raw: string | undefined): number[] {
  if (!raw) return [];
  return raw.split(',').map((k) => parseInt(k.trim(), 16)).filter((k) => Number.isInteger(k) && k >= 0 && k <= 0xf);
}

async function main() {
  const args = parseArgs(process.argv);
  const romPath = args.rom || process.env.CHIP8_ROM;
  const outPath = args.out || 'screenshot.png';
  const frames = Math.max(1, parseNumber(args.frames) ?? 120);
  const scale = Math.max(1, parseNumber(args.scale) ?? 8);

  if (!romPath) {
    log.error('Usage: npm run screenshot -- --rom=path/to/game.ch8 [--out=out.png] [--frames=120] [--ipf=10] [--scale=8] [--seed=N] [--onCpuError=throw|record|ignore] [--keys=5,A]');
    process.exit(1);
  }

  const overrides: Partial<Chip8Config> = {};
  const ipf = parseNumber(args.ipf);
  if (ipf !== undefined && ipf >= 1) overrides.instructionsPerFrame = Math.floor(ipf);
  const seed = parseNumber(args.seed);
  if (seed !== undefined) overrides.seed = seed >>> 0;
  const mode = args.onCpuError;
  if (mode === 'throw' || mode === 'record' || mode === 'ignore') overrides.onCpuError = mode;
  const config = loadConfig(process.env, overrides);

  const rom = await readRomFile(romPath);
  log.info(`ROM: ${romPath} (${rom.length} bytes)  out: ${outPath}  frames: ${frames}  ipf: ${config.instructionsPerFrame}  scale: ${scale}  onCpuError=${config.onCpuError}`);

  const emu = Emulator.fromRom(rom, { config });
  for (const k of parseKeys(args.keys)) emu.keypad.setKey(k, true);
  const sched = new Scheduler(emu);

  try {
    for (let i = 0; i < frames && !sched.halted; i++) {
      sched.stepFrame();
      if (i % 60 === 59) log.debug(`stepped ${i + 1} frames`);
    }
  } catch (e) {
    log.error('CPU error during stepping:', e);
    // keep going so the frame at the point of failure is still written
  }
  if (sched.lastCpuError !== undefined) log.warn('last CPU error:', sched.lastCpuError);

  fs.writeFileSync(outPath, encodePNG(emu.framebuffer, { scale }));
  log.info(`Wrote ${outPath} after ${sched.frames} frames, ${sched.executed} instructions, ${emu.framebuffer.countLit()} lit pixels, hash=${framebufferHash(emu.framebuffer)}`);
}

main().catch((e) => {
  log.error('Unhandled error:', e);
  process.exit(1);
});
