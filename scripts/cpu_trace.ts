#!/usr/bin/env tsx
/*
CPU trace generator: runs a ROM and emits one JSON line per instruction with the
pre-instruction CPU state.

Usage:
  tsx scripts/cpu_trace.ts --rom=path/to/game.ch8 [--maxSteps=1000] [--out=trace.jsonl] [--seed=N] [--text]

Each JSON line contains:
  { step, PC, OP, I, SP, DT, ST, V, asm }
--text writes the formatted trace lines instead of JSON.
*/
import fs from 'fs';
import { readRomFile } from '../src/rom/loader';
import { Emulator } from '../src/emulator/core';
import { loadConfig, parseNumber } from '../src/emulator/config';
import { disassemble, formatTraceLine, snapshotCpu } from '../src/tools/trace';
import { createLogger } from '../src/utils/log';

const log = createLogger('trace');

function parseArgs(argv: string[]) {
  const out: Record<string, string | boolean> = {};
  for (const a of argv) {
    const m = a.match(/^--([^=]+)=(.*)$/);
    if (m) out[m[1]] = m[2];
    else if (a.startsWith('--')) out[a.slice(2)] = true;
  }
  return out;
}

const str = (v: string | boolean | undefined): string | undefined => (typeof v === 'string' ? v : undefined);

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const romPath = str(args.rom);
  if (!romPath) {
    log.error('Usage: tsx scripts/cpu_trace.ts --rom=path/to/game.ch8 [--maxSteps=N] [--out=trace.jsonl] [--seed=N] [--text]');
    process.exit(2);
  }
  const maxSteps = Math.max(1, parseNumber(str(args.maxSteps)) ?? 1000);
  const outPath = str(args.out);
  const seed = parseNumber(str(args.seed));
  const config = loadConfig(process.env, seed !== undefined ? { seed: seed >>> 0 } : {});

  const emu = Emulator.fromRom(await readRomFile(romPath), { config });
  const lines: string[] = [];
  let failure: unknown = undefined;
  for (let step = 0; step < maxSteps; step++) {
    const snap = snapshotCpu(emu.cpu);
    lines.push(args.text === true ? formatTraceLine(snap) : JSON.stringify({ step, ...snap, asm: snap.OP < 0 ? null : disassemble(snap.OP) }));
    try {
      emu.stepInstruction();
    } catch (e) {
      failure = e;
      break;
    }
    // one timer tick per ipf instructions approximates the 60 Hz clock
    if ((step + 1) % config.instructionsPerFrame === 0) emu.tickTimers();
  }

  const text = lines.join('\n') + '\n';
  if (outPath) {
    fs.writeFileSync(outPath, text);
    log.info(`Wrote ${lines.length} steps to ${outPath}`);
  } else {
    process.stdout.write(text);
  }
  if (failure !== undefined) {
    log.error('stopped on CPU error:', failure);
    process.exit(1);
  }
}

main().catch((e) => {
  log.error('Unhandled error:', e);
  process.exit(1);
});
