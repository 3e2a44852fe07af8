import type { Chip8 } from '../cpu/chip8';
import { decode } from '../cpu/decode';
import { formatInstruction } from '../cpu/instructions';
import { isChip8Error } from '../emulator/errors';

export interface CpuSnapshot {
  PC: number;
  OP: number;
  I: number;
  SP: number;
  DT: number;
  ST: number;
  V: number[];
}

const hx = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');

// Pre-instruction state: the opcode at PC is peeked without executing it.
// OP is -1 when PC is outside memory.
export function snapshotCpu(cpu: Chip8): CpuSnapshot {
  const s = cpu.state;
  let op = -1;
  if (s.PC >= 0 && s.PC + 1 < cpu.memory.size) op = cpu.memory.read16(s.PC);
  return { PC: s.PC, OP: op, I: s.I, SP: s.SP, DT: s.DT, ST: s.ST, V: Array.from(s.V) };
}

export function disassemble(op: number): string {
  try {
    return formatInstruction(decode(op));
  } catch (e) {
    if (isChip8Error(e, 'UnknownOpcode')) return '???';
    throw e;
  }
}

// e.g. "PC=0200 OP=6A02 I=0000 SP=0 DT=00 ST=00 V=00 00 ... 00  LD VA, 0x02"
export function formatTraceLine(snap: CpuSnapshot): string {
  const op = snap.OP < 0 ? '----' : hx(snap.OP, 4);
  const asm = snap.OP < 0 ? '' : `  ${disassemble(snap.OP)}`;
  const regs = snap.V.map((v) => hx(v, 2)).join(' ');
  return `PC=${hx(snap.PC, 4)} OP=${op} I=${hx(snap.I, 4)} SP=${snap.SP.toString(16).toUpperCase()} DT=${hx(snap.DT, 2)} ST=${hx(snap.ST, 2)} V=${regs}${asm}`;
}
