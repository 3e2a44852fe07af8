import { describe, it, expect } from 'vitest';
import { disassemble, formatTraceLine, snapshotCpu } from '../../src/tools/trace';
import { mkCpu } from '../helpers/chip8Kit';

describe('trace', () => {
  it('formats the pre-instruction state with its disassembly', () => {
    const cpu = mkCpu([0x6a02]);
    const zeros = new Array(16).fill('00').join(' ');
    expect(formatTraceLine(snapshotCpu(cpu))).toBe(`PC=0200 OP=6A02 I=0000 SP=0 DT=00 ST=00 V=${zeros}  LD VA, 0x02`);
    cpu.step();
    const snap = snapshotCpu(cpu);
    expect(snap.PC).toBe(0x202);
    expect(snap.V[0xa]).toBe(2);
  });

  it('marks a PC outside memory', () => {
    const cpu = mkCpu();
    cpu.state.PC = 0xfff;
    const snap = snapshotCpu(cpu);
    expect(snap.OP).toBe(-1);
    expect(formatTraceLine(snap).startsWith('PC=0FFF OP=---- ')).toBe(true);
    expect(formatTraceLine(snap).endsWith(new Array(16).fill('00').join(' '))).toBe(true);
  });

  it('disassembles unknown words as ???', () => {
    expect(disassemble(0x0123)).toBe('???');
    expect(disassemble(0x00e0)).toBe('CLS');
  });
});
