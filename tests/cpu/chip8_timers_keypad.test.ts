import { describe, it, expect } from 'vitest';
import { SequenceRandom } from '../../src/emulator/random';
import { mkCpu, exec } from '../helpers/chip8Kit';

describe('Chip8 timers', () => {
  it('Fx15 / Fx18 load the timers and Fx07 reads the delay timer back', () => {
    const cpu = mkCpu();
    cpu.state.V[1] = 30;
    cpu.state.V[2] = 4;
    exec(cpu, 0xf115);
    exec(cpu, 0xf218);
    expect(cpu.state.DT).toBe(30);
    expect(cpu.state.ST).toBe(4);
    exec(cpu, 0xf307);
    expect(cpu.state.V[3]).toBe(30);
  });

  it('step never decrements the timers', () => {
    const cpu = mkCpu([0x1200]);
    cpu.state.DT = 5;
    cpu.state.ST = 5;
    for (let i = 0; i < 50; i++) cpu.step();
    expect(cpu.state.DT).toBe(5);
    expect(cpu.state.ST).toBe(5);
  });

  it('tickTimers decrements each timer down to zero', () => {
    const cpu = mkCpu();
    cpu.state.DT = 2;
    cpu.state.ST = 1;
    expect(cpu.isSoundActive()).toBe(true);
    cpu.tickTimers();
    expect([cpu.state.DT, cpu.state.ST]).toEqual([1, 0]);
    expect(cpu.isSoundActive()).toBe(false);
    cpu.tickTimers();
    cpu.tickTimers();
    expect([cpu.state.DT, cpu.state.ST]).toEqual([0, 0]);
  });
});

describe('Chip8 keypad instructions', () => {
  it('Ex9E skips only while the key in Vx is held', () => {
    const cpu = mkCpu();
    cpu.state.V[1] = 0xa;
    exec(cpu, 0xe19e);
    expect(cpu.state.PC).toBe(0x202);
    cpu.keypad.setKey(0xa, true);
    exec(cpu, 0xe19e);
    expect(cpu.state.PC).toBe(0x206);
  });

  it('ExA1 skips only while the key in Vx is up', () => {
    const cpu = mkCpu();
    cpu.state.V[1] = 0x3;
    exec(cpu, 0xe1a1);
    expect(cpu.state.PC).toBe(0x204);
    cpu.keypad.setKey(0x3, true);
    exec(cpu, 0xe1a1);
    expect(cpu.state.PC).toBe(0x206);
  });

  it('Fx0A re-executes until a key is down, then stores the lowest key', () => {
    const cpu = mkCpu([0xf20a, 0x6501]);
    cpu.step();
    cpu.step();
    cpu.step();
    expect(cpu.state.PC).toBe(0x200);
    expect(cpu.state.V[2]).toBe(0);
    cpu.keypad.setKey(0x7, true);
    cpu.keypad.setKey(0x3, true);
    cpu.step();
    expect(cpu.state.V[2]).toBe(0x3);
    expect(cpu.state.PC).toBe(0x202);
    cpu.step();
    expect(cpu.state.V[5]).toBe(1);
  });
});

describe('Cxkk', () => {
  it('masks the injected random byte with kk', () => {
    const cpu = mkCpu([0xc30f, 0xc4f0], new SequenceRandom([0xab, 0xcd]));
    cpu.step();
    cpu.step();
    expect(cpu.state.V[3]).toBe(0x0b);
    expect(cpu.state.V[4]).toBe(0xc0);
  });
});
