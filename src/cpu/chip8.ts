import type { RandomSource } from '../emulator/types';
import { Chip8Error } from '../emulator/errors';
import { createLogger, type Logger } from '../utils/log';
import { Memory, PROGRAM_START } from '../bus/memory';
import { validateRom } from '../rom/loader';
import { Framebuffer } from '../display/framebuffer';
import { Keypad } from '../input/keypad';
import { FONT, FONT_BASE, glyphAddress } from '../font/font';
import { mathRandomSource } from '../emulator/random';
import { decode } from './decode';
import type { Instruction } from './instructions';

export const REGISTER_COUNT = 16;
export const STACK_DEPTH = 16;
export const VF = 0xf;

export interface CPUState {
  V: Uint8Array; // V0..VF
  I: number;
  PC: number;
  SP: number; // index of the next free stack slot, 0..16
  stack: Uint16Array;
  DT: number; // delay timer
  ST: number; // sound timer
}

export interface Chip8Options {
  memory?: Memory;
  framebuffer?: Framebuffer;
  keypad?: Keypad;
  random?: RandomSource;
  logger?: Logger;
}

export class Chip8 {
  readonly memory: Memory;
  readonly framebuffer: Framebuffer;
  readonly keypad: Keypad;
  random: RandomSource;
  private log: Logger;

  state: CPUState = {
    V: new Uint8Array(REGISTER_COUNT),
    I: 0,
    PC: PROGRAM_START,
    SP: 0,
    stack: new Uint16Array(STACK_DEPTH),
    DT: 0,
    ST: 0,
  };

  constructor(opts: Chip8Options = {}) {
    this.memory = opts.memory ?? new Memory();
    this.framebuffer = opts.framebuffer ?? new Framebuffer();
    this.keypad = opts.keypad ?? new Keypad();
    this.random = opts.random ?? mathRandomSource;
    this.log = opts.logger ?? createLogger('chip8');
    this.reset();
  }

  reset(): void {
    const s = this.state;
    s.V.fill(0);
    s.stack.fill(0);
    s.I = 0;
    s.PC = PROGRAM_START;
    s.SP = 0;
    s.DT = 0;
    s.ST = 0;
    this.memory.clear();
    this.memory.load(FONT_BASE, FONT);
    this.framebuffer.clear();
    this.keypad.releaseAll();
  }

  // Copies a program to 0x200. The size check runs first so an oversized ROM leaves memory untouched.
  loadProgram(rom: ArrayLike<number>): void {
    validateRom(rom);
    this.memory.load(PROGRAM_START, rom);
    this.log.debug(`loaded ${rom.length} bytes at 0x${PROGRAM_START.toString(16)}`);
  }

  // 60 Hz clock, driven by the host independently of step().
  tickTimers(): void {
    if (this.state.DT > 0) this.state.DT--;
    if (this.state.ST > 0) this.state.ST--;
  }

  isSoundActive(): boolean {
    return this.state.ST > 0;
  }

  private fetch(): number {
    const pc = this.state.PC;
    if (pc < 0 || pc + 1 > this.memory.size - 1) {
      throw new Chip8Error('OutOfBounds', 'program counter outside memory', { pc });
    }
    return this.memory.read16(pc);
  }

  // One fetch-decode-execute cycle. PC is advanced before the handler runs, so a fault
  // leaves PC pointing past the faulting instruction.
  step(): void {
    const pc = this.state.PC;
    const op = this.fetch();
    this.state.PC = (pc + 2) & 0xffff;
    try {
      this.execute(decode(op));
    } catch (e) {
      throw e instanceof Chip8Error ? e.withContext({ pc, opcode: op }) : e;
    }
    if (this.log.debugEnabled) {
      this.log.debug(`${pc.toString(16).padStart(4, '0')}: ${op.toString(16).padStart(4, '0')}`);
    }
  }

  private skipIf(cond: boolean): void {
    if (cond) this.state.PC = (this.state.PC + 2) & 0xffff;
  }

  private reg(i: number): number {
    if (i < 0 || i >= REGISTER_COUNT) {
      throw new Chip8Error('OutOfBounds', `register index ${i} outside V0-VF`);
    }
    return this.state.V[i];
  }

  private setReg(i: number, value: number): void {
    if (i < 0 || i >= REGISTER_COUNT) {
      throw new Chip8Error('OutOfBounds', `register index ${i} outside V0-VF`);
    }
    this.state.V[i] = value & 0xff;
  }

  execute(ins: Instruction): void {
    const s = this.state;
    const V = s.V;
    switch (ins.op) {
      case 'CLS':
        this.framebuffer.clear();
        return;
      case 'RET':
        if (s.SP === 0) throw new Chip8Error('StackUnderflow', 'return with empty stack');
        s.SP--;
        s.PC = s.stack[s.SP];
        return;
      case 'JP':
        s.PC = ins.addr;
        return;
      case 'CALL':
        if (s.SP >= STACK_DEPTH) throw new Chip8Error('StackOverflow', `call nesting exceeds ${STACK_DEPTH} levels`);
        s.stack[s.SP] = s.PC;
        s.SP++;
        s.PC = ins.addr;
        return;
      case 'SE_IMM':
        this.skipIf(this.reg(ins.x) === ins.kk);
        return;
      case 'SNE_IMM':
        this.skipIf(this.reg(ins.x) !== ins.kk);
        return;
      case 'SE_REG':
        this.skipIf(this.reg(ins.x) === this.reg(ins.y));
        return;
      case 'SNE_REG':
        this.skipIf(this.reg(ins.x) !== this.reg(ins.y));
        return;
      case 'LD_IMM':
        this.setReg(ins.x, ins.kk);
        return;
      case 'ADD_IMM':
        this.setReg(ins.x, (this.reg(ins.x) + ins.kk) & 0xff);
        return;
      case 'LD_REG':
        this.setReg(ins.x, this.reg(ins.y));
        return;
      case 'OR':
        this.setReg(ins.x, this.reg(ins.x) | this.reg(ins.y));
        return;
      case 'AND':
        this.setReg(ins.x, this.reg(ins.x) & this.reg(ins.y));
        return;
      case 'XOR':
        this.setReg(ins.x, this.reg(ins.x) ^ this.reg(ins.y));
        return;
      case 'ADD_REG': {
        const sum = this.reg(ins.x) + this.reg(ins.y);
        this.setReg(ins.x, sum & 0xff);
        V[VF] = sum > 0xff ? 1 : 0;
        return;
      }
      case 'SUB': {
        const a = this.reg(ins.x), b = this.reg(ins.y);
        V[VF] = a >= b ? 1 : 0;
        this.setReg(ins.x, (a - b) & 0xff);
        return;
      }
      case 'SHR': {
        const a = this.reg(ins.x);
        V[VF] = a & 0x01;
        this.setReg(ins.x, a >>> 1);
        return;
      }
      case 'SUBN': {
        const a = this.reg(ins.x), b = this.reg(ins.y);
        V[VF] = b >= a ? 1 : 0;
        this.setReg(ins.x, (b - a) & 0xff);
        return;
      }
      case 'SHL': {
        const a = this.reg(ins.x);
        V[VF] = (a >>> 7) & 0x01;
        this.setReg(ins.x, (a << 1) & 0xff);
        return;
      }
      case 'LD_I':
        s.I = ins.addr;
        return;
      case 'JP_V0':
        s.PC = ins.addr + V[0];
        return;
      case 'RND':
        this.setReg(ins.x, this.random.nextByte() & ins.kk);
        return;
      case 'DRW': {
        const rows = ins.n > 0 ? this.memory.slice(s.I, ins.n) : new Uint8Array(0);
        V[VF] = this.framebuffer.drawSprite(this.reg(ins.x), this.reg(ins.y), rows) ? 1 : 0;
        return;
      }
      case 'SKP':
        this.skipIf(this.keypad.isPressed(this.reg(ins.x) & 0x0f));
        return;
      case 'SKNP':
        this.skipIf(!this.keypad.isPressed(this.reg(ins.x) & 0x0f));
        return;
      case 'LD_VX_DT':
        this.setReg(ins.x, s.DT);
        return;
      case 'LD_VX_K': {
        const key = this.keypad.firstPressed();
        if (key === undefined) {
          // Not satisfied yet: rewind so the next step executes this instruction again.
          s.PC = (s.PC - 2) & 0xffff;
          return;
        }
        this.setReg(ins.x, key);
        return;
      }
      case 'LD_DT_VX':
        s.DT = this.reg(ins.x);
        return;
      case 'LD_ST_VX':
        s.ST = this.reg(ins.x);
        return;
      case 'ADD_I':
        s.I = (s.I + this.reg(ins.x)) & 0xffff;
        return;
      case 'LD_F':
        s.I = glyphAddress(this.reg(ins.x));
        return;
      case 'LD_B': {
        const v = this.reg(ins.x);
        // Checked as one range so a fault writes none of the three digits.
        this.memory.load(s.I, [Math.floor(v / 100), Math.floor(v / 10) % 10, v % 10]);
        return;
      }
      case 'LD_MEM_VX':
        this.memory.load(s.I, V.subarray(0, ins.x + 1));
        return;
      case 'LD_VX_MEM':
        V.set(this.memory.slice(s.I, ins.x + 1), 0);
        return;
    }
  }
}
