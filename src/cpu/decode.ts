import { Chip8Error } from '../emulator/errors';
import type { Instruction } from './instructions';

// Field extraction over a 16-bit opcode word.
export const kind = (op: number): number => (op >>> 12) & 0xf;
export const x = (op: number): number => (op >>> 8) & 0xf;
export const y = (op: number): number => (op >>> 4) & 0xf;
export const n = (op: number): number => op & 0xf;
export const nn = (op: number): number => op & 0xff;
export const nnn = (op: number): number => op & 0xfff;

function unknown(op: number): never {
  throw new Chip8Error('UnknownOpcode', 'no instruction matches opcode', { opcode: op & 0xffff });
}

// Families 0x8, 0xE and 0xF select further on the low nibble/byte.
function decodeALU(op: number): Instruction {
  const vx = x(op), vy = y(op);
  switch (n(op)) {
    case 0x0: return { op: 'LD_REG', x: vx, y: vy };
    case 0x1: return { op: 'OR', x: vx, y: vy };
    case 0x2: return { op: 'AND', x: vx, y: vy };
    case 0x3: return { op: 'XOR', x: vx, y: vy };
    case 0x4: return { op: 'ADD_REG', x: vx, y: vy };
    case 0x5: return { op: 'SUB', x: vx, y: vy };
    case 0x6: return { op: 'SHR', x: vx, y: vy };
    case 0x7: return { op: 'SUBN', x: vx, y: vy };
    case 0xe: return { op: 'SHL', x: vx, y: vy };
    default: return unknown(op);
  }
}

function decodeKey(op: number): Instruction {
  switch (nn(op)) {
    case 0x9e: return { op: 'SKP', x: x(op) };
    case 0xa1: return { op: 'SKNP', x: x(op) };
    default: return unknown(op);
  }
}

function decodeMisc(op: number): Instruction {
  const vx = x(op);
  switch (nn(op)) {
    case 0x07: return { op: 'LD_VX_DT', x: vx };
    case 0x0a: return { op: 'LD_VX_K', x: vx };
    case 0x15: return { op: 'LD_DT_VX', x: vx };
    case 0x18: return { op: 'LD_ST_VX', x: vx };
    case 0x1e: return { op: 'ADD_I', x: vx };
    case 0x29: return { op: 'LD_F', x: vx };
    case 0x33: return { op: 'LD_B', x: vx };
    case 0x55: return { op: 'LD_MEM_VX', x: vx };
    case 0x65: return { op: 'LD_VX_MEM', x: vx };
    default: return unknown(op);
  }
}

export function decode(op: number): Instruction {
  switch (kind(op)) {
    case 0x0:
      // 0nnn (call native routine) has no meaning for an interpreter and is rejected.
      if (op === 0x00e0) return { op: 'CLS' };
      if (op === 0x00ee) return { op: 'RET' };
      return unknown(op);
    case 0x1: return { op: 'JP', addr: nnn(op) };
    case 0x2: return { op: 'CALL', addr: nnn(op) };
    case 0x3: return { op: 'SE_IMM', x: x(op), kk: nn(op) };
    case 0x4: return { op: 'SNE_IMM', x: x(op), kk: nn(op) };
    case 0x5: return n(op) === 0 ? { op: 'SE_REG', x: x(op), y: y(op) } : unknown(op);
    case 0x6: return { op: 'LD_IMM', x: x(op), kk: nn(op) };
    case 0x7: return { op: 'ADD_IMM', x: x(op), kk: nn(op) };
    case 0x8: return decodeALU(op);
    case 0x9: return n(op) === 0 ? { op: 'SNE_REG', x: x(op), y: y(op) } : unknown(op);
    case 0xa: return { op: 'LD_I', addr: nnn(op) };
    case 0xb: return { op: 'JP_V0', addr: nnn(op) };
    case 0xc: return { op: 'RND', x: x(op), kk: nn(op) };
    case 0xd: return { op: 'DRW', x: x(op), y: y(op), n: n(op) };
    case 0xe: return decodeKey(op);
    case 0xf: return decodeMisc(op);
    default: return unknown(op);
  }
}
