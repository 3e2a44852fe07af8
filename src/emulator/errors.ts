export type Chip8ErrorCode =
  | 'RomTooLarge'
  | 'TruncatedSource'
  | 'UnknownOpcode'
  | 'StackOverflow'
  | 'StackUnderflow'
  | 'OutOfBounds';

export interface Chip8ErrorContext {
  pc?: number; // address the faulting opcode was fetched from
  opcode?: number;
  addr?: number;
}

const hex = (v: number, w: number): string => v.toString(16).toUpperCase().padStart(w, '0');

export class Chip8Error extends Error {
  readonly code: Chip8ErrorCode;
  readonly pc: number | undefined;
  readonly opcode: number | undefined;
  readonly addr: number | undefined;
  readonly detail: string;

  constructor(code: Chip8ErrorCode, detail: string, ctx: Chip8ErrorContext = {}) {
    const where: string[] = [];
    if (ctx.pc !== undefined) where.push(`PC=${hex(ctx.pc, 4)}`);
    if (ctx.opcode !== undefined) where.push(`OP=${hex(ctx.opcode, 4)}`);
    super(where.length > 0 ? `${code}: ${detail} (${where.join(' ')})` : `${code}: ${detail}`);
    this.name = 'Chip8Error';
    this.code = code;
    this.detail = detail;
    this.pc = ctx.pc;
    this.opcode = ctx.opcode;
    this.addr = ctx.addr;
  }

  // Same error with the faulting instruction attached; fields already set are kept.
  withContext(ctx: Chip8ErrorContext): Chip8Error {
    return new Chip8Error(this.code, this.detail, {
      pc: this.pc ?? ctx.pc,
      opcode: this.opcode ?? ctx.opcode,
      addr: this.addr ?? ctx.addr,
    });
  }

  // Execution errors leave the VM in a state the host has to reset; load errors leave it untouched.
  get isLoadError(): boolean {
    return this.code === 'RomTooLarge' || this.code === 'TruncatedSource';
  }
}

export function isChip8Error(e: unknown, code?: Chip8ErrorCode): e is Chip8Error {
  return e instanceof Chip8Error && (code === undefined || e.code === code);
}
