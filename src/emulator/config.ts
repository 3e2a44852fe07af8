import { envFlag, type Env } from '../utils/log';

export type CpuErrorMode = 'ignore' | 'throw' | 'record';

export interface Chip8Config {
  instructionsPerFrame: number;
  onCpuError: CpuErrorMode;
  traceEveryInstr: number; // if >0, log CPU state every N instructions
  seed: number | undefined; // seeded RNG for Cxkk when set, Math.random otherwise
  debug: boolean;
}

export const DEFAULT_CONFIG: Readonly<Chip8Config> = {
  instructionsPerFrame: 10, // ~600 instructions/s at 60 frames/s
  onCpuError: 'throw',
  traceEveryInstr: 0,
  seed: undefined,
  debug: false,
};

// Accepts decimal, 0x-prefixed or $-prefixed hex.
export function parseNumber(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const cleaned = raw.trim().toLowerCase().replace(/^\$/, '0x');
  if (cleaned.length === 0) return undefined;
  const v = Number(cleaned);
  return Number.isFinite(v) ? v : undefined;
}

function parseErrorMode(raw: string | undefined): CpuErrorMode | undefined {
  const v = (raw ?? '').toLowerCase();
  return v === 'ignore' || v === 'throw' || v === 'record' ? v : undefined;
}

export function loadConfig(env: Env = process.env, overrides: Partial<Chip8Config> = {}): Chip8Config {
  const ipf = parseNumber(env.CHIP8_IPF);
  const trace = parseNumber(env.CHIP8_TRACE_EVERY);
  const seed = parseNumber(env.CHIP8_SEED);
  return {
    instructionsPerFrame: ipf !== undefined && ipf >= 1 ? Math.floor(ipf) : DEFAULT_CONFIG.instructionsPerFrame,
    onCpuError: parseErrorMode(env.CHIP8_ON_CPU_ERROR) ?? DEFAULT_CONFIG.onCpuError,
    traceEveryInstr: trace !== undefined && trace > 0 ? Math.floor(trace) : 0,
    seed: seed !== undefined ? seed >>> 0 : undefined,
    debug: envFlag(env, 'CHIP8_DEBUG'),
    ...overrides,
  };
}
