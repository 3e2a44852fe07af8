export type Env = Record<string, string | undefined>;

export interface Logger {
  readonly debugEnabled: boolean;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function envFlag(env: Env, name: string): boolean {
  const v = (env[name] ?? '').toLowerCase();
  return v === '1' || v === 'true';
}

// Console logger with a "[tag]" prefix. Debug lines only print when enabled,
// which defaults to CHIP8_DEBUG=1.
export function createLogger(tag: string, debugEnabled: boolean = envFlag(process.env, 'CHIP8_DEBUG')): Logger {
  const prefix = `[${tag}]`;
  return {
    debugEnabled,
    debug: (...args) => {
      // eslint-disable-next-line no-console
      if (debugEnabled) console.log(prefix, ...args);
    },
    // eslint-disable-next-line no-console
    info: (...args) => console.log(prefix, ...args),
    warn: (...args) => console.warn(prefix, ...args),
    error: (...args) => console.error(prefix, ...args),
  };
}
