import { Chip8 } from '../cpu/chip8';
import { Framebuffer, type ReadonlyFramebuffer } from '../display/framebuffer';
import { Keypad } from '../input/keypad';
import { validateRom } from '../rom/loader';
import { createLogger, type Logger } from '../utils/log';
import type { IEmulator, RandomSource } from './types';
import { type Chip8Config, loadConfig } from './config';
import { createRandomSource } from './random';

export interface EmulatorOptions {
  random?: RandomSource;
  config?: Chip8Config;
  logger?: Logger;
}

export class Emulator implements IEmulator {
  readonly config: Chip8Config;
  private rom: Uint8Array | null = null;

  constructor(public readonly cpu: Chip8, config?: Chip8Config) {
    this.config = config ?? loadConfig();
  }

  static create(opts: EmulatorOptions = {}): Emulator {
    const config = opts.config ?? loadConfig();
    const cpu = new Chip8({
      framebuffer: new Framebuffer(),
      keypad: new Keypad(),
      random: opts.random ?? createRandomSource(config.seed),
      logger: opts.logger ?? createLogger('chip8', config.debug),
    });
    return new Emulator(cpu, config);
  }

  static fromRom(rom: Uint8Array, opts: EmulatorOptions = {}): Emulator {
    const emu = Emulator.create(opts);
    emu.load(rom);
    return emu;
  }

  get keypad(): Keypad {
    return this.cpu.keypad;
  }

  get framebuffer(): ReadonlyFramebuffer {
    return this.cpu.framebuffer;
  }

  // Replaces the running program. Validation happens before the VM is touched.
  load(rom: Uint8Array): void {
    validateRom(rom);
    this.rom = rom.slice();
    this.reset();
  }

  // Power-cycles the VM and restages the last loaded ROM, if any.
  reset(): void {
    this.cpu.reset();
    if (this.rom) this.cpu.loadProgram(this.rom);
  }

  stepInstruction(): void {
    this.cpu.step();
  }

  tickTimers(): void {
    this.cpu.tickTimers();
  }
}
