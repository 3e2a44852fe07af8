import type { Emulator } from './core';
import type { CpuErrorMode } from './config';
import { createLogger, type Logger } from '../utils/log';
import { formatTraceLine, snapshotCpu } from '../tools/trace';

export interface SchedulerOptions {
  instructionsPerFrame?: number;
  onCpuError?: CpuErrorMode;
  traceEveryInstr?: number; // if >0, log CPU state every N instructions
  logger?: Logger;
}

// Fixed-rate host loop: each frame runs N CPU steps, then ticks the 60 Hz timers once.
// A frame cut short by a recorded or ignored CPU error still ticks the timers.
export class Scheduler {
  readonly instructionsPerFrame: number;
  private onCpuError: CpuErrorMode;
  private traceEveryInstr: number;
  private log: Logger;
  public lastCpuError: unknown = undefined;
  private execCount = 0;
  private frameCount = 0;

  constructor(private emu: Emulator, opts: SchedulerOptions = {}) {
    this.instructionsPerFrame = Math.max(1, Math.floor(opts.instructionsPerFrame ?? emu.config.instructionsPerFrame));
    this.onCpuError = opts.onCpuError ?? emu.config.onCpuError;
    this.traceEveryInstr = Math.max(0, Math.floor(opts.traceEveryInstr ?? emu.config.traceEveryInstr));
    this.log = opts.logger ?? createLogger('sched', emu.config.debug);
  }

  get executed(): number {
    return this.execCount;
  }

  get frames(): number {
    return this.frameCount;
  }

  // 'record' halts the VM after the first fault; 'ignore' keeps stepping on later frames.
  get halted(): boolean {
    return this.onCpuError === 'record' && this.lastCpuError !== undefined;
  }

  stepFrame(): void {
    if (this.halted) return;
    if (this.onCpuError === 'ignore') this.lastCpuError = undefined;
    for (let i = 0; i < this.instructionsPerFrame; i++) {
      if (this.traceEveryInstr > 0 && (this.execCount % this.traceEveryInstr) === 0) {
        this.log.info(formatTraceLine(snapshotCpu(this.emu.cpu)));
      }
      try {
        this.emu.stepInstruction();
        this.execCount++;
      } catch (e) {
        this.lastCpuError = e;
        this.log.debug(`cpu error in frame ${this.frameCount}:`, e);
        if (this.onCpuError === 'throw') throw e;
        // Stop executing this frame
        break;
      }
    }
    this.emu.tickTimers();
    this.frameCount++;
  }

  runFrames(count: number): void {
    for (let i = 0; i < count && !this.halted; i++) this.stepFrame();
  }
}
