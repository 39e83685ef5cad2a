/**
 * Host side of the 0x80 interrupt convention: run the emulator, and each
 * time it yields with exit code 0x80, service the module selected on port 0
 * and resume.
 */
import { PORT } from '../core/constants';
import { ModuleError } from '../core/errors';
import type { QTMemory } from '../core/memory';
import type { QTEmulator } from '../core/qt';
import { ExitCode } from '../core/types';
import type { QTModule } from './types';

export class ModuleHost {
  private modules: Map<number, QTModule> = new Map();
  interruptsServiced = 0;

  register(module: QTModule): this {
    if (this.modules.has(module.id)) {
      throw new ModuleError(`Module selector ${module.id} is already taken by '${this.modules.get(module.id)?.name}'`);
    }
    this.modules.set(module.id, module);
    return this;
  }

  getModule(id: number): QTModule | undefined {
    return this.modules.get(id);
  }

  reset(): void {
    this.interruptsServiced = 0;
    for (const module of this.modules.values()) module.reset();
  }

  service(memory: QTMemory): QTModule {
    const selector = memory.ports[PORT.MODULE_SELECT];
    const module = this.modules.get(selector);
    if (!module) {
      throw new ModuleError(`No module with selector ${selector}`);
    }
    module.service(memory);
    this.interruptsServiced++;
    return module;
  }
}

export interface RunOptions {
  /** Stop after this many instructions in total */
  maxSteps?: number;
  /** Called before each instruction; forces single-stepping */
  trace?: (emu: QTEmulator) => void;
}

export interface RunResult {
  exitCode: number;
  stepLimitReached: boolean;
}

/**
 * Run to a terminal exit code, servicing module interrupts on the way.
 * Without options this is the plain run()/resume loop.
 */
export function runWithModules(emu: QTEmulator, host: ModuleHost, options: RunOptions = {}): RunResult {
  const { maxSteps, trace } = options;

  if (maxSteps === undefined && trace === undefined) {
    let exitCode = emu.run();
    while (exitCode === ExitCode.INTERRUPT) {
      host.service(emu.memory);
      exitCode = emu.run();
    }
    return { exitCode, stepLimitReached: false };
  }

  let steps = 0;
  for (;;) {
    if (maxSteps !== undefined && steps >= maxSteps) {
      return { exitCode: emu.exitCode, stepLimitReached: true };
    }
    trace?.(emu);
    steps++;
    if (emu.step()) continue;

    if (emu.exitCode !== ExitCode.INTERRUPT) {
      return { exitCode: emu.exitCode, stepLimitReached: false };
    }
    host.service(emu.memory);
  }
}
