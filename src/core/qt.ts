/**
 * QT CPU emulator - fetch/decode/dispatch loop over a single machine state.
 *
 * The engine never calls peripheral code. `int 0x80` stops the loop with
 * exit code 0x80; the owner services the module selected on port 0 and then
 * calls run() again, which resumes at the instruction after the `int`.
 */
import { refreshFlags, testFlag } from './alu';
import { createDispatchTable } from './instructions';
import type { InstructionHandler, QTState } from './instructions';
import { QTMemory } from './memory';
import { decodeWord } from './word';
import { ExitCode, Flag, WORD_MASK } from './types';
import type {
  DecodedWord, EmulatorSnapshot, InstructionRecord, MemoryDump, QTRegisters,
} from './types';

export class QTEmulator {
  private readonly state: QTState;
  private readonly dispatch: InstructionHandler[];

  /** Instructions dispatched by the latest run() call */
  instructionsExecuted = 0;
  /** Instructions dispatched since initializeMemory() */
  totalInstructions = 0;

  constructor() {
    this.state = {
      acc: 0,
      pr: 0,
      pc: 0,
      flags: 0,
      running: false,
      exitCode: ExitCode.HALT,
      mem: new QTMemory(),
    };
    this.dispatch = createDispatchTable();
  }

  // ========================================================================
  // Initialization
  // ========================================================================

  /** Zero every bank and register. Call before importCode() and run(). */
  initializeMemory(): void {
    this.state.mem.reset();
    this.state.acc = 0;
    this.state.pr = 0;
    this.state.pc = 0;
    this.state.flags = 0;
    this.state.running = false;
    this.state.exitCode = ExitCode.HALT;
    this.instructionsExecuted = 0;
    this.totalInstructions = 0;
  }

  importCode(records: readonly InstructionRecord[]): void {
    this.state.mem.importCode(records);
  }

  // ========================================================================
  // Execution
  // ========================================================================

  private fetch(): DecodedWord {
    return decodeWord(this.state.mem.fetch(this.state.pc));
  }

  private execute(word: DecodedWord): void {
    const s = this.state;
    const bus = word.flag === 1 ? s.mem.cache[word.value] : word.value;

    this.dispatch[word.opcode](s, bus);
    this.instructionsExecuted++;
    this.totalInstructions++;

    s.flags = refreshFlags(s.flags, s.acc);
    s.pc = (s.pc + 1) & WORD_MASK;
  }

  /**
   * Run until halt, `int` or a trap. Returns the exit code; 0x80 means a
   * module interrupt is pending and run() may be called again to resume.
   */
  run(): number {
    this.state.running = true;
    this.instructionsExecuted = 0;
    while (this.state.running) {
      this.execute(this.fetch());
    }
    return this.state.exitCode;
  }

  /**
   * Execute one instruction. Starting a new run (running was false) resets
   * the per-run instruction count, as run() does.
   * @returns true while the machine keeps running
   */
  step(): boolean {
    if (!this.state.running) {
      this.state.running = true;
      this.instructionsExecuted = 0;
    }
    this.execute(this.fetch());
    return this.state.running;
  }

  // ========================================================================
  // State queries
  // ========================================================================

  get exitCode(): number {
    return this.state.exitCode;
  }

  get running(): boolean {
    return this.state.running;
  }

  get memory(): QTMemory {
    return this.state.mem;
  }

  getRegisters(): QTRegisters {
    const s = this.state;
    return {
      ACC: s.acc,
      PR: s.pr,
      PC: s.pc,
      SP: s.mem.stack.pointer,
      ASP: s.mem.addressStack.pointer,
      FLAGS: s.flags,
    };
  }

  /** Overwrite selected registers; used to set up programs under test. */
  setRegisters(regs: Partial<QTRegisters>): void {
    const s = this.state;
    if (regs.ACC !== undefined) s.acc = regs.ACC & WORD_MASK;
    if (regs.PR !== undefined) s.pr = regs.PR & WORD_MASK;
    if (regs.PC !== undefined) s.pc = regs.PC & WORD_MASK;
    if (regs.SP !== undefined) s.mem.stack.pointer = regs.SP & WORD_MASK;
    if (regs.ASP !== undefined) s.mem.addressStack.pointer = regs.ASP & WORD_MASK;
    if (regs.FLAGS !== undefined) s.flags = regs.FLAGS & WORD_MASK;
  }

  /** Decoded instruction at PC, i.e. the next one to execute. */
  peekInstruction(): DecodedWord {
    return this.fetch();
  }

  getSnapshot(): EmulatorSnapshot {
    const f = this.state.flags;
    return {
      registers: this.getRegisters(),
      flags: {
        carry: testFlag(f, Flag.CARRY),
        parity: testFlag(f, Flag.PARITY),
        zero: testFlag(f, Flag.ZERO),
        sign: testFlag(f, Flag.SIGN),
        overflow: testFlag(f, Flag.OVERFLOW),
        underflow: testFlag(f, Flag.UNDERFLOW),
      },
      running: this.state.running,
      exitCode: this.state.exitCode,
      instructionsExecuted: this.instructionsExecuted,
      totalInstructions: this.totalInstructions,
    };
  }

  getMemoryDump(): MemoryDump {
    return this.state.mem.dump();
  }
}
