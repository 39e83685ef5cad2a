/**
 * Instruction handlers and the 128-entry dispatch table.
 *
 * Handlers receive the machine state and the bus value (the immediate, or
 * cache[immediate] when the indirection flag is set). Control-flow handlers
 * store target - 1 in PC because the engine advances PC after every dispatch.
 */
import * as alu from './alu';
import { DISPATCH_SIZE, OP } from './constants';
import type { QTMemory } from './memory';
import { ExitCode, Flag, WORD_MASK } from './types';
import type { Word16 } from './types';

/** Mutable execution context owned by one emulator instance. */
export interface QTState {
  acc: Word16;
  pr: Word16;
  pc: Word16;
  flags: Word16;
  running: boolean;
  exitCode: number;
  readonly mem: QTMemory;
}

export type InstructionHandler = (state: QTState, bus: Word16) => void;

const biased = (target: number): Word16 => (target - 1) & WORD_MASK;

function stop(state: QTState, exitCode: number): void {
  state.running = false;
  state.exitCode = exitCode;
}

const trap: InstructionHandler = (state) => {
  stop(state, ExitCode.UNKNOWN_OPCODE);
};

// ============================================================================
// Data movement
// ============================================================================

const load: InstructionHandler = (s, bus) => { s.acc = bus; };
const store: InstructionHandler = (s, bus) => { s.mem.cache[bus] = s.acc; };
const loadp: InstructionHandler = (s) => { s.acc = s.mem.cache[s.acc]; };
const loadpr: InstructionHandler = (s, bus) => { s.pr = bus; };
const storep: InstructionHandler = (s) => { s.mem.cache[s.pr] = s.acc; };
const tapr: InstructionHandler = (s) => { s.pr = s.acc; };
const push: InstructionHandler = (s) => { s.mem.stack.push(s.acc); };
const pop: InstructionHandler = (s) => { s.acc = s.mem.stack.pop(); };

// ============================================================================
// Control flow
// ============================================================================

const call: InstructionHandler = (s, bus) => {
  s.mem.addressStack.push(s.pc);
  s.pc = biased(bus);
};

// The popped address is the call site; the uniform advance steps past it.
const ret: InstructionHandler = (s) => { s.pc = s.mem.addressStack.pop(); };

const jump: InstructionHandler = (s, bus) => { s.pc = biased(bus); };

// bus selects flags; jump to PR when any selected flag is set
const jumpc: InstructionHandler = (s, bus) => {
  if ((s.flags & bus) !== 0) {
    s.pc = biased(s.pr);
  }
};

const clf: InstructionHandler = (s) => { s.flags = 0; };

// ============================================================================
// Logic and shifts
// ============================================================================

const and: InstructionHandler = (s, bus) => { s.acc = s.acc & bus; };
const or: InstructionHandler = (s, bus) => { s.acc = s.acc | bus; };
const xor: InstructionHandler = (s, bus) => { s.acc = s.acc ^ bus; };

const lsl: InstructionHandler = (s, bus) => {
  const r = alu.shiftLeft(s.acc, bus);
  s.acc = r.value;
  s.flags = alu.setFlag(s.flags, Flag.OVERFLOW, r.flag);
};

const lsr: InstructionHandler = (s, bus) => {
  const r = alu.shiftRight(s.acc, bus);
  s.acc = r.value;
  s.flags = alu.setFlag(s.flags, Flag.UNDERFLOW, r.flag);
};

const rol: InstructionHandler = (s, bus) => { s.acc = alu.rotateLeft(s.acc, bus); };
const ror: InstructionHandler = (s, bus) => { s.acc = alu.rotateRight(s.acc, bus); };
const comp: InstructionHandler = (s, bus) => { s.acc = alu.compare(s.acc, bus); };

// ============================================================================
// Arithmetic
// ============================================================================

function withCarry(s: QTState, r: alu.AluResult): void {
  s.acc = r.value;
  s.flags = alu.setFlag(s.flags, Flag.CARRY, r.flag);
}

const add: InstructionHandler = (s, bus) => withCarry(s, alu.add(s.acc, bus));
const sub: InstructionHandler = (s, bus) => withCarry(s, alu.sub(s.acc, bus));
const addc: InstructionHandler = (s, bus) =>
  withCarry(s, alu.add(s.acc, bus, alu.testFlag(s.flags, Flag.CARRY)));
const subc: InstructionHandler = (s, bus) =>
  withCarry(s, alu.sub(s.acc, bus, alu.testFlag(s.flags, Flag.CARRY)));
const inc: InstructionHandler = (s) => withCarry(s, alu.add(s.acc, 1));
const dec: InstructionHandler = (s) => withCarry(s, alu.sub(s.acc, 1));

const mul: InstructionHandler = (s, bus) => {
  const r = alu.mul(s.acc, bus);
  s.acc = r.value;
  s.flags = alu.setFlag(s.flags, Flag.OVERFLOW, r.flag);
};

const div: InstructionHandler = (s, bus) => {
  const q = alu.div(s.acc, bus);
  if (q === null) {
    stop(s, ExitCode.DIVIDE_BY_ZERO);
    return;
  }
  s.acc = q;
};

const mod: InstructionHandler = (s, bus) => {
  const m = alu.mod(s.acc, bus);
  if (m === null) {
    stop(s, ExitCode.DIVIDE_BY_ZERO);
    return;
  }
  s.acc = m;
};

// ============================================================================
// Ports and interrupts
// ============================================================================

const portw: InstructionHandler = (s, bus) => { s.mem.ports[bus] = s.acc; };
const portr: InstructionHandler = (s, bus) => { s.acc = s.mem.ports[bus]; };
const interrupt: InstructionHandler = (s, bus) => stop(s, bus);
const halt: InstructionHandler = (s) => stop(s, ExitCode.HALT);

const HANDLERS: ReadonlyArray<readonly [number, InstructionHandler]> = [
  [OP.HALT, halt],
  [OP.LOAD, load],
  [OP.STORE, store],
  [OP.LOADP, loadp],
  [OP.LOADPR, loadpr],
  [OP.STOREP, storep],
  [OP.TAPR, tapr],
  [OP.PUSH, push],
  [OP.POP, pop],
  [OP.CALL, call],
  [OP.RETURN, ret],
  [OP.JUMP, jump],
  [OP.JUMPC, jumpc],
  [OP.CLF, clf],
  [OP.AND, and],
  [OP.OR, or],
  [OP.XOR, xor],
  [OP.LSL, lsl],
  [OP.LSR, lsr],
  [OP.ROL, rol],
  [OP.ROR, ror],
  [OP.COMP, comp],
  [OP.ADD, add],
  [OP.SUB, sub],
  [OP.ADDC, addc],
  [OP.SUBC, subc],
  [OP.INC, inc],
  [OP.DEC, dec],
  [OP.MUL, mul],
  [OP.DIV, div],
  [OP.MOD, mod],
  [OP.PORTW, portw],
  [OP.PORTR, portr],
  [OP.INT, interrupt],
];

/** Every slot starts as the trap; known opcodes then claim theirs. */
export function createDispatchTable(): InstructionHandler[] {
  const table: InstructionHandler[] = new Array<InstructionHandler>(DISPATCH_SIZE).fill(trap);
  for (const [opcode, handler] of HANDLERS) {
    table[opcode] = handler;
  }
  return table;
}
