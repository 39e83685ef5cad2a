// 16-bit cell (stored as standard JS number, masked to 16 bits)
export type Word16 = number;

// Packed 24-bit instruction word held in a 32-bit ROM cell
export type PackedWord = number;

export const WORD_MASK = 0xFFFF;
export const OPCODE_MASK = 0x7F;

export const ExitCode = {
  HALT: 0,
  INTERRUPT: 0x80,
  UNKNOWN_OPCODE: -1,
  DIVIDE_BY_ZERO: -2,
} as const;
export type ExitCode = typeof ExitCode[keyof typeof ExitCode];

/** Bit positions inside the flag register. */
export const Flag = {
  CARRY: 0,
  PARITY: 1,
  ZERO: 2,
  SIGN: 3,
  OVERFLOW: 4,
  UNDERFLOW: 5,
} as const;
export type Flag = typeof Flag[keyof typeof Flag];

/** One decoded record of a binary image: (memory flag, value, opcode). */
export interface InstructionRecord {
  readonly flag: number;
  readonly value: number;
  readonly opcode: number;
}

export interface DecodedWord {
  flag: number;
  value: number;
  opcode: number;
}

export interface QTRegisters {
  ACC: Word16;
  PR: Word16;
  PC: Word16;
  SP: Word16;
  ASP: Word16;
  FLAGS: Word16;
}

export interface FlagSnapshot {
  carry: boolean;
  parity: boolean;
  zero: boolean;
  sign: boolean;
  overflow: boolean;
  underflow: boolean;
}

export interface EmulatorSnapshot {
  registers: QTRegisters;
  flags: FlagSnapshot;
  running: boolean;
  exitCode: number;
  instructionsExecuted: number;
  totalInstructions: number;
}

/** Copies of the data banks, each addressed 0..65535. */
export interface MemoryDump {
  cache: Uint16Array;
  stack: Uint16Array;
  addressStack: Uint16Array;
  ports: Uint16Array;
}
