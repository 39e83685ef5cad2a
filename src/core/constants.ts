export const ADDRESS_BIT_WIDTH = 16;
export const MEM_SIZE = 1 << ADDRESS_BIT_WIDTH; // 65536
export const DISPATCH_SIZE = 128;

// Opcode numbers. Everything not listed here traps.
export const OP = {
  HALT: 0,
  LOAD: 1,
  STORE: 2,
  LOADP: 3,
  LOADPR: 4,
  STOREP: 5,
  TAPR: 6,
  PUSH: 7,
  POP: 8,
  CALL: 9,
  RETURN: 10,
  JUMP: 11,
  JUMPC: 12,
  CLF: 13,
  AND: 14,
  OR: 15,
  XOR: 16,
  LSL: 17,
  LSR: 18,
  ROL: 19,
  ROR: 20,
  COMP: 21,
  ADD: 22,
  SUB: 23,
  ADDC: 24,
  SUBC: 25,
  INC: 26,
  DEC: 27,
  MUL: 28,
  DIV: 29,
  MOD: 30,
  PORTW: 31,
  PORTR: 32,
  INT: 33,
} as const;

// Mnemonics indexed by opcode number
export const OPCODES: string[] = [
  'halt', 'load', 'store', 'loadp', 'loadpr', 'storep', 'tapr', 'push',
  'pop', 'call', 'return', 'jump', 'jumpc', 'clf', 'and', 'or',
  'xor', 'lsl', 'lsr', 'rol', 'ror', 'comp', 'add', 'sub',
  'addc', 'subc', 'inc', 'dec', 'mul', 'div', 'mod', 'portw',
  'portr', 'int',
];

// Instructions that ignore the bus value
export const NO_OPERAND = new Set([
  'halt', 'loadp', 'storep', 'tapr', 'push', 'pop', 'return', 'clf', 'inc', 'dec',
]);

// Port numbers used by the module layer
export const PORT = {
  MODULE_SELECT: 0,
  SCREEN_GEOMETRY: 1,
  SCREEN_MODE: 2,
} as const;

export const MODULE_ID = {
  SCREEN: 1,
} as const;

export const NAMESPACE = {
  QT: 'QT',
  QM: 'QM',
} as const;
export type Namespace = typeof NAMESPACE[keyof typeof NAMESPACE];

// Bytes per instruction record in a QT image
export const QT_RECORD_SIZE = 4;

export function isKnownOpcode(opcode: number): boolean {
  return opcode >= 0 && opcode < OPCODES.length;
}
