import { OPCODES, NO_OPERAND, isKnownOpcode } from './constants';
import { decodeWord } from './word';
import type { PackedWord } from './types';

export interface DisassembledWord {
  mnemonic: string;
  flag: number;
  value: number;
  opcode: number;
  raw: PackedWord;
}

const hex4 = (n: number): string => '0x' + n.toString(16).padStart(4, '0');

export function disassembleWord(word: PackedWord): DisassembledWord {
  const { flag, value, opcode } = decodeWord(word);
  return {
    mnemonic: isKnownOpcode(opcode) ? OPCODES[opcode] : '???',
    flag,
    value,
    opcode,
    raw: word,
  };
}

/**
 * Format a word as `mnemonic operand`. Indirect operands print as
 * `[0x0010]`; unknown opcodes print their number.
 */
export function formatDisassembly(word: PackedWord): string {
  const dis = disassembleWord(word);
  if (dis.mnemonic === '???') {
    return `??? op=${dis.opcode} ${hex4(dis.value)}`;
  }
  if (NO_OPERAND.has(dis.mnemonic)) {
    return dis.mnemonic;
  }
  const operand = dis.flag === 1 ? `[${hex4(dis.value)}]` : hex4(dis.value);
  return `${dis.mnemonic} ${operand}`;
}

/** Disassemble the first `count` ROM words, one `addr: text` line each. */
export function disassembleRom(rom: Uint32Array, count: number): string[] {
  const lines: string[] = [];
  for (let addr = 0; addr < count && addr < rom.length; addr++) {
    lines.push(`${addr.toString(16).padStart(4, '0')}: ${formatDisassembly(rom[addr])}`);
  }
  return lines;
}
