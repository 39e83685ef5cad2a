/**
 * Instruction word codec.
 *
 *   M VVVV`VVVV`VVVV`VVVV OOO`OOOO
 *   bit 23      memory-indirection flag
 *   bits 22-7   16-bit value
 *   bits 6-0    7-bit opcode
 */
import type { DecodedWord, PackedWord } from './types';

/**
 * Pack the three fields into a ROM cell. Inputs are not masked: a value
 * wider than 16 bits or an opcode wider than 7 bits spills into the
 * neighbouring field.
 */
export function encodeWord(flag: number, value: number, opcode: number): PackedWord {
  return ((flag << 23) | (value << 7) | opcode) >>> 0;
}

export function decodeWord(word: PackedWord): DecodedWord {
  return {
    flag: (word >> 23) & 1,
    value: (word >> 7) & 0xFFFF,
    opcode: word & 0x7F,
  };
}
