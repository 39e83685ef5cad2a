/**
 * Arithmetic/logic unit. Pure functions over 16-bit values; each returns the
 * wrapped result together with the flag it produces, and the instruction
 * handlers decide which flags to write back.
 */
import { WORD_MASK, Flag } from './types';
import type { Word16 } from './types';

export interface AluResult {
  value: Word16;
  /** carry/overflow/underflow outcome, depending on the operation */
  flag: boolean;
}

const mask16 = (n: number): Word16 => n & WORD_MASK;

// ---- Flag register helpers ----

export function testFlag(flags: number, bit: Flag): boolean {
  return ((flags >> bit) & 1) === 1;
}

export function setFlag(flags: number, bit: Flag, on: boolean): number {
  return on ? (flags | (1 << bit)) & WORD_MASK : flags & ~(1 << bit) & WORD_MASK;
}

/** 1 when ACC holds an odd number of set bits. */
export function parity16(value: Word16): boolean {
  let v = value & WORD_MASK;
  v ^= v >> 8;
  v ^= v >> 4;
  v ^= v >> 2;
  v ^= v >> 1;
  return (v & 1) === 1;
}

/** Recompute parity, zero and sign from the accumulator; other bits kept. */
export function refreshFlags(flags: number, acc: Word16): number {
  let f = setFlag(flags, Flag.PARITY, parity16(acc));
  f = setFlag(f, Flag.ZERO, acc === 0);
  f = setFlag(f, Flag.SIGN, (acc & 0x8000) !== 0);
  return f;
}

// ---- Arithmetic ----

export function add(a: Word16, b: Word16, carryIn = false): AluResult {
  const sum = a + b + (carryIn ? 1 : 0);
  return { value: mask16(sum), flag: sum > WORD_MASK };
}

export function sub(a: Word16, b: Word16, borrowIn = false): AluResult {
  const diff = a - b - (borrowIn ? 1 : 0);
  return { value: mask16(diff), flag: diff < 0 };
}

export function mul(a: Word16, b: Word16): AluResult {
  // 16x16 products stay below 2^32, exact in a double
  const product = a * b;
  return { value: mask16(product), flag: product > WORD_MASK };
}

/** null for a zero divisor; the caller owns the trap. */
export function div(a: Word16, b: Word16): Word16 | null {
  if (b === 0) return null;
  return Math.floor(a / b);
}

export function mod(a: Word16, b: Word16): Word16 | null {
  if (b === 0) return null;
  return a % b;
}

/** 65535 when a < b, 0 when equal, 1 when a > b. */
export function compare(a: Word16, b: Word16): Word16 {
  if (a < b) return WORD_MASK;
  return a === b ? 0 : 1;
}

// ---- Shifts ----

export function shiftLeft(a: Word16, count: number): AluResult {
  const top = (a & 0x8000) !== 0;
  return { value: count >= 16 ? 0 : mask16(a << count), flag: top };
}

export function shiftRight(a: Word16, count: number): AluResult {
  const bottom = (a & 1) !== 0;
  return { value: count >= 16 ? 0 : a >>> count, flag: bottom };
}

export function rotateLeft(a: Word16, count: number): Word16 {
  const n = count & 0xF;
  if (n === 0) return a;
  return mask16((a << n) | (a >>> (16 - n)));
}

export function rotateRight(a: Word16, count: number): Word16 {
  const n = count & 0xF;
  if (n === 0) return a;
  return mask16((a >>> n) | (a << (16 - n)));
}
