/**
 * Pure framebuffer decoder - turns cache cells into an RGBA buffer with no
 * dependency on the emulator, so every color mode can be tested directly.
 *
 * Pixels are stored row-major with no row padding. Cache reads wrap at
 * 65536.
 */
import { MEM_SIZE } from '../core/constants';

export const ColorMode = {
  MONO: 1,
  GRAY8: 8,
  RGB565: 16,
  RGB888: 24,
} as const;
export type ColorMode = typeof ColorMode[keyof typeof ColorMode];

export function isColorMode(mode: number): mode is ColorMode {
  return mode === ColorMode.MONO || mode === ColorMode.GRAY8 ||
    mode === ColorMode.RGB565 || mode === ColorMode.RGB888;
}

// ---- 5/6-bit channel → 8-bit lookups ----
export const EXPAND_5 = new Uint8Array(32);
export const EXPAND_6 = new Uint8Array(64);
for (let i = 0; i < 32; i++) EXPAND_5[i] = (i << 3) | (i >> 2);
for (let i = 0; i < 64; i++) EXPAND_6[i] = (i << 2) | (i >> 4);

function put(out: Uint8Array, i: number, r: number, g: number, b: number): void {
  const o = i * 4;
  out[o] = r;
  out[o + 1] = g;
  out[o + 2] = b;
  out[o + 3] = 255;
}

const cell = (cache: Uint16Array, offset: number, index: number): number =>
  cache[(offset + index) % MEM_SIZE];

/**
 * Decode `width * height` pixels starting at cache[offset] into `out`
 * (RGBA, 4 bytes per pixel).
 */
export function decodeFramebuffer(
  cache: Uint16Array,
  offset: number,
  width: number,
  height: number,
  mode: ColorMode,
  out: Uint8Array = new Uint8Array(width * height * 4),
): Uint8Array {
  const pixels = width * height;

  switch (mode) {
    case ColorMode.MONO:
      // 16 pixels per cell, most significant bit first
      for (let i = 0; i < pixels; i++) {
        const bit = (cell(cache, offset, i >> 4) >> (15 - (i & 15))) & 1;
        const v = bit ? 255 : 0;
        put(out, i, v, v, v);
      }
      break;

    case ColorMode.GRAY8:
      // 2 pixels per cell, high byte first
      for (let i = 0; i < pixels; i++) {
        const c = cell(cache, offset, i >> 1);
        const v = (i & 1) === 0 ? c >> 8 : c & 0xFF;
        put(out, i, v, v, v);
      }
      break;

    case ColorMode.RGB565:
      for (let i = 0; i < pixels; i++) {
        const c = cell(cache, offset, i);
        put(out, i, EXPAND_5[c >> 11], EXPAND_6[(c >> 5) & 0x3F], EXPAND_5[c & 0x1F]);
      }
      break;

    case ColorMode.RGB888:
      // cell0 = R:G, low byte of cell1 = B
      for (let i = 0; i < pixels; i++) {
        const rg = cell(cache, offset, i * 2);
        const b = cell(cache, offset, i * 2 + 1) & 0xFF;
        put(out, i, rg >> 8, rg & 0xFF, b);
      }
      break;
  }
  return out;
}
