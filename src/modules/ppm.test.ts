import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createFrameWriter, encodePPM } from './ppm';
import { ColorMode } from './framebuffer';
import { OutputError } from '../core/errors';
import type { ScreenFrame } from './types';

const FRAME: ScreenFrame = {
  index: 0,
  width: 2,
  height: 1,
  mode: ColorMode.RGB888,
  pixels: new Uint8Array([1, 2, 3, 255, 4, 5, 6, 255]),
};

describe('encodePPM', () => {
  it('writes a P6 header followed by RGB triples', () => {
    const out = encodePPM(FRAME);
    const header = 'P6\n2 1\n255\n';
    expect(new TextDecoder().decode(out.subarray(0, header.length))).toBe(header);
    expect(Array.from(out.subarray(header.length))).toEqual([1, 2, 3, 4, 5, 6]);
  });
});

describe('createFrameWriter', () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), 'qt-frames-'));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('creates the directory and writes numbered frames', () => {
    const out = join(dir, 'nested', 'frames');
    const write = createFrameWriter(out);
    write({ ...FRAME, index: 12 });
    expect(Array.from(readFileSync(join(out, 'frame-00012.ppm')))).toEqual(Array.from(encodePPM(FRAME)));
  });

  it('reports a directory it cannot create as OutputError', () => {
    const blocker = join(dir, 'not-a-dir');
    writeFileSync(blocker, 'x');
    const target = join(blocker, 'frames');
    expect(() => createFrameWriter(target)).toThrow(OutputError);
    expect(() => createFrameWriter(target)).toThrow(`Cannot write '${target}': `);
  });
});
