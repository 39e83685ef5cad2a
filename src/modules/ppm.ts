import { mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { OutputError } from '../core/errors';
import type { FrameListener, ScreenFrame } from './types';

/** Binary PPM (P6) image of a frame; alpha is dropped. */
export function encodePPM(frame: ScreenFrame): Uint8Array {
  const header = new TextEncoder().encode(`P6\n${frame.width} ${frame.height}\n255\n`);
  const pixelCount = frame.width * frame.height;
  const out = new Uint8Array(header.length + pixelCount * 3);
  out.set(header, 0);
  for (let i = 0; i < pixelCount; i++) {
    const src = i * 4;
    const dst = header.length + i * 3;
    out[dst] = frame.pixels[src];
    out[dst + 1] = frame.pixels[src + 1];
    out[dst + 2] = frame.pixels[src + 2];
  }
  return out;
}

function framePath(dir: string, frame: ScreenFrame): string {
  return join(dir, `frame-${frame.index.toString().padStart(5, '0')}.ppm`);
}

/**
 * Listener that writes every presented frame into `dir`, created up front.
 * File system failures surface as OutputError.
 */
export function createFrameWriter(dir: string): FrameListener {
  const guard = (path: string, write: () => void): void => {
    try {
      write();
    } catch (err) {
      throw new OutputError(path, err instanceof Error ? err.message : String(err));
    }
  };

  guard(dir, () => mkdirSync(dir, { recursive: true }));
  return frame => {
    const file = framePath(dir, frame);
    guard(file, () => writeFileSync(file, encodePPM(frame)));
  };
}
