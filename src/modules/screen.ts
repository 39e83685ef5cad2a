/**
 * Screen module (selector 1).
 *
 * First interrupt: port 1 holds (width << 8) | height and port 2 the color
 * mode; the module sizes its frame and presents nothing. Every later
 * interrupt: port 1 is the cache offset of the framebuffer, port 2 is read
 * again, and one frame is decoded and presented.
 */
import { MODULE_ID, PORT } from '../core/constants';
import { ModuleError } from '../core/errors';
import type { QTMemory } from '../core/memory';
import { ColorMode, decodeFramebuffer, isColorMode } from './framebuffer';
import type { FrameListener, QTModule, ScreenFrame } from './types';

export interface ScreenGeometry {
  width: number;
  height: number;
}

export class ScreenModule implements QTModule {
  readonly id = MODULE_ID.SCREEN;
  readonly name = 'screen';

  private geometry: ScreenGeometry | null = null;
  private mode: ColorMode = ColorMode.MONO;
  private pixels: Uint8Array = new Uint8Array(0);
  private listener: FrameListener | null;
  framesPresented = 0;

  constructor(listener?: FrameListener) {
    this.listener = listener ?? null;
  }

  onFrame(listener: FrameListener | null): void {
    this.listener = listener;
  }

  reset(): void {
    this.geometry = null;
    this.mode = ColorMode.MONO;
    this.pixels = new Uint8Array(0);
    this.framesPresented = 0;
  }

  getGeometry(): ScreenGeometry | null {
    return this.geometry;
  }

  service(memory: QTMemory): void {
    const mode = this.readMode(memory);

    if (this.geometry === null) {
      const packed = memory.ports[PORT.SCREEN_GEOMETRY];
      const width = packed >> 8;
      const height = packed & 0xFF;
      if (width === 0 || height === 0) {
        throw new ModuleError(`Screen size ${width}x${height} is empty`);
      }
      this.geometry = { width, height };
      this.mode = mode;
      this.pixels = new Uint8Array(width * height * 4);
      return;
    }

    this.mode = mode;
    const { width, height } = this.geometry;
    const offset = memory.ports[PORT.SCREEN_GEOMETRY];
    decodeFramebuffer(memory.cache, offset, width, height, mode, this.pixels);
    this.present();
  }

  private readMode(memory: QTMemory): ColorMode {
    const mode = memory.ports[PORT.SCREEN_MODE];
    if (!isColorMode(mode)) {
      throw new ModuleError(`Unsupported screen color mode ${mode}`);
    }
    return mode;
  }

  private present(): void {
    if (this.geometry === null) return;
    const frame: ScreenFrame = {
      index: this.framesPresented++,
      width: this.geometry.width,
      height: this.geometry.height,
      mode: this.mode,
      pixels: this.pixels.slice(),
    };
    this.listener?.(frame);
  }
}
