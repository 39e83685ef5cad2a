import type { QTMemory } from '../core/memory';
import type { ColorMode } from './framebuffer';

/**
 * A peripheral reachable through the 0x80 interrupt. The host calls
 * service() when port 0 holds this module's id.
 */
export interface QTModule {
  readonly id: number;
  readonly name: string;

  /** Handle one interrupt. Reads ports and cache; never writes cache. */
  service(memory: QTMemory): void;

  reset(): void;
}

export interface ScreenFrame {
  index: number;
  width: number;
  height: number;
  mode: ColorMode;
  /** RGBA, 4 bytes per pixel */
  pixels: Uint8Array;
}

export type FrameListener = (frame: ScreenFrame) => void;
