import type { PixelGrid, Rgb } from '@/utils/pixelGrid';
import type { Trace } from '../trace/types';

/**
 * Drawable two-surface canvas (primary + optional mixing buffer).
 *
 * Stamping is only allowed between `begin()` and `end()`.
 */
export interface CanvasBackend {
  readonly width: number;
  readonly height: number;
  readonly hasBuffer: boolean;

  clear(color: Rgb): void;
  begin(): void;
  end(): void;
  isDrawing(): boolean;
  stampStep(trace: Trace, stepIndex: number): void;
  /** Copies the primary surface into `dest` (RGB, same size). */
  readback(dest: PixelGrid): void;
  /** Copies the primary surface into the buffer. */
  syncBuffer(): void;
  /** The buffer surface, read-only for callers. */
  readBuffer(): PixelGrid;
  dispose(): void;
}

export interface CanvasBackendOptions {
  useBuffer: boolean;
}

export type CanvasBackendFactory = (
  width: number,
  height: number,
  options: CanvasBackendOptions
) => CanvasBackend;
