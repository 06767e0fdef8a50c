/**
 * CpuCanvasBackend - CPU implementation of the canvas abstraction
 *
 * Surfaces are plain RGB pixel grids. A bristle step is rasterized as a capsule:
 * every pixel whose center lies within the bristle radius of the segment between
 * the previous and the current bristle position takes the bristle color.
 */

import {
  copyPixelGrid,
  createPixelGrid,
  fillRgb,
  type PixelGrid,
  type Rgb,
} from '@/utils/pixelGrid';
import { canvasUnavailable } from '../errors';
import type { BristleStampTarget, Point, Trace } from '../trace/types';
import type { CanvasBackend, CanvasBackendFactory, CanvasBackendOptions } from './types';

const SCOPE = 'CpuCanvasBackend';

/** Largest surface the CPU backend will allocate */
export const MAX_CPU_CANVAS_PIXELS = 64 * 1024 * 1024;

function allocateSurface(width: number, height: number): PixelGrid {
  if (width * height > MAX_CPU_CANVAS_PIXELS) {
    throw canvasUnavailable(SCOPE, `Surface ${width}x${height} exceeds the CPU canvas limit`);
  }
  try {
    return createPixelGrid(width, height, 3);
  } catch (error) {
    throw canvasUnavailable(SCOPE, `Failed to allocate ${width}x${height} surface: ${error}`);
  }
}

function distanceSqToSegment(px: number, py: number, from: Point, to: Point): number {
  const dx = to.x - from.x;
  const dy = to.y - from.y;
  const lenSq = dx * dx + dy * dy;
  let t = 0;
  if (lenSq > 0) {
    t = Math.max(0, Math.min(1, ((px - from.x) * dx + (py - from.y) * dy) / lenSq));
  }
  const cx = from.x + t * dx - px;
  const cy = from.y + t * dy - py;
  return cx * cx + cy * cy;
}

/**
 * Fills the capsule around `from`-`to` on an RGB grid.
 */
export function stampCapsule(
  surface: PixelGrid,
  from: Point,
  to: Point,
  radius: number,
  color: Rgb
): void {
  const minX = Math.max(0, Math.floor(Math.min(from.x, to.x) - radius));
  const maxX = Math.min(surface.width - 1, Math.ceil(Math.max(from.x, to.x) + radius));
  const minY = Math.max(0, Math.floor(Math.min(from.y, to.y) - radius));
  const maxY = Math.min(surface.height - 1, Math.ceil(Math.max(from.y, to.y) + radius));
  const radiusSq = radius * radius;
  const { data, width } = surface;

  for (let y = minY; y <= maxY; y++) {
    for (let x = minX; x <= maxX; x++) {
      if (distanceSqToSegment(x, y, from, to) > radiusSq) continue;
      const offset = (y * width + x) * 3;
      data[offset] = color[0];
      data[offset + 1] = color[1];
      data[offset + 2] = color[2];
    }
  }
}

export class CpuCanvasBackend implements CanvasBackend, BristleStampTarget {
  readonly width: number;
  readonly height: number;

  private primary: PixelGrid;
  private buffer: PixelGrid | null;
  private drawing = false;
  private disposed = false;

  constructor(width: number, height: number, options: CanvasBackendOptions) {
    this.width = width;
    this.height = height;
    this.primary = allocateSurface(width, height);
    this.buffer = options.useBuffer ? allocateSurface(width, height) : null;
  }

  get hasBuffer(): boolean {
    return this.buffer !== null;
  }

  clear(color: Rgb): void {
    this.assertAlive();
    fillRgb(this.primary, color);
    if (this.buffer) {
      fillRgb(this.buffer, color);
    }
  }

  begin(): void {
    this.assertAlive();
    if (this.drawing) {
      throw canvasUnavailable(SCOPE, 'begin() called inside an open drawing transaction');
    }
    this.drawing = true;
  }

  end(): void {
    if (!this.drawing) {
      throw canvasUnavailable(SCOPE, 'end() called without a matching begin()');
    }
    this.drawing = false;
  }

  isDrawing(): boolean {
    return this.drawing;
  }

  stampStep(trace: Trace, stepIndex: number): void {
    if (!this.drawing) {
      throw canvasUnavailable(SCOPE, 'stampStep() called outside begin()/end()');
    }
    trace.paintStep(this, stepIndex);
  }

  stampSegment(from: Point, to: Point, radius: number, color: Rgb): void {
    if (!this.drawing) {
      throw canvasUnavailable(SCOPE, 'stampSegment() called outside begin()/end()');
    }
    stampCapsule(this.primary, from, to, radius, color);
  }

  readback(dest: PixelGrid): void {
    this.assertAlive();
    copyPixelGrid(this.primary, dest);
  }

  syncBuffer(): void {
    this.assertAlive();
    if (!this.buffer) return;
    copyPixelGrid(this.primary, this.buffer);
  }

  readBuffer(): PixelGrid {
    this.assertAlive();
    if (!this.buffer) {
      throw canvasUnavailable(SCOPE, 'Canvas buffer was not allocated');
    }
    return this.buffer;
  }

  dispose(): void {
    this.disposed = true;
    this.drawing = false;
    this.buffer = null;
  }

  private assertAlive(): void {
    if (this.disposed) {
      throw canvasUnavailable(SCOPE, 'Canvas backend has been disposed');
    }
  }
}

export const createCpuCanvasBackend: CanvasBackendFactory = (width, height, options) =>
  new CpuCanvasBackend(width, height, options);
