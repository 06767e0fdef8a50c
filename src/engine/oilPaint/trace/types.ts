import type { PixelGrid, Rgb } from '@/utils/pixelGrid';
import type { RandomFn } from '@/utils/random';

export interface Point {
  x: number;
  y: number;
}

/**
 * Surface a trace stamps its bristles onto. Implemented by canvas backends.
 */
export interface BristleStampTarget {
  readonly width: number;
  readonly height: number;
  /** Paints every pixel whose center lies within `radius` of the segment `from`-`to`. */
  stampSegment(from: Point, to: Point, radius: number, color: Rgb): void;
}

export interface BristleSample {
  step: number;
  bristle: number;
  x: number;
  y: number;
}

export interface BristleColorOptions {
  /**
   * When true, each computed bristle color is written to a scratch copy of the
   * surface so later samples of the same trace mix with it.
   */
  selfBlend: boolean;
}

/**
 * A single brush stroke: trajectory, bristles and per-(step, bristle) colors.
 */
export interface Trace {
  readonly nSteps: number;
  readonly nBristles: number;
  readonly length: number;
  readonly speed: number;
  readonly brushSize: number;
  /** Stamp radius of one bristle in pixels */
  readonly bristleRadius: number;

  getTrajectoryPosition(step: number): Point;
  getBristlePosition(step: number, bristle: number): Point;
  /** null until `calculateBristleColors` has run */
  getBristleColor(step: number, bristle: number): Rgb | null;
  hasBristleColors(): boolean;

  /** Rebuilds the bristles for a new brush size. Drops computed colors. */
  setBrushSize(size: number): void;

  calculateBristleColors(
    surface: PixelGrid,
    target: PixelGrid,
    background: Rgb,
    options: BristleColorOptions
  ): void;

  paintStep(canvas: BristleStampTarget, step: number): void;

  forEachTrajectoryPoint(callback: (point: Point, step: number) => void): void;
  forEachBristleSample(callback: (sample: BristleSample) => void): void;
}

export interface TraceRequest {
  position: Point;
  brushSize: number;
  length: number;
  speed: number;
}

/**
 * Builds candidate traces. Implementations may consume the random source.
 */
export interface TraceFactory {
  createTrace(request: TraceRequest, random: RandomFn): Trace;
}
