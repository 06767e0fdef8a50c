/**
 * OilTrace - default trace collaborator
 *
 * An arc-shaped trajectory through the pivot, an odd number of bristles spread across
 * the brush width and one color per (step, bristle) from the mixing model.
 */

import type { PixelGrid, Rgb } from '@/utils/pixelGrid';
import { randomSigned, type RandomFn } from '@/utils/random';
import { averageTargetColor, computeBristleColors } from './bristleColors';
import { bristleOffsetsFor, bristleRadiusFor } from './bristles';
import { buildArcTrajectory, type ArcTrajectory } from './trajectory';
import type {
  BristleColorOptions,
  BristleSample,
  BristleStampTarget,
  Point,
  Trace,
  TraceFactory,
  TraceRequest,
} from './types';

/** Total heading change allowed along one trace, radians */
export const MAX_TRACE_TURN = Math.PI / 4;

/** Relative spread of the brush size around the requested average */
export const BRUSH_SIZE_JITTER = 0.1;

export interface OilTraceParams {
  center: Point;
  angle: number;
  curvature: number;
  length: number;
  speed: number;
  brushSize: number;
}

export class OilTrace implements Trace {
  readonly length: number;
  readonly speed: number;

  private trajectory: ArcTrajectory;
  private offsets: number[] = [];
  private size = 0;
  private radius = 0;
  private colors: Uint8ClampedArray | null = null;

  constructor(params: OilTraceParams) {
    this.length = params.length;
    this.speed = params.speed;
    this.trajectory = buildArcTrajectory(params);
    this.setBrushSize(params.brushSize);
  }

  get nSteps(): number {
    return this.trajectory.points.length;
  }

  get nBristles(): number {
    return this.offsets.length;
  }

  get brushSize(): number {
    return this.size;
  }

  get bristleRadius(): number {
    return this.radius;
  }

  setBrushSize(size: number): void {
    this.size = size;
    this.offsets = bristleOffsetsFor(size);
    this.radius = bristleRadiusFor(size);
    this.colors = null;
  }

  getTrajectoryPosition(step: number): Point {
    const point = this.trajectory.points[step];
    if (!point) {
      throw new RangeError(`[OilTrace] Step ${step} out of range (nSteps=${this.nSteps})`);
    }
    return point;
  }

  getBristlePosition(step: number, bristle: number): Point {
    const center = this.getTrajectoryPosition(step);
    const offset = this.offsets[bristle];
    if (offset === undefined) {
      throw new RangeError(
        `[OilTrace] Bristle ${bristle} out of range (nBristles=${this.nBristles})`
      );
    }
    const heading = this.trajectory.headings[step] ?? 0;
    return {
      x: center.x - Math.sin(heading) * offset,
      y: center.y + Math.cos(heading) * offset,
    };
  }

  getBristleColor(step: number, bristle: number): Rgb | null {
    if (!this.colors) return null;
    const offset = (step * this.nBristles + bristle) * 3;
    return [this.colors[offset], this.colors[offset + 1], this.colors[offset + 2]];
  }

  hasBristleColors(): boolean {
    return this.colors !== null;
  }

  calculateBristleColors(
    surface: PixelGrid,
    target: PixelGrid,
    background: Rgb,
    options: BristleColorOptions
  ): void {
    this.colors = computeBristleColors({
      nSteps: this.nSteps,
      nBristles: this.nBristles,
      paint: averageTargetColor(target, this.trajectory.points),
      bristlePosition: (step, bristle) => this.getBristlePosition(step, bristle),
      surface,
      background,
      selfBlend: options.selfBlend,
    });
  }

  paintStep(canvas: BristleStampTarget, step: number): void {
    for (let bristle = 0; bristle < this.nBristles; bristle++) {
      const color = this.getBristleColor(step, bristle);
      if (!color) {
        throw new Error('[OilTrace] paintStep called before calculateBristleColors');
      }
      const to = this.getBristlePosition(step, bristle);
      const from = step > 0 ? this.getBristlePosition(step - 1, bristle) : to;
      canvas.stampSegment(from, to, this.radius, color);
    }
  }

  forEachTrajectoryPoint(callback: (point: Point, step: number) => void): void {
    this.trajectory.points.forEach((point, step) => callback(point, step));
  }

  forEachBristleSample(callback: (sample: BristleSample) => void): void {
    for (let step = 0; step < this.nSteps; step++) {
      for (let bristle = 0; bristle < this.nBristles; bristle++) {
        const { x, y } = this.getBristlePosition(step, bristle);
        callback({ step, bristle, x, y });
      }
    }
  }
}

/**
 * Default factory. Consumes three random values per trace: heading, curvature and
 * brush size jitter, in that order.
 */
export function createOilTraceFactory(): TraceFactory {
  return {
    createTrace(request: TraceRequest, random: RandomFn): Trace {
      const angle = random() * 2 * Math.PI;
      const curvature = (randomSigned(random) * MAX_TRACE_TURN) / request.length;
      const brushSize = request.brushSize * (1 + randomSigned(random) * BRUSH_SIZE_JITTER);
      return new OilTrace({
        center: request.position,
        angle,
        curvature,
        length: request.length,
        speed: request.speed,
        brushSize,
      });
    },
  };
}
