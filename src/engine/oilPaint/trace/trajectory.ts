/**
 * Trace trajectories: circular arcs sampled at a fixed speed, centered on the pivot.
 *
 * A curvature of 0 gives a straight segment. Arc length parameter s runs from
 * -(n-1)/2 * speed to +(n-1)/2 * speed, so the pivot sits at the middle of the trace.
 */

import type { Point } from './types';

const STRAIGHT_CURVATURE_EPS = 1e-9;

export interface ArcTrajectoryParams {
  center: Point;
  /** Heading at the pivot, radians */
  angle: number;
  /** Heading change per pixel of arc length */
  curvature: number;
  length: number;
  speed: number;
}

export interface ArcTrajectory {
  points: Point[];
  /** Heading at each point, radians */
  headings: number[];
}

export function stepCountFor(length: number, speed: number): number {
  if (!Number.isFinite(length) || !Number.isFinite(speed) || speed <= 0) return 1;
  return Math.max(1, Math.round(length / speed));
}

export function arcPointAt(params: ArcTrajectoryParams, s: number): Point {
  const { center, angle, curvature } = params;
  if (Math.abs(curvature) < STRAIGHT_CURVATURE_EPS) {
    return {
      x: center.x + s * Math.cos(angle),
      y: center.y + s * Math.sin(angle),
    };
  }
  const heading = angle + curvature * s;
  return {
    x: center.x + (Math.sin(heading) - Math.sin(angle)) / curvature,
    y: center.y - (Math.cos(heading) - Math.cos(angle)) / curvature,
  };
}

export function buildArcTrajectory(params: ArcTrajectoryParams): ArcTrajectory {
  const nSteps = stepCountFor(params.length, params.speed);
  const mid = (nSteps - 1) / 2;
  const points: Point[] = [];
  const headings: number[] = [];

  for (let i = 0; i < nSteps; i++) {
    const s = (i - mid) * params.speed;
    points.push(arcPointAt(params, s));
    headings.push(params.angle + params.curvature * s);
  }

  return { points, headings };
}
