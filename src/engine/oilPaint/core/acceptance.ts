/**
 * Acceptance pipeline: pure checks gating every candidate trace.
 *
 * Trajectory checks look at the trace centroid (one point per step); the improvement
 * check looks at every (step, bristle) sample and needs the bristle colors. Positions
 * are rounded to the nearest pixel and samples outside the canvas only count towards
 * the inside fraction. None of the checks mutates the planes or the trace.
 */

import { colorsWithin, meanChannelDistance } from '@/utils/colorUtils';
import type { OilSimulatorConfig } from '../config';
import type { Trace } from '../trace/types';
import type { RasterPlanes } from './rasterPlanes';

/** Floor for the new color distance in the improvement ratio, in color levels */
export const COLOR_DISTANCE_EPS = 1;

export type TrajectoryRejectReason =
  | 'already_visited'
  | 'outside_canvas'
  | 'similar_color'
  | 'color_variation';

export type TraceRejectReason =
  | 'missing_colors'
  | 'outside_canvas'
  | 'similar_color'
  | 'already_painted'
  | 'no_improvement';

export interface CheckResult<Reason extends string> {
  passed: boolean;
  reason: Reason | null;
  metrics: Record<string, number>;
}

type AcceptanceConfig = Pick<
  OilSimulatorConfig,
  | 'backgroundColor'
  | 'maxColorDifference'
  | 'maxVisitsFractionInTrajectory'
  | 'minInsideFractionInTrajectory'
  | 'maxSimilarColorFractionInTrajectory'
  | 'maxColorStdevInTrajectory'
  | 'minInsideFraction'
  | 'maxSimilarColorFraction'
  | 'maxPaintedFraction'
  | 'minColorImprovementFactor'
  | 'bigWellPaintedImprovementFraction'
  | 'minBadPaintedReductionFraction'
  | 'maxWellPaintedDestructionFraction'
>;

function pass(metrics: Record<string, number>): CheckResult<never> {
  return { passed: true, reason: null, metrics };
}

function reject<Reason extends string>(
  reason: Reason,
  metrics: Record<string, number>
): CheckResult<Reason> {
  return { passed: false, reason, metrics };
}

/**
 * Fails when the fraction of in-canvas trajectory points visited by earlier traces
 * exceeds `maxVisitsFractionInTrajectory`.
 */
export function checkTrajectoryVisits(
  planes: RasterPlanes,
  trace: Trace,
  config: AcceptanceConfig
): CheckResult<TrajectoryRejectReason> {
  const visited = planes.visited.data;
  let inside = 0;
  let visitedCount = 0;

  trace.forEachTrajectoryPoint(({ x, y }) => {
    const index = planes.indexOf(x, y);
    if (index < 0) return;
    inside += 1;
    if (visited[index] !== 0) visitedCount += 1;
  });

  const visitedFraction = inside > 0 ? visitedCount / inside : 0;
  const metrics = { inside, visitedFraction };
  if (visitedFraction > config.maxVisitsFractionInTrajectory) {
    return reject('already_visited', metrics);
  }
  return pass(metrics);
}

/**
 * Trajectory must be mostly inside the canvas, mostly over badly painted pixels and
 * over a region of uniform target color. Color variation is the largest per-channel
 * population standard deviation.
 */
export function checkTrajectory(
  planes: RasterPlanes,
  trace: Trace,
  config: AcceptanceConfig
): CheckResult<TrajectoryRejectReason> {
  const target = planes.target.data;
  const total = trace.nSteps;
  let inside = 0;
  let similar = 0;
  const sum = [0, 0, 0];
  const sumSq = [0, 0, 0];

  trace.forEachTrajectoryPoint(({ x, y }) => {
    const index = planes.indexOf(x, y);
    if (index < 0) return;
    inside += 1;
    if (planes.paintedMatchesTarget(index)) similar += 1;
    const offset = index * 3;
    for (let c = 0; c < 3; c++) {
      const v = target[offset + c];
      sum[c] += v;
      sumSq[c] += v * v;
    }
  });

  const insideFraction = total > 0 ? inside / total : 0;
  if (inside === 0 || insideFraction < config.minInsideFractionInTrajectory) {
    return reject('outside_canvas', { insideFraction });
  }

  const similarFraction = similar / inside;
  if (similarFraction > config.maxSimilarColorFractionInTrajectory) {
    return reject('similar_color', { insideFraction, similarFraction });
  }

  let colorStdev = 0;
  for (let c = 0; c < 3; c++) {
    const mean = sum[c] / inside;
    const variance = Math.max(0, sumSq[c] / inside - mean * mean);
    colorStdev = Math.max(colorStdev, Math.sqrt(variance));
  }
  const metrics = { insideFraction, similarFraction, colorStdev };
  if (colorStdev > config.maxColorStdevInTrajectory) {
    return reject('color_variation', metrics);
  }
  return pass(metrics);
}

/**
 * Decides whether painting the trace with its computed bristle colors improves the
 * painting. Accepts on a real color improvement that does not spoil well painted
 * pixels, or on a large gain of well painted pixels.
 */
export function checkTraceImprovement(
  planes: RasterPlanes,
  trace: Trace,
  config: AcceptanceConfig
): CheckResult<TraceRejectReason> {
  if (!trace.hasBristleColors()) {
    return reject('missing_colors', {});
  }

  const painted = planes.painted.data;
  const target = planes.target.data;
  const background = config.backgroundColor;
  const tolerance = config.maxColorDifference;

  let total = 0;
  let inside = 0;
  let similar = 0;
  let alreadyPainted = 0;
  let wellBefore = 0;
  let wellAfter = 0;
  let distanceOld = 0;
  let distanceNew = 0;

  trace.forEachBristleSample(({ step, bristle, x, y }) => {
    total += 1;
    const index = planes.indexOf(x, y);
    if (index < 0) return;
    const color = trace.getBristleColor(step, bristle);
    if (!color) return;
    inside += 1;

    const offset = index * 3;
    const pr = painted[offset];
    const pg = painted[offset + 1];
    const pb = painted[offset + 2];
    const tr = target[offset];
    const tg = target[offset + 1];
    const tb = target[offset + 2];

    if (planes.paintedMatchesTarget(index)) similar += 1;
    if (pr !== background[0] || pg !== background[1] || pb !== background[2]) {
      alreadyPainted += 1;
    }
    if (planes.isWellPainted(index)) wellBefore += 1;
    if (colorsWithin(color[0], color[1], color[2], tr, tg, tb, tolerance)) wellAfter += 1;

    distanceOld += meanChannelDistance(pr, pg, pb, tr, tg, tb);
    distanceNew += meanChannelDistance(color[0], color[1], color[2], tr, tg, tb);
  });

  const insideFraction = total > 0 ? inside / total : 0;
  if (inside === 0 || insideFraction < config.minInsideFraction) {
    return reject('outside_canvas', { insideFraction });
  }

  const similarFraction = similar / inside;
  if (similarFraction > config.maxSimilarColorFraction) {
    return reject('similar_color', { insideFraction, similarFraction });
  }

  const paintedFraction = alreadyPainted / inside;
  if (paintedFraction > config.maxPaintedFraction) {
    return reject('already_painted', { insideFraction, similarFraction, paintedFraction });
  }

  const colorImprovement =
    distanceOld / inside / Math.max(distanceNew / inside, COLOR_DISTANCE_EPS);
  const destructionFraction = (wellBefore - wellAfter) / inside;
  const badBefore = inside - wellBefore;
  const badAfter = inside - wellAfter;
  const badReductionFraction = (badBefore - badAfter) / inside;
  const wellPaintedGainFraction = (wellAfter - wellBefore) / inside;

  const metrics = {
    insideFraction,
    similarFraction,
    paintedFraction,
    colorImprovement,
    destructionFraction,
    badReductionFraction,
    wellPaintedGainFraction,
  };

  const improvesColor =
    colorImprovement >= config.minColorImprovementFactor &&
    destructionFraction <= config.maxWellPaintedDestructionFraction &&
    badReductionFraction >= config.minBadPaintedReductionFraction;
  const bigWellPaintedGain = wellPaintedGainFraction >= config.bigWellPaintedImprovementFraction;

  if (improvesColor || bigWellPaintedGain) {
    return pass(metrics);
  }
  return reject('no_improvement', metrics);
}

export function alreadyVisitedTrajectory(
  planes: RasterPlanes,
  trace: Trace,
  config: AcceptanceConfig
): boolean {
  return !checkTrajectoryVisits(planes, trace, config).passed;
}

export function validTrajectory(
  planes: RasterPlanes,
  trace: Trace,
  config: AcceptanceConfig
): boolean {
  return checkTrajectory(planes, trace, config).passed;
}

export function traceImprovesPainting(
  planes: RasterPlanes,
  trace: Trace,
  config: AcceptanceConfig
): boolean {
  return checkTraceImprovement(planes, trace, config).passed;
}
