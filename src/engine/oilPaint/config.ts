/**
 * Simulator tuning constants.
 *
 * Passed explicitly at construction; `DEFAULT_OIL_SIMULATOR_CONFIG` holds the stock values.
 */

import { parseColor } from '@/utils/colorUtils';
import type { Rgb } from '@/utils/pixelGrid';
import { invalidInput } from './errors';

export interface OilSimulatorConfig {
  /** The smaller brush size allowed */
  smallerBrushSize: number;
  /** Brush size multiplier applied on every shrink (0-1) */
  brushSizeDecrement: number;
  /** Invalid trajectories allowed before the brush size is reduced */
  maxInvalidTrajectories: number;
  /** Invalid trajectories allowed at the smaller size before the painting is finished */
  maxInvalidTrajectoriesForSmallerSize: number;
  /** Invalid traces allowed before the brush size is reduced */
  maxInvalidTraces: number;
  /** Invalid traces allowed at the smaller size before the painting is finished */
  maxInvalidTracesForSmallerSize: number;
  /** Trace speed in pixels/step */
  traceSpeed: number;
  /** Typical trace length, relative to the brush size */
  relativeTraceLength: number;
  /** Minimum trace length in pixels */
  minTraceLength: number;
  /** Canvas background color */
  backgroundColor: Rgb;
  /** Per-channel tolerance for a painted pixel to count as well painted */
  maxColorDifference: Rgb;
  /** Max fraction of trajectory pixels visited by earlier traces */
  maxVisitsFractionInTrajectory: number;
  /** Min fraction of trajectory pixels inside the canvas */
  minInsideFractionInTrajectory: number;
  /** Max fraction of trajectory pixels already painted with a similar color */
  maxSimilarColorFractionInTrajectory: number;
  /** Max per-channel standard deviation of target colors along the trajectory */
  maxColorStdevInTrajectory: number;
  /** Min fraction of bristle samples inside the canvas */
  minInsideFraction: number;
  /** Max fraction of bristle samples already painted with a similar color */
  maxSimilarColorFraction: number;
  /** Max fraction of bristle samples that already carry paint */
  maxPaintedFraction: number;
  /** Min ratio between the old and the new mean color distance */
  minColorImprovementFactor: number;
  /** Well-painted gain fraction that accepts a trace on its own */
  bigWellPaintedImprovementFraction: number;
  /** Min bad-painted reduction fraction */
  minBadPaintedReductionFraction: number;
  /** Max fraction of well-painted samples the trace may spoil */
  maxWellPaintedDestructionFraction: number;
}

export type OilSimulatorConfigInput = Partial<
  Omit<OilSimulatorConfig, 'backgroundColor' | 'maxColorDifference'>
> & {
  backgroundColor?: Rgb | string;
  maxColorDifference?: Rgb | string;
};

const STOCK_CONFIG: OilSimulatorConfig = {
  smallerBrushSize: 4,
  brushSizeDecrement: 0.77,
  maxInvalidTrajectories: 5000,
  maxInvalidTrajectoriesForSmallerSize: 10000,
  maxInvalidTraces: 250,
  maxInvalidTracesForSmallerSize: 350,
  traceSpeed: 2,
  relativeTraceLength: 2.3,
  minTraceLength: 16,
  backgroundColor: [255, 255, 255],
  maxColorDifference: [40, 40, 40],
  maxVisitsFractionInTrajectory: 0.35,
  minInsideFractionInTrajectory: 0.4,
  maxSimilarColorFractionInTrajectory: 0.6,
  maxColorStdevInTrajectory: 45,
  minInsideFraction: 0.7,
  maxSimilarColorFraction: 0.8,
  maxPaintedFraction: 0.65,
  minColorImprovementFactor: 1.2,
  bigWellPaintedImprovementFraction: 0.3,
  minBadPaintedReductionFraction: 0.1,
  maxWellPaintedDestructionFraction: 0.4,
};

export const DEFAULT_OIL_SIMULATOR_CONFIG: Readonly<OilSimulatorConfig> =
  Object.freeze(STOCK_CONFIG);

const SCOPE = 'OilSimulatorConfig';

type NumericKey = Exclude<keyof OilSimulatorConfig, 'backgroundColor' | 'maxColorDifference'>;

const POSITIVE_KEYS: NumericKey[] = [
  'smallerBrushSize',
  'traceSpeed',
  'relativeTraceLength',
  'minTraceLength',
];

const COUNT_KEYS: NumericKey[] = [
  'maxInvalidTrajectories',
  'maxInvalidTrajectoriesForSmallerSize',
  'maxInvalidTraces',
  'maxInvalidTracesForSmallerSize',
];

const NON_NEGATIVE_KEYS: NumericKey[] = [
  'maxVisitsFractionInTrajectory',
  'minInsideFractionInTrajectory',
  'maxSimilarColorFractionInTrajectory',
  'maxColorStdevInTrajectory',
  'minInsideFraction',
  'maxSimilarColorFraction',
  'maxPaintedFraction',
  'minBadPaintedReductionFraction',
  'maxWellPaintedDestructionFraction',
];

// Infinity switches the corresponding acceptance path off.
const UNBOUNDED_KEYS: NumericKey[] = [
  'minColorImprovementFactor',
  'bigWellPaintedImprovementFraction',
];

function requireNumber(
  key: string,
  value: number,
  check: (v: number) => boolean,
  rule: string
): void {
  if (typeof value !== 'number' || Number.isNaN(value) || !check(value)) {
    throw invalidInput(SCOPE, `${key} must be ${rule}, got ${String(value)}`);
  }
}

function resolveColor(key: string, value: Rgb | string): Rgb {
  const color = parseColor(value);
  if (!color) {
    throw invalidInput(SCOPE, `${key} must be an [r, g, b] tuple or hex color`);
  }
  return Object.freeze(color);
}

/**
 * Merges `input` over the defaults and validates the result.
 * Throws an `invalid_input` OilSimulatorError on the first bad value.
 */
export function resolveOilSimulatorConfig(
  input: OilSimulatorConfigInput = {}
): Readonly<OilSimulatorConfig> {
  const { backgroundColor, maxColorDifference, ...numeric } = input;
  const merged: OilSimulatorConfig = {
    ...DEFAULT_OIL_SIMULATOR_CONFIG,
    ...numeric,
    backgroundColor: resolveColor(
      'backgroundColor',
      backgroundColor ?? DEFAULT_OIL_SIMULATOR_CONFIG.backgroundColor
    ),
    maxColorDifference: resolveColor(
      'maxColorDifference',
      maxColorDifference ?? DEFAULT_OIL_SIMULATOR_CONFIG.maxColorDifference
    ),
  };

  for (const key of POSITIVE_KEYS) {
    requireNumber(key, merged[key], (v) => Number.isFinite(v) && v > 0, 'a finite positive number');
  }
  for (const key of COUNT_KEYS) {
    requireNumber(key, merged[key], (v) => Number.isInteger(v) && v >= 0, 'a non-negative integer');
  }
  for (const key of NON_NEGATIVE_KEYS) {
    requireNumber(key, merged[key], (v) => Number.isFinite(v) && v >= 0, 'a finite number >= 0');
  }
  for (const key of UNBOUNDED_KEYS) {
    requireNumber(key, merged[key], (v) => v >= 0, 'a number >= 0 or Infinity');
  }
  requireNumber(
    'brushSizeDecrement',
    merged.brushSizeDecrement,
    (v) => v > 0 && v < 1,
    'between 0 and 1 (exclusive)'
  );

  return Object.freeze(merged);
}

/**
 * Starting brush size for a W x H target.
 */
export function initialBrushSize(
  config: OilSimulatorConfig,
  width: number,
  height: number
): number {
  return Math.max(config.smallerBrushSize, Math.max(width, height) / 6);
}

/**
 * Typical trace length for a brush size.
 */
export function traceLengthFor(config: OilSimulatorConfig, brushSize: number): number {
  return Math.max(config.minTraceLength, config.relativeTraceLength * brushSize);
}
