/**
 * Bristle color mixing model.
 *
 * Every bristle starts loaded with the mean target color along the trajectory. As the
 * trace advances the brush runs dry and picks up more of the paint already on the
 * canvas: the deposited color is mixed with the underlying paint by a fraction that
 * grows linearly from 0 at the first step to PAINT_MIX_FRACTION at the last one.
 * Bare canvas (background color) never mixes.
 */

import { mixRgb } from '@/utils/colorUtils';
import {
  clonePixelGrid,
  getRgbAt,
  rgbEqualsAt,
  roundedPixelIndex,
  setRgbAt,
  type PixelGrid,
  type Rgb,
} from '@/utils/pixelGrid';
import type { Point } from './types';

export const PAINT_MIX_FRACTION = 0.5;

/**
 * Mean target color over the in-canvas points. Falls back to the clamped middle point
 * when every point is outside.
 */
export function averageTargetColor(target: PixelGrid, points: readonly Point[]): Rgb {
  let r = 0;
  let g = 0;
  let b = 0;
  let count = 0;

  for (const point of points) {
    const index = roundedPixelIndex(target, point.x, point.y);
    if (index < 0) continue;
    const offset = index * 3;
    r += target.data[offset];
    g += target.data[offset + 1];
    b += target.data[offset + 2];
    count += 1;
  }

  if (count > 0) {
    return [Math.round(r / count), Math.round(g / count), Math.round(b / count)];
  }

  const middle = points[Math.floor(points.length / 2)] ?? { x: 0, y: 0 };
  const x = Math.max(0, Math.min(target.width - 1, Math.round(middle.x)));
  const y = Math.max(0, Math.min(target.height - 1, Math.round(middle.y)));
  return getRgbAt(target, y * target.width + x);
}

export function mixFractionForStep(step: number, nSteps: number): number {
  if (nSteps <= 1) return 0;
  return (PAINT_MIX_FRACTION * step) / (nSteps - 1);
}

export interface BristleColorInput {
  nSteps: number;
  nBristles: number;
  paint: Rgb;
  bristlePosition: (step: number, bristle: number) => Point;
  surface: PixelGrid;
  background: Rgb;
  selfBlend: boolean;
}

/**
 * Returns interleaved RGB colors indexed by `(step * nBristles + bristle) * 3`.
 */
export function computeBristleColors(input: BristleColorInput): Uint8ClampedArray {
  const { nSteps, nBristles, paint, bristlePosition, background, selfBlend } = input;
  const surface = selfBlend ? clonePixelGrid(input.surface) : input.surface;
  const colors = new Uint8ClampedArray(nSteps * nBristles * 3);

  for (let step = 0; step < nSteps; step++) {
    const mix = mixFractionForStep(step, nSteps);
    for (let bristle = 0; bristle < nBristles; bristle++) {
      const position = bristlePosition(step, bristle);
      const index = roundedPixelIndex(surface, position.x, position.y);
      let color: Rgb = paint;
      if (index >= 0 && mix > 0 && !rgbEqualsAt(surface, index, background)) {
        color = mixRgb(paint, getRgbAt(surface, index), mix);
      }

      const offset = (step * nBristles + bristle) * 3;
      colors[offset] = color[0];
      colors[offset + 1] = color[1];
      colors[offset + 2] = color[2];

      if (selfBlend && index >= 0) {
        setRgbAt(surface, index, color);
      }
    }
  }

  return colors;
}
