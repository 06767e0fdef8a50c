/**
 * Bristle layout across the brush width.
 *
 * Bristle count is always odd so the middle bristle rides the trajectory itself.
 */

/** Bristles per pixel of brush width */
export const BRISTLE_DENSITY = 1;

const MIN_BRISTLE_RADIUS = 0.75;
const BRISTLE_RADIUS_FACTOR = 0.75;

export function bristleCountFor(brushSize: number): number {
  if (!Number.isFinite(brushSize) || brushSize <= 0) return 1;
  const half = Math.floor((brushSize * BRISTLE_DENSITY) / 2);
  return 2 * half + 1;
}

/**
 * Signed offsets from the trajectory, perpendicular to the heading, spanning the brush width.
 */
export function bristleOffsetsFor(brushSize: number): number[] {
  const n = bristleCountFor(brushSize);
  if (n === 1) return [0];

  const spacing = brushSize / (n - 1);
  const mid = (n - 1) / 2;
  const offsets: number[] = [];
  for (let b = 0; b < n; b++) {
    offsets.push((b - mid) * spacing);
  }
  return offsets;
}

/**
 * Stamp radius wide enough for neighbouring bristles to overlap.
 */
export function bristleRadiusFor(brushSize: number): number {
  const n = bristleCountFor(brushSize);
  const spacing = n > 1 ? brushSize / (n - 1) : brushSize;
  return Math.max(MIN_BRISTLE_RADIUS, BRISTLE_RADIUS_FACTOR * spacing);
}
