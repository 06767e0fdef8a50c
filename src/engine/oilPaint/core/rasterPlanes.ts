/**
 * RasterPlanes - the simulator bookkeeping rasters
 *
 * - target: the image to paint (RGB, copied on setTarget)
 * - painted: readback of the canvas at the last trace boundary (RGB)
 * - visited: saturating per-pixel visit counter (1 channel)
 * - similar: 255 where painted matches target within tolerance, else 0 (1 channel)
 * - badPainted: ascending indices of every pixel where similar is 0
 *
 * After setTarget() and refreshAfterTrace() the planes agree with each other.
 */

import { colorsWithin } from '@/utils/colorUtils';
import {
  clonePixelGrid,
  createPixelGrid,
  fillRgb,
  roundedPixelIndex,
  sameGridSize,
  type PixelGrid,
  type Rgb,
} from '@/utils/pixelGrid';
import type { CanvasBackend } from '../canvas/types';
import type { Trace } from '../trace/types';

export const SIMILAR_COLOR = 255;
export const VISIT_INCREMENT = 32;
export const MAX_VISITS = 255;

export interface RasterPlanesOptions {
  maxColorDifference: Rgb;
  background: Rgb;
}

export class RasterPlanes {
  private targetGrid: PixelGrid = createPixelGrid(0, 0, 3);
  private paintedGrid: PixelGrid = createPixelGrid(0, 0, 3);
  private visitedGrid: PixelGrid = createPixelGrid(0, 0, 1);
  private similarGrid: PixelGrid = createPixelGrid(0, 0, 1);
  private badPainted = new Uint32Array(0);
  private nBad = 0;

  private readonly maxColorDifference: Rgb;
  private readonly background: Rgb;

  constructor(options: RasterPlanesOptions) {
    this.maxColorDifference = options.maxColorDifference;
    this.background = options.background;
  }

  get width(): number {
    return this.targetGrid.width;
  }

  get height(): number {
    return this.targetGrid.height;
  }

  get target(): Readonly<PixelGrid> {
    return this.targetGrid;
  }

  get painted(): Readonly<PixelGrid> {
    return this.paintedGrid;
  }

  get visited(): Readonly<PixelGrid> {
    return this.visitedGrid;
  }

  get similar(): Readonly<PixelGrid> {
    return this.similarGrid;
  }

  get nBadPaintedPixels(): number {
    return this.nBad;
  }

  /**
   * Bad painted pixel indices (a view, valid until the next refresh).
   */
  getBadPaintedIndices(): Uint32Array {
    return this.badPainted.subarray(0, this.nBad);
  }

  badPaintedAt(position: number): number {
    return this.badPainted[position];
  }

  /**
   * Binds a new target. Returns true when the painted plane was reset to the
   * background, which always happens when the size changes.
   */
  setTarget(pixels: PixelGrid, clear: boolean): boolean {
    const resize = !sameGridSize(this.targetGrid, pixels);
    this.targetGrid = clonePixelGrid(pixels);

    const reset = clear || resize;
    if (resize) {
      const { width, height } = pixels;
      this.paintedGrid = createPixelGrid(width, height, 3);
      this.visitedGrid = createPixelGrid(width, height, 1);
      this.similarGrid = createPixelGrid(width, height, 1);
      this.badPainted = new Uint32Array(width * height);
    }
    if (reset) {
      fillRgb(this.paintedGrid, this.background);
      this.visitedGrid.data.fill(0);
    }

    this.recomputeSimilar();
    return reset;
  }

  /**
   * Reads the canvas back into `painted` and rebuilds `similar` and `badPainted`.
   */
  refreshAfterTrace(canvas: CanvasBackend): void {
    canvas.readback(this.paintedGrid);
    this.recomputeSimilar();
  }

  /**
   * Saturating increment at every (step, bristle) footprint pixel inside the canvas.
   */
  markVisited(trace: Trace): void {
    const visited = this.visitedGrid.data;
    trace.forEachBristleSample(({ x, y }) => {
      const index = roundedPixelIndex(this.visitedGrid, x, y);
      if (index < 0) return;
      visited[index] = Math.min(MAX_VISITS, visited[index] + VISIT_INCREMENT);
    });
  }

  isInside(x: number, y: number): boolean {
    return roundedPixelIndex(this.targetGrid, x, y) >= 0;
  }

  indexOf(x: number, y: number): number {
    return roundedPixelIndex(this.targetGrid, x, y);
  }

  isWellPainted(index: number): boolean {
    return this.similarGrid.data[index] === SIMILAR_COLOR;
  }

  /**
   * Whether the painted color at `index` matches the target within tolerance.
   */
  paintedMatchesTarget(index: number): boolean {
    const offset = index * 3;
    const painted = this.paintedGrid.data;
    const target = this.targetGrid.data;
    return colorsWithin(
      painted[offset],
      painted[offset + 1],
      painted[offset + 2],
      target[offset],
      target[offset + 1],
      target[offset + 2],
      this.maxColorDifference
    );
  }

  wellPaintedFraction(): number {
    const total = this.width * this.height;
    if (total === 0) return 0;
    return (total - this.nBad) / total;
  }

  private recomputeSimilar(): void {
    const similar = this.similarGrid.data;
    const total = this.width * this.height;
    let nBad = 0;

    for (let index = 0; index < total; index++) {
      if (this.paintedMatchesTarget(index)) {
        similar[index] = SIMILAR_COLOR;
      } else {
        similar[index] = 0;
        this.badPainted[nBad] = index;
        nBad += 1;
      }
    }

    this.nBad = nBad;
  }
}
