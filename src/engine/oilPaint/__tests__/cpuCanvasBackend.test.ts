import { describe, expect, it } from 'vitest';
import { createPixelGrid, fillRgb, getRgbAt, type PixelGrid, type Rgb } from '@/utils/pixelGrid';
import { solidPixels } from '@/test/oilPaintFixtures';
import {
  CpuCanvasBackend,
  createCpuCanvasBackend,
  stampCapsule,
} from '../canvas/cpuCanvasBackend';
import { isOilSimulatorError } from '../errors';
import { OilTrace } from '../trace/oilTrace';

const WHITE: Rgb = [255, 255, 255];
const RED: Rgb = [200, 0, 0];

function paintedIndices(grid: PixelGrid, background: Rgb): number[] {
  const out: number[] = [];
  for (let i = 0; i < grid.width * grid.height; i++) {
    const [r, g, b] = getRgbAt(grid, i);
    if (r !== background[0] || g !== background[1] || b !== background[2]) out.push(i);
  }
  return out;
}

function expectCanvasUnavailable(run: () => unknown): void {
  let caught: unknown = null;
  try {
    run();
  } catch (error) {
    caught = error;
  }
  expect(isOilSimulatorError(caught, 'canvas_unavailable')).toBe(true);
}

describe('stampCapsule', () => {
  function blank(): PixelGrid {
    const grid = createPixelGrid(5, 5, 3);
    fillRgb(grid, WHITE);
    return grid;
  }

  it('paints the nearest pixel for a point stamp', () => {
    const grid = blank();
    stampCapsule(grid, { x: 2, y: 2 }, { x: 2, y: 2 }, 0.75, RED);
    expect(paintedIndices(grid, WHITE)).toEqual([12]);
    expect(getRgbAt(grid, 12)).toEqual([200, 0, 0]);
  });

  it('includes pixel centers on the radius', () => {
    const grid = blank();
    stampCapsule(grid, { x: 2, y: 2 }, { x: 2, y: 2 }, 1, RED);
    expect(paintedIndices(grid, WHITE)).toEqual([7, 11, 12, 13, 17]);
  });

  it('covers the segment between the two positions', () => {
    const grid = blank();
    stampCapsule(grid, { x: 1, y: 2 }, { x: 3, y: 2 }, 0.75, RED);
    expect(paintedIndices(grid, WHITE)).toEqual([11, 12, 13]);
  });

  it('clips at the surface edges', () => {
    const grid = blank();
    stampCapsule(grid, { x: -1, y: 0 }, { x: 0, y: 0 }, 0.75, RED);
    expect(paintedIndices(grid, WHITE)).toEqual([0]);
  });
});

describe('CpuCanvasBackend', () => {
  it('clears both surfaces', () => {
    const canvas = new CpuCanvasBackend(3, 2, { useBuffer: true });
    canvas.clear(WHITE);
    const dest = createPixelGrid(3, 2, 3);
    canvas.readback(dest);
    expect(paintedIndices(dest, WHITE)).toEqual([]);
    expect(paintedIndices(canvas.readBuffer(), WHITE)).toEqual([]);
  });

  it('stamps trace steps inside a transaction only', () => {
    const canvas = createCpuCanvasBackend(64, 64, { useBuffer: true });
    canvas.clear(WHITE);
    const trace = new OilTrace({
      center: { x: 32, y: 32 },
      angle: 0,
      curvature: 0,
      length: 24,
      speed: 2,
      brushSize: 4,
    });
    const surface = solidPixels(64, 64, WHITE);
    trace.calculateBristleColors(surface, solidPixels(64, 64, RED), WHITE, { selfBlend: false });

    expectCanvasUnavailable(() => canvas.stampStep(trace, 0));

    canvas.begin();
    expect(canvas.isDrawing()).toBe(true);
    canvas.stampStep(trace, 0);
    canvas.end();

    const dest = createPixelGrid(64, 64, 3);
    canvas.readback(dest);
    // Step 0 bristles sit at x = 21, y = 30..34.
    expect(paintedIndices(dest, WHITE)).toEqual([30, 31, 32, 33, 34].map((y) => y * 64 + 21));
    expect(paintedIndices(canvas.readBuffer(), WHITE)).toEqual([]);

    canvas.syncBuffer();
    expect(paintedIndices(canvas.readBuffer(), WHITE)).toHaveLength(5);
  });

  it('rejects unbalanced transactions', () => {
    const canvas = new CpuCanvasBackend(4, 4, { useBuffer: false });
    expectCanvasUnavailable(() => canvas.end());
    canvas.begin();
    expectCanvasUnavailable(() => canvas.begin());
    canvas.end();
    expectCanvasUnavailable(() => canvas.stampSegment({ x: 0, y: 0 }, { x: 1, y: 1 }, 1, RED));
  });

  it('has no buffer to read when created without one', () => {
    const canvas = new CpuCanvasBackend(4, 4, { useBuffer: false });
    expect(canvas.hasBuffer).toBe(false);
    expectCanvasUnavailable(() => canvas.readBuffer());
    canvas.syncBuffer();
  });

  it('refuses surfaces above the pixel limit', () => {
    expectCanvasUnavailable(() => new CpuCanvasBackend(10_000, 10_000, { useBuffer: false }));
  });

  it('is unusable after dispose', () => {
    const canvas = new CpuCanvasBackend(4, 4, { useBuffer: true });
    canvas.dispose();
    expect(canvas.hasBuffer).toBe(false);
    expectCanvasUnavailable(() => canvas.clear(WHITE));
    expectCanvasUnavailable(() => canvas.begin());
    expectCanvasUnavailable(() => canvas.readback(createPixelGrid(4, 4, 3)));
  });
});
