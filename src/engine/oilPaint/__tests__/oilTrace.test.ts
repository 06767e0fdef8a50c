import { describe, expect, it } from 'vitest';
import { createPixelGrid, fillRgb, type Rgb } from '@/utils/pixelGrid';
import { makeRandom, solidPixels } from '@/test/oilPaintFixtures';
import { createOilTraceFactory, MAX_TRACE_TURN, OilTrace } from '../trace/oilTrace';
import { arcPointAt } from '../trace/trajectory';
import type { BristleStampTarget, Point } from '../trace/types';

const WHITE: Rgb = [255, 255, 255];

function straightTrace(brushSize = 4, angle = 0): OilTrace {
  return new OilTrace({
    center: { x: 32, y: 32 },
    angle,
    curvature: 0,
    length: 24,
    speed: 2,
    brushSize,
  });
}

function colorize(trace: OilTrace, color: Rgb): void {
  const surface = createPixelGrid(64, 64, 3);
  fillRgb(surface, WHITE);
  trace.calculateBristleColors(surface, solidPixels(64, 64, color), WHITE, { selfBlend: false });
}

interface StampCall {
  from: Point;
  to: Point;
  radius: number;
  color: Rgb;
}

function recordingTarget(): BristleStampTarget & { calls: StampCall[] } {
  const calls: StampCall[] = [];
  return {
    width: 64,
    height: 64,
    calls,
    stampSegment(from, to, radius, color) {
      calls.push({ from, to, radius, color });
    },
  };
}

describe('OilTrace geometry', () => {
  it('derives steps, bristles and radius from length and size', () => {
    const trace = straightTrace();
    expect(trace.nSteps).toBe(12);
    expect(trace.nBristles).toBe(5);
    expect(trace.bristleRadius).toBe(0.75);
    expect(trace.brushSize).toBe(4);
  });

  it('places bristles across the heading', () => {
    const trace = straightTrace();
    expect(trace.getTrajectoryPosition(0)).toEqual({ x: 21, y: 32 });
    expect(trace.getBristlePosition(0, 0)).toEqual({ x: 21, y: 30 });
    expect(trace.getBristlePosition(0, 2)).toEqual({ x: 21, y: 32 });
    expect(trace.getBristlePosition(11, 4)).toEqual({ x: 43, y: 34 });

    const vertical = straightTrace(4, Math.PI / 2);
    const bristle = vertical.getBristlePosition(5, 0);
    expect(bristle.x).toBeCloseTo(34, 10);
    expect(bristle.y).toBeCloseTo(31, 10);
  });

  it('throws RangeError outside the step and bristle ranges', () => {
    const trace = straightTrace();
    expect(() => trace.getTrajectoryPosition(12)).toThrow(RangeError);
    expect(() => trace.getBristlePosition(0, 5)).toThrow(RangeError);
  });

  it('visits samples step by step', () => {
    const trace = straightTrace();
    const samples: Array<[number, number]> = [];
    trace.forEachBristleSample(({ step, bristle }) => samples.push([step, bristle]));
    expect(samples).toHaveLength(60);
    expect(samples.slice(0, 6)).toEqual([
      [0, 0],
      [0, 1],
      [0, 2],
      [0, 3],
      [0, 4],
      [1, 0],
    ]);

    const steps: number[] = [];
    trace.forEachTrajectoryPoint((_point, step) => steps.push(step));
    expect(steps).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11]);
  });
});

describe('OilTrace colors', () => {
  it('has no colors until they are calculated', () => {
    const trace = straightTrace();
    expect(trace.hasBristleColors()).toBe(false);
    expect(trace.getBristleColor(0, 0)).toBeNull();

    colorize(trace, [200, 50, 50]);
    expect(trace.hasBristleColors()).toBe(true);
    expect(trace.getBristleColor(11, 4)).toEqual([200, 50, 50]);
  });

  it('drops colors when the brush size changes', () => {
    const trace = straightTrace();
    colorize(trace, [200, 50, 50]);
    trace.setBrushSize(8);
    expect(trace.nBristles).toBe(9);
    expect(trace.bristleRadius).toBe(0.75);
    expect(trace.hasBristleColors()).toBe(false);
  });

  it('refuses to paint without colors', () => {
    const trace = straightTrace();
    expect(() => trace.paintStep(recordingTarget(), 0)).toThrow(
      '[OilTrace] paintStep called before calculateBristleColors'
    );
  });

  it('stamps each bristle from its previous position', () => {
    const trace = straightTrace();
    colorize(trace, [10, 20, 30]);
    const target = recordingTarget();

    trace.paintStep(target, 0);
    trace.paintStep(target, 1);

    expect(target.calls).toHaveLength(10);
    expect(target.calls[0]).toEqual({
      from: { x: 21, y: 30 },
      to: { x: 21, y: 30 },
      radius: 0.75,
      color: [10, 20, 30],
    });
    expect(target.calls[5]).toEqual({
      from: { x: 21, y: 30 },
      to: { x: 23, y: 30 },
      radius: 0.75,
      color: [10, 20, 30],
    });
  });
});

describe('createOilTraceFactory', () => {
  it('draws heading, curvature and size jitter in that order', () => {
    const factory = createOilTraceFactory();
    const request = { position: { x: 40, y: 20 }, brushSize: 10, length: 20, speed: 2 };
    const trace = factory.createTrace(request, makeRandom([0.25, 0.75, 0.75]));

    expect(trace.nSteps).toBe(10);
    expect(trace.brushSize).toBeCloseTo(10.5, 10);

    const expected = arcPointAt(
      {
        center: request.position,
        angle: Math.PI / 2,
        curvature: (0.5 * MAX_TRACE_TURN) / 20,
        length: 20,
        speed: 2,
      },
      9
    );
    const last = trace.getTrajectoryPosition(9);
    expect(last.x).toBeCloseTo(expected.x, 10);
    expect(last.y).toBeCloseTo(expected.y, 10);
  });

  it('keeps the requested size with a centered jitter draw', () => {
    const trace = createOilTraceFactory().createTrace(
      { position: { x: 0, y: 0 }, brushSize: 6, length: 16, speed: 2 },
      makeRandom([0, 0.5, 0.5])
    );
    expect(trace.brushSize).toBe(6);
    expect(trace.getTrajectoryPosition(0)).toEqual({ x: -7, y: 0 });
  });
});
