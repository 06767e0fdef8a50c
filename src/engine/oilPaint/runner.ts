/**
 * Drivers for OilSimulator: a blocking loop for batch rendering and a frame loop
 * for hosts that want to show progress.
 */

import { invalidInput } from './errors';
import type { OilSimulator, OilSimulatorStats } from './OilSimulator';

const SCOPE = 'PaintingLoop';

export interface PaintUntilFinishedOptions {
  stepByStep?: boolean;
  /** Upper bound on update() calls (default unbounded) */
  maxUpdates?: number;
}

/**
 * Calls update() until the painting finishes or `maxUpdates` is reached.
 * Returns the number of updates performed.
 */
export function paintUntilFinished(
  simulator: OilSimulator,
  options: PaintUntilFinishedOptions = {}
): number {
  const stepByStep = options.stepByStep ?? false;
  const maxUpdates = options.maxUpdates ?? Infinity;
  let updates = 0;

  while (!simulator.isFinished() && updates < maxUpdates) {
    simulator.update(stepByStep);
    updates += 1;
  }
  return updates;
}

export type RequestFrame = (callback: () => void) => void;

export interface PaintingLoopOptions {
  simulator: OilSimulator;
  /** update() calls per frame (default 1) */
  updatesPerFrame?: number;
  stepByStep?: boolean;
  /** Frame scheduler, e.g. requestAnimationFrame (default: a zero-delay timeout) */
  requestFrame?: RequestFrame;
  onFrame?: (stats: OilSimulatorStats) => void;
  /** Receives update() failures; without it they are rethrown from the frame */
  onError?: (error: unknown) => void;
}

export interface PaintingLoop {
  start(): void;
  stop(): void;
  isRunning(): boolean;
}

const defaultRequestFrame: RequestFrame = (callback) => {
  setTimeout(callback, 0);
};

export function createPaintingLoop(options: PaintingLoopOptions): PaintingLoop {
  const { simulator, onFrame, onError } = options;
  const updatesPerFrame = options.updatesPerFrame ?? 1;
  const stepByStep = options.stepByStep ?? false;
  const requestFrame = options.requestFrame ?? defaultRequestFrame;

  if (!Number.isInteger(updatesPerFrame) || updatesPerFrame < 1) {
    throw invalidInput(SCOPE, `updatesPerFrame must be a positive integer, got ${updatesPerFrame}`);
  }

  let running = false;
  // Frames scheduled before a stop() must not resume a later start().
  let generation = 0;

  const frame = (frameGeneration: number) => {
    if (!running || frameGeneration !== generation) return;

    try {
      for (let i = 0; i < updatesPerFrame && !simulator.isFinished(); i++) {
        simulator.update(stepByStep);
      }
    } catch (error) {
      running = false;
      if (onError) {
        onError(error);
        return;
      }
      throw error;
    }

    onFrame?.(simulator.getStats());

    if (simulator.isFinished()) {
      running = false;
      return;
    }
    if (running && frameGeneration === generation) {
      requestFrame(() => frame(frameGeneration));
    }
  };

  return {
    start() {
      if (running || simulator.isFinished()) return;
      running = true;
      generation += 1;
      const current = generation;
      requestFrame(() => frame(current));
    },

    stop() {
      running = false;
    },

    isRunning() {
      return running;
    },
  };
}
