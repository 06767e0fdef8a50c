/**
 * Painting Session Store
 *
 * Observable progress of one simulator run, for hosts that render a HUD or drive
 * a frame loop:
 * - phase (idle / painting / finished)
 * - trace count and current brush size
 * - well/bad painted coverage
 * - schedule counters and the last notable event
 */

import { createStore } from 'zustand/vanilla';
import { immer } from 'zustand/middleware/immer';

// ============================================================================
// Types
// ============================================================================

export type PaintingPhase = 'idle' | 'painting' | 'finished';

export type PaintingSessionEvent =
  | 'image_set'
  | 'trace_accepted'
  | 'trace_step'
  | 'trace_painted'
  | 'trajectory_rejected'
  | 'trace_rejected'
  | 'brush_shrunk'
  | 'painting_finished';

export interface PaintingSessionSnapshot {
  phase: PaintingPhase;
  width: number;
  height: number;
  /** Completed traces since the last setImage */
  nTraces: number;
  averageBrushSize: number;
  nBadPaintedPixels: number;
  /** Fraction of pixels matching the target within tolerance (0-1) */
  wellPaintedFraction: number;
  invalidTrajectoriesCount: number;
  invalidTracesCount: number;
  /** Step of the trace being painted in step-by-step mode */
  traceStep: number;
  lastEvent: PaintingSessionEvent | null;
}

// ============================================================================
// Store State & Actions
// ============================================================================

interface PaintingSessionState extends PaintingSessionSnapshot {
  /** Number of publish() calls since the last reset */
  revision: number;

  /** Replace the published progress */
  publish: (snapshot: PaintingSessionSnapshot) => void;
  /** Back to the idle state */
  reset: () => void;
}

export const INITIAL_PAINTING_SESSION: Readonly<PaintingSessionSnapshot> = Object.freeze({
  phase: 'idle',
  width: 0,
  height: 0,
  nTraces: 0,
  averageBrushSize: 0,
  nBadPaintedPixels: 0,
  wellPaintedFraction: 0,
  invalidTrajectoriesCount: 0,
  invalidTracesCount: 0,
  traceStep: 0,
  lastEvent: null,
});

export const createPaintingSessionStore = () =>
  createStore<PaintingSessionState>()(
    immer((set) => ({
      ...INITIAL_PAINTING_SESSION,
      revision: 0,

      publish: (snapshot) => {
        set((state) => {
          Object.assign(state, snapshot);
          state.revision += 1;
        });
      },

      reset: () => {
        set((state) => {
          Object.assign(state, INITIAL_PAINTING_SESSION);
          state.revision = 0;
        });
      },
    }))
  );

export type PaintingSessionStore = ReturnType<typeof createPaintingSessionStore>;
