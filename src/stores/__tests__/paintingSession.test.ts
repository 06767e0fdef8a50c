import { describe, expect, it } from 'vitest';
import {
  createPaintingSessionStore,
  INITIAL_PAINTING_SESSION,
  type PaintingSessionSnapshot,
} from '../paintingSession';

const PAINTING: PaintingSessionSnapshot = {
  phase: 'painting',
  width: 32,
  height: 16,
  nTraces: 3,
  averageBrushSize: 5.5,
  nBadPaintedPixels: 100,
  wellPaintedFraction: 0.8,
  invalidTrajectoriesCount: 2,
  invalidTracesCount: 1,
  traceStep: 0,
  lastEvent: 'trace_painted',
};

describe('painting session store', () => {
  it('starts idle', () => {
    const store = createPaintingSessionStore();
    expect(store.getState()).toMatchObject({ ...INITIAL_PAINTING_SESSION, revision: 0 });
  });

  it('publishes snapshots and counts revisions', () => {
    const store = createPaintingSessionStore();
    store.getState().publish(PAINTING);
    expect(store.getState()).toMatchObject({ ...PAINTING, revision: 1 });

    store.getState().publish({ ...PAINTING, phase: 'finished', lastEvent: 'painting_finished' });
    expect(store.getState().phase).toBe('finished');
    expect(store.getState().lastEvent).toBe('painting_finished');
    expect(store.getState().revision).toBe(2);
  });

  it('notifies subscribers on publish', () => {
    const store = createPaintingSessionStore();
    const phases: string[] = [];
    const unsubscribe = store.subscribe((state) => phases.push(state.phase));

    store.getState().publish(PAINTING);
    unsubscribe();
    store.getState().publish({ ...PAINTING, phase: 'finished' });

    expect(phases).toEqual(['painting']);
  });

  it('resets to the idle state', () => {
    const store = createPaintingSessionStore();
    store.getState().publish(PAINTING);
    store.getState().reset();
    expect(store.getState()).toMatchObject({ ...INITIAL_PAINTING_SESSION, revision: 0 });
  });

  it('keeps stores independent', () => {
    const first = createPaintingSessionStore();
    const second = createPaintingSessionStore();
    first.getState().publish(PAINTING);
    expect(second.getState().phase).toBe('idle');
  });
});
