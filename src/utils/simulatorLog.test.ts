import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { consoleLogSink, createSimulatorLogger, type SimulatorLogRecord } from './simulatorLog';

describe('createSimulatorLogger', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-02T03:04:05.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('emits nothing when disabled', () => {
    const sink = vi.fn();
    const logger = createSimulatorLogger({ sink });
    logger.log('image.set', { width: 4 });
    expect(logger.enabled).toBe(false);
    expect(sink).not.toHaveBeenCalled();
    expect(logger.getRecentEntries()).toEqual([]);
  });

  it('stamps records and hands them to the sink', () => {
    const records: SimulatorLogRecord[] = [];
    const logger = createSimulatorLogger({ enabled: true, sink: (r) => records.push(r) });
    logger.log('trace.painted', { nTraces: 3 });

    expect(records).toEqual([
      {
        scope: 'trace.painted',
        nTraces: 3,
        time_iso: '2026-01-02T03:04:05.000Z',
        epoch_ms: Date.parse('2026-01-02T03:04:05.000Z'),
      },
    ]);
    expect(logger.getRecentEntries()).toEqual(records);
  });

  it('keeps only the most recent entries', () => {
    const logger = createSimulatorLogger({ enabled: true, sink: () => {}, maxRecentEntries: 2 });
    logger.log('trace.rejected', { n: 1 });
    logger.log('trace.rejected', { n: 2 });
    logger.log('trace.rejected', { n: 3 });

    expect(logger.getRecentEntries().map((r) => r.n)).toEqual([2, 3]);
    logger.clear();
    expect(logger.getRecentEntries()).toEqual([]);
  });

  it('still reaches the sink with the ring disabled', () => {
    const sink = vi.fn();
    const logger = createSimulatorLogger({ enabled: true, sink, maxRecentEntries: 0 });
    logger.log('brush.shrunk', { averageBrushSize: 8 });
    expect(sink).toHaveBeenCalledTimes(1);
    expect(logger.getRecentEntries()).toEqual([]);
  });

  it('payload cannot override the scope', () => {
    const records: SimulatorLogRecord[] = [];
    const logger = createSimulatorLogger({ enabled: true, sink: (r) => records.push(r) });
    logger.log('image.set', { scope: 'other' });
    expect(records[0].scope).toBe('image.set');
  });
});

describe('consoleLogSink', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes console.info with the record scope', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});
    consoleLogSink({ scope: 'image.set', time_iso: 't', epoch_ms: 1, width: 8 });
    expect(info).toHaveBeenCalledWith('[OilSimulator][image.set]', {
      time_iso: 't',
      epoch_ms: 1,
      width: 8,
    });
  });
});
