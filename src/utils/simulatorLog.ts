/**
 * Structured diagnostic log for the painting simulator.
 *
 * Records are stamped and handed to a sink (console.info by default) and kept in a
 * bounded ring so hosts and tests can inspect recent activity.
 */

export type SimulatorLogScope =
  | 'image.set'
  | 'trace.accepted'
  | 'trace.painted'
  | 'trajectory.rejected'
  | 'trace.rejected'
  | 'brush.shrunk'
  | 'painting.finished';

export interface SimulatorLogRecord {
  scope: SimulatorLogScope;
  time_iso: string;
  epoch_ms: number;
  [key: string]: unknown;
}

export type SimulatorLogSink = (record: SimulatorLogRecord) => void;

export interface SimulatorLoggerOptions {
  enabled?: boolean;
  sink?: SimulatorLogSink;
  maxRecentEntries?: number;
}

export interface SimulatorLogger {
  readonly enabled: boolean;
  log(scope: SimulatorLogScope, payload: Record<string, unknown>): void;
  getRecentEntries(): SimulatorLogRecord[];
  clear(): void;
}

const DEFAULT_MAX_RECENT_ENTRIES = 200;

export const consoleLogSink: SimulatorLogSink = (record) => {
  const { scope, ...rest } = record;
  // eslint-disable-next-line no-console
  console.info(`[OilSimulator][${scope}]`, rest);
};

function normalizeMaxRecentEntries(value: number | undefined): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) return DEFAULT_MAX_RECENT_ENTRIES;
  return Math.max(0, Math.min(10_000, Math.round(value)));
}

export function createSimulatorLogger(options: SimulatorLoggerOptions = {}): SimulatorLogger {
  const enabled = options.enabled ?? false;
  const sink = options.sink ?? consoleLogSink;
  const keep = normalizeMaxRecentEntries(options.maxRecentEntries);
  const recent: SimulatorLogRecord[] = [];

  return {
    enabled,

    log(scope, payload) {
      if (!enabled) return;

      const epochMs = Date.now();
      const record: SimulatorLogRecord = {
        ...payload,
        scope,
        time_iso: new Date(epochMs).toISOString(),
        epoch_ms: epochMs,
      };

      if (keep > 0) {
        recent.push(record);
        if (recent.length > keep) {
          recent.splice(0, recent.length - keep);
        }
      }
      sink(record);
    },

    getRecentEntries() {
      return recent.slice();
    },

    clear() {
      recent.length = 0;
    },
  };
}
