/**
 * BrushSchedule - adaptive brush size driving termination
 *
 * Rejected candidates accumulate in two counters. Once either exceeds its budget the
 * brush shrinks; once the brush sits at the smaller size and a budget is exhausted
 * again, the painting is finished.
 */

import type { OilSimulatorConfig } from '../config';

export type BrushScheduleEvent = 'none' | 'shrunk' | 'finished';

type ScheduleConfig = Pick<
  OilSimulatorConfig,
  | 'smallerBrushSize'
  | 'brushSizeDecrement'
  | 'maxInvalidTrajectories'
  | 'maxInvalidTrajectoriesForSmallerSize'
  | 'maxInvalidTraces'
  | 'maxInvalidTracesForSmallerSize'
>;

export interface BrushScheduleSnapshot {
  averageBrushSize: number;
  invalidTrajectoriesCount: number;
  invalidTracesCount: number;
  finished: boolean;
}

export class BrushSchedule {
  private size: number;
  private invalidTrajectories = 0;
  private invalidTraces = 0;
  private done = false;
  private readonly config: ScheduleConfig;

  constructor(config: ScheduleConfig, initialSize: number) {
    this.config = config;
    this.size = Math.max(config.smallerBrushSize, initialSize);
  }

  get averageBrushSize(): number {
    return this.size;
  }

  get invalidTrajectoriesCount(): number {
    return this.invalidTrajectories;
  }

  get invalidTracesCount(): number {
    return this.invalidTraces;
  }

  get finished(): boolean {
    return this.done;
  }

  atSmallerSize(): boolean {
    return this.size <= this.config.smallerBrushSize;
  }

  recordInvalidTrajectory(): BrushScheduleEvent {
    if (this.done) return 'none';
    this.invalidTrajectories += 1;
    const budget = this.atSmallerSize()
      ? this.config.maxInvalidTrajectoriesForSmallerSize
      : this.config.maxInvalidTrajectories;
    return this.invalidTrajectories > budget ? this.shrink() : 'none';
  }

  recordInvalidTrace(): BrushScheduleEvent {
    if (this.done) return 'none';
    this.invalidTraces += 1;
    const budget = this.atSmallerSize()
      ? this.config.maxInvalidTracesForSmallerSize
      : this.config.maxInvalidTraces;
    return this.invalidTraces > budget ? this.shrink() : 'none';
  }

  recordPaintedTrace(): void {
    this.resetCounters();
  }

  snapshot(): BrushScheduleSnapshot {
    return {
      averageBrushSize: this.size,
      invalidTrajectoriesCount: this.invalidTrajectories,
      invalidTracesCount: this.invalidTraces,
      finished: this.done,
    };
  }

  private shrink(): BrushScheduleEvent {
    if (this.atSmallerSize()) {
      this.done = true;
      return 'finished';
    }
    this.size = Math.max(this.config.smallerBrushSize, this.size * this.config.brushSizeDecrement);
    this.resetCounters();
    return 'shrunk';
  }

  private resetCounters(): void {
    this.invalidTrajectories = 0;
    this.invalidTraces = 0;
  }
}
