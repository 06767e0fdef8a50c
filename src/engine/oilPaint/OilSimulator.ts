/**
 * OilSimulator - the painting control loop
 *
 * Every update either looks for a new trace (pivot, trajectory checks, bristle
 * colors, improvement check) or paints one more step of the accepted trace. The
 * brush shrinks when candidates keep failing and the painting finishes once the
 * smallest brush runs out of budget.
 */

import {
  createPaintingSessionStore,
  type PaintingSessionEvent,
  type PaintingSessionStore,
} from '@/stores/paintingSession';
import { rgbToHex } from '@/utils/colorUtils';
import { pixelGridToRgbaImage, rgbaImageToPixelGrid } from '@/utils/imageUtils';
import type { DisplaySurface, RgbaImage } from '@/utils/imageUtils';
import { createPixelGrid, describeInvalidRgbGrid, type PixelGrid } from '@/utils/pixelGrid';
import { mulberry32, randomInt, type RandomFn } from '@/utils/random';
import {
  createSimulatorLogger,
  type SimulatorLogger,
  type SimulatorLogSink,
} from '@/utils/simulatorLog';
import { createCpuCanvasBackend } from './canvas/cpuCanvasBackend';
import type { CanvasBackend, CanvasBackendFactory } from './canvas/types';
import {
  initialBrushSize,
  resolveOilSimulatorConfig,
  traceLengthFor,
  type OilSimulatorConfig,
  type OilSimulatorConfigInput,
} from './config';
import {
  checkTraceImprovement,
  checkTrajectory,
  checkTrajectoryVisits,
  type CheckResult,
  type TraceRejectReason,
  type TrajectoryRejectReason,
} from './core/acceptance';
import { BrushSchedule, type BrushScheduleEvent } from './core/brushSchedule';
import { RasterPlanes } from './core/rasterPlanes';
import { canvasUnavailable, invalidInput } from './errors';
import { createOilTraceFactory } from './trace/oilTrace';
import type { Point, Trace, TraceFactory } from './trace/types';

const SCOPE = 'OilSimulator';

export interface OilSimulatorOptions {
  /** Mix bristle colors against a buffer synced after every trace (default true) */
  useCanvasBuffer?: boolean;
  /** Emit diagnostic log records (default false) */
  verbose?: boolean;
  config?: OilSimulatorConfigInput;
  /** Random source; takes precedence over `seed` */
  random?: RandomFn;
  /** Seed for the built-in mulberry32 generator */
  seed?: number;
  traceFactory?: TraceFactory;
  createCanvasBackend?: CanvasBackendFactory;
  /** Target of the draw* calls */
  display?: DisplaySurface | null;
  logSink?: SimulatorLogSink;
  maxLogEntries?: number;
  sessionStore?: PaintingSessionStore;
}

export interface OilSimulatorStats {
  width: number;
  height: number;
  nTraces: number;
  traceStep: number;
  averageBrushSize: number;
  invalidTrajectoriesCount: number;
  invalidTracesCount: number;
  nBadPaintedPixels: number;
  wellPaintedFraction: number;
  finished: boolean;
  obtainNewTrace: boolean;
}

export class OilSimulator {
  readonly config: Readonly<OilSimulatorConfig>;
  readonly logger: SimulatorLogger;
  readonly session: PaintingSessionStore;

  private useCanvasBuffer: boolean;
  private random: RandomFn;
  private traceFactory: TraceFactory;
  private createCanvasBackend: CanvasBackendFactory;
  private display: DisplaySurface | null;

  private planes: RasterPlanes;
  private canvas: CanvasBackend | null = null;
  private schedule: BrushSchedule | null = null;
  private trace: Trace | null = null;
  private traceStep = 0;
  private obtainNewTrace = true;
  private nTraces = 0;
  private lastEvent: PaintingSessionEvent | null = null;

  constructor(options: OilSimulatorOptions = {}) {
    this.config = resolveOilSimulatorConfig(options.config);
    this.useCanvasBuffer = options.useCanvasBuffer ?? true;
    this.random =
      options.random ?? (options.seed !== undefined ? mulberry32(options.seed) : Math.random);
    this.traceFactory = options.traceFactory ?? createOilTraceFactory();
    this.createCanvasBackend = options.createCanvasBackend ?? createCpuCanvasBackend;
    this.display = options.display ?? null;
    this.logger = createSimulatorLogger({
      enabled: options.verbose ?? false,
      sink: options.logSink,
      maxRecentEntries: options.maxLogEntries,
    });
    this.session = options.sessionStore ?? createPaintingSessionStore();
    this.planes = new RasterPlanes({
      maxColorDifference: this.config.maxColorDifference,
      background: this.config.backgroundColor,
    });
  }

  // ==========================================================================
  // Image binding
  // ==========================================================================

  /**
   * Binds a new target and starts a new painting session. With `clearCanvas` false
   * and an unchanged size, the current canvas content is kept as the starting point.
   */
  setImagePixels(pixels: PixelGrid, clearCanvas = true): void {
    const problem = describeInvalidRgbGrid(pixels);
    if (problem) {
      throw invalidInput(SCOPE, `Invalid target image: ${problem}`);
    }

    const { width, height } = pixels;
    const previous = this.canvas;
    const resize = !previous || previous.width !== width || previous.height !== height;
    const canvas = resize
      ? this.createCanvasBackend(width, height, { useBuffer: this.useCanvasBuffer })
      : previous;

    if (resize && previous) {
      previous.dispose();
    }
    this.canvas = canvas;

    // A new backend starts blank, so the planes must start from the background too.
    const reset = this.planes.setTarget(pixels, clearCanvas || canvas !== previous);
    if (reset) {
      canvas.clear(this.config.backgroundColor);
    } else {
      // A step-by-step trace may have been interrupted halfway.
      this.planes.refreshAfterTrace(canvas);
      canvas.syncBuffer();
    }

    this.schedule = new BrushSchedule(this.config, initialBrushSize(this.config, width, height));
    this.trace = null;
    this.traceStep = 0;
    this.obtainNewTrace = true;
    this.nTraces = 0;
    this.lastEvent = 'image_set';

    this.logger.log('image.set', {
      width,
      height,
      cleared: reset,
      background: rgbToHex(this.config.backgroundColor),
      averageBrushSize: this.schedule.averageBrushSize,
      nBadPaintedPixels: this.planes.nBadPaintedPixels,
    });
    this.publish();
  }

  /**
   * RGBA variant of setImagePixels(). Alpha is ignored.
   */
  setImage(image: RgbaImage, clearCanvas = true): void {
    const pixels = rgbaImageToPixelGrid(image);
    if (!pixels) {
      throw invalidInput(
        SCOPE,
        `Invalid RGBA image ${image.width}x${image.height} (${image.data.length} bytes)`
      );
    }
    this.setImagePixels(pixels, clearCanvas);
  }

  // ==========================================================================
  // Update loop
  // ==========================================================================

  /**
   * Advances the simulation by one unit: a candidate trace evaluation, or one step
   * of the current trace when `stepByStep` is on. No-op once finished.
   */
  update(stepByStep = false): void {
    const { canvas, schedule } = this;
    if (!canvas || !schedule) {
      throw invalidInput(SCOPE, 'update() called before setImage() or after dispose()');
    }
    if (schedule.finished) return;

    if (this.obtainNewTrace || !this.trace) {
      this.tryNewTrace(canvas, schedule, stepByStep);
    } else {
      this.advanceTrace(canvas, schedule, this.trace);
    }
    this.publish();
  }

  isFinished(): boolean {
    return this.schedule?.finished ?? false;
  }

  private tryNewTrace(canvas: CanvasBackend, schedule: BrushSchedule, stepByStep: boolean): void {
    const brushSize = schedule.averageBrushSize;
    const trace = this.traceFactory.createTrace(
      {
        position: this.pickPivot(),
        brushSize,
        length: traceLengthFor(this.config, brushSize),
        speed: this.config.traceSpeed,
      },
      this.random
    );

    let trajectory = checkTrajectoryVisits(this.planes, trace, this.config);
    if (trajectory.passed) {
      trajectory = checkTrajectory(this.planes, trace, this.config);
    }
    if (!trajectory.passed) {
      this.rejectTrajectory(schedule, trajectory);
      return;
    }

    const surface = this.useCanvasBuffer ? canvas.readBuffer() : this.planes.painted;
    trace.calculateBristleColors(surface, this.planes.target, this.config.backgroundColor, {
      selfBlend: !this.useCanvasBuffer,
    });

    const verdict = checkTraceImprovement(this.planes, trace, this.config);
    if (!verdict.passed) {
      this.rejectTrace(schedule, verdict);
      return;
    }

    this.trace = trace;
    this.traceStep = 0;
    this.obtainNewTrace = false;
    this.lastEvent = 'trace_accepted';
    this.logger.log('trace.accepted', {
      brushSize: trace.brushSize,
      nSteps: trace.nSteps,
      nBristles: trace.nBristles,
      stepByStep,
      ...verdict.metrics,
    });

    if (stepByStep) return;

    canvas.begin();
    try {
      for (let step = 0; step < trace.nSteps; step++) {
        canvas.stampStep(trace, step);
      }
    } finally {
      canvas.end();
    }
    this.traceStep = trace.nSteps;
    this.finishTrace(canvas, schedule, trace);
  }

  private advanceTrace(canvas: CanvasBackend, schedule: BrushSchedule, trace: Trace): void {
    canvas.begin();
    try {
      canvas.stampStep(trace, this.traceStep);
    } finally {
      canvas.end();
    }
    this.traceStep += 1;
    this.lastEvent = 'trace_step';

    if (this.traceStep >= trace.nSteps) {
      this.finishTrace(canvas, schedule, trace);
    }
  }

  private finishTrace(canvas: CanvasBackend, schedule: BrushSchedule, trace: Trace): void {
    this.planes.refreshAfterTrace(canvas);
    this.planes.markVisited(trace);
    this.nTraces += 1;
    this.obtainNewTrace = true;
    this.traceStep = 0;
    schedule.recordPaintedTrace();
    canvas.syncBuffer();

    this.lastEvent = 'trace_painted';
    this.logger.log('trace.painted', {
      nTraces: this.nTraces,
      nBadPaintedPixels: this.planes.nBadPaintedPixels,
      wellPaintedFraction: this.planes.wellPaintedFraction(),
    });
  }

  /**
   * Uniform pick among badly painted pixels, or over the whole canvas when there
   * are none left.
   */
  private pickPivot(): Point {
    const { width, height } = this.planes;
    const nBad = this.planes.nBadPaintedPixels;
    const index =
      nBad > 0
        ? this.planes.badPaintedAt(randomInt(this.random, nBad))
        : randomInt(this.random, width * height);
    return { x: index % width, y: Math.floor(index / width) };
  }

  private rejectTrajectory(
    schedule: BrushSchedule,
    result: CheckResult<TrajectoryRejectReason>
  ): void {
    const event = schedule.recordInvalidTrajectory();
    this.lastEvent = 'trajectory_rejected';
    this.logger.log('trajectory.rejected', {
      reason: result.reason,
      invalidTrajectoriesCount: schedule.invalidTrajectoriesCount,
      ...result.metrics,
    });
    this.handleScheduleEvent(schedule, event);
  }

  private rejectTrace(schedule: BrushSchedule, result: CheckResult<TraceRejectReason>): void {
    const event = schedule.recordInvalidTrace();
    this.lastEvent = 'trace_rejected';
    this.logger.log('trace.rejected', {
      reason: result.reason,
      invalidTracesCount: schedule.invalidTracesCount,
      ...result.metrics,
    });
    this.handleScheduleEvent(schedule, event);
  }

  private handleScheduleEvent(schedule: BrushSchedule, event: BrushScheduleEvent): void {
    if (event === 'shrunk') {
      this.lastEvent = 'brush_shrunk';
      this.logger.log('brush.shrunk', { averageBrushSize: schedule.averageBrushSize });
    } else if (event === 'finished') {
      this.lastEvent = 'painting_finished';
      this.logger.log('painting.finished', {
        nTraces: this.nTraces,
        nBadPaintedPixels: this.planes.nBadPaintedPixels,
        wellPaintedFraction: this.planes.wellPaintedFraction(),
      });
    }
  }

  // ==========================================================================
  // Display
  // ==========================================================================

  drawCanvas(x = 0, y = 0): void {
    const { display, canvas } = this.requireDisplay('drawCanvas');
    const pixels = createPixelGrid(canvas.width, canvas.height, 3);
    canvas.readback(pixels);
    display.putImageData(pixelGridToRgbaImage(pixels), x, y);
  }

  drawImage(x = 0, y = 0): void {
    const { display } = this.requireDisplay('drawImage');
    display.putImageData(pixelGridToRgbaImage(this.planes.target), x, y);
  }

  drawVisitedPixels(x = 0, y = 0): void {
    const { display } = this.requireDisplay('drawVisitedPixels');
    display.putImageData(pixelGridToRgbaImage(this.planes.visited), x, y);
  }

  drawSimilarColorPixels(x = 0, y = 0): void {
    const { display } = this.requireDisplay('drawSimilarColorPixels');
    display.putImageData(pixelGridToRgbaImage(this.planes.similar), x, y);
  }

  private requireDisplay(caller: string): { display: DisplaySurface; canvas: CanvasBackend } {
    if (!this.display) {
      throw canvasUnavailable(SCOPE, `${caller}() requires a display surface`);
    }
    if (!this.canvas) {
      throw canvasUnavailable(SCOPE, `${caller}() called before setImage() or after dispose()`);
    }
    return { display: this.display, canvas: this.canvas };
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getStats(): OilSimulatorStats {
    const schedule = this.schedule?.snapshot();
    return {
      width: this.planes.width,
      height: this.planes.height,
      nTraces: this.nTraces,
      traceStep: this.traceStep,
      averageBrushSize: schedule?.averageBrushSize ?? 0,
      invalidTrajectoriesCount: schedule?.invalidTrajectoriesCount ?? 0,
      invalidTracesCount: schedule?.invalidTracesCount ?? 0,
      nBadPaintedPixels: this.planes.nBadPaintedPixels,
      wellPaintedFraction: this.planes.wellPaintedFraction(),
      finished: schedule?.finished ?? false,
      obtainNewTrace: this.obtainNewTrace,
    };
  }

  getPlanes(): RasterPlanes {
    return this.planes;
  }

  /** The trace being painted, or the last painted one */
  getCurrentTrace(): Trace | null {
    return this.trace;
  }

  dispose(): void {
    this.canvas?.dispose();
    this.canvas = null;
    this.schedule = null;
    this.trace = null;
  }

  private publish(): void {
    const stats = this.getStats();
    this.session.getState().publish({
      phase: this.schedule === null ? 'idle' : stats.finished ? 'finished' : 'painting',
      width: stats.width,
      height: stats.height,
      nTraces: stats.nTraces,
      averageBrushSize: stats.averageBrushSize,
      nBadPaintedPixels: stats.nBadPaintedPixels,
      wellPaintedFraction: stats.wellPaintedFraction,
      invalidTrajectoriesCount: stats.invalidTrajectoriesCount,
      invalidTracesCount: stats.invalidTracesCount,
      traceStep: stats.traceStep,
      lastEvent: this.lastEvent,
    });
  }
}
