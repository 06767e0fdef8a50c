/**
 * Oil painting simulator
 */

// Simulator
export { OilSimulator } from './engine/oilPaint/OilSimulator';
export type { OilSimulatorOptions, OilSimulatorStats } from './engine/oilPaint/OilSimulator';
export { paintUntilFinished, createPaintingLoop } from './engine/oilPaint/runner';
export type {
  PaintUntilFinishedOptions,
  PaintingLoop,
  PaintingLoopOptions,
  RequestFrame,
} from './engine/oilPaint/runner';

// Configuration & errors
export {
  DEFAULT_OIL_SIMULATOR_CONFIG,
  resolveOilSimulatorConfig,
  initialBrushSize,
  traceLengthFor,
} from './engine/oilPaint/config';
export type { OilSimulatorConfig, OilSimulatorConfigInput } from './engine/oilPaint/config';
export {
  OilSimulatorError,
  invalidInput,
  canvasUnavailable,
  isOilSimulatorError,
} from './engine/oilPaint/errors';
export type { OilSimulatorErrorCode } from './engine/oilPaint/errors';

// Core
export {
  RasterPlanes,
  SIMILAR_COLOR,
  VISIT_INCREMENT,
  MAX_VISITS,
} from './engine/oilPaint/core/rasterPlanes';
export {
  COLOR_DISTANCE_EPS,
  checkTrajectoryVisits,
  checkTrajectory,
  checkTraceImprovement,
  alreadyVisitedTrajectory,
  validTrajectory,
  traceImprovesPainting,
} from './engine/oilPaint/core/acceptance';
export type {
  CheckResult,
  TrajectoryRejectReason,
  TraceRejectReason,
} from './engine/oilPaint/core/acceptance';
export { BrushSchedule } from './engine/oilPaint/core/brushSchedule';
export type {
  BrushScheduleEvent,
  BrushScheduleSnapshot,
} from './engine/oilPaint/core/brushSchedule';

// Trace collaborator
export {
  OilTrace,
  createOilTraceFactory,
  MAX_TRACE_TURN,
  BRUSH_SIZE_JITTER,
} from './engine/oilPaint/trace/oilTrace';
export type { OilTraceParams } from './engine/oilPaint/trace/oilTrace';
export { PAINT_MIX_FRACTION } from './engine/oilPaint/trace/bristleColors';
export type {
  Point,
  Trace,
  TraceFactory,
  TraceRequest,
  BristleSample,
  BristleStampTarget,
  BristleColorOptions,
} from './engine/oilPaint/trace/types';

// Canvas
export {
  CpuCanvasBackend,
  createCpuCanvasBackend,
  MAX_CPU_CANVAS_PIXELS,
} from './engine/oilPaint/canvas/cpuCanvasBackend';
export type {
  CanvasBackend,
  CanvasBackendFactory,
  CanvasBackendOptions,
} from './engine/oilPaint/canvas/types';

// Session store
export {
  createPaintingSessionStore,
  INITIAL_PAINTING_SESSION,
} from './stores/paintingSession';
export type {
  PaintingPhase,
  PaintingSessionEvent,
  PaintingSessionSnapshot,
  PaintingSessionStore,
} from './stores/paintingSession';

// Utilities
export { createPixelGrid, clonePixelGrid } from './utils/pixelGrid';
export type { PixelGrid, PixelChannels, Rgb } from './utils/pixelGrid';
export { rgbaImageToPixelGrid, pixelGridToRgbaImage } from './utils/imageUtils';
export type { RgbaImage, DisplaySurface } from './utils/imageUtils';
export { mulberry32 } from './utils/random';
export type { RandomFn } from './utils/random';
export { createSimulatorLogger, consoleLogSink } from './utils/simulatorLog';
export type {
  SimulatorLogger,
  SimulatorLoggerOptions,
  SimulatorLogRecord,
  SimulatorLogScope,
  SimulatorLogSink,
} from './utils/simulatorLog';
