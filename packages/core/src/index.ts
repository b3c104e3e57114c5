export { generateGroove, runSession } from "./session.js";
export { SessionController } from "./session-controller.js";
export type { SessionState, SessionControllerOptions } from "./session-controller.js";
export { resolveSession } from "./config/session-resolver.js";
export type { SessionResolution } from "./config/session-resolver.js";
export { parseSessionConfig } from "./config/config-parser.js";
export {
  DEFAULT_BPM,
  DEFAULT_PPQ,
  DEFAULT_BARS,
  DEFAULT_TARGETS,
  DEFAULT_GUARD,
  DEFAULT_HATS,
  DRUM_CHANNEL,
  RESCUE_BASELINES,
  builtInModulators,
  defaultLayers
} from "./config/defaults.js";
export { ConfigurationError, NumericRangeViolation } from "./errors.js";
export { createRng, gaussian, uniform, weightedIndex } from "./random.js";
export type { Rng } from "./random.js";
export { createTimeGrid, msToTicks, ticksToMs, STEPS_PER_BAR } from "./timebase.js";
export type { TimeGrid } from "./timebase.js";
export * from "./rhythm/index.js";
export * from "./modulation/index.js";
export { quantizeStep, sampleMicroOffsetMs, swingOffsetTicks } from "./timing/swing-quantizer.js";
export type { QuantizeOptions } from "./timing/swing-quantizer.js";
export {
  analyzeTiming,
  analyzeLayerTiming,
  microOffsetsMs,
  interOnsetIntervalsMs,
  rms,
  standardDeviation
} from "./timing/timing-analysis.js";
export type { LayerTimingStats } from "./timing/timing-analysis.js";
export type {
  AccentProfile,
  BarMetrics,
  BarReport,
  Bit,
  EventsByLayer,
  GuardConfig,
  HatAdaptation,
  HatLayerName,
  LayerBarStats,
  LayerConfig,
  LayerName,
  LayerSet,
  MicroTiming,
  ModulatorBinding,
  ModulatorMode,
  ModulatorSpec,
  MuteWindow,
  OnsetMask,
  RescueReport,
  ResolvedSession,
  SessionMeta,
  SessionOptions,
  SessionResult,
  StepCondition,
  StepConditionKind,
  Targets,
  TelemetrySink,
  TimedEvent
} from "./types.js";
