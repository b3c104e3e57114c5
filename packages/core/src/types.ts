/**
 * Shared type definitions for the adaptive groove session.
 *
 * A session runs bar by bar: Euclidean base patterns, Markov-sampled hi-hats,
 * bounded modulators and a guarded feedback loop produce `TimedEvent`s per layer.
 * Input types (`SessionOptions` and friends) are camelCase; the JSON surface read by
 * `parseSessionConfig` uses snake_case keys and maps onto these.
 */

export type Bit = 0 | 1;

/** Fixed-length onset vector, one entry per step. */
export type OnsetMask = Bit[];

export type LayerName = "kick" | "hat_c" | "hat_o" | "snare" | "clap";
export type HatLayerName = "hat_c" | "hat_o";

export interface MicroTiming {
  offsetsMs: number[];
  probabilities: number[];
  capMs: number;
}

export type StepConditionKind = "prob" | "pre" | "not_pre" | "fill" | "every_n";

export interface StepCondition {
  kind: StepConditionKind;
  /** `prob` only */
  p?: number;
  /** `fill` / `every_n`: bar period */
  n?: number;
  /** `fill` / `every_n`: 1-indexed first bar */
  offset?: number;
  negate?: boolean;
}

export interface LayerConfig {
  steps: number;
  pulses: number;
  rotation: number;
  note: number;
  velocity: number;
  /** Overrides the session swing for this layer. */
  swingPercent?: number;
  /** Layers without `swingPercent` follow the session swing modulator when set. */
  followSessionSwing: boolean;
  micro?: MicroTiming;
  offbeatsOnly: boolean;
  ratchetProb: number;
  ratchetRepeat: number;
  chokeWith?: LayerName;
  /** Kick variation; ignored while the guard keeps the kick immutable. */
  ghostPre1Prob: number;
  displaceInto2Prob: number;
  rotationRatePerBar: number;
  conditions: StepCondition[];
}

export type LayerSet = Record<LayerName, LayerConfig>;

export type ModulatorMode = "random_walk" | "ou" | "sine";

export interface ModulatorSpec {
  name: string;
  mode: ModulatorMode;
  min: number;
  max: number;
  stepSize: number;
  timeConstant: number;
  maxDeltaPerBar: number;
  phase: number;
  /** Seed value; defaults to the bound field's value (or the range midpoint). */
  initial?: number;
}

export interface ModulatorBinding {
  path: string;
  spec: ModulatorSpec;
}

export interface Targets {
  eTarget: number;
  sLow: number;
  sHigh: number;
  hatDensityTarget: number;
  hatDensityTolerance: number;
  entropyLow: number;
  entropyHigh: number;
  microCapMs: number;
}

export interface GuardConfig {
  minEntrainment: number;
  maxRotationRate: number;
  kickImmutable: boolean;
}

export interface HatAdaptation {
  floor: number;
  ceiling: number;
  stickiness: number;
  gain: number;
  deltaCap: number;
  densityTarget: number;
  densityTolerance: number;
  /** Initial probability on slots set in the layer's Euclidean pattern. */
  initialOnPattern: number;
  initialOffPattern: number;
}

export interface AccentProfile {
  /** 1-indexed steps */
  steps: number[];
  probability: number;
  velocityScale: number;
  lengthScale: number;
}

/** Inclusive, 0-indexed bar range whose masks are emptied after the bar is computed. */
export interface MuteWindow {
  startBar: number;
  endBar: number;
}

export interface TimedEvent {
  note: number;
  velocity: number;
  /** Absolute tick from session start */
  startTick: number;
  durationTick: number;
  channel: number;
}

export type EventsByLayer = Record<LayerName, TimedEvent[]>;

export interface BarMetrics {
  bar: number;
  E: number;
  S: number;
  hatDensity: number;
  hatEntropy: number;
}

export interface TelemetrySink {
  append(record: BarMetrics): void;
}

export interface SessionOptions {
  bpm?: number;
  ppq?: number;
  bars?: number;
  seed?: number;
  layers?: Partial<Record<LayerName, Partial<LayerConfig>>>;
  targets?: Partial<Targets>;
  guard?: Partial<GuardConfig>;
  hats?: Partial<Record<HatLayerName, Partial<HatAdaptation>>>;
  modulators?: ModulatorBinding[];
  accent?: AccentProfile;
  muteWindow?: MuteWindow;
  telemetry?: TelemetrySink;
  signal?: AbortSignal;
}

/** Fully-defaulted, validated configuration. */
export interface ResolvedSession {
  bpm: number;
  ppq: number;
  bars: number;
  seed: number;
  layers: LayerSet;
  targets: Targets;
  guard: GuardConfig;
  hats: Record<HatLayerName, HatAdaptation>;
  modulators: ModulatorBinding[];
  accent?: AccentProfile;
  muteWindow?: MuteWindow;
}

export interface LayerBarStats {
  onsets: number;
  density: number;
  entropy: number;
}

export interface BarReport {
  bar: number;
  masks: Record<LayerName, OnsetMask>;
  metrics: BarMetrics;
  layerStats: Record<LayerName, LayerBarStats>;
  /** Value of every modulator after this bar's feedback, keyed by name/path */
  modulators: Record<string, number>;
  hatProbabilities: Record<HatLayerName, number[]>;
  feedbackError: number;
  rescued: boolean;
  /** The closed hat was forced full because the previous bar rescued. */
  recovery: boolean;
}

export interface RescueReport {
  count: number;
  bars: number[];
}

export interface SessionMeta {
  bpm: number;
  ppq: number;
  bars: number;
  seed: number;
  ticksPerBar: number;
  /** Options that reproduce this run exactly. */
  replayOptions: SessionOptions;
}

export interface SessionResult {
  events: EventsByLayer;
  metrics: BarMetrics[];
  bars: BarReport[];
  rescue: RescueReport;
  completedBars: number;
  aborted: boolean;
  meta: SessionMeta;
}
