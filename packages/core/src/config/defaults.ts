import type {
  GuardConfig,
  HatAdaptation,
  HatLayerName,
  LayerConfig,
  LayerSet,
  ModulatorSpec,
  Targets
} from "../types.js";
import type { SessionParameter } from "../modulation/parameter-path.js";

export const DEFAULT_BPM = 132;
export const DEFAULT_PPQ = 1920;
export const DEFAULT_BARS = 32;

/** General MIDI percussion channel (0-indexed). */
export const DRUM_CHANNEL = 9;

export const DEFAULT_TARGETS: Targets = {
  eTarget: 0.8,
  sLow: 0.35,
  sHigh: 0.55,
  hatDensityTarget: 0.7,
  hatDensityTolerance: 0.05,
  entropyLow: 0.75,
  entropyHigh: 0.95,
  microCapMs: 12
};

export const DEFAULT_GUARD: GuardConfig = {
  minEntrainment: 0.78,
  maxRotationRate: 0.125,
  kickImmutable: true
};

function layer(overrides: Partial<LayerConfig> & Pick<LayerConfig, "pulses" | "note" | "velocity">): LayerConfig {
  return {
    steps: 16,
    rotation: 0,
    followSessionSwing: false,
    offbeatsOnly: false,
    ratchetProb: 0,
    ratchetRepeat: 2,
    ghostPre1Prob: 0,
    displaceInto2Prob: 0,
    rotationRatePerBar: 0,
    conditions: [],
    ...overrides
  };
}

/** Fresh copy on every call; callers mutate their working set. */
export function defaultLayers(): LayerSet {
  return {
    kick: layer({ pulses: 4, note: 36, velocity: 110 }),
    hat_c: layer({
      pulses: 12,
      note: 42,
      velocity: 80,
      followSessionSwing: true,
      micro: { offsetsMs: [-10, -6, -2, 0], probabilities: [0.4, 0.35, 0.2, 0.05], capMs: 12 }
    }),
    hat_o: layer({
      pulses: 16,
      note: 46,
      velocity: 80,
      followSessionSwing: true,
      offbeatsOnly: true,
      ratchetProb: 0.06,
      ratchetRepeat: 3,
      micro: { offsetsMs: [-2, 0, 2], probabilities: [0.2, 0.6, 0.2], capMs: 10 },
      chokeWith: "hat_c"
    }),
    snare: layer({ pulses: 2, rotation: 4, note: 38, velocity: 96 }),
    clap: layer({ pulses: 2, rotation: 4, note: 39, velocity: 92 })
  };
}

export const DEFAULT_HATS: Record<HatLayerName, HatAdaptation> = {
  hat_c: {
    floor: 0.25,
    ceiling: 0.95,
    stickiness: 0.15,
    gain: 0.6,
    deltaCap: 0.03,
    densityTarget: 0.7,
    densityTolerance: 0.05,
    initialOnPattern: 0.85,
    initialOffPattern: 0.4
  },
  hat_o: {
    floor: 0.05,
    ceiling: 0.75,
    stickiness: 0.3,
    gain: 0.4,
    deltaCap: 0.03,
    densityTarget: 0.2,
    densityTolerance: 0.05,
    initialOnPattern: 0.55,
    initialOffPattern: 0.05
  }
};

/** Built-in session modulators. Rotation rate never exceeds the guard's ceiling. */
export function builtInModulators(guard: GuardConfig): Record<SessionParameter, ModulatorSpec> {
  return {
    swing: {
      name: "swing",
      mode: "ou",
      min: 0.51,
      max: 0.58,
      stepSize: 0.005,
      timeConstant: 48,
      maxDeltaPerBar: 0.01,
      phase: 0,
      initial: 0.545
    },
    thin_bias: {
      name: "thin_bias",
      mode: "ou",
      min: -0.8,
      max: 0,
      stepSize: 0.02,
      timeConstant: 32,
      maxDeltaPerBar: 0.03,
      phase: 0,
      initial: -0.2
    },
    rotation_rate: {
      name: "rotation_rate",
      mode: "random_walk",
      min: 0,
      max: Math.min(0.125, guard.maxRotationRate),
      stepSize: 0.01,
      timeConstant: 1,
      maxDeltaPerBar: 0.02,
      phase: 0,
      initial: 0
    }
  };
}

/** Values the guard snaps session modulators back to on a rescue bar. */
export const RESCUE_BASELINES: Record<SessionParameter, number> = {
  swing: 0.5,
  rotation_rate: 0,
  thin_bias: -0.2
};

/** Swing value the feedback loop gently pulls toward. */
export const SWING_HOME = 0.545;
