/**
 * Turns caller-facing `SessionOptions` into a validated `ResolvedSession`.
 *
 * Every partial override is merged over the defaults, every range is checked, and
 * every modulator path is resolved against the merged layers. Any failure throws
 * `ConfigurationError` before a single bar is computed. The returned
 * `replayOptions` pin the seed so a run can be reproduced exactly.
 */

import type {
  AccentProfile,
  GuardConfig,
  HatAdaptation,
  HatLayerName,
  LayerConfig,
  LayerName,
  LayerSet,
  ModulatorBinding,
  MuteWindow,
  ResolvedSession,
  SessionOptions,
  StepCondition,
  Targets
} from "../types.js";
import { ConfigurationError } from "../errors.js";
import { randomSeed } from "../random.js";
import { LAYER_NAMES, resolveParameterPath } from "../modulation/parameter-path.js";
import {
  DEFAULT_BARS,
  DEFAULT_BPM,
  DEFAULT_GUARD,
  DEFAULT_HATS,
  DEFAULT_PPQ,
  DEFAULT_TARGETS,
  defaultLayers
} from "./defaults.js";

const HAT_LAYERS: readonly HatLayerName[] = ["hat_c", "hat_o"];
const MODULATOR_MODES = ["random_walk", "ou", "sine"] as const;
const CONDITION_KINDS = ["prob", "pre", "not_pre", "fill", "every_n"] as const;

export interface SessionResolution {
  session: ResolvedSession;
  replayOptions: SessionOptions;
}

function requireFinite(path: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(path, `must be a finite number, got ${value}`);
  }
}

function requireRange(path: string, value: number, min: number, max: number): void {
  requireFinite(path, value);
  if (value < min || value > max) {
    throw new ConfigurationError(path, `must be within [${min}, ${max}], got ${value}`);
  }
}

function requirePositiveInteger(path: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(path, `must be a positive integer, got ${value}`);
  }
}

function requireInteger(path: string, value: number): void {
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(path, `must be an integer, got ${value}`);
  }
}

function validateConditions(path: string, conditions: readonly StepCondition[]): void {
  conditions.forEach((condition, i) => {
    const at = `${path}[${i}]`;
    if (!CONDITION_KINDS.some((kind) => kind === condition.kind)) {
      throw new ConfigurationError(`${at}.kind`, `unknown step condition '${String(condition.kind)}'`);
    }
    if (condition.kind === "prob") {
      requireRange(`${at}.p`, condition.p ?? 1, 0, 1);
    }
    if (condition.kind === "fill" || condition.kind === "every_n") {
      requirePositiveInteger(`${at}.n`, condition.n ?? 0);
      requireInteger(`${at}.offset`, condition.offset ?? 0);
    }
  });
}

function validateLayer(name: LayerName, config: LayerConfig): void {
  const at = `layers.${name}`;
  requirePositiveInteger(`${at}.steps`, config.steps);
  requireInteger(`${at}.pulses`, config.pulses);
  requireInteger(`${at}.rotation`, config.rotation);
  requireRange(`${at}.note`, config.note, 0, 127);
  requireInteger(`${at}.note`, config.note);
  requireRange(`${at}.velocity`, config.velocity, 1, 127);
  if (config.swingPercent !== undefined) {
    requireRange(`${at}.swingPercent`, config.swingPercent, 0, 1);
  }
  requireRange(`${at}.ratchetProb`, config.ratchetProb, 0, 1);
  requirePositiveInteger(`${at}.ratchetRepeat`, config.ratchetRepeat);
  requireRange(`${at}.ghostPre1Prob`, config.ghostPre1Prob, 0, 1);
  requireRange(`${at}.displaceInto2Prob`, config.displaceInto2Prob, 0, 1);
  requireRange(`${at}.rotationRatePerBar`, config.rotationRatePerBar, 0, Number.MAX_VALUE);

  if (config.micro) {
    const { offsetsMs, probabilities, capMs } = config.micro;
    if (offsetsMs.length === 0) {
      throw new ConfigurationError(`${at}.micro.offsetsMs`, "needs at least one bin");
    }
    if (offsetsMs.length !== probabilities.length) {
      throw new ConfigurationError(
        `${at}.micro.probabilities`,
        `length ${probabilities.length} does not match ${offsetsMs.length} offsets`
      );
    }
    offsetsMs.forEach((offset, i) => requireFinite(`${at}.micro.offsetsMs[${i}]`, offset));
    probabilities.forEach((p, i) => requireRange(`${at}.micro.probabilities[${i}]`, p, 0, 1));
    if (probabilities.reduce((sum, p) => sum + p, 0) <= 0) {
      throw new ConfigurationError(`${at}.micro.probabilities`, "must not all be zero");
    }
    requireRange(`${at}.micro.capMs`, capMs, 0, Number.MAX_VALUE);
  }

  if (config.chokeWith !== undefined) {
    if (!LAYER_NAMES.includes(config.chokeWith)) {
      throw new ConfigurationError(`${at}.chokeWith`, `unknown layer '${String(config.chokeWith)}'`);
    }
    if (config.chokeWith === name) {
      throw new ConfigurationError(`${at}.chokeWith`, "a layer cannot choke itself");
    }
  }

  validateConditions(`${at}.conditions`, config.conditions);
}

function mergeLayers(overrides: SessionOptions["layers"]): LayerSet {
  const layers = defaultLayers();
  if (!overrides) {
    return layers;
  }
  for (const name of Object.keys(overrides)) {
    if (!LAYER_NAMES.some((known) => known === name)) {
      throw new ConfigurationError(`layers.${name}`, "unknown layer");
    }
  }
  for (const name of LAYER_NAMES) {
    const override = overrides[name];
    if (override) {
      layers[name] = {
        ...layers[name],
        ...structuredClone(override)
      };
    }
  }
  return layers;
}

function resolveTargets(partial: Partial<Targets> | undefined): Targets {
  const targets: Targets = { ...DEFAULT_TARGETS, ...partial };
  requireRange("targets.eTarget", targets.eTarget, 0, 1);
  requireRange("targets.sLow", targets.sLow, 0, 1);
  requireRange("targets.sHigh", targets.sHigh, targets.sLow, 1);
  requireRange("targets.hatDensityTarget", targets.hatDensityTarget, 0, 1);
  requireRange("targets.hatDensityTolerance", targets.hatDensityTolerance, 0, 1);
  requireRange("targets.entropyLow", targets.entropyLow, 0, 1);
  requireRange("targets.entropyHigh", targets.entropyHigh, targets.entropyLow, 1);
  requireRange("targets.microCapMs", targets.microCapMs, 0, Number.MAX_VALUE);
  return targets;
}

function resolveGuard(partial: Partial<GuardConfig> | undefined): GuardConfig {
  const guard: GuardConfig = { ...DEFAULT_GUARD, ...partial };
  requireRange("guard.minEntrainment", guard.minEntrainment, 0, 1);
  requireRange("guard.maxRotationRate", guard.maxRotationRate, 0, Number.MAX_VALUE);
  return guard;
}

function resolveHats(
  partial: SessionOptions["hats"],
  targets: Targets
): Record<HatLayerName, HatAdaptation> {
  const hats: Record<HatLayerName, HatAdaptation> = {
    // the closed hat follows the session-wide density target
    hat_c: {
      ...DEFAULT_HATS.hat_c,
      densityTarget: targets.hatDensityTarget,
      densityTolerance: targets.hatDensityTolerance,
      ...partial?.hat_c
    },
    hat_o: { ...DEFAULT_HATS.hat_o, ...partial?.hat_o }
  };
  for (const name of HAT_LAYERS) {
    const at = `hats.${name}`;
    const hat = hats[name];
    requireRange(`${at}.floor`, hat.floor, 0, 1);
    requireRange(`${at}.ceiling`, hat.ceiling, hat.floor, 1);
    requireRange(`${at}.stickiness`, hat.stickiness, 0, 1);
    requireRange(`${at}.gain`, hat.gain, 0, Number.MAX_VALUE);
    requireRange(`${at}.deltaCap`, hat.deltaCap, 0, 1);
    requireRange(`${at}.densityTarget`, hat.densityTarget, 0, 1);
    requireRange(`${at}.densityTolerance`, hat.densityTolerance, 0, 1);
    requireRange(`${at}.initialOnPattern`, hat.initialOnPattern, 0, 1);
    requireRange(`${at}.initialOffPattern`, hat.initialOffPattern, 0, 1);
  }
  return hats;
}

const KICK_PATTERN_FIELDS = ["pulses", "rotation"];
const KICK_MOTION_FIELDS = ["ghost_pre1_prob", "displace_into_2_prob", "rotation_rate_per_bar"];
const HAT_SEED_FIELDS = ["pulses", "rotation"];

/** Layer fields a binding may resolve to but that no bar reads. */
function unreadField(path: string, guard: GuardConfig): string | undefined {
  const [root, field] = path.split(".").filter((segment) => segment.length > 0);
  if (field === undefined) return undefined;
  if (root === "kick") {
    if (guard.kickImmutable && KICK_PATTERN_FIELDS.includes(field)) {
      return "cannot be modulated while the kick is immutable";
    }
    if (guard.kickImmutable && KICK_MOTION_FIELDS.includes(field)) {
      return "is not read while the kick is immutable";
    }
    return undefined;
  }
  if (KICK_MOTION_FIELDS.includes(field)) {
    return "is only read by the kick";
  }
  if ((root === "hat_c" || root === "hat_o") && HAT_SEED_FIELDS.includes(field)) {
    return "only seeds the hat probabilities when the session starts";
  }
  return undefined;
}

function validateModulators(bindings: readonly ModulatorBinding[], layers: LayerSet, guard: GuardConfig): void {
  const seen = new Set<string>();
  bindings.forEach((binding, i) => {
    const at = `modulators[${i}]`;
    const { spec } = binding;
    if (seen.has(binding.path)) {
      throw new ConfigurationError(binding.path, "bound by more than one modulator");
    }
    seen.add(binding.path);
    resolveParameterPath(binding.path, layers);
    const unread = unreadField(binding.path, guard);
    if (unread !== undefined) {
      throw new ConfigurationError(binding.path, unread);
    }
    if (!MODULATOR_MODES.some((mode) => mode === spec.mode)) {
      throw new ConfigurationError(`${at}.mode`, `unknown modulator mode '${String(spec.mode)}'`);
    }
    requireFinite(`${at}.min`, spec.min);
    requireRange(`${at}.max`, spec.max, spec.min, Number.MAX_VALUE);
    requireRange(`${at}.stepSize`, spec.stepSize, 0, Number.MAX_VALUE);
    requireRange(`${at}.maxDeltaPerBar`, spec.maxDeltaPerBar, 0, Number.MAX_VALUE);
    requireFinite(`${at}.phase`, spec.phase);
    if (spec.mode !== "random_walk" && !(spec.timeConstant > 0)) {
      throw new ConfigurationError(`${at}.timeConstant`, `must be positive for '${spec.mode}', got ${spec.timeConstant}`);
    }
    if (spec.initial !== undefined) {
      requireFinite(`${at}.initial`, spec.initial);
    }
  });
}

function validateAccent(accent: AccentProfile): void {
  accent.steps.forEach((step, i) => {
    requireInteger(`accent.steps[${i}]`, step);
    requireRange(`accent.steps[${i}]`, step, 1, Number.MAX_SAFE_INTEGER);
  });
  requireRange("accent.probability", accent.probability, 0, 1);
  requireRange("accent.velocityScale", accent.velocityScale, 0, Number.MAX_VALUE);
  requireRange("accent.lengthScale", accent.lengthScale, 0, Number.MAX_VALUE);
}

function validateMuteWindow(window: MuteWindow): void {
  requireInteger("muteWindow.startBar", window.startBar);
  requireInteger("muteWindow.endBar", window.endBar);
  requireRange("muteWindow.startBar", window.startBar, 0, Number.MAX_SAFE_INTEGER);
  requireRange("muteWindow.endBar", window.endBar, window.startBar, Number.MAX_SAFE_INTEGER);
}

export function resolveSession(options: SessionOptions = {}): SessionResolution {
  const bpm = options.bpm ?? DEFAULT_BPM;
  const ppq = options.ppq ?? DEFAULT_PPQ;
  const bars = options.bars ?? DEFAULT_BARS;
  requireRange("bpm", bpm, Number.MIN_VALUE, Number.MAX_VALUE);
  requirePositiveInteger("ppq", ppq);
  requirePositiveInteger("bars", bars);

  const seed = options.seed ?? randomSeed();
  requireInteger("seed", seed);

  const layers = mergeLayers(options.layers);
  for (const name of LAYER_NAMES) {
    validateLayer(name, layers[name]);
  }

  const targets = resolveTargets(options.targets);
  const guard = resolveGuard(options.guard);
  const hats = resolveHats(options.hats, targets);

  const modulators = structuredClone(options.modulators ?? []);
  validateModulators(modulators, layers, guard);

  const accent = options.accent ? structuredClone(options.accent) : undefined;
  if (accent) validateAccent(accent);

  const muteWindow = options.muteWindow ? { ...options.muteWindow } : undefined;
  if (muteWindow) validateMuteWindow(muteWindow);

  const session: ResolvedSession = { bpm, ppq, bars, seed, layers, targets, guard, hats, modulators, accent, muteWindow };

  const replayOptions: SessionOptions = { bpm, ppq, bars, seed };
  if (options.layers) replayOptions.layers = structuredClone(options.layers);
  if (options.targets) replayOptions.targets = { ...options.targets };
  if (options.guard) replayOptions.guard = { ...options.guard };
  if (options.hats) replayOptions.hats = structuredClone(options.hats);
  if (options.modulators) replayOptions.modulators = structuredClone(options.modulators);
  if (accent) replayOptions.accent = structuredClone(accent);
  if (muteWindow) replayOptions.muteWindow = { ...muteWindow };

  return { session, replayOptions };
}
