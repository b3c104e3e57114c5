/**
 * Reads a session description in its JSON form (snake_case keys) into
 * `SessionOptions`. Unknown keys and mistyped values are rejected with the
 * offending key path; range checks happen later in `resolveSession`.
 *
 * ```json
 * {
 *   "bpm": 132, "ppq": 1920, "bars": 64, "seed": 7,
 *   "layers": { "hat_c": { "velocity": 84, "micro": { "offsets_ms": [-4, 0], "probabilities": [0.5, 0.5], "cap_ms": 8 } } },
 *   "targets": { "S_low": 0.35, "S_high": 0.55 },
 *   "guard": { "min_E": 0.78, "kick_immutable": false },
 *   "modulators": [{ "param_path": "hat_o.ratchet_prob", "mode": "sine", "min": 0, "max": 0.2, "tau": 16, "max_delta_per_bar": 0.05 }],
 *   "mute_window": { "start_bar": 10, "end_bar": 12 }
 * }
 * ```
 */

import type {
  AccentProfile,
  GuardConfig,
  HatAdaptation,
  HatLayerName,
  LayerConfig,
  LayerName,
  MicroTiming,
  ModulatorBinding,
  ModulatorMode,
  MuteWindow,
  SessionOptions,
  StepCondition,
  StepConditionKind,
  Targets
} from "../types.js";
import { ConfigurationError } from "../errors.js";
import { LAYER_NAMES } from "../modulation/parameter-path.js";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw new ConfigurationError(path, "expected an object");
  }
  return value;
}

function rejectUnknownKeys(obj: JsonObject, allowed: readonly string[], path: string): void {
  for (const key of Object.keys(obj)) {
    if (!allowed.includes(key)) {
      throw new ConfigurationError(path ? `${path}.${key}` : key, "unknown key");
    }
  }
}

function readNumber(obj: JsonObject, key: string, path: string): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new ConfigurationError(path ? `${path}.${key}` : key, "expected a number");
  }
  return value;
}

function readBoolean(obj: JsonObject, key: string, path: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") {
    throw new ConfigurationError(`${path}.${key}`, "expected a boolean");
  }
  return value;
}

function readString(obj: JsonObject, key: string, path: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigurationError(`${path}.${key}`, "expected a string");
  }
  return value;
}

function readNumberArray(obj: JsonObject, key: string, path: string): number[] | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${path}.${key}`, "expected an array of numbers");
  }
  return value.map((item: unknown, i) => {
    if (typeof item !== "number" || !Number.isFinite(item)) {
      throw new ConfigurationError(`${path}.${key}[${i}]`, "expected a number");
    }
    return item;
  });
}

/** Copies defined values only, so omitted keys fall back to defaults when merged. */
function defined<T extends object>(entries: Partial<T>): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(entries) as Array<keyof T>) {
    if (entries[key] !== undefined) {
      out[key] = entries[key];
    }
  }
  return out;
}

function isLayerName(value: string): value is LayerName {
  return LAYER_NAMES.some((name) => name === value);
}

const CONDITION_KINDS: readonly StepConditionKind[] = ["prob", "pre", "not_pre", "fill", "every_n"];

function isConditionKind(value: string): value is StepConditionKind {
  return CONDITION_KINDS.some((kind) => kind === value);
}

const MODULATOR_MODES: readonly ModulatorMode[] = ["random_walk", "ou", "sine"];

function isModulatorMode(value: string): value is ModulatorMode {
  return MODULATOR_MODES.some((mode) => mode === value);
}

function parseMicro(raw: unknown, path: string): MicroTiming {
  const obj = expectObject(raw, path);
  rejectUnknownKeys(obj, ["offsets_ms", "probabilities", "cap_ms"], path);
  const offsetsMs = readNumberArray(obj, "offsets_ms", path);
  const probabilities = readNumberArray(obj, "probabilities", path);
  if (!offsetsMs || !probabilities) {
    throw new ConfigurationError(path, "micro timing needs offsets_ms and probabilities");
  }
  return { offsetsMs, probabilities, capMs: readNumber(obj, "cap_ms", path) ?? 12 };
}

function parseCondition(raw: unknown, path: string): StepCondition {
  const obj = expectObject(raw, path);
  rejectUnknownKeys(obj, ["kind", "p", "n", "offset", "negate"], path);
  const kind = readString(obj, "kind", path);
  if (kind === undefined || !isConditionKind(kind)) {
    throw new ConfigurationError(`${path}.kind`, `unknown step condition '${String(kind)}'`);
  }
  return {
    kind,
    ...defined<Omit<StepCondition, "kind">>({
      p: readNumber(obj, "p", path),
      n: readNumber(obj, "n", path),
      offset: readNumber(obj, "offset", path),
      negate: readBoolean(obj, "negate", path)
    })
  };
}

const LAYER_KEYS = [
  "steps",
  "pulses",
  "fills",
  "rotation",
  "rot",
  "note",
  "velocity",
  "swing_percent",
  "follow_session_swing",
  "micro",
  "beat_bins_ms",
  "beat_bins_probs",
  "beat_bin_cap_ms",
  "offbeats_only",
  "ratchet_prob",
  "ratchet_repeat",
  "choke_with",
  "ghost_pre1_prob",
  "displace_into_2_prob",
  "rotation_rate_per_bar",
  "conditions"
] as const;

function parseLayer(raw: unknown, path: string): Partial<LayerConfig> {
  const obj = expectObject(raw, path);
  rejectUnknownKeys(obj, LAYER_KEYS, path);

  let micro: MicroTiming | undefined;
  if (obj.micro !== undefined) {
    micro = parseMicro(obj.micro, `${path}.micro`);
  } else if (obj.beat_bins_ms !== undefined || obj.beat_bins_probs !== undefined) {
    // flat bin-table keys
    const offsetsMs = readNumberArray(obj, "beat_bins_ms", path);
    const probabilities = readNumberArray(obj, "beat_bins_probs", path);
    if (!offsetsMs || !probabilities) {
      throw new ConfigurationError(path, "beat_bins_ms and beat_bins_probs must be given together");
    }
    micro = { offsetsMs, probabilities, capMs: readNumber(obj, "beat_bin_cap_ms", path) ?? 12 };
  }

  const chokeWith = readString(obj, "choke_with", path);
  if (chokeWith !== undefined && !isLayerName(chokeWith)) {
    throw new ConfigurationError(`${path}.choke_with`, `unknown layer '${chokeWith}'`);
  }

  let conditions: StepCondition[] | undefined;
  if (obj.conditions !== undefined) {
    if (!Array.isArray(obj.conditions)) {
      throw new ConfigurationError(`${path}.conditions`, "expected an array");
    }
    conditions = obj.conditions.map((entry: unknown, i) => parseCondition(entry, `${path}.conditions[${i}]`));
  }

  return defined<LayerConfig>({
    steps: readNumber(obj, "steps", path),
    pulses: readNumber(obj, "pulses", path) ?? readNumber(obj, "fills", path),
    rotation: readNumber(obj, "rotation", path) ?? readNumber(obj, "rot", path),
    note: readNumber(obj, "note", path),
    velocity: readNumber(obj, "velocity", path),
    swingPercent: readNumber(obj, "swing_percent", path),
    followSessionSwing: readBoolean(obj, "follow_session_swing", path),
    micro,
    offbeatsOnly: readBoolean(obj, "offbeats_only", path),
    ratchetProb: readNumber(obj, "ratchet_prob", path),
    ratchetRepeat: readNumber(obj, "ratchet_repeat", path),
    chokeWith,
    ghostPre1Prob: readNumber(obj, "ghost_pre1_prob", path),
    displaceInto2Prob: readNumber(obj, "displace_into_2_prob", path),
    rotationRatePerBar: readNumber(obj, "rotation_rate_per_bar", path),
    conditions
  });
}

function parseTargets(raw: unknown): Partial<Targets> {
  const path = "targets";
  const obj = expectObject(raw, path);
  rejectUnknownKeys(
    obj,
    ["E_target", "S_low", "S_high", "hat_density_target", "hat_density_tol", "entropy_low", "entropy_high", "micro_cap_ms"],
    path
  );
  return defined<Targets>({
    eTarget: readNumber(obj, "E_target", path),
    sLow: readNumber(obj, "S_low", path),
    sHigh: readNumber(obj, "S_high", path),
    hatDensityTarget: readNumber(obj, "hat_density_target", path),
    hatDensityTolerance: readNumber(obj, "hat_density_tol", path),
    entropyLow: readNumber(obj, "entropy_low", path),
    entropyHigh: readNumber(obj, "entropy_high", path),
    microCapMs: readNumber(obj, "micro_cap_ms", path)
  });
}

function parseGuard(raw: unknown): Partial<GuardConfig> {
  const path = "guard";
  const obj = expectObject(raw, path);
  rejectUnknownKeys(obj, ["min_E", "max_rot_rate", "kick_immutable"], path);
  return defined<GuardConfig>({
    minEntrainment: readNumber(obj, "min_E", path),
    maxRotationRate: readNumber(obj, "max_rot_rate", path),
    kickImmutable: readBoolean(obj, "kick_immutable", path)
  });
}

function parseHat(raw: unknown, path: string): Partial<HatAdaptation> {
  const obj = expectObject(raw, path);
  rejectUnknownKeys(
    obj,
    [
      "floor",
      "ceiling",
      "stickiness",
      "gain",
      "delta_cap",
      "density_target",
      "density_tolerance",
      "initial_on_pattern",
      "initial_off_pattern"
    ],
    path
  );
  return defined<HatAdaptation>({
    floor: readNumber(obj, "floor", path),
    ceiling: readNumber(obj, "ceiling", path),
    stickiness: readNumber(obj, "stickiness", path),
    gain: readNumber(obj, "gain", path),
    deltaCap: readNumber(obj, "delta_cap", path),
    densityTarget: readNumber(obj, "density_target", path),
    densityTolerance: readNumber(obj, "density_tolerance", path),
    initialOnPattern: readNumber(obj, "initial_on_pattern", path),
    initialOffPattern: readNumber(obj, "initial_off_pattern", path)
  });
}

function parseModulator(raw: unknown, path: string): ModulatorBinding {
  const obj = expectObject(raw, path);
  rejectUnknownKeys(
    obj,
    ["name", "param_path", "mode", "min", "max", "min_val", "max_val", "step_per_bar", "tau", "max_delta_per_bar", "phase", "initial"],
    path
  );
  const paramPath = readString(obj, "param_path", path);
  if (paramPath === undefined) {
    throw new ConfigurationError(`${path}.param_path`, "is required");
  }
  const mode = readString(obj, "mode", path) ?? "random_walk";
  if (!isModulatorMode(mode)) {
    throw new ConfigurationError(`${path}.mode`, `unknown modulator mode '${mode}'`);
  }
  const min = readNumber(obj, "min", path) ?? readNumber(obj, "min_val", path);
  const max = readNumber(obj, "max", path) ?? readNumber(obj, "max_val", path);
  if (min === undefined || max === undefined) {
    throw new ConfigurationError(path, "min and max are required");
  }
  return {
    path: paramPath,
    spec: {
      name: readString(obj, "name", path) ?? paramPath,
      mode,
      min,
      max,
      stepSize: readNumber(obj, "step_per_bar", path) ?? 0.01,
      timeConstant: readNumber(obj, "tau", path) ?? 32,
      maxDeltaPerBar: readNumber(obj, "max_delta_per_bar", path) ?? 0.02,
      phase: readNumber(obj, "phase", path) ?? 0,
      ...defined<{ initial: number }>({ initial: readNumber(obj, "initial", path) })
    }
  };
}

function parseAccent(raw: unknown): AccentProfile {
  const path = "accent";
  const obj = expectObject(raw, path);
  rejectUnknownKeys(obj, ["steps", "prob", "velocity_scale", "length_scale"], path);
  return {
    steps: readNumberArray(obj, "steps", path) ?? [],
    probability: readNumber(obj, "prob", path) ?? 1,
    velocityScale: readNumber(obj, "velocity_scale", path) ?? 1,
    lengthScale: readNumber(obj, "length_scale", path) ?? 1
  };
}

function parseMuteWindow(raw: unknown): MuteWindow {
  const path = "mute_window";
  const obj = expectObject(raw, path);
  rejectUnknownKeys(obj, ["start_bar", "end_bar"], path);
  const startBar = readNumber(obj, "start_bar", path);
  const endBar = readNumber(obj, "end_bar", path);
  if (startBar === undefined || endBar === undefined) {
    throw new ConfigurationError(path, "start_bar and end_bar are required");
  }
  return { startBar, endBar };
}

const TOP_LEVEL_KEYS = ["bpm", "ppq", "bars", "seed", "layers", "targets", "guard", "hats", "modulators", "accent", "mute_window"];

export function parseSessionConfig(raw: unknown): SessionOptions {
  const obj = expectObject(raw, "$");
  rejectUnknownKeys(obj, TOP_LEVEL_KEYS, "");

  const options: SessionOptions = defined<SessionOptions>({
    bpm: readNumber(obj, "bpm", ""),
    ppq: readNumber(obj, "ppq", ""),
    bars: readNumber(obj, "bars", ""),
    seed: readNumber(obj, "seed", "")
  });

  if (obj.layers !== undefined) {
    const layersObj = expectObject(obj.layers, "layers");
    const layers: Partial<Record<LayerName, Partial<LayerConfig>>> = {};
    for (const [name, value] of Object.entries(layersObj)) {
      if (!isLayerName(name)) {
        throw new ConfigurationError(`layers.${name}`, "unknown layer");
      }
      layers[name] = parseLayer(value, `layers.${name}`);
    }
    options.layers = layers;
  }

  if (obj.targets !== undefined) options.targets = parseTargets(obj.targets);
  if (obj.guard !== undefined) options.guard = parseGuard(obj.guard);

  if (obj.hats !== undefined) {
    const hatsObj = expectObject(obj.hats, "hats");
    const hats: Partial<Record<HatLayerName, Partial<HatAdaptation>>> = {};
    for (const [name, value] of Object.entries(hatsObj)) {
      if (name !== "hat_c" && name !== "hat_o") {
        throw new ConfigurationError(`hats.${name}`, "unknown hat layer");
      }
      hats[name] = parseHat(value, `hats.${name}`);
    }
    options.hats = hats;
  }

  if (obj.modulators !== undefined) {
    if (!Array.isArray(obj.modulators)) {
      throw new ConfigurationError("modulators", "expected an array");
    }
    options.modulators = obj.modulators.map((entry: unknown, i) => parseModulator(entry, `modulators[${i}]`));
  }

  if (obj.accent !== undefined) options.accent = parseAccent(obj.accent);
  if (obj.mute_window !== undefined) options.muteWindow = parseMuteWindow(obj.mute_window);

  return options;
}
