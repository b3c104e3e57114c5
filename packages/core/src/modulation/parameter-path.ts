/**
 * Parameter paths address one numeric field of the session or of a layer config,
 * e.g. `swing`, `hat_c.swing_percent`, `hat_o.micro.cap_ms` or
 * `hat_c.micro.offsets_ms.0`.
 *
 * Paths are resolved once, at session setup, into a typed target with get/set
 * closures. Anything that does not end on a numeric scalar is a
 * `ConfigurationError`.
 */

import type { LayerConfig, LayerName, LayerSet, MicroTiming } from "../types.js";
import { ConfigurationError } from "../errors.js";
import { clamp } from "../random.js";

export type SessionParameter = "swing" | "thin_bias" | "rotation_rate";

export const SESSION_PARAMETERS: readonly SessionParameter[] = ["swing", "thin_bias", "rotation_rate"];
export const LAYER_NAMES: readonly LayerName[] = ["kick", "hat_c", "hat_o", "snare", "clap"];

export interface LayerFieldAccessor {
  get(layer: LayerConfig): number | undefined;
  set(layer: LayerConfig, value: number): void;
}

export type ParameterTarget =
  | { kind: "session"; path: string; parameter: SessionParameter }
  | { kind: "layer"; path: string; layer: LayerName; field: LayerFieldAccessor };

export type LayerTarget = Extract<ParameterTarget, { kind: "layer" }>;

type FieldNode =
  | { kind: "scalar"; accessor: LayerFieldAccessor }
  | { kind: "container"; children: Record<string, FieldNode>; present(layer: LayerConfig): boolean }
  | { kind: "list"; items(layer: LayerConfig): number[] | undefined }
  | { kind: "opaque" };

function intField(read: (l: LayerConfig) => number, write: (l: LayerConfig, v: number) => void, min: number, max: number): FieldNode {
  return {
    kind: "scalar",
    accessor: { get: read, set: (layer, value) => write(layer, clamp(Math.round(value), min, max)) }
  };
}

function probabilityField(read: (l: LayerConfig) => number, write: (l: LayerConfig, v: number) => void): FieldNode {
  return {
    kind: "scalar",
    accessor: { get: read, set: (layer, value) => write(layer, clamp(value, 0, 1)) }
  };
}

function microList(pick: (micro: MicroTiming) => number[]): FieldNode {
  return { kind: "list", items: (layer) => (layer.micro ? pick(layer.micro) : undefined) };
}

const MICRO_NODE: FieldNode = {
  kind: "container",
  present: (layer) => layer.micro !== undefined,
  children: {
    cap_ms: {
      kind: "scalar",
      accessor: {
        get: (layer) => layer.micro?.capMs,
        set: (layer, value) => {
          if (layer.micro) layer.micro.capMs = Math.max(0, value);
        }
      }
    },
    offsets_ms: microList((micro) => micro.offsetsMs),
    probabilities: microList((micro) => micro.probabilities)
  }
};

const LAYER_FIELDS: Record<string, FieldNode> = {
  steps: { kind: "opaque" },
  note: { kind: "opaque" },
  offbeats_only: { kind: "opaque" },
  choke_with: { kind: "opaque" },
  conditions: { kind: "opaque" },
  pulses: intField((l) => l.pulses, (l, v) => (l.pulses = v), 0, 64),
  rotation: intField((l) => l.rotation, (l, v) => (l.rotation = v), -64, 64),
  velocity: intField((l) => l.velocity, (l, v) => (l.velocity = v), 1, 127),
  ratchet_repeat: intField((l) => l.ratchetRepeat, (l, v) => (l.ratchetRepeat = v), 2, 16),
  ratchet_prob: probabilityField((l) => l.ratchetProb, (l, v) => (l.ratchetProb = v)),
  ghost_pre1_prob: probabilityField((l) => l.ghostPre1Prob, (l, v) => (l.ghostPre1Prob = v)),
  displace_into_2_prob: probabilityField((l) => l.displaceInto2Prob, (l, v) => (l.displaceInto2Prob = v)),
  swing_percent: {
    kind: "scalar",
    accessor: { get: (l) => l.swingPercent, set: (l, v) => (l.swingPercent = clamp(v, 0, 1)) }
  },
  rotation_rate_per_bar: {
    kind: "scalar",
    accessor: { get: (l) => l.rotationRatePerBar, set: (l, v) => (l.rotationRatePerBar = Math.max(0, v)) }
  },
  micro: MICRO_NODE
};

function isLayerName(value: string): value is LayerName {
  return LAYER_NAMES.some((name) => name === value);
}

function isSessionParameter(value: string): value is SessionParameter {
  return SESSION_PARAMETERS.some((name) => name === value);
}

function listElement(node: { items(layer: LayerConfig): number[] | undefined }, index: number): LayerFieldAccessor {
  return {
    get: (layer) => node.items(layer)?.[index],
    set: (layer, value) => {
      const items = node.items(layer);
      if (items && index < items.length) items[index] = value;
    }
  };
}

/**
 * Resolves `path` against the resolved layer set. Fails on an unknown root or
 * field, on indexing through a scalar, and on paths ending at a container.
 */
export function resolveParameterPath(path: string, layers: LayerSet): ParameterTarget {
  const segments = path.split(".").filter((segment) => segment.length > 0);
  if (segments.length === 0) {
    throw new ConfigurationError(path, "empty parameter path");
  }
  const [root, ...rest] = segments;

  if (isSessionParameter(root)) {
    if (rest.length > 0) {
      throw new ConfigurationError(path, `cannot index into scalar '${root}'`);
    }
    return { kind: "session", path, parameter: root };
  }

  if (!isLayerName(root)) {
    throw new ConfigurationError(path, `unknown root '${root}'`);
  }

  const layer = layers[root];
  let node: FieldNode = { kind: "container", children: LAYER_FIELDS, present: () => true };
  let walked: string = root;

  for (let i = 0; i < rest.length; i++) {
    const segment = rest[i];
    switch (node.kind) {
      case "scalar":
      case "opaque":
        throw new ConfigurationError(path, `cannot index into scalar '${walked}'`);
      case "list": {
        const items = node.items(layer);
        if (items === undefined) {
          throw new ConfigurationError(path, `'${walked}' is not configured on ${root}`);
        }
        const index = Number(segment);
        if (!Number.isInteger(index) || index < 0 || index >= items.length) {
          throw new ConfigurationError(path, `index '${segment}' out of range for '${walked}' (length ${items.length})`);
        }
        node = { kind: "scalar", accessor: listElement(node, index) };
        break;
      }
      case "container": {
        if (!node.present(layer)) {
          throw new ConfigurationError(path, `'${walked}' is not configured on ${root}`);
        }
        const child: FieldNode | undefined = Object.hasOwn(node.children, segment) ? node.children[segment] : undefined;
        if (child === undefined) {
          throw new ConfigurationError(path, `unknown field '${segment}' on '${walked}'`);
        }
        if (child.kind === "container" && !child.present(layer)) {
          throw new ConfigurationError(path, `'${walked}.${segment}' is not configured on ${root}`);
        }
        node = child;
        break;
      }
    }
    walked = `${walked}.${segment}`;
  }

  if (node.kind !== "scalar") {
    throw new ConfigurationError(path, `'${walked}' is not a numeric scalar`);
  }
  return { kind: "layer", path, layer: root, field: node.accessor };
}

export function readTarget(target: LayerTarget, layers: LayerSet): number | undefined {
  return target.field.get(layers[target.layer]);
}

export function writeTarget(target: LayerTarget, layers: LayerSet, value: number): void {
  target.field.set(layers[target.layer], value);
}
