import type { Bit, LayerConfig, OnsetMask } from "../types.js";
import type { Rng } from "../random.js";
import { euclidean, rotate } from "../rhythm/euclidean.js";
import { applyStepConditions } from "../rhythm/conditions.js";
import { metricClass } from "../rhythm/metrics.js";

/** Snare/clap style layer: Euclidean pattern, optional eighth-offbeat filter, step conditions. */
export function staticLayerMask(config: LayerConfig, bar: number, rng: Rng): OnsetMask {
  let mask = rotate(euclidean(config.steps, config.pulses), config.rotation);
  if (config.offbeatsOnly) {
    mask = mask.map((bit, i): Bit => (metricClass(i, config.steps) === "eighth" ? bit : 0));
  }
  return applyStepConditions(mask, bar, config.conditions, rng);
}
