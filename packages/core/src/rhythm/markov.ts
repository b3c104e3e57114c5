import type { Bit, OnsetMask } from "../types.js";
import { clamp, type Rng } from "../random.js";
import { assertInRange } from "../errors.js";

/** Carried across bars, one per hat layer. */
export interface MarkovState {
  lastActive: boolean;
}

export interface ProbabilityBounds {
  floor: number;
  ceiling: number;
}

/**
 * Moves every slot toward `probs[i] + gain * error * weight[i]`, capping the
 * per-bar change at `deltaCap` and keeping the result inside `[floor, ceiling]`.
 */
export function updateProbabilities(
  probs: readonly number[],
  feedbackError: number,
  metricWeights: readonly number[],
  gain: number,
  deltaCap: number,
  bounds: ProbabilityBounds
): number[] {
  const { floor, ceiling } = bounds;
  return probs.map((p, i) => {
    const target = clamp(p + gain * feedbackError * (metricWeights[i] ?? 0), floor, ceiling);
    const capped = clamp(target, p - deltaCap, p + deltaCap);
    const next = clamp(capped, floor, ceiling);
    assertInRange(`probability[${i}]`, next, floor, ceiling);
    return next;
  });
}

export interface SampleOptions {
  stickiness: number;
  bounds: ProbabilityBounds;
  /** Slots that may fire when the layer is offbeats-only. */
  offbeatSlots?: ReadonlySet<number>;
}

/**
 * First-order Markov pass over the slots. An active previous slot scales the next
 * slot's probability by `1 - stickiness`, still inside the bounds. Non-offbeat slots of an offbeats-only
 * layer stay silent and clear the memory.
 */
export function sampleMask(
  probs: readonly number[],
  rng: Rng,
  state: MarkovState,
  options: SampleOptions
): { mask: OnsetMask; state: MarkovState } {
  const { stickiness, bounds, offbeatSlots } = options;
  let lastActive = state.lastActive;
  const mask: OnsetMask = probs.map((p, i): Bit => {
    if (offbeatSlots && !offbeatSlots.has(i)) {
      lastActive = false;
      return 0;
    }
    let effective = clamp(p, bounds.floor, bounds.ceiling);
    if (lastActive) {
      effective = clamp(effective * (1 - stickiness), bounds.floor, bounds.ceiling);
    }
    const active = rng() < effective;
    lastActive = active;
    return active ? 1 : 0;
  });
  return { mask, state: { lastActive } };
}

export function initialProbabilities(pattern: readonly Bit[], onPattern: number, offPattern: number, bounds: ProbabilityBounds): number[] {
  return pattern.map((bit) => clamp(bit === 1 ? onPattern : offPattern, bounds.floor, bounds.ceiling));
}
