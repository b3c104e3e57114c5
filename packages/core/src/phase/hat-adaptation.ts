/**
 * Adaptive hi-hat layers.
 *
 * Each hat keeps a probability vector and a Markov memory across bars. A bar
 * nudges the vector with the previous bar's feedback error, samples a mask,
 * gates it through the layer's step conditions, thins it around kicks and
 * finally pulls its onset count into the configured density band.
 *
 * The closed hat may instead run a recovery bar (forced full) after a rescue.
 * An offbeats-only hat samples and fills only the eighth offbeats.
 */

import type { Bit, HatAdaptation, LayerConfig, OnsetMask } from "../types.js";
import type { Rng } from "../random.js";
import { euclidean, fullMask, rotate } from "../rhythm/euclidean.js";
import { initialProbabilities, sampleMask, updateProbabilities, type MarkovState } from "../rhythm/markov.js";
import { applyStepConditions, thinNearKick } from "../rhythm/conditions.js";
import { enforceDensity } from "../rhythm/density-enforcer.js";
import { metricClass, metricWeights } from "../rhythm/metrics.js";

export interface HatLayerState {
  probabilities: number[];
  markov: MarkovState;
}

export interface HatBarContext {
  bar: number;
  feedbackError: number;
  kickMask: readonly Bit[];
  thinBias: number;
  rng: Rng;
}

/** Beats never respond to syncopation error. */
export function updateWeights(steps: number): number[] {
  return metricWeights(steps, { beat: 0, eighth: 0.6, sixteenth: 0.6 });
}

/** Closed-hat density preference: drop beats first, add off-16ths first. */
export function closedHatDensityWeights(steps: number): number[] {
  return metricWeights(steps, { beat: 0.6, eighth: 0.9, sixteenth: 1 });
}

export function openHatDensityWeights(steps: number): number[] {
  return metricWeights(steps, { beat: 0, eighth: 1, sixteenth: 0 });
}

/** Eighth offbeats: slots 2, 6, 10 and 14 of a 16-step bar. */
export function offbeatSlots(steps: number): Set<number> {
  const slots = new Set<number>();
  for (let i = 0; i < steps; i++) {
    if (metricClass(i, steps) === "eighth") slots.add(i);
  }
  return slots;
}

export function createHatState(config: LayerConfig, adaptation: HatAdaptation): HatLayerState {
  const pattern = rotate(euclidean(config.steps, config.pulses), config.rotation);
  return {
    probabilities: initialProbabilities(pattern, adaptation.initialOnPattern, adaptation.initialOffPattern, {
      floor: adaptation.floor,
      ceiling: adaptation.ceiling
    }),
    markov: { lastActive: false }
  };
}

/** Maps a kick mask onto a grid of `steps` slots. */
function resample(mask: readonly Bit[], steps: number): OnsetMask {
  if (mask.length === steps) return [...mask];
  const out: OnsetMask = new Array<Bit>(steps).fill(0);
  mask.forEach((bit, i) => {
    if (bit === 1) out[Math.min(steps - 1, Math.floor((i * steps) / mask.length))] = 1;
  });
  return out;
}

function adaptiveMask(
  config: LayerConfig,
  adaptation: HatAdaptation,
  state: HatLayerState,
  ctx: HatBarContext,
  allowed: ReadonlySet<number> | undefined,
  densityWeights: readonly number[]
): { mask: OnsetMask; state: HatLayerState } {
  const bounds = { floor: adaptation.floor, ceiling: adaptation.ceiling };
  const probabilities = updateProbabilities(
    state.probabilities,
    ctx.feedbackError,
    updateWeights(config.steps),
    adaptation.gain,
    adaptation.deltaCap,
    bounds
  );
  const sampled = sampleMask(probabilities, ctx.rng, state.markov, {
    stickiness: adaptation.stickiness,
    bounds,
    offbeatSlots: allowed
  });
  let mask = applyStepConditions(sampled.mask, ctx.bar, config.conditions, ctx.rng);
  mask = thinNearKick(mask, resample(ctx.kickMask, config.steps), ctx.thinBias, ctx.rng);
  mask = enforceDensity(mask, adaptation.densityTarget, adaptation.densityTolerance, densityWeights, allowed);
  return { mask, state: { probabilities, markov: sampled.state } };
}

export function closedHatBar(
  config: LayerConfig,
  adaptation: HatAdaptation,
  state: HatLayerState,
  ctx: HatBarContext
): { mask: OnsetMask; state: HatLayerState } {
  const allowed = config.offbeatsOnly ? offbeatSlots(config.steps) : undefined;
  return adaptiveMask(config, adaptation, state, ctx, allowed, closedHatDensityWeights(config.steps));
}

/** Full bar, probabilities at the ceiling, memory cleared. */
export function closedHatRecoveryBar(
  config: LayerConfig,
  adaptation: HatAdaptation
): { mask: OnsetMask; state: HatLayerState } {
  return {
    mask: fullMask(config.steps),
    state: {
      probabilities: new Array<number>(config.steps).fill(adaptation.ceiling),
      markov: { lastActive: false }
    }
  };
}

export function openHatBar(
  config: LayerConfig,
  adaptation: HatAdaptation,
  state: HatLayerState,
  ctx: HatBarContext
): { mask: OnsetMask; state: HatLayerState } {
  const allowed = config.offbeatsOnly ? offbeatSlots(config.steps) : undefined;
  return adaptiveMask(config, adaptation, state, ctx, allowed, openHatDensityWeights(config.steps));
}
