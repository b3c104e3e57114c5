import type { Bit, OnsetMask } from "../types.js";
import { clamp } from "../random.js";
import { STEPS_PER_BAR } from "../timebase.js";
import { countOnsets } from "./euclidean.js";

const QUARTER_SLOTS = [0, 4, 8, 12] as const;

export type MetricClass = "beat" | "eighth" | "sixteenth";

/**
 * Metric position of `slot` in a bar of `steps` slots, measured on the 16th grid.
 * Slots that fall between 16ths count as "sixteenth".
 */
export function metricClass(slot: number, steps = STEPS_PER_BAR): MetricClass {
  const position = (slot * STEPS_PER_BAR) / steps;
  if (!Number.isInteger(position)) return "sixteenth";
  if (position % 4 === 0) return "beat";
  if (position % 2 === 0) return "eighth";
  return "sixteenth";
}

/** Per-slot table built from one weight per metric class. */
export function metricWeights(steps: number, weights: Record<MetricClass, number>): number[] {
  return Array.from({ length: steps }, (_, i) => weights[metricClass(i, steps)]);
}

const SYNCOPATION_WEIGHTS: Record<MetricClass, number> = { beat: 0, eighth: 0.4, sixteenth: 0.65 };

/** Syncopation weight of a 16th slot: beat 0, eighth offbeat 0.4, other 16ths 0.65. */
export function syncopationWeight(slot: number): number {
  return SYNCOPATION_WEIGHTS[metricClass(slot)];
}

export function entrainment(union: readonly Bit[]): number {
  const quarterHits = QUARTER_SLOTS.filter((s) => union[s] === 1).length;
  const quarterComplete = quarterHits === QUARTER_SLOTS.length;
  const gridComplete = union.length > 0 && union.every((bit) => bit === 1);
  let E: number;
  if (quarterComplete && gridComplete) {
    E = 1;
  } else if (quarterComplete) {
    E = 0.9;
  } else if (gridComplete) {
    E = 0.85;
  } else {
    E = 0.7 + 0.3 * (quarterHits / 4);
  }
  return clamp(E, 0, 1);
}

export function syncopation(union: readonly Bit[]): number {
  let sum = 0;
  let active = 0;
  union.forEach((bit, i) => {
    if (bit === 1) {
      sum += syncopationWeight(i);
      active++;
    }
  });
  return active === 0 ? 0 : clamp(sum / active, 0, 1);
}

export function entrainmentSyncopation(union: readonly Bit[]): { E: number; S: number } {
  return { E: entrainment(union), S: syncopation(union) };
}

export function density(mask: readonly Bit[]): number {
  return mask.length === 0 ? 0 : countOnsets(mask) / mask.length;
}

/** Bernoulli entropy (bits) of the activity ratio. */
export function bernoulliEntropy(p: number): number {
  if (p <= 0 || p >= 1) {
    return 0;
  }
  return -(p * Math.log2(p) + (1 - p) * Math.log2(1 - p));
}

export function entropy(mask: readonly Bit[]): number {
  return bernoulliEntropy(density(mask));
}

/**
 * ORs layer masks onto the 16-step grid; masks of other lengths are mapped
 * proportionally.
 */
export function unionMask(masks: readonly (readonly Bit[])[]): OnsetMask {
  const union: OnsetMask = new Array<Bit>(STEPS_PER_BAR).fill(0);
  for (const mask of masks) {
    const n = mask.length;
    mask.forEach((bit, i) => {
      if (bit === 1) {
        union[Math.min(STEPS_PER_BAR - 1, Math.floor((i * STEPS_PER_BAR) / n))] = 1;
      }
    });
  }
  return union;
}
