import type { Bit, OnsetMask } from "../types.js";
import { countOnsets } from "./euclidean.js";

export interface DensityBounds {
  lower: number;
  upper: number;
}

export function densityBounds(steps: number, targetRatio: number, tolerance: number): DensityBounds {
  const center = Math.round(steps * targetRatio);
  const slack = Math.round(steps * tolerance);
  return {
    lower: Math.max(0, center - slack),
    upper: Math.min(steps, center + slack)
  };
}

/**
 * Moves the onset count into `round(steps*target) ± round(steps*tolerance)`.
 * Removes the lowest-weighted onsets first and adds at the highest-weighted
 * empty slots first; equal weights resolve by ascending slot index. With
 * `allowed`, onsets are only added on those slots.
 */
export function enforceDensity(
  mask: readonly Bit[],
  targetRatio: number,
  tolerance: number,
  metricWeights: readonly number[],
  allowed?: ReadonlySet<number>
): OnsetMask {
  const out: OnsetMask = [...mask];
  const { lower, upper } = densityBounds(out.length, targetRatio, tolerance);
  let count = countOnsets(out);
  const weightAt = (i: number) => metricWeights[i] ?? 0;

  if (count > upper) {
    const active = out
      .map((bit, i) => ({ bit, i }))
      .filter(({ bit }) => bit === 1)
      .sort((a, b) => weightAt(a.i) - weightAt(b.i) || a.i - b.i);
    for (const { i } of active) {
      if (count <= upper) break;
      out[i] = 0;
      count--;
    }
  } else if (count < lower) {
    const inactive = out
      .map((bit, i) => ({ bit, i }))
      .filter(({ bit, i }) => bit === 0 && (allowed === undefined || allowed.has(i)))
      .sort((a, b) => weightAt(b.i) - weightAt(a.i) || a.i - b.i);
    for (const { i } of inactive) {
      if (count >= lower) break;
      out[i] = 1;
      count++;
    }
  }

  return out;
}
