import type { Bit, OnsetMask, StepCondition } from "../types.js";
import { clamp, type Rng } from "../random.js";

/**
 * Whether a 1-indexed bar falls on the schedule offset, offset+n, offset+2n, ...
 */
export function everyN(bar1: number, n: number, offset = 0): boolean {
  if (n <= 0) {
    return false;
  }
  if (bar1 < Math.max(1, offset)) {
    return false;
  }
  return (bar1 - offset) % n === 0;
}

function evaluate(condition: StepCondition, bar1: number, prevRaw: Bit, rng: Rng): boolean {
  switch (condition.kind) {
    case "prob":
      return rng() < (condition.p ?? 1);
    case "pre":
      return prevRaw === 1;
    case "not_pre":
      return prevRaw === 0;
    case "fill":
    case "every_n":
      return everyN(bar1, condition.n ?? 0, condition.offset ?? 0);
  }
}

/**
 * Gates each onset through every condition in order; the first failing
 * condition silences the step. `pre`/`not_pre` look at the unconditioned mask.
 */
export function applyStepConditions(
  mask: readonly Bit[],
  barIndex: number,
  conditions: readonly StepCondition[],
  rng: Rng
): OnsetMask {
  const out: OnsetMask = [...mask];
  if (conditions.length === 0) {
    return out;
  }
  const bar1 = barIndex + 1;
  let prevRaw: Bit = 0;
  for (let step = 0; step < mask.length; step++) {
    const raw = mask[step];
    if (raw === 1) {
      for (const condition of conditions) {
        let passed = evaluate(condition, bar1, prevRaw, rng);
        if (condition.negate) {
          passed = !passed;
        }
        if (!passed) {
          out[step] = 0;
          break;
        }
      }
    }
    prevRaw = raw;
  }
  return out;
}

/**
 * Keep probability per slot: slots within `window` steps of a kick get
 * `1 + bias * (1 - d / (window + 1))`, where d is the circular distance to the
 * nearest kick. A negative bias thins hats around kicks.
 */
export function thinningKeepProbabilities(kickMask: readonly Bit[], bias: number, window = 1): number[] {
  const steps = kickMask.length;
  const kicks = kickMask.flatMap((bit, i) => (bit === 1 ? [i] : []));
  return kickMask.map((_, i) => {
    let nearest = Infinity;
    for (const k of kicks) {
      const direct = Math.abs(i - k);
      nearest = Math.min(nearest, direct, steps - direct);
    }
    if (nearest > window) {
      return 1;
    }
    return clamp(1 + bias * (1 - nearest / (window + 1)), 0, 1);
  });
}

export function thinNearKick(mask: readonly Bit[], kickMask: readonly Bit[], bias: number, rng: Rng, window = 1): OnsetMask {
  const keep = thinningKeepProbabilities(kickMask, bias, window);
  return mask.map((bit, i): Bit => (bit === 1 && rng() >= keep[i] ? 0 : bit));
}
