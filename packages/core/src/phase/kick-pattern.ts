import type { Bit, GuardConfig, LayerConfig, OnsetMask } from "../types.js";
import type { Rng } from "../random.js";
import { euclidean, rotate } from "../rhythm/euclidean.js";

export interface KickBar {
  mask: OnsetMask;
  /** Steps holding a ghost hit rather than a main onset */
  ghosts: Set<number>;
  rotation: number;
  rotationAccum: number;
}

export const GHOST_VELOCITY_DROP = 40;
export const GHOST_VELOCITY_FLOOR = 60;

export function ghostVelocity(velocity: number): number {
  return Math.max(GHOST_VELOCITY_FLOOR, velocity - GHOST_VELOCITY_DROP);
}

function quarterWindows(steps: number): Array<[number, number]> {
  const size = Math.max(1, Math.floor(steps / 4));
  const windows: Array<[number, number]> = [];
  for (let q = 0; q < 4; q++) {
    const start = q * size;
    const end = q === 3 ? steps - 1 : start + size - 1;
    if (start < steps) windows.push([start, Math.min(end, steps - 1)]);
  }
  return windows;
}

/**
 * Builds one bar of kick. An immutable kick is its Euclidean pattern at the
 * configured rotation, bar after bar. Otherwise the pattern drifts by the
 * accumulated rotation rate and may pick up a ghost hit one step before an
 * onset or a displacement toward the next eighth; every quarter window keeps
 * at least one onset.
 */
export function buildKickBar(
  config: LayerConfig,
  guard: GuardConfig,
  rotationAccum: number,
  sessionRotationRate: number,
  rng: Rng
): KickBar {
  const base = euclidean(config.steps, config.pulses);

  if (guard.kickImmutable) {
    return {
      mask: rotate(base, config.rotation),
      ghosts: new Set(),
      rotation: config.rotation,
      rotationAccum
    };
  }

  const rate = Math.min(guard.maxRotationRate, Math.max(0, config.rotationRatePerBar + sessionRotationRate));
  const accum = (rotationAccum + rate) % config.steps;
  const rotation = (config.rotation + Math.round(accum)) % config.steps;
  const mask: OnsetMask = rotate(base, rotation);
  const ghosts = new Set<number>();

  const onsets = mask.flatMap((bit, i) => (bit === 1 ? [i] : []));
  for (const step of onsets) {
    const before = step - 1;
    if (before >= 0 && mask[before] === 0 && rng() < config.ghostPre1Prob) {
      mask[before] = 1;
      ghosts.add(before);
    }
  }

  const windows = quarterWindows(config.steps);
  if (rng() < config.displaceInto2Prob) {
    const [start, end] = windows[Math.min(windows.length - 1, Math.floor(rng() * windows.length))];
    for (let pos = start; pos <= end; pos++) {
      if (mask[pos] === 1 && !ghosts.has(pos)) {
        const target = Math.min(end, pos + 2);
        if (target !== pos && mask[target] === 0) {
          mask[pos] = 0;
          mask[target] = 1;
        }
        break;
      }
    }
  }

  for (const [start, end] of windows) {
    if (!mask.slice(start, end + 1).some((bit: Bit) => bit === 1)) {
      mask[start] = 1;
    }
  }

  return { mask, ghosts, rotation, rotationAccum: accum };
}
