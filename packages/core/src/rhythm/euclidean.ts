import type { Bit, OnsetMask } from "../types.js";

/**
 * Distributes `pulses` onsets as evenly as possible over `steps` slots
 * (Bjorklund). Degenerate counts clamp to an empty or full mask.
 */
export function euclidean(steps: number, pulses: number): OnsetMask {
  const n = Math.max(0, Math.floor(steps));
  const k = Math.floor(pulses);
  if (k <= 0) {
    return new Array<Bit>(n).fill(0);
  }
  if (k >= n) {
    return new Array<Bit>(n).fill(1);
  }

  let front: Bit[][] = Array.from({ length: k }, (): Bit[] => [1]);
  let back: Bit[][] = Array.from({ length: n - k }, (): Bit[] => [0]);

  while (back.length > 1) {
    const pairs = Math.min(front.length, back.length);
    const merged: Bit[][] = [];
    for (let i = 0; i < pairs; i++) {
      merged.push([...front[i], ...back[i]]);
    }
    const remainder = front.length > pairs ? front.slice(pairs) : back.slice(pairs);
    front = merged;
    back = remainder;
  }

  return [...front.flat(), ...back.flat()];
}

/** Circular left rotation: `out[i] = mask[(i + amount) mod n]`. */
export function rotate(mask: readonly Bit[], amount: number): OnsetMask {
  const n = mask.length;
  if (n === 0) {
    return [];
  }
  const shift = ((Math.round(amount) % n) + n) % n;
  return mask.map((_, i) => mask[(i + shift) % n]);
}

export function countOnsets(mask: readonly Bit[]): number {
  let count = 0;
  for (const bit of mask) {
    count += bit;
  }
  return count;
}

export function onsetSteps(mask: readonly Bit[]): number[] {
  const steps: number[] = [];
  mask.forEach((bit, i) => {
    if (bit === 1) {
      steps.push(i);
    }
  });
  return steps;
}

export function maskFromSteps(stepsOn: Iterable<number>, steps: number): OnsetMask {
  const mask = new Array<Bit>(steps).fill(0);
  for (const s of stepsOn) {
    if (s >= 0 && s < steps) {
      mask[s] = 1;
    }
  }
  return mask;
}

export function emptyMask(steps: number): OnsetMask {
  return new Array<Bit>(steps).fill(0);
}

export function fullMask(steps: number): OnsetMask {
  return new Array<Bit>(steps).fill(1);
}
