import type { MicroTiming } from "../types.js";
import type { TimeGrid } from "../timebase.js";
import { msToTicks } from "../timebase.js";
import { clamp, weightedIndex, type Rng } from "../random.js";

export interface QuantizeOptions {
  swingPercent?: number;
  micro?: MicroTiming;
  /** Session-wide ceiling, combined with the table's own cap */
  capMs?: number;
}

/** Delay for odd (off-16th) steps: `round((swing - 0.5) * ticksPerEighth)`. */
export function swingOffsetTicks(step: number, swingPercent: number | undefined, grid: TimeGrid): number {
  if (swingPercent === undefined || step % 2 === 0) {
    return 0;
  }
  return Math.round((swingPercent - 0.5) * (grid.ppq / 2));
}

/** Draws one bin from the table and limits its magnitude to the tighter cap. */
export function sampleMicroOffsetMs(micro: MicroTiming, rng: Rng, capMs?: number): number {
  const index = weightedIndex(rng, micro.probabilities);
  const offset = micro.offsetsMs[index] ?? 0;
  const cap = Math.abs(Math.min(micro.capMs, capMs ?? micro.capMs));
  return clamp(offset, -cap, cap);
}

/**
 * Final tick of an onset relative to the bar start. May be negative when a
 * negative micro offset lands on step 0.
 */
export function quantizeStep(step: number, baseTick: number, options: QuantizeOptions, grid: TimeGrid, rng: Rng): number {
  let tick = baseTick + swingOffsetTicks(step, options.swingPercent, grid);
  if (options.micro) {
    tick += msToTicks(grid, sampleMicroOffsetMs(options.micro, rng, options.capMs));
  }
  return tick;
}
