import { ConfigurationError } from "./errors.js";

export const STEPS_PER_BAR = 16;
export const BEATS_PER_BAR = 4;

/**
 * Tick-domain constants for one session. Tempo changes mid-session are not supported.
 */
export interface TimeGrid {
  ppq: number;
  bpm: number;
  ticksPerBar: number;
  ticksPerStep: number;
  ticksPerMs: number;
}

export function createTimeGrid(ppq: number, bpm: number, beatsPerBar = BEATS_PER_BAR): TimeGrid {
  if (!Number.isFinite(ppq) || ppq <= 0 || !Number.isInteger(ppq)) {
    throw new ConfigurationError("ppq", `must be a positive integer, got ${ppq}`);
  }
  if (!Number.isFinite(bpm) || bpm <= 0) {
    throw new ConfigurationError("bpm", `must be positive, got ${bpm}`);
  }
  const ticksPerBar = ppq * beatsPerBar;
  const msPerBeat = 60000 / bpm;
  return {
    ppq,
    bpm,
    ticksPerBar,
    ticksPerStep: Math.floor(ticksPerBar / STEPS_PER_BAR),
    ticksPerMs: ppq / msPerBeat
  };
}

/** Start tick of `step` inside a bar of `steps` slots. */
export function stepTick(grid: TimeGrid, step: number, steps: number): number {
  return Math.round((step * grid.ticksPerBar) / steps);
}

export function msToTicks(grid: TimeGrid, ms: number): number {
  return Math.round(ms * grid.ticksPerMs);
}

export function ticksToMs(grid: TimeGrid, ticks: number): number {
  return ticks / grid.ticksPerMs;
}
