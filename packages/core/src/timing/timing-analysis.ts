import type { EventsByLayer, LayerName, TimedEvent } from "../types.js";
import type { TimeGrid } from "../timebase.js";
import { ticksToMs } from "../timebase.js";

export interface LayerTimingStats {
  count: number;
  meanOffsetMs: number;
  rmsOffsetMs: number;
  /** Standard deviation of inter-onset intervals */
  ioiStdMs: number;
}

/** Signed distance in ms from each onset to its nearest 16th grid line. */
export function microOffsetsMs(events: readonly TimedEvent[], grid: TimeGrid): number[] {
  return events.map((event) => {
    const nearest = Math.round(event.startTick / grid.ticksPerStep) * grid.ticksPerStep;
    return ticksToMs(grid, event.startTick - nearest);
  });
}

export function rms(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return Math.sqrt(values.reduce((sum, v) => sum + v * v, 0) / values.length);
}

export function standardDeviation(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  return Math.sqrt(values.reduce((sum, v) => sum + (v - mean) ** 2, 0) / values.length);
}

export function interOnsetIntervalsMs(events: readonly TimedEvent[], grid: TimeGrid): number[] {
  const starts = [...new Set(events.map((e) => e.startTick))].sort((a, b) => a - b);
  const intervals: number[] = [];
  for (let i = 1; i < starts.length; i++) {
    intervals.push(ticksToMs(grid, starts[i] - starts[i - 1]));
  }
  return intervals;
}

export function analyzeLayerTiming(events: readonly TimedEvent[], grid: TimeGrid): LayerTimingStats {
  const offsets = microOffsetsMs(events, grid);
  return {
    count: events.length,
    meanOffsetMs: offsets.length === 0 ? 0 : offsets.reduce((s, v) => s + v, 0) / offsets.length,
    rmsOffsetMs: rms(offsets),
    ioiStdMs: standardDeviation(interOnsetIntervalsMs(events, grid))
  };
}

export function analyzeTiming(events: EventsByLayer, grid: TimeGrid): Record<LayerName, LayerTimingStats> {
  return {
    kick: analyzeLayerTiming(events.kick, grid),
    hat_c: analyzeLayerTiming(events.hat_c, grid),
    hat_o: analyzeLayerTiming(events.hat_o, grid),
    snare: analyzeLayerTiming(events.snare, grid),
    clap: analyzeLayerTiming(events.clap, grid)
  };
}
