/**
 * Plain-text session report.
 *
 * `summarizeSession` is pure; `printSessionReport` writes the formatted lines
 * through `console.log` unless another writer is given.
 */

import { LAYER_NAMES } from "@adaptive-groove/core";
import type { LayerName, MetricSummary, SessionResult, SessionSummary } from "./types.js";

function summarize(values: readonly number[]): MetricSummary {
  if (values.length === 0) {
    return { mean: 0, median: 0, min: 0, max: 0 };
  }
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return {
    mean: values.reduce((sum, v) => sum + v, 0) / values.length,
    median: sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid],
    min: sorted[0],
    max: sorted[sorted.length - 1]
  };
}

export function summarizeSession(result: SessionResult): SessionSummary {
  const { events } = result;
  const eventCounts: Record<LayerName, number> = {
    kick: events.kick.length,
    hat_c: events.hat_c.length,
    hat_o: events.hat_o.length,
    snare: events.snare.length,
    clap: events.clap.length
  };
  return {
    seed: result.meta.seed,
    bpm: result.meta.bpm,
    completedBars: result.completedBars,
    plannedBars: result.meta.bars,
    aborted: result.aborted,
    entrainment: summarize(result.metrics.map((m) => m.E)),
    syncopation: summarize(result.metrics.map((m) => m.S)),
    hatDensity: summarize(result.metrics.map((m) => m.hatDensity)),
    hatEntropy: summarize(result.metrics.map((m) => m.hatEntropy)),
    eventCounts,
    rescueCount: result.rescue.count,
    rescueBars: [...result.rescue.bars]
  };
}

function formatMetric(label: string, summary: MetricSummary): string {
  const { mean, median, min, max } = summary;
  return `${label}: mean ${mean.toFixed(3)}, median ${median.toFixed(3)}, range [${min.toFixed(3)}, ${max.toFixed(3)}]`;
}

export function formatSessionReport(summary: SessionSummary): string[] {
  const status = summary.aborted ? " (aborted)" : "";
  const lines = [
    `seed ${summary.seed}, ${summary.bpm} bpm, ${summary.completedBars}/${summary.plannedBars} bars${status}`,
    formatMetric("E", summary.entrainment),
    formatMetric("S", summary.syncopation),
    formatMetric("hat density", summary.hatDensity),
    formatMetric("hat entropy", summary.hatEntropy),
    `events: ${LAYER_NAMES.map((layer) => `${layer} ${summary.eventCounts[layer]}`).join(", ")}`
  ];
  lines.push(
    summary.rescueCount === 0
      ? "rescues: none"
      : `rescues: ${summary.rescueCount} (bars ${summary.rescueBars.join(", ")})`
  );
  return lines;
}

export function printSessionReport(result: SessionResult, write: (line: string) => void = console.log): SessionSummary {
  const summary = summarizeSession(result);
  for (const line of formatSessionReport(summary)) {
    write(line);
  }
  return summary;
}
