/**
 * Type definitions for the Node-side helpers.
 *
 * Re-exports the core types the helpers consume and defines the flattened
 * timeline and report shapes.
 */

import type { LayerName, SessionOptions, TimedEvent } from "@adaptive-groove/core";

// ============================================================================
// Re-exported Core Types
// ============================================================================

export type {
  BarMetrics,
  EventsByLayer,
  LayerName,
  RescueReport,
  SessionOptions,
  SessionResult,
  TelemetrySink,
  TimedEvent
} from "@adaptive-groove/core";

// ============================================================================
// Helper Types
// ============================================================================

/** An event tagged with the layer that produced it. */
export interface TimelineEvent extends TimedEvent {
  layer: LayerName;
}

/** Timeline event with wall-clock positions. */
export interface TimedTimelineEvent extends TimelineEvent {
  startSeconds: number;
  durationSeconds: number;
}

export interface MetricSummary {
  mean: number;
  median: number;
  min: number;
  max: number;
}

/**
 * Aggregates over every completed bar of a session.
 */
export interface SessionSummary {
  seed: number;
  bpm: number;
  completedBars: number;
  plannedBars: number;
  aborted: boolean;
  entrainment: MetricSummary;
  syncopation: MetricSummary;
  hatDensity: MetricSummary;
  hatEntropy: MetricSummary;
  eventCounts: Record<LayerName, number>;
  rescueCount: number;
  rescueBars: number[];
}

export interface RenderOptions {
  /** Write the per-bar telemetry CSV here once the session finishes */
  telemetryPath?: string;
  /** Overrides applied on top of the loaded configuration */
  overrides?: SessionOptions;
}
