export { loadSessionConfig } from "./config-file.js";
export { CsvTelemetryLog, TELEMETRY_HEADER, formatTelemetryRow } from "./telemetry-log.js";
export { flattenEvents, secondsTimeline, ticksToSeconds } from "./timeline.js";
export { formatSessionReport, printSessionReport, summarizeSession } from "./report.js";
export { renderSessionFromConfig } from "./render.js";
export type {
  MetricSummary,
  RenderOptions,
  SessionSummary,
  TimedTimelineEvent,
  TimelineEvent
} from "./types.js";
