import { generateGroove } from "@adaptive-groove/core";
import { loadSessionConfig } from "./config-file.js";
import { CsvTelemetryLog } from "./telemetry-log.js";
import type { RenderOptions, SessionResult } from "./types.js";

/**
 * Loads a session file, runs it and, when asked, writes the telemetry CSV.
 */
export async function renderSessionFromConfig(configPath: string, options: RenderOptions = {}): Promise<SessionResult> {
  const loaded = await loadSessionConfig(configPath);
  const log = new CsvTelemetryLog();
  const result = await generateGroove({ ...loaded, ...options.overrides, telemetry: log });
  if (options.telemetryPath) {
    await log.flush(options.telemetryPath);
  }
  return result;
}
