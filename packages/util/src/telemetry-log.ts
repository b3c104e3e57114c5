/**
 * Row-oriented telemetry log.
 *
 * Buffers one row per bar while a session runs and writes the whole table on
 * `flush`, so the session loop never waits on the filesystem.
 */

import { writeFile } from "node:fs/promises";
import type { BarMetrics, TelemetrySink } from "./types.js";

export const TELEMETRY_HEADER = "bar,E,S,hat_density,hat_entropy";

const DECIMALS = 4;

export function formatTelemetryRow(record: BarMetrics): string {
  return [
    String(record.bar),
    record.E.toFixed(DECIMALS),
    record.S.toFixed(DECIMALS),
    record.hatDensity.toFixed(DECIMALS),
    record.hatEntropy.toFixed(DECIMALS)
  ].join(",");
}

export class CsvTelemetryLog implements TelemetrySink {
  private readonly rows: string[] = [];

  append(record: BarMetrics): void {
    this.rows.push(formatTelemetryRow(record));
  }

  get size(): number {
    return this.rows.length;
  }

  toCsv(): string {
    return [TELEMETRY_HEADER, ...this.rows].join("\n") + "\n";
  }

  async flush(path: string): Promise<void> {
    await writeFile(path, this.toCsv(), "utf8");
  }
}
