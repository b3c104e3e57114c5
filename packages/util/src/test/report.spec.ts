import { describe, it } from "node:test";
import assert from "node:assert";
import { fileURLToPath } from "node:url";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { runSession } from "@adaptive-groove/core";
import { formatSessionReport, printSessionReport, summarizeSession } from "../report.js";
import { renderSessionFromConfig } from "../render.js";

describe("summarizeSession", () => {
  it("aggregates metrics and rescues", () => {
    const result = runSession({ bars: 16, seed: 5, muteWindow: { startBar: 4, endBar: 5 } });
    const summary = summarizeSession(result);
    assert.strictEqual(summary.completedBars, 16);
    assert.strictEqual(summary.rescueCount, 2);
    assert.deepStrictEqual(summary.rescueBars, [4, 5]);
    assert.strictEqual(summary.entrainment.min, 0.7);
    assert.strictEqual(summary.eventCounts.kick, 56);
  });
});

describe("formatSessionReport", () => {
  it("prints a header, metric lines and the rescue line", () => {
    const result = runSession({ bars: 8, seed: 5, muteWindow: { startBar: 2, endBar: 2 } });
    const lines: string[] = [];
    printSessionReport(result, (line) => lines.push(line));
    assert.strictEqual(lines.length, 7);
    assert.strictEqual(lines[0], "seed 5, 132 bpm, 8/8 bars");
    assert.ok(lines[1].startsWith("E: mean "));
    assert.strictEqual(lines[6], "rescues: 1 (bars 2)");
  });

  it("marks aborted runs and quiet sessions", () => {
    const controller = new AbortController();
    controller.abort();
    const summary = summarizeSession(runSession({ bars: 4, seed: 1, signal: controller.signal }));
    const lines = formatSessionReport(summary);
    assert.strictEqual(lines[0], "seed 1, 132 bpm, 0/4 bars (aborted)");
    assert.strictEqual(lines[1], "E: mean 0.000, median 0.000, range [0.000, 0.000]");
    assert.strictEqual(lines[5], "events: kick 0, hat_c 0, hat_o 0, snare 0, clap 0");
    assert.strictEqual(lines[6], "rescues: none");
  });
});

describe("renderSessionFromConfig", () => {
  it("runs a config file and writes its telemetry", async () => {
    const dir = await mkdtemp(join(tmpdir(), "groove-render-"));
    try {
      const telemetryPath = join(dir, "telemetry.csv");
      const configPath = fileURLToPath(new URL("./fixtures/adaptive-session.json", import.meta.url));
      const result = await renderSessionFromConfig(configPath, { telemetryPath, overrides: { bars: 3 } });
      assert.strictEqual(result.completedBars, 3);
      assert.strictEqual(result.meta.seed, 2024);
      const csv = await readFile(telemetryPath, "utf8");
      assert.strictEqual(csv.trimEnd().split("\n").length, 4);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
