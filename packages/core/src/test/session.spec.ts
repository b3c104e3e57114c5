import { describe, it } from "node:test";
import assert from "node:assert";
import { generateGroove, runSession } from "../session.js";
import { SessionController } from "../session-controller.js";
import { resolveSession } from "../config/session-resolver.js";
import { ConfigurationError } from "../errors.js";
import type { BarMetrics } from "../types.js";
import { EPSILON, buildSessionOptions } from "./test-utils.js";

describe("runSession", () => {
  it("is deterministic for a seed", () => {
    const first = runSession(buildSessionOptions({ bars: 8, seed: 42 }));
    const second = runSession(buildSessionOptions({ bars: 8, seed: 42 }));
    assert.deepStrictEqual(first.events, second.events);
    assert.deepStrictEqual(first.metrics, second.metrics);
  });

  it("reproduces a seedless run from its replay options", () => {
    const first = runSession({ bars: 4 });
    const replay = runSession(first.meta.replayOptions);
    assert.strictEqual(replay.meta.seed, first.meta.seed);
    assert.deepStrictEqual(replay.events, first.events);
  });

  it("reports session metadata", () => {
    const result = runSession(buildSessionOptions({ bars: 3, seed: 9 }));
    assert.deepStrictEqual(
      { ...result.meta, replayOptions: undefined },
      { bpm: 132, ppq: 1920, bars: 3, seed: 9, ticksPerBar: 7680, replayOptions: undefined }
    );
    assert.strictEqual(result.completedBars, 3);
    assert.strictEqual(result.aborted, false);
    assert.strictEqual(result.bars.length, 3);
  });

  it("places an immutable kick on the quarters of every bar", () => {
    const result = runSession(buildSessionOptions({ bars: 2, seed: 3 }));
    assert.deepStrictEqual(
      result.events.kick.map((e) => e.startTick),
      [0, 1920, 3840, 5760, 7680, 9600, 11520, 13440]
    );
    assert.ok(result.events.kick.every((e) => e.note === 36 && e.velocity === 110 && e.channel === 9));
  });

  it("emits only non-negative ticks on the drum channel", () => {
    const result = runSession(buildSessionOptions({ bars: 16, seed: 5 }));
    for (const events of Object.values(result.events)) {
      for (const event of events) {
        assert.ok(event.startTick >= 0);
        assert.ok(event.durationTick >= 1);
        assert.strictEqual(event.channel, 9);
      }
    }
  });

  it("keeps the closed hat inside its density band", () => {
    const result = runSession(buildSessionOptions({ bars: 32, seed: 17 }));
    for (const report of result.bars) {
      assert.ok(report.layerStats.hat_c.onsets >= 10 && report.layerStats.hat_c.onsets <= 12, `bar ${report.bar}`);
    }
  });

  it("keeps hat probabilities inside their bounds", () => {
    const result = runSession(buildSessionOptions({ bars: 32, seed: 21 }));
    for (const report of result.bars) {
      assert.ok(report.hatProbabilities.hat_c.every((p) => p >= 0.25 - EPSILON && p <= 0.95 + EPSILON));
      assert.ok(report.hatProbabilities.hat_o.every((p) => p >= 0.05 - EPSILON && p <= 0.75 + EPSILON));
    }
  });

  it("moves session modulators by at most their per-bar delta", () => {
    const result = runSession(buildSessionOptions({ bars: 48, seed: 8 }));
    for (let i = 1; i < result.bars.length; i++) {
      const previous = result.bars[i - 1].modulators;
      const current = result.bars[i].modulators;
      assert.ok(Math.abs(current.swing - previous.swing) <= 0.01 + EPSILON, `swing at bar ${i}`);
      assert.ok(Math.abs(current.thin_bias - previous.thin_bias) <= 0.03 + EPSILON, `thin_bias at bar ${i}`);
      assert.ok(current.swing >= 0.51 - EPSILON && current.swing <= 0.58 + EPSILON);
      assert.ok(current.rotation_rate >= 0 && current.rotation_rate <= 0.125 + EPSILON);
    }
  });

  it("drives bound layer fields from their modulators", () => {
    const result = runSession(
      buildSessionOptions({
        bars: 16,
        seed: 4,
        modulators: [
          {
            path: "hat_c.velocity",
            spec: { name: "hat velocity", mode: "sine", min: 60, max: 100, stepSize: 0, timeConstant: 8, maxDeltaPerBar: 40, phase: 0 }
          }
        ]
      })
    );
    const bound = new Set(result.bars.map((report) => Math.round(report.modulators["hat_c.velocity"])));
    assert.ok(bound.size > 1);
    for (const event of result.events.hat_c) {
      assert.ok(bound.has(event.velocity), `velocity ${event.velocity}`);
    }
  });

  it("sends one telemetry record per bar", () => {
    const records: BarMetrics[] = [];
    runSession(buildSessionOptions({ bars: 6, seed: 2, telemetry: { append: (metrics) => records.push(metrics) } }));
    assert.deepStrictEqual(
      records.map((r) => r.bar),
      [0, 1, 2, 3, 4, 5]
    );
  });

  it("returns nothing when aborted before the first bar", () => {
    const controller = new AbortController();
    controller.abort();
    const result = runSession(buildSessionOptions({ bars: 8, seed: 2, signal: controller.signal }));
    assert.strictEqual(result.completedBars, 0);
    assert.strictEqual(result.aborted, true);
    assert.deepStrictEqual(result.events, { kick: [], hat_c: [], hat_o: [], snare: [], clap: [] });
  });

  it("stops between bars when aborted mid-run", () => {
    const controller = new AbortController();
    const result = runSession(
      buildSessionOptions({
        bars: 16,
        seed: 2,
        signal: controller.signal,
        telemetry: {
          append: (metrics) => {
            if (metrics.bar === 4) controller.abort();
          }
        }
      })
    );
    assert.strictEqual(result.completedBars, 5);
    assert.strictEqual(result.aborted, true);
    assert.strictEqual(result.metrics.length, 5);
  });

  it("throws configuration errors before running", () => {
    assert.throws(() => runSession({ bpm: 0 }), ConfigurationError);
  });
});

describe("generateGroove", () => {
  it("resolves to the same result as runSession", async () => {
    const direct = runSession(buildSessionOptions({ bars: 4, seed: 12 }));
    const awaited = await generateGroove(buildSessionOptions({ bars: 4, seed: 12 }));
    assert.deepStrictEqual(awaited.events, direct.events);
  });
});

describe("SessionController", () => {
  it("refuses to run past the last bar", () => {
    const controller = new SessionController(resolveSession(buildSessionOptions({ bars: 2, seed: 1 })).session);
    controller.nextBar();
    controller.nextBar();
    assert.strictEqual(controller.done, true);
    assert.throws(() => controller.nextBar(), /already finished/);
  });

  it("exposes a detached state snapshot", () => {
    const controller = new SessionController(resolveSession(buildSessionOptions({ bars: 4, seed: 1 })).session);
    controller.nextBar();
    const snapshot = controller.snapshot();
    controller.nextBar();
    assert.strictEqual(snapshot.bar, 1);
    assert.strictEqual(controller.currentBar, 2);
  });
});
