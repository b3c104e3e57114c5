import { describe, it } from "node:test";
import assert from "node:assert";
import { resolveSession } from "../config/session-resolver.js";
import { defaultLayers } from "../config/defaults.js";
import { ConfigurationError } from "../errors.js";
import type { ModulatorSpec, SessionOptions } from "../types.js";

function expectConfigError(options: SessionOptions, path: string) {
  assert.throws(
    () => resolveSession(options),
    (error: unknown) => error instanceof ConfigurationError && error.path === path
  );
}

const rampSpec: ModulatorSpec = {
  name: "ramp",
  mode: "random_walk",
  min: 0,
  max: 0.2,
  stepSize: 0.01,
  timeConstant: 1,
  maxDeltaPerBar: 0.02,
  phase: 0
};

describe("resolveSession", () => {
  it("fills every default", () => {
    const { session } = resolveSession({ seed: 5 });
    assert.strictEqual(session.bpm, 132);
    assert.strictEqual(session.ppq, 1920);
    assert.strictEqual(session.bars, 32);
    assert.strictEqual(session.seed, 5);
    assert.deepStrictEqual(session.layers, defaultLayers());
    assert.deepStrictEqual(session.modulators, []);
    assert.strictEqual(session.accent, undefined);
  });

  it("merges layer overrides over the defaults", () => {
    const { session } = resolveSession({ seed: 1, layers: { snare: { velocity: 70 } } });
    assert.strictEqual(session.layers.snare.velocity, 70);
    assert.strictEqual(session.layers.snare.note, 38);
  });

  it("ties the closed hat density band to the session targets", () => {
    const { session } = resolveSession({ seed: 1, targets: { hatDensityTarget: 0.5, hatDensityTolerance: 0.1 } });
    assert.strictEqual(session.hats.hat_c.densityTarget, 0.5);
    assert.strictEqual(session.hats.hat_c.densityTolerance, 0.1);
    assert.strictEqual(session.hats.hat_o.densityTarget, 0.2);
  });

  it("pins a drawn seed in the replay options", () => {
    const { session, replayOptions } = resolveSession({ bars: 4 });
    assert.ok(Number.isInteger(session.seed));
    assert.deepStrictEqual(replayOptions, { bpm: 132, ppq: 1920, bars: 4, seed: session.seed });
  });

  it("does not alias caller objects", () => {
    const options: SessionOptions = { seed: 1, layers: { hat_c: { conditions: [{ kind: "pre" }] } } };
    const { session } = resolveSession(options);
    options.layers?.hat_c?.conditions?.push({ kind: "not_pre" });
    assert.deepStrictEqual(session.layers.hat_c.conditions, [{ kind: "pre" }]);
  });

  it("rejects invalid timing", () => {
    expectConfigError({ bpm: 0 }, "bpm");
    expectConfigError({ ppq: 1.5 }, "ppq");
    expectConfigError({ bars: 0 }, "bars");
  });

  it("rejects invalid layers", () => {
    expectConfigError({ layers: { kick: { velocity: 0 } } }, "layers.kick.velocity");
    expectConfigError(
      { layers: { hat_c: { micro: { offsetsMs: [0, 1], probabilities: [1], capMs: 5 } } } },
      "layers.hat_c.micro.probabilities"
    );
    expectConfigError({ layers: { hat_o: { chokeWith: "hat_o" } } }, "layers.hat_o.chokeWith");
    expectConfigError({ layers: { snare: { conditions: [{ kind: "every_n", n: 0 }] } } }, "layers.snare.conditions[0].n");
  });

  it("rejects inverted target bands", () => {
    expectConfigError({ targets: { sLow: 0.6, sHigh: 0.5 } }, "targets.sHigh");
    expectConfigError({ targets: { entropyLow: 0.9, entropyHigh: 0.8 } }, "targets.entropyHigh");
  });

  it("rejects modulator bindings that cannot run", () => {
    expectConfigError({ modulators: [{ path: "hat_o.loudness", spec: rampSpec }] }, "hat_o.loudness");
    expectConfigError(
      {
        modulators: [
          { path: "hat_o.ratchet_prob", spec: rampSpec },
          { path: "hat_o.ratchet_prob", spec: rampSpec }
        ]
      },
      "hat_o.ratchet_prob"
    );
    expectConfigError(
      { modulators: [{ path: "swing", spec: { ...rampSpec, mode: "ou", timeConstant: 0 } }] },
      "modulators[0].timeConstant"
    );
    expectConfigError({ modulators: [{ path: "swing", spec: { ...rampSpec, max: -1 } }] }, "modulators[0].max");
  });

  it("rejects an inverted mute window and zero accent steps", () => {
    expectConfigError({ muteWindow: { startBar: 6, endBar: 4 } }, "muteWindow.endBar");
    expectConfigError(
      { accent: { steps: [0], probability: 1, velocityScale: 1, lengthScale: 1 } },
      "accent.steps[0]"
    );
  });

  it("rejects kick pattern bindings while the kick is immutable", () => {
    expectConfigError({ modulators: [{ path: "kick.pulses", spec: { ...rampSpec, min: 3, max: 6 } }] }, "kick.pulses");
    expectConfigError({ modulators: [{ path: "kick.rotation", spec: { ...rampSpec, min: 0, max: 3 } }] }, "kick.rotation");
    expectConfigError({ modulators: [{ path: "kick.steps", spec: rampSpec }] }, "kick.steps");
    expectConfigError({ modulators: [{ path: "kick.ghost_pre1_prob", spec: rampSpec }] }, "kick.ghost_pre1_prob");
  });

  it("accepts kick pattern bindings once the kick may move", () => {
    const { session } = resolveSession({
      seed: 1,
      guard: { kickImmutable: false },
      modulators: [
        { path: "kick.pulses", spec: { ...rampSpec, min: 3, max: 6 } },
        { path: "kick.ghost_pre1_prob", spec: rampSpec }
      ]
    });
    assert.strictEqual(session.modulators.length, 2);
  });

  it("rejects bindings on fields no bar reads", () => {
    expectConfigError({ modulators: [{ path: "snare.ghost_pre1_prob", spec: rampSpec }] }, "snare.ghost_pre1_prob");
    expectConfigError({ modulators: [{ path: "hat_o.rotation_rate_per_bar", spec: rampSpec }] }, "hat_o.rotation_rate_per_bar");
    expectConfigError({ modulators: [{ path: "clap.displace_into_2_prob", spec: rampSpec }] }, "clap.displace_into_2_prob");
    expectConfigError({ modulators: [{ path: "hat_c.pulses", spec: { ...rampSpec, min: 2, max: 16 } }] }, "hat_c.pulses");
    expectConfigError({ modulators: [{ path: "hat_o.rotation", spec: { ...rampSpec, min: 0, max: 3 } }] }, "hat_o.rotation");
  });

  it("accepts per-bar fields on static layers", () => {
    const { session } = resolveSession({
      seed: 1,
      modulators: [
        { path: "snare.pulses", spec: { ...rampSpec, min: 2, max: 4 } },
        { path: "clap.velocity", spec: { ...rampSpec, min: 80, max: 100 } }
      ]
    });
    assert.deepStrictEqual(
      session.modulators.map((binding) => binding.path),
      ["snare.pulses", "clap.velocity"]
    );
  });
});
