import { describe, it } from "node:test";
import assert from "node:assert";
import {
  applyAccent,
  applyChoke,
  effectiveSwing,
  realizeBar,
  realizeLayer,
  type RealizationContext,
  type StepEvent
} from "../phase/event-realization.js";
import { defaultLayers } from "../config/defaults.js";
import { emptyMask } from "../rhythm/euclidean.js";
import { bits, constantRng, plainLayer, testGrid } from "./test-utils.js";

function context(overrides: Partial<RealizationContext> = {}): RealizationContext {
  return { grid: testGrid(), bar: 0, sessionSwing: 0.5, microCapMs: 12, rng: constantRng(0.5), ...overrides };
}

function stepEvent(slot: number, overrides: Partial<StepEvent> = {}): StepEvent {
  return { note: 38, velocity: 100, startTick: slot * 480, durationTick: 240, channel: 9, slot, ...overrides };
}

describe("realizeLayer", () => {
  it("places onsets on the bar grid with half-step durations", () => {
    const events = realizeLayer(plainLayer(), bits("1000100000000000"), context({ bar: 1 }));
    assert.deepStrictEqual(
      events.map((e) => [e.startTick, e.durationTick, e.channel, e.note, e.velocity]),
      [
        [7680, 240, 9, 38, 96],
        [9600, 240, 9, 38, 96]
      ]
    );
  });

  it("delays odd steps by the layer swing", () => {
    const events = realizeLayer(plainLayer({ swingPercent: 0.55 }), bits("0100000000000000"), context());
    assert.strictEqual(events[0].startTick, 528);
  });

  it("splits ratcheted onsets into equal sub-hits", () => {
    const events = realizeLayer(plainLayer({ ratchetProb: 1, ratchetRepeat: 3 }), bits("1000000000000000"), context());
    assert.deepStrictEqual(
      events.map((e) => [e.startTick, e.durationTick]),
      [
        [0, 80],
        [80, 80],
        [160, 80]
      ]
    );
  });

  it("clamps an early micro offset at tick 0", () => {
    const layer = plainLayer({ micro: { offsetsMs: [-10], probabilities: [1], capMs: 12 } });
    const events = realizeLayer(layer, bits("1000000000000000"), context());
    assert.strictEqual(events[0].startTick, 0);
  });

  it("plays ghost steps at reduced velocity", () => {
    const events = realizeLayer(plainLayer({ velocity: 110 }), bits("1001000000000000"), context(), new Set([3]));
    assert.deepStrictEqual(
      events.map((e) => e.velocity),
      [110, 70]
    );
  });
});

describe("effectiveSwing", () => {
  it("prefers the layer value, then the session value for followers", () => {
    assert.strictEqual(effectiveSwing(plainLayer({ swingPercent: 0.6 }), 0.55), 0.6);
    assert.strictEqual(effectiveSwing(plainLayer({ followSessionSwing: true }), 0.55), 0.55);
    assert.strictEqual(effectiveSwing(plainLayer(), 0.55), undefined);
  });
});

describe("applyChoke", () => {
  it("cuts an event at the next choking onset", () => {
    const [event] = applyChoke([stepEvent(2, { startTick: 960 })], [1000]);
    assert.strictEqual(event.durationTick, 40);
  });

  it("ignores choking onsets at or before the event", () => {
    const [event] = applyChoke([stepEvent(2, { startTick: 960 })], [960, 500]);
    assert.strictEqual(event.durationTick, 240);
  });
});

describe("applyAccent", () => {
  it("scales every event on a passing accent slot", () => {
    const byLayer = { kick: [stepEvent(0)], hat_c: [stepEvent(0), stepEvent(4)], hat_o: [], snare: [], clap: [] };
    const out = applyAccent(byLayer, { steps: [1], probability: 1, velocityScale: 1.5, lengthScale: 2 }, constantRng(0));
    assert.deepStrictEqual(
      [...out.kick, ...out.hat_c].map((e) => [e.slot, e.velocity, e.durationTick]),
      [
        [0, 127, 480],
        [0, 127, 480],
        [4, 100, 240]
      ]
    );
  });

  it("leaves everything untouched when the gate fails", () => {
    const byLayer = { kick: [stepEvent(0)], hat_c: [], hat_o: [], snare: [], clap: [] };
    const out = applyAccent(byLayer, { steps: [1], probability: 0.5, velocityScale: 2, lengthScale: 2 }, constantRng(0.9));
    assert.deepStrictEqual(out.kick, byLayer.kick);
  });
});

describe("realizeBar", () => {
  const layers = defaultLayers();
  layers.hat_o = { ...layers.hat_o, steps: 4, micro: undefined, ratchetProb: 0, followSessionSwing: false };
  layers.hat_c = { ...layers.hat_c, micro: undefined, followSessionSwing: false };

  function realize(hatClosed: string) {
    return realizeBar(
      {
        layers,
        masks: {
          kick: emptyMask(16),
          hat_c: bits(hatClosed),
          hat_o: bits("1000"),
          snare: emptyMask(16),
          clap: emptyMask(16)
        },
        kickGhosts: new Set()
      },
      context()
    );
  }

  it("emits plain timed events", () => {
    const events = realize("0000000000000000");
    assert.deepStrictEqual(events.hat_o, [{ note: 46, velocity: 80, startTick: 0, durationTick: 960, channel: 9 }]);
  });

  it("chokes the open hat at the next closed hat", () => {
    const events = realize("0100000000000000");
    assert.strictEqual(events.hat_c[0].startTick, 480);
    assert.strictEqual(events.hat_o[0].durationTick, 480);
  });
});
