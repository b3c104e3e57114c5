import { describe, it } from "node:test";
import assert from "node:assert";
import { initialProbabilities, sampleMask, updateProbabilities } from "../rhythm/markov.js";
import { createRng } from "../random.js";
import { assertClose, bits, constantRng, EPSILON, maskString } from "./test-utils.js";

const bounds = { floor: 0.25, ceiling: 0.95 };

describe("updateProbabilities", () => {
  it("moves toward the target by at most the delta cap", () => {
    const [next] = updateProbabilities([0.5], 1, [0.6], 0.6, 0.03, bounds);
    assertClose(next, 0.53);
  });

  it("leaves zero-weight slots unchanged", () => {
    const next = updateProbabilities([0.4, 0.4], 0.5, [0, 1], 1, 0.1, bounds);
    assert.strictEqual(next[0], 0.4);
    assertClose(next[1], 0.5);
  });

  it("never leaves [floor, ceiling] under arbitrary error", () => {
    const rng = createRng(11);
    let probs = Array.from({ length: 16 }, () => 0.6);
    const weights = probs.map((_, i) => (i % 4 === 0 ? 0 : 0.6));
    for (let bar = 0; bar < 400; bar++) {
      const error = (rng() - 0.5) * 20;
      const next = updateProbabilities(probs, error, weights, 5, 0.03, bounds);
      next.forEach((p, i) => {
        assert.ok(p >= bounds.floor - EPSILON && p <= bounds.ceiling + EPSILON);
        assert.ok(Math.abs(p - probs[i]) <= 0.03 + EPSILON);
      });
      probs = next;
    }
  });
});

describe("sampleMask", () => {
  it("fires every slot when the draw is always zero", () => {
    const { mask, state } = sampleMask([0.5, 0.5, 0.5, 0.5], constantRng(0), { lastActive: false }, {
      stickiness: 0.5,
      bounds
    });
    assert.strictEqual(maskString(mask), "1111");
    assert.strictEqual(state.lastActive, true);
  });

  it("fires nothing when the draw is above the ceiling", () => {
    const { mask } = sampleMask([0.9, 0.9, 0.9], constantRng(0.99), { lastActive: false }, { stickiness: 0, bounds });
    assert.strictEqual(maskString(mask), "000");
  });

  it("suppresses a slot right after an active one by the stickiness factor", () => {
    const { mask, state } = sampleMask([0.5, 0.5, 0.5, 0.5], constantRng(0.45), { lastActive: false }, {
      stickiness: 0.2,
      bounds
    });
    assert.strictEqual(maskString(mask), "1010");
    assert.strictEqual(state.lastActive, false);
  });

  it("carries the memory in from the previous bar", () => {
    const { mask } = sampleMask([0.5, 0.5], constantRng(0.45), { lastActive: true }, { stickiness: 0.2, bounds });
    assert.strictEqual(maskString(mask), "01");
  });

  it("never lets stickiness push a slot below the floor", () => {
    const { mask } = sampleMask([0.3], constantRng(0.2), { lastActive: true }, { stickiness: 0.9, bounds });
    assert.strictEqual(maskString(mask), "1");
  });

  it("keeps non-offbeat slots silent and clears the memory there", () => {
    const { mask } = sampleMask([0.5, 0.5, 0.5, 0.5], constantRng(0.45), { lastActive: false }, {
      stickiness: 0.2,
      bounds,
      offbeatSlots: new Set([1, 2])
    });
    assert.strictEqual(maskString(mask), "0100");
  });
});

describe("initialProbabilities", () => {
  it("seeds pattern slots and other slots separately, inside bounds", () => {
    const probs = initialProbabilities(bits("1010"), 0.99, 0.1, bounds);
    assert.deepStrictEqual(probs, [0.95, 0.25, 0.95, 0.25]);
  });
});
