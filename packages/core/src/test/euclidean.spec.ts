import { describe, it } from "node:test";
import assert from "node:assert";
import { countOnsets, euclidean, maskFromSteps, onsetSteps, rotate } from "../rhythm/euclidean.js";
import { bits, maskString } from "./test-utils.js";

describe("euclidean", () => {
  it("places four pulses on the quarter notes of a 16-step bar", () => {
    assert.deepStrictEqual(euclidean(16, 4), [1, 0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0, 1, 0, 0, 0]);
  });

  it("returns an all-zero mask for zero or negative pulses", () => {
    assert.strictEqual(maskString(euclidean(16, 0)), "0000000000000000");
    assert.strictEqual(maskString(euclidean(8, -3)), "00000000");
  });

  it("returns an all-ones mask when pulses reach or exceed steps", () => {
    assert.strictEqual(maskString(euclidean(16, 16)), "1111111111111111");
    assert.strictEqual(maskString(euclidean(4, 9)), "1111");
  });

  it("distributes uneven pulse counts", () => {
    assert.strictEqual(maskString(euclidean(8, 3)), "10010010");
    assert.strictEqual(maskString(euclidean(16, 12)), "1011101110111011");
    assert.strictEqual(maskString(euclidean(16, 2)), "1000000010000000");
  });

  it("always produces `steps` slots with `pulses` onsets", () => {
    for (let steps = 1; steps <= 24; steps++) {
      for (let pulses = 0; pulses <= steps; pulses++) {
        const mask = euclidean(steps, pulses);
        assert.strictEqual(mask.length, steps);
        assert.strictEqual(countOnsets(mask), pulses);
      }
    }
  });
});

describe("rotate", () => {
  it("rotates left", () => {
    assert.strictEqual(maskString(rotate(bits("1000"), 1)), "0001");
    assert.strictEqual(maskString(rotate(bits("1000"), -1)), "0100");
    assert.strictEqual(maskString(rotate(bits("1000"), 5)), "0001");
  });

  it("moves a two-pulse backbeat onto steps 4 and 12", () => {
    assert.deepStrictEqual(onsetSteps(rotate(euclidean(16, 2), 4)), [4, 12]);
  });

  it("leaves an empty mask empty", () => {
    assert.deepStrictEqual(rotate([], 3), []);
  });
});

describe("mask helpers", () => {
  it("builds a mask from step indices and ignores out-of-range steps", () => {
    assert.strictEqual(maskString(maskFromSteps([0, 3, 9, -1], 8)), "10010000");
  });
});
