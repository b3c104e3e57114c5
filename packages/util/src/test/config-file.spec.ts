import { describe, it } from "node:test";
import assert from "node:assert";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "@adaptive-groove/core";
import { loadSessionConfig } from "../config-file.js";

function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

describe("loadSessionConfig", () => {
  it("reads and converts a session file", async () => {
    const options = await loadSessionConfig(fixture("adaptive-session.json"));
    assert.strictEqual(options.bpm, 120);
    assert.strictEqual(options.seed, 2024);
    assert.deepStrictEqual(options.layers?.hat_c, { velocity: 84 });
    assert.deepStrictEqual(options.targets, { sLow: 0.3, sHigh: 0.5 });
    assert.strictEqual(options.modulators?.[0].spec.mode, "sine");
    assert.deepStrictEqual(options.accent, { steps: [1, 9], probability: 0.5, velocityScale: 1.2, lengthScale: 1 });
  });

  it("reports malformed JSON against the file path", async () => {
    const path = fixture("broken-session.json");
    await assert.rejects(
      loadSessionConfig(path),
      (error: unknown) => error instanceof ConfigurationError && error.path === path
    );
  });
});
