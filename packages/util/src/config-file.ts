import { readFile } from "node:fs/promises";
import { ConfigurationError, parseSessionConfig } from "@adaptive-groove/core";
import type { SessionOptions } from "./types.js";

/**
 * Reads a JSON session description from disk.
 *
 * Syntax errors are reported as `ConfigurationError` on the file path; key and
 * type errors keep the key path reported by `parseSessionConfig`.
 */
export async function loadSessionConfig(path: string): Promise<SessionOptions> {
  const text = await readFile(path, "utf8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(path, `invalid JSON: ${reason}`);
  }
  return parseSessionConfig(raw);
}
