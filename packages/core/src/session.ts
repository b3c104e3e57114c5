import type { SessionOptions, SessionResult } from "./types.js";
import { resolveSession } from "./config/session-resolver.js";
import { SessionController } from "./session-controller.js";

/**
 * Resolves `options` and runs every bar of the session.
 *
 * Configuration problems throw `ConfigurationError` before any bar runs. When
 * `options.signal` aborts, the loop stops between bars and the result holds
 * every bar completed so far.
 */
export function runSession(options: SessionOptions = {}): SessionResult {
  const { session, replayOptions } = resolveSession(options);
  const controller = new SessionController(session, { telemetry: options.telemetry });

  let aborted = false;
  while (!controller.done) {
    if (options.signal?.aborted) {
      aborted = true;
      break;
    }
    controller.nextBar();
  }

  return {
    events: controller.eventsByLayer(),
    metrics: controller.metrics(),
    bars: controller.barReports(),
    rescue: controller.rescueReport(),
    completedBars: controller.currentBar,
    aborted,
    meta: {
      bpm: session.bpm,
      ppq: session.ppq,
      bars: session.bars,
      seed: session.seed,
      ticksPerBar: controller.grid.ticksPerBar,
      replayOptions
    }
  };
}

/**
 * Async entry point, kept alongside `runSession` so callers can await a groove
 * the same way they would any other render step.
 */
export async function generateGroove(options: SessionOptions = {}): Promise<SessionResult> {
  return runSession(options);
}
