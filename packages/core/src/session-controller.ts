/**
 * Bar-by-bar session controller.
 *
 * Each call to `nextBar()` runs one bar in a fixed order:
 *
 * 1. Advance session modulators (swing, thinning bias, rotation rate) and every
 *    parameter-path binding, writing bound values into this bar's layer copy.
 * 2. Kick: fixed Euclidean bar, or drifting/perturbed when the guard allows.
 * 3. Closed hat: recovery bar after a rescue, otherwise the adaptive pipeline.
 * 4. Open hat: adaptive pipeline restricted to offbeats.
 * 5. Snare and clap from their static patterns.
 * 6. Mute window, then metrics on the union of all layers.
 * 7. Guard: low entrainment rescues (baselines restored, recovery armed).
 * 8. Feedback: error for the next bar's probability update, thinning and swing nudges.
 * 9. Events for the bar, telemetry record and bar report.
 *
 * All state that survives a bar lives in `SessionState`; a controller owns its
 * generator and never shares state with another session.
 */

import type {
  BarMetrics,
  BarReport,
  EventsByLayer,
  HatLayerName,
  LayerBarStats,
  LayerName,
  LayerSet,
  OnsetMask,
  RescueReport,
  ResolvedSession,
  TelemetrySink
} from "./types.js";
import { createRng, type Rng } from "./random.js";
import { createTimeGrid, type TimeGrid } from "./timebase.js";
import { Modulator } from "./modulation/modulator.js";
import {
  LAYER_NAMES,
  SESSION_PARAMETERS,
  readTarget,
  resolveParameterPath,
  writeTarget,
  type LayerTarget,
  type SessionParameter
} from "./modulation/parameter-path.js";
import { RESCUE_BASELINES, SWING_HOME, builtInModulators } from "./config/defaults.js";
import { buildKickBar } from "./phase/kick-pattern.js";
import {
  closedHatBar,
  closedHatRecoveryBar,
  createHatState,
  openHatBar,
  type HatLayerState
} from "./phase/hat-adaptation.js";
import { staticLayerMask } from "./phase/static-layers.js";
import { createGuardState, recordRescue, shouldRescue, toRescueReport, type GuardState } from "./phase/guard.js";
import { computeFeedback, swingNudge } from "./phase/feedback.js";
import { realizeBar } from "./phase/event-realization.js";
import { countOnsets, emptyMask } from "./rhythm/euclidean.js";
import { density, entrainmentSyncopation, entropy, unionMask } from "./rhythm/metrics.js";
import { assertInRange } from "./errors.js";

export interface SessionState {
  bar: number;
  rotationAccum: number;
  hats: Record<HatLayerName, HatLayerState>;
  guard: GuardState;
  feedbackError: number;
}

interface LayerBinding {
  target: LayerTarget;
  modulator: Modulator;
}

export interface SessionControllerOptions {
  telemetry?: TelemetrySink;
}

function emptyEvents(): EventsByLayer {
  return { kick: [], hat_c: [], hat_o: [], snare: [], clap: [] };
}

function layerStats(mask: OnsetMask): LayerBarStats {
  return { onsets: countOnsets(mask), density: density(mask), entropy: entropy(mask) };
}

export class SessionController {
  readonly session: ResolvedSession;
  readonly grid: TimeGrid;
  private readonly rng: Rng;
  private readonly telemetry?: TelemetrySink;
  private readonly sessionModulators: Record<SessionParameter, Modulator>;
  private readonly layerBindings: LayerBinding[];
  private state: SessionState;
  private readonly events: EventsByLayer = emptyEvents();
  private readonly metricSeries: BarMetrics[] = [];
  private readonly reports: BarReport[] = [];

  constructor(session: ResolvedSession, options: SessionControllerOptions = {}) {
    this.session = session;
    this.grid = createTimeGrid(session.ppq, session.bpm);
    this.rng = createRng(session.seed);
    this.telemetry = options.telemetry;

    const builtIn = builtInModulators(session.guard);
    const sessionSpecs = { ...builtIn };
    const layerBindings: LayerBinding[] = [];
    for (const binding of session.modulators) {
      const target = resolveParameterPath(binding.path, session.layers);
      if (target.kind === "session") {
        sessionSpecs[target.parameter] = {
          ...binding.spec,
          initial: binding.spec.initial ?? builtIn[target.parameter].initial
        };
      } else {
        const base = readTarget(target, session.layers);
        layerBindings.push({ target, modulator: new Modulator(binding.spec, binding.spec.initial ?? base) });
      }
    }
    this.sessionModulators = {
      swing: new Modulator(sessionSpecs.swing),
      thin_bias: new Modulator(sessionSpecs.thin_bias),
      rotation_rate: new Modulator(sessionSpecs.rotation_rate)
    };
    this.layerBindings = layerBindings;

    this.state = {
      bar: 0,
      rotationAccum: 0,
      hats: {
        hat_c: createHatState(session.layers.hat_c, session.hats.hat_c),
        hat_o: createHatState(session.layers.hat_o, session.hats.hat_o)
      },
      guard: createGuardState(),
      feedbackError: 0
    };
  }

  get currentBar(): number {
    return this.state.bar;
  }

  get done(): boolean {
    return this.state.bar >= this.session.bars;
  }

  /** Snapshot of the cross-bar state. */
  snapshot(): SessionState {
    return structuredClone(this.state);
  }

  modulatorValues(): Record<string, number> {
    const values: Record<string, number> = {};
    for (const name of SESSION_PARAMETERS) {
      values[name] = this.sessionModulators[name].value;
    }
    for (const binding of this.layerBindings) {
      values[binding.target.path] = binding.modulator.value;
    }
    return values;
  }

  nextBar(): BarReport {
    if (this.done) {
      throw new Error(`Session already finished after ${this.session.bars} bars`);
    }
    const { session, rng, grid } = this;
    const bar = this.state.bar;
    const { swing, thin_bias: thinBias, rotation_rate: rotationRate } = this.sessionModulators;

    // 1. modulators
    swing.advance(bar, rng);
    thinBias.advance(bar, rng);
    rotationRate.advance(bar, rng);
    const layers: LayerSet = structuredClone(session.layers);
    for (const binding of this.layerBindings) {
      writeTarget(binding.target, layers, binding.modulator.advance(bar, rng));
    }
    const barSwing = swing.value;

    // 2. kick
    const kick = buildKickBar(layers.kick, session.guard, this.state.rotationAccum, rotationRate.value, rng);

    // 3. closed hat
    const hatContext = {
      bar,
      feedbackError: this.state.feedbackError,
      kickMask: kick.mask,
      thinBias: thinBias.value,
      rng
    };
    const recovery = this.state.guard.rescuePending;
    const closed = recovery
      ? closedHatRecoveryBar(layers.hat_c, session.hats.hat_c)
      : closedHatBar(layers.hat_c, session.hats.hat_c, this.state.hats.hat_c, hatContext);

    // 4. open hat
    const open = openHatBar(layers.hat_o, session.hats.hat_o, this.state.hats.hat_o, hatContext);

    // 5. static layers
    let masks: Record<LayerName, OnsetMask> = {
      kick: kick.mask,
      hat_c: closed.mask,
      hat_o: open.mask,
      snare: staticLayerMask(layers.snare, bar, rng),
      clap: staticLayerMask(layers.clap, bar, rng)
    };

    // 6. mute window and metrics
    const muteWindow = session.muteWindow;
    if (muteWindow && bar >= muteWindow.startBar && bar <= muteWindow.endBar) {
      masks = {
        kick: emptyMask(layers.kick.steps),
        hat_c: emptyMask(layers.hat_c.steps),
        hat_o: emptyMask(layers.hat_o.steps),
        snare: emptyMask(layers.snare.steps),
        clap: emptyMask(layers.clap.steps)
      };
    }
    const { E, S } = entrainmentSyncopation(unionMask(LAYER_NAMES.map((name) => masks[name])));
    const metrics: BarMetrics = {
      bar,
      E,
      S,
      hatDensity: density(masks.hat_c),
      hatEntropy: entropy(masks.hat_c)
    };
    assertInRange("E", E, 0, 1);
    assertInRange("S", S, 0, 1);

    // 7. guard, 8. feedback
    let guardState: GuardState = { ...this.state.guard, rescuePending: false };
    let feedbackError: number;
    let rotationAccum = kick.rotationAccum;
    const rescued = shouldRescue(session.guard, E);
    if (rescued) {
      guardState = recordRescue(guardState, bar);
      swing.reset(RESCUE_BASELINES.swing);
      rotationRate.reset(RESCUE_BASELINES.rotation_rate);
      thinBias.reset(RESCUE_BASELINES.thin_bias);
      rotationAccum = 0;
      feedbackError = 0;
    } else {
      const signal = computeFeedback(session.targets, metrics);
      feedbackError = signal.error;
      thinBias.nudge(signal.thinNudge);
      swing.nudge(swingNudge(swing.value, SWING_HOME));
    }

    // 9. events, telemetry, report
    const barEvents = realizeBar(
      { layers, masks, kickGhosts: kick.ghosts, accent: session.accent },
      { grid, bar, sessionSwing: barSwing, microCapMs: session.targets.microCapMs, rng }
    );
    for (const name of LAYER_NAMES) {
      this.events[name].push(...barEvents[name]);
    }

    this.state = {
      bar: bar + 1,
      rotationAccum,
      hats: { hat_c: closed.state, hat_o: open.state },
      guard: guardState,
      feedbackError
    };

    this.metricSeries.push(metrics);
    this.telemetry?.append(metrics);

    const report: BarReport = {
      bar,
      masks,
      metrics,
      layerStats: {
        kick: layerStats(masks.kick),
        hat_c: layerStats(masks.hat_c),
        hat_o: layerStats(masks.hat_o),
        snare: layerStats(masks.snare),
        clap: layerStats(masks.clap)
      },
      modulators: this.modulatorValues(),
      hatProbabilities: {
        hat_c: [...closed.state.probabilities],
        hat_o: [...open.state.probabilities]
      },
      feedbackError,
      rescued,
      recovery
    };
    this.reports.push(report);
    return report;
  }

  eventsByLayer(): EventsByLayer {
    return {
      kick: [...this.events.kick],
      hat_c: [...this.events.hat_c],
      hat_o: [...this.events.hat_o],
      snare: [...this.events.snare],
      clap: [...this.events.clap]
    };
  }

  metrics(): BarMetrics[] {
    return [...this.metricSeries];
  }

  barReports(): BarReport[] {
    return [...this.reports];
  }

  rescueReport(): RescueReport {
    return toRescueReport(this.state.guard);
  }
}
