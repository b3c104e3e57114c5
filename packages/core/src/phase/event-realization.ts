/**
 * Event realization: turns one bar of layer masks into tick-stamped events.
 *
 * For every active step the swing quantizer places the onset (swing on odd
 * steps, sampled micro offset), the bar offset is added and the result is
 * clamped at tick 0. Ratchets then split onsets, choked layers are cut at the
 * choking layer's next onset, and the accent lane scales whole steps.
 */

import type {
  AccentProfile,
  Bit,
  EventsByLayer,
  LayerConfig,
  LayerName,
  LayerSet,
  OnsetMask,
  TimedEvent
} from "../types.js";
import type { Rng } from "../random.js";
import type { TimeGrid } from "../timebase.js";
import { STEPS_PER_BAR, stepTick } from "../timebase.js";
import { quantizeStep } from "../timing/swing-quantizer.js";
import { DRUM_CHANNEL } from "../config/defaults.js";
import { LAYER_NAMES } from "../modulation/parameter-path.js";
import { ghostVelocity } from "./kick-pattern.js";

/** Event plus the 16th slot it was scheduled from. */
export interface StepEvent extends TimedEvent {
  slot: number;
}

export interface RealizationContext {
  grid: TimeGrid;
  bar: number;
  sessionSwing: number;
  microCapMs: number;
  rng: Rng;
}

export function eventDuration(grid: TimeGrid, steps: number): number {
  return Math.max(1, Math.round((grid.ticksPerBar / steps) * 0.5));
}

export function effectiveSwing(config: LayerConfig, sessionSwing: number): number | undefined {
  if (config.swingPercent !== undefined) return config.swingPercent;
  return config.followSessionSwing ? sessionSwing : undefined;
}

export function realizeLayer(
  config: LayerConfig,
  mask: readonly Bit[],
  ctx: RealizationContext,
  ghosts: ReadonlySet<number> = new Set()
): StepEvent[] {
  const { grid, bar, rng } = ctx;
  const events: StepEvent[] = [];
  const duration = eventDuration(grid, config.steps);
  const swingPercent = effectiveSwing(config, ctx.sessionSwing);

  mask.forEach((bit, step) => {
    if (bit === 0) return;
    const relative = quantizeStep(
      step,
      stepTick(grid, step, config.steps),
      { swingPercent, micro: config.micro, capMs: ctx.microCapMs },
      grid,
      rng
    );
    const start = Math.max(0, bar * grid.ticksPerBar + relative);
    const velocity = ghosts.has(step) ? ghostVelocity(config.velocity) : config.velocity;
    const slot = Math.floor((step * STEPS_PER_BAR) / config.steps);
    const base = { note: config.note, velocity, channel: DRUM_CHANNEL, slot };

    if (config.ratchetProb > 0 && rng() < config.ratchetProb) {
      const repeats = Math.max(2, config.ratchetRepeat);
      const sub = Math.max(1, Math.floor(duration / repeats));
      for (let r = 0; r < repeats; r++) {
        events.push({ ...base, startTick: start + r * sub, durationTick: sub });
      }
    } else {
      events.push({ ...base, startTick: start, durationTick: duration });
    }
  });

  return events;
}

/** Truncates each event so it ends no later than the next choking onset (min 1 tick). */
export function applyChoke<T extends TimedEvent>(events: readonly T[], chokeStarts: readonly number[]): T[] {
  const starts = [...chokeStarts].sort((a, b) => a - b);
  return events.map((event) => {
    const next = starts.find((tick) => tick > event.startTick);
    if (next === undefined) return event;
    return { ...event, durationTick: Math.min(event.durationTick, Math.max(1, next - event.startTick)) };
  });
}

/**
 * One probability gate per accent slot that carries events this bar; a passing
 * gate scales velocity (max 127) and duration (min 1 tick) of every event on it.
 */
export function applyAccent(
  byLayer: Record<LayerName, StepEvent[]>,
  accent: AccentProfile,
  rng: Rng
): Record<LayerName, StepEvent[]> {
  const accentSlots = [...new Set(accent.steps.map((s) => Math.max(0, Math.floor(s) - 1)))].sort((a, b) => a - b);
  const occupied = new Set(LAYER_NAMES.flatMap((name) => byLayer[name].map((e) => e.slot)));
  const gated = new Set<number>();
  for (const slot of accentSlots) {
    if (occupied.has(slot) && rng() < accent.probability) {
      gated.add(slot);
    }
  }

  const scale = (events: StepEvent[]): StepEvent[] =>
    events.map((event) =>
      gated.has(event.slot)
        ? {
            ...event,
            velocity: Math.min(127, Math.round(event.velocity * accent.velocityScale)),
            durationTick: Math.max(1, Math.round(event.durationTick * accent.lengthScale))
          }
        : event
    );

  return {
    kick: scale(byLayer.kick),
    hat_c: scale(byLayer.hat_c),
    hat_o: scale(byLayer.hat_o),
    snare: scale(byLayer.snare),
    clap: scale(byLayer.clap)
  };
}

function strip(events: readonly StepEvent[]): TimedEvent[] {
  return events.map(({ note, velocity, startTick, durationTick, channel }) => ({
    note,
    velocity,
    startTick,
    durationTick,
    channel
  }));
}

export interface BarRealizationInput {
  layers: LayerSet;
  masks: Record<LayerName, OnsetMask>;
  kickGhosts: ReadonlySet<number>;
  accent?: AccentProfile;
}

/** Layers realize in fixed order so the shared generator is consumed deterministically. */
export function realizeBar(input: BarRealizationInput, ctx: RealizationContext): EventsByLayer {
  const { layers, masks } = input;
  let byLayer: Record<LayerName, StepEvent[]> = {
    kick: realizeLayer(layers.kick, masks.kick, ctx, input.kickGhosts),
    hat_c: realizeLayer(layers.hat_c, masks.hat_c, ctx),
    hat_o: realizeLayer(layers.hat_o, masks.hat_o, ctx),
    snare: realizeLayer(layers.snare, masks.snare, ctx),
    clap: realizeLayer(layers.clap, masks.clap, ctx)
  };

  const choked: Record<LayerName, StepEvent[]> = { ...byLayer };
  for (const name of LAYER_NAMES) {
    const chokeWith = layers[name].chokeWith;
    if (chokeWith !== undefined) {
      choked[name] = applyChoke(byLayer[name], byLayer[chokeWith].map((e) => e.startTick));
    }
  }
  byLayer = choked;

  if (input.accent) {
    byLayer = applyAccent(byLayer, input.accent, ctx.rng);
  }

  return {
    kick: strip(byLayer.kick),
    hat_c: strip(byLayer.hat_c),
    hat_o: strip(byLayer.hat_o),
    snare: strip(byLayer.snare),
    clap: strip(byLayer.clap)
  };
}
