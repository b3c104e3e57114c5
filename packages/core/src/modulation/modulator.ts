import type { ModulatorSpec } from "../types.js";
import { clamp, gaussian, uniform, type Rng } from "../random.js";
import { assertInRange } from "../errors.js";

/**
 * One bar of a bounded process. The raw step is clamped to `[min, max]`, then
 * its distance from `value` is clamped to `±maxDeltaPerBar`.
 */
export function stepModulator(value: number, spec: ModulatorSpec, barIndex: number, rng: Rng): number {
  const { min, max } = spec;
  let next: number;
  switch (spec.mode) {
    case "random_walk":
      next = value + uniform(rng, -spec.stepSize, spec.stepSize);
      break;
    case "ou": {
      const mid = (min + max) / 2;
      next = value + (mid - value) / spec.timeConstant + gaussian(rng, 0, spec.stepSize);
      break;
    }
    case "sine": {
      const cycle = (((spec.phase + barIndex / spec.timeConstant) % 1) + 1) % 1;
      next = min + 0.5 * (1 + Math.sin(2 * Math.PI * cycle)) * (max - min);
      break;
    }
    default:
      throw new Error(`Unknown modulator mode: ${String(spec.mode)}`);
  }
  next = clamp(next, min, max);
  next = clamp(next, value - spec.maxDeltaPerBar, value + spec.maxDeltaPerBar);
  return clamp(next, min, max);
}

/**
 * Stateful wrapper around `stepModulator`. Within a bar, `nudge` may move the
 * value further but never past `maxDeltaPerBar` from where the bar started.
 * `reset` is the only discontinuous move.
 */
export class Modulator {
  readonly spec: ModulatorSpec;
  private current: number;
  private barStart: number;

  constructor(spec: ModulatorSpec, initial?: number) {
    this.spec = spec;
    const seed = initial ?? spec.initial ?? (spec.min + spec.max) / 2;
    this.current = clamp(seed, spec.min, spec.max);
    this.barStart = this.current;
  }

  get name(): string {
    return this.spec.name;
  }

  get value(): number {
    return this.current;
  }

  /** Value at the start of the current bar. */
  get previous(): number {
    return this.barStart;
  }

  advance(barIndex: number, rng: Rng): number {
    this.barStart = this.current;
    this.current = stepModulator(this.current, this.spec, barIndex, rng);
    this.check();
    return this.current;
  }

  nudge(amount: number): number {
    const { min, max, maxDeltaPerBar } = this.spec;
    let next = clamp(this.current + amount, min, max);
    next = clamp(next, this.barStart - maxDeltaPerBar, this.barStart + maxDeltaPerBar);
    this.current = clamp(next, min, max);
    this.check();
    return this.current;
  }

  reset(value: number): number {
    this.current = clamp(value, this.spec.min, this.spec.max);
    this.barStart = this.current;
    return this.current;
  }

  private check(): void {
    assertInRange(`modulator ${this.spec.name}`, this.current, this.spec.min, this.spec.max);
  }
}
