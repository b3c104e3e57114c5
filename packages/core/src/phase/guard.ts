import type { GuardConfig, RescueReport } from "../types.js";

export interface GuardState {
  rescueCount: number;
  rescueBars: number[];
  /** The next bar runs the closed hat as a recovery bar. */
  rescuePending: boolean;
}

export function createGuardState(): GuardState {
  return { rescueCount: 0, rescueBars: [], rescuePending: false };
}

export function shouldRescue(guard: GuardConfig, entrainment: number): boolean {
  return entrainment < guard.minEntrainment;
}

export function recordRescue(state: GuardState, bar: number): GuardState {
  return {
    rescueCount: state.rescueCount + 1,
    rescueBars: [...state.rescueBars, bar],
    rescuePending: true
  };
}

export function toRescueReport(state: GuardState): RescueReport {
  return { count: state.rescueCount, bars: [...state.rescueBars] };
}
