import type { Targets } from "../types.js";

export interface FeedbackSignal {
  syncError: number;
  entropyError: number;
  densityError: number;
  /** Drives next bar's probability update */
  error: number;
  thinNudge: number;
}

export const ENTROPY_ERROR_WEIGHT = 0.25;
export const THIN_SYNC_GAIN = 0.1;
export const THIN_DENSITY_GAIN = 0.1;
export const THIN_ENTRAINMENT_GAIN = 0.2;
export const SWING_RETURN_RATE = 0.02;

/**
 * Entropy of a Bernoulli mask falls as density moves away from 0.5, so the
 * entropy term changes sign with the side of 0.5 the hat density sits on.
 */
export function computeFeedback(
  targets: Targets,
  metrics: { E: number; S: number; hatDensity: number; hatEntropy: number }
): FeedbackSignal {
  const syncError = (targets.sLow + targets.sHigh) / 2 - metrics.S;
  const entropyError = (targets.entropyLow + targets.entropyHigh) / 2 - metrics.hatEntropy;
  const densityError = targets.hatDensityTarget - metrics.hatDensity;
  const direction = Math.sign(0.5 - metrics.hatDensity);
  return {
    syncError,
    entropyError,
    densityError,
    error: syncError + ENTROPY_ERROR_WEIGHT * entropyError * direction,
    thinNudge:
      THIN_SYNC_GAIN * syncError +
      THIN_DENSITY_GAIN * densityError +
      THIN_ENTRAINMENT_GAIN * Math.max(0, targets.eTarget - metrics.E)
  };
}

export function swingNudge(current: number, home: number): number {
  return SWING_RETURN_RATE * (home - current);
}
