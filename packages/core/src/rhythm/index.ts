export { euclidean, rotate, countOnsets, onsetSteps, maskFromSteps, emptyMask, fullMask } from "./euclidean.js";
export { enforceDensity, densityBounds } from "./density-enforcer.js";
export type { DensityBounds } from "./density-enforcer.js";
export { updateProbabilities, sampleMask, initialProbabilities } from "./markov.js";
export type { MarkovState, ProbabilityBounds, SampleOptions } from "./markov.js";
export { applyStepConditions, everyN, thinNearKick, thinningKeepProbabilities } from "./conditions.js";
export {
  entrainment,
  syncopation,
  syncopationWeight,
  metricClass,
  metricWeights,
  entrainmentSyncopation,
  density,
  entropy,
  bernoulliEntropy,
  unionMask
} from "./metrics.js";
export type { MetricClass } from "./metrics.js";
