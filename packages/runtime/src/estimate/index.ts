// Demand estimation

export { estimate, estimateDemand, meanDemand, applyGrowth } from './estimator.js';
export { describeEstimationWarning } from './warnings.js';
