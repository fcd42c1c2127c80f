// Estimate types - the blended demand figure and how it was reached

import type { PeriodName } from './common.js';

/**
 * Which period means contributed to the estimate.
 */
export type EstimateBasis = 'blended' | 'earlier_only' | 'later_only' | 'none';

/**
 * Non-fatal conditions reported alongside an estimate.
 */
export type EstimationWarning =
  | { code: 'EMPTY_SELECTION'; period: PeriodName }
  | { code: 'NO_NUMERIC_DEMAND'; period: PeriodName }
  | { code: 'UNESTIMABLE' };

export type EstimationWarningCode = EstimationWarning['code'];

/**
 * Result of blending the Earlier and Later period means.
 */
export type DemandEstimate = {
  /** The blended figure, or null when neither period has numeric demand */
  estimate: number | null;

  basis: EstimateBasis;

  growthPercent: number;

  /** Mean demand of the Earlier selection before growth */
  earlierMean: number | null;

  /** Earlier mean after applying growthPercent */
  adjustedEarlier: number | null;

  laterMean: number | null;

  /** Rows in each selection, including rows with null demand */
  earlierCount: number;
  laterCount: number;

  warnings: EstimationWarning[];
};
