// Demand estimation
//
// Blends the mean demand of the Earlier and Later selections:
//
//   adjustedEarlier = earlierMean * (1 + growthPercent / 100)
//   estimate        = (adjustedEarlier + laterMean) / 2
//
// A period without numeric demand drops out of the blend instead of
// counting as zero; with neither period there is no estimate.

import type {
  CampaignRecord,
  DemandEstimate,
  EstimateBasis,
  EstimationWarning,
  PeriodName,
} from '@campaign-demand/protocol';
import { ValidationError } from '../errors.js';

type DemandCarrier = Pick<CampaignRecord, 'demand'>;

/**
 * Mean demand over records with numeric demand.
 *
 * @returns The mean, or null when no record carries a number
 */
export function meanDemand(records: readonly DemandCarrier[]): number | null {
  let sum = 0;
  let count = 0;

  for (const record of records) {
    if (record.demand !== null && Number.isFinite(record.demand)) {
      sum += record.demand;
      count++;
    }
  }

  return count === 0 ? null : sum / count;
}

/**
 * Grow (or shrink, for negative values) a mean by a percentage.
 */
export function applyGrowth(mean: number, growthPercent: number): number {
  return mean * (1 + growthPercent / 100);
}

function assertGrowth(growthPercent: number): void {
  if (!Number.isFinite(growthPercent)) {
    throw new ValidationError('growthPercent must be a finite number', {
      field: 'growthPercent',
      details: { value: growthPercent },
    });
  }
}

function periodWarnings(
  period: PeriodName,
  records: readonly DemandCarrier[],
  mean: number | null
): EstimationWarning[] {
  if (records.length === 0) {
    return [{ code: 'EMPTY_SELECTION', period }];
  }
  if (mean === null) {
    return [{ code: 'NO_NUMERIC_DEMAND', period }];
  }
  return [];
}

/**
 * Estimate demand with a breakdown of how the figure was reached.
 *
 * Empty selections and missing numeric demand are reported as warnings;
 * only a non-finite growth value throws.
 *
 * @throws ValidationError if growthPercent is NaN or infinite
 */
export function estimateDemand(
  earlier: readonly DemandCarrier[],
  later: readonly DemandCarrier[],
  growthPercent: number
): DemandEstimate {
  assertGrowth(growthPercent);

  const earlierMean = meanDemand(earlier);
  const laterMean = meanDemand(later);
  const adjustedEarlier = earlierMean === null ? null : applyGrowth(earlierMean, growthPercent);

  let estimate: number | null;
  let basis: EstimateBasis;

  if (adjustedEarlier !== null && laterMean !== null) {
    estimate = (adjustedEarlier + laterMean) / 2;
    basis = 'blended';
  } else if (adjustedEarlier !== null) {
    estimate = adjustedEarlier;
    basis = 'earlier_only';
  } else if (laterMean !== null) {
    estimate = laterMean;
    basis = 'later_only';
  } else {
    estimate = null;
    basis = 'none';
  }

  const warnings: EstimationWarning[] = [
    ...periodWarnings('earlier', earlier, earlierMean),
    ...periodWarnings('later', later, laterMean),
  ];
  if (estimate === null) {
    warnings.push({ code: 'UNESTIMABLE' });
  }

  return {
    estimate,
    basis,
    growthPercent,
    earlierMean,
    adjustedEarlier,
    laterMean,
    earlierCount: earlier.length,
    laterCount: later.length,
    warnings,
  };
}

/**
 * Estimate demand from the final Earlier and Later selections.
 *
 * @returns The blended figure, or null when neither period has numeric demand
 * @throws ValidationError if growthPercent is NaN or infinite
 */
export function estimate(
  earlier: readonly DemandCarrier[],
  later: readonly DemandCarrier[],
  growthPercent: number
): number | null {
  return estimateDemand(earlier, later, growthPercent).estimate;
}
