// Human-readable estimation warnings

import type { EstimationWarning, PeriodName } from '@campaign-demand/protocol';

const PERIOD_LABELS: Record<PeriodName, string> = {
  earlier: 'Earlier',
  later: 'Later',
};

/**
 * Describe a warning for display or logs.
 */
export function describeEstimationWarning(warning: EstimationWarning): string {
  switch (warning.code) {
    case 'EMPTY_SELECTION':
      return `No campaigns selected from the ${PERIOD_LABELS[warning.period]} period`;
    case 'NO_NUMERIC_DEMAND':
      return `Selected campaigns in the ${PERIOD_LABELS[warning.period]} period have no numeric demand`;
    case 'UNESTIMABLE':
      return 'Cannot estimate demand: neither period has numeric demand';
  }
}
