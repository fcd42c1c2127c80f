// Estimation pipeline - ties period filtering, row selection, and estimation together
//
// table → filter Earlier → filter Later → prune each by retained ids → estimate.
// Every call recomputes from the table; nothing is kept between calls.

import type {
  CampaignTable,
  DemandEstimate,
  PeriodFilterOptionsInput,
  PeriodName,
  PeriodQuery,
  PeriodRecord,
  RowId,
} from '@campaign-demand/protocol';
import { filterPeriod } from './filter/index.js';
import { selectRows, selectionSummary, type SelectionSummary } from './selection/index.js';
import { estimateDemand, describeEstimationWarning } from './estimate/index.js';
import { consoleLogger, type Logger } from './logging.js';

/**
 * Everything needed for one estimate.
 */
export type EstimationRequest = {
  earlier: PeriodQuery;
  later: PeriodQuery;

  /** Growth applied to the Earlier mean, in percent */
  growthPercent: number;

  /** Earlier rows to keep (default: every filtered row) */
  earlierRowIds?: Iterable<RowId>;

  /** Later rows to keep (default: every filtered row) */
  laterRowIds?: Iterable<RowId>;

  /** Matching behavior shared by both periods */
  filterOptions?: PeriodFilterOptionsInput;
};

/**
 * Options for running the pipeline
 */
export type RunEstimationOptions = {
  /**
   * Logger for pipeline diagnostics (default: console)
   */
  logger?: Logger;
};

/**
 * One period's path through the pipeline
 */
export type PeriodOutcome = {
  query: PeriodQuery;

  /** Rows that passed the period filter */
  filtered: PeriodRecord[];

  /** Filtered rows the caller kept */
  selected: PeriodRecord[];

  selection: SelectionSummary;
};

/**
 * Result of running the full pipeline
 */
export type EstimationResult = {
  earlier: PeriodOutcome;
  later: PeriodOutcome;
  estimate: DemandEstimate;
};

function runPeriod(
  table: CampaignTable,
  period: PeriodName,
  query: PeriodQuery,
  retained: Iterable<RowId> | undefined,
  filterOptions: PeriodFilterOptionsInput | undefined,
  logger: Logger
): PeriodOutcome {
  const filtered = filterPeriod(table, query, filterOptions);
  // Materialize once so a one-shot iterable feeds both calls below
  const retainedIds = retained === undefined ? undefined : [...retained];
  const selected = selectRows(filtered, retainedIds);
  const selection = selectionSummary(filtered, retainedIds);

  logger.debug('Period filtered', {
    period,
    country: query.country,
    window: query.window,
    filtered: filtered.length,
    selected: selected.length,
  });

  return { query, filtered, selected, selection };
}

/**
 * Run the full estimation for one request.
 *
 * @throws ValidationError for malformed window bounds or non-finite growth
 */
export function runEstimation(
  table: CampaignTable,
  request: EstimationRequest,
  options: RunEstimationOptions = {}
): EstimationResult {
  const { logger = consoleLogger } = options;

  const earlier = runPeriod(
    table,
    'earlier',
    request.earlier,
    request.earlierRowIds,
    request.filterOptions,
    logger
  );
  const later = runPeriod(
    table,
    'later',
    request.later,
    request.laterRowIds,
    request.filterOptions,
    logger
  );

  const estimate = estimateDemand(earlier.selected, later.selected, request.growthPercent);

  for (const warning of estimate.warnings) {
    logger.warn(describeEstimationWarning(warning), { ...warning });
  }

  logger.info('Demand estimated', {
    estimate: estimate.estimate,
    basis: estimate.basis,
    growthPercent: estimate.growthPercent,
  });

  return { earlier, later, estimate };
}
