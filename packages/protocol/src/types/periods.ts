// Period types - what the period filter takes and returns

import type { IsoDate } from './common.js';
import type { CampaignRecord } from './campaigns.js';

/**
 * Inclusive calendar window.
 */
export type DateWindow = {
  start: IsoDate;
  end: IsoDate;
};

/**
 * How the category predicate compares values.
 *
 * - exact: equality after trimming and collapsing whitespace
 * - substring: containment under the same normalization
 */
export type CategoryMatchMode = 'exact' | 'substring';

/**
 * Text columns the keyword predicate may search.
 */
export type KeywordColumn = 'description' | 'campaignName';

/**
 * Parameters of one period's filter.
 */
export type PeriodQuery = {
  /** Exact country to match */
  country: string;

  /** Substring to search for; empty means no keyword restriction */
  keyword?: string;

  /** Category to match; empty or "All" means no category restriction */
  category?: string;

  window: DateWindow;
};

/**
 * Matching behavior shared by both periods.
 */
export type PeriodFilterOptions = {
  categoryMode: CategoryMatchMode;
  keywordColumns: KeywordColumn[];
  caseSensitive: boolean;
};

/**
 * A record that passed a period filter, with its dates parsed.
 * Created fresh by every filter call.
 */
export type PeriodRecord = CampaignRecord & {
  readonly startDate: IsoDate;
  readonly endDate: IsoDate;
};
