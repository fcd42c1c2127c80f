// Campaign table types - one loaded campaign file and its rows

import type { RowId } from './common.js';

/**
 * Column headers the loader recognizes in a campaign file.
 */
export const CAMPAIGN_COLUMNS = {
  country: 'Country',
  description: 'Description',
  campaignName: 'Campaign name',
  categoryName: 'Category_name',
  dateStart: 'Date Start',
  dateEnd: 'Date End',
  demand: 'Demand',
} as const;

export type CampaignColumnKey = keyof typeof CAMPAIGN_COLUMNS;

/**
 * Columns every campaign file must carry.
 */
export const BASE_REQUIRED_COLUMNS: readonly string[] = [
  CAMPAIGN_COLUMNS.country,
  CAMPAIGN_COLUMNS.description,
  CAMPAIGN_COLUMNS.dateStart,
  CAMPAIGN_COLUMNS.dateEnd,
  CAMPAIGN_COLUMNS.demand,
];

/**
 * Raw cell values of a row keyed by source column header.
 * Empty cells are null.
 */
export type CampaignCells = Readonly<Record<string, string | null>>;

/**
 * One row of a loaded campaign table.
 *
 * Date columns stay in their raw day-first form here; they are parsed
 * per period filter call so that each period works on its own values.
 */
export type CampaignRecord = {
  readonly rowId: RowId;
  readonly country: string | null;
  readonly description: string | null;
  /** Null when the file has no "Campaign name" column */
  readonly campaignName: string | null;
  /** Null when the file has no "Category_name" column */
  readonly categoryName: string | null;
  readonly dateStart: string | null;
  readonly dateEnd: string | null;
  /** Locale-formatted currency text, e.g. "1.234,56 €" */
  readonly demandRaw: string | null;
  /** Normalized demand; null when the raw text is not a number */
  readonly demand: number | null;
  readonly cells: CampaignCells;
};

/**
 * A campaign file after ingestion.
 */
export type CampaignTable = {
  /** Source headers in file order */
  readonly columns: readonly string[];
  readonly records: readonly CampaignRecord[];
  /** Character encoding the bytes were decoded with */
  readonly encoding: string;
  readonly hasCampaignName: boolean;
  readonly hasCategory: boolean;
};
