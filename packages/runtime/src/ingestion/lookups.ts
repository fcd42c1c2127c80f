// Distinct values for filter pickers

import type { CampaignTable } from '@campaign-demand/protocol';

function distinct(values: Iterable<string | null>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    if (value !== null) {
      seen.add(value);
    }
  }
  return [...seen];
}

/**
 * Countries present in the table, in order of first appearance.
 */
export function listCountries(table: CampaignTable): string[] {
  return distinct(table.records.map((record) => record.country));
}

/**
 * Categories present in the table, optionally within one country,
 * in order of first appearance.
 */
export function listCategories(table: CampaignTable, country?: string): string[] {
  const records =
    country === undefined
      ? table.records
      : table.records.filter((record) => record.country === country);
  return distinct(records.map((record) => record.categoryName));
}
