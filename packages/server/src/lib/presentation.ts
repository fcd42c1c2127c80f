// Display helpers for engine output

import type { PeriodRecord } from '@campaign-demand/protocol';

/**
 * Checkbox label for a filtered row:
 * "<campaign> | <start> - <end> | Demand: <demand>"
 */
export function formatRowLabel(record: PeriodRecord): string {
  const name = record.campaignName ?? record.description ?? `Row ${record.rowId}`;
  const demand = record.demand === null ? 'n/a' : String(record.demand);
  return `${name} | ${record.startDate} - ${record.endDate} | Demand: ${demand}`;
}

/**
 * Headline for an estimate, two decimals in EUR.
 */
export function formatEstimate(estimate: number | null): string | null {
  return estimate === null ? null : `Estimated Demand: ${estimate.toFixed(2)} EUR`;
}

/**
 * Download name for an export in the given delimiter.
 */
export function exportFilename(delimiter: string): string {
  return delimiter === '\t' ? 'selected_campaigns.tsv' : 'selected_campaigns.csv';
}
