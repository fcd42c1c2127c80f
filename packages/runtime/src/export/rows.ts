// Export of selected campaign rows
//
// Produces the delimited file offered for download: the union of both
// periods' selections, de-duplicated by the full exported row.

import {
  CAMPAIGN_COLUMNS,
  stringifyDelimited,
  type CampaignTable,
  type DelimitedCell,
  type PeriodRecord,
} from '@campaign-demand/protocol';

export type ExportSelectedRowsOptions = {
  /** Field delimiter (default: ",") */
  delimiter?: string;

  /** Move Description next to Campaign name (default: true) */
  arrangeForDisplay?: boolean;
};

export type ExportedRows = {
  header: string[];
  rows: DelimitedCell[][];
  content: string;
};

/**
 * Display order for table columns: Description directly after Campaign name.
 * Other columns keep their order. Returns a new array.
 */
export function arrangeColumnsForDisplay(columns: readonly string[]): string[] {
  const { campaignName, description } = CAMPAIGN_COLUMNS;
  if (!columns.includes(campaignName) || !columns.includes(description)) {
    return [...columns];
  }

  const arranged = columns.filter((column) => column !== description);
  arranged.splice(arranged.indexOf(campaignName) + 1, 0, description);
  return arranged;
}

function exportCell(record: PeriodRecord, column: string): DelimitedCell {
  switch (column) {
    case CAMPAIGN_COLUMNS.demand:
      return record.demand;
    case CAMPAIGN_COLUMNS.dateStart:
      return record.startDate;
    case CAMPAIGN_COLUMNS.dateEnd:
      return record.endDate;
    default:
      return record.cells[column] ?? null;
  }
}

/**
 * Export the selected rows of both periods as delimited text.
 *
 * Earlier rows come first. A row identical in every exported cell to one
 * already written is skipped, so a campaign selected in both periods
 * appears once. Demand is written normalized and dates as YYYY-MM-DD.
 */
export function exportSelectedRows(
  table: Pick<CampaignTable, 'columns'>,
  earlier: readonly PeriodRecord[],
  later: readonly PeriodRecord[],
  options: ExportSelectedRowsOptions = {}
): ExportedRows {
  const { delimiter = ',', arrangeForDisplay = true } = options;

  const header = arrangeForDisplay ? arrangeColumnsForDisplay(table.columns) : [...table.columns];
  const seen = new Set<string>();
  const rows: DelimitedCell[][] = [];

  for (const record of [...earlier, ...later]) {
    const cells = header.map((column) => exportCell(record, column));
    const identity = JSON.stringify(cells);
    if (seen.has(identity)) continue;
    seen.add(identity);
    rows.push(cells);
  }

  return {
    header,
    rows,
    content: stringifyDelimited(header, rows, delimiter),
  };
}
