// Campaign file ingestion - the entry point for uploaded data
//
// bytes → decode → delimited table → required columns → records

import {
  CAMPAIGN_COLUMNS,
  type CampaignRecord,
  type CampaignTable,
} from '@campaign-demand/protocol';
import { IngestionError, SchemaError } from '../errors.js';
import { consoleLogger, describeError, type Logger } from '../logging.js';
import { normalizeDemand } from '../normalize/index.js';
import { decodeBytes, resolveEncoding } from './encoding.js';
import { checkRequiredColumns, type SchemaOptions } from './schema.js';
import { parseDelimitedTable, type DelimitedTable } from './table.js';

/**
 * Options for loading a campaign file.
 */
export type LoadCampaignTableOptions = SchemaOptions & {
  /** Best-guess character encoding supplied by the caller */
  encoding?: string | null;

  /** Field delimiter (default: tab) */
  delimiter?: string;

  /** Logger for load diagnostics (default: console) */
  logger?: Logger;
};

/**
 * Outcome of the ingestion boundary. Failures are values, not exceptions.
 */
export type IngestCampaignFileResult =
  | { ok: true; table: CampaignTable }
  | { ok: false; error: SchemaError | IngestionError };

/**
 * Build frozen records from parsed rows, normalizing demand once per row.
 */
export function buildCampaignRecords(parsed: DelimitedTable): CampaignRecord[] {
  return parsed.rows.map((cells, rowId) => {
    const cell = (column: string): string | null => cells[column] ?? null;
    const demandRaw = cell(CAMPAIGN_COLUMNS.demand);

    return Object.freeze({
      rowId,
      country: cell(CAMPAIGN_COLUMNS.country),
      description: cell(CAMPAIGN_COLUMNS.description),
      campaignName: cell(CAMPAIGN_COLUMNS.campaignName),
      categoryName: cell(CAMPAIGN_COLUMNS.categoryName),
      dateStart: cell(CAMPAIGN_COLUMNS.dateStart),
      dateEnd: cell(CAMPAIGN_COLUMNS.dateEnd),
      demandRaw,
      demand: normalizeDemand(demandRaw),
      cells: Object.freeze({ ...cells }),
    });
  });
}

/**
 * Load a campaign file into an in-memory table.
 *
 * @throws IngestionError if the bytes cannot be decoded or parsed
 * @throws SchemaError if required columns are missing
 */
export function loadCampaignTable(
  bytes: Uint8Array,
  options: LoadCampaignTableOptions = {}
): CampaignTable {
  const { delimiter = '\t', logger = consoleLogger } = options;

  const encoding = resolveEncoding(bytes, options.encoding);
  logger.debug('Decoding campaign file', {
    byteLength: bytes.length,
    encoding,
    hint: options.encoding ?? null,
  });

  const text = decodeBytes(bytes, encoding);
  const parsed = parseDelimitedTable(text, { delimiter });
  if (parsed.quotesIgnored) {
    logger.warn('Malformed quoting, reading quote characters as text', { encoding });
  }

  checkRequiredColumns(parsed.columns, options);

  const records = buildCampaignRecords(parsed);
  const columns = new Set(parsed.columns);

  const table: CampaignTable = Object.freeze({
    columns: Object.freeze([...parsed.columns]),
    records: Object.freeze(records),
    encoding,
    hasCampaignName: columns.has(CAMPAIGN_COLUMNS.campaignName),
    hasCategory: columns.has(CAMPAIGN_COLUMNS.categoryName),
  });

  logger.info('Campaign table loaded', {
    rows: records.length,
    columns: parsed.columns.length,
    encoding,
    nonNumericDemand: records.filter((record) => record.demand === null).length,
  });

  return table;
}

/**
 * Load a campaign file, reporting every failure as a result.
 *
 * Schema and ingestion errors pass through as they are; anything else
 * is wrapped in an IngestionError that keeps the original as its cause.
 */
export function ingestCampaignFile(
  bytes: Uint8Array,
  options: LoadCampaignTableOptions = {}
): IngestCampaignFileResult {
  const logger = options.logger ?? consoleLogger;

  try {
    return { ok: true, table: loadCampaignTable(bytes, options) };
  } catch (error) {
    if (error instanceof SchemaError) {
      logger.warn('Campaign file rejected', { missingColumns: error.missingColumns });
      return { ok: false, error };
    }

    const ingestionError =
      error instanceof IngestionError
        ? error
        : new IngestionError(
            `Error processing file: ${error instanceof Error ? error.message : String(error)}`,
            { cause: error }
          );

    logger.error('Campaign file could not be loaded', describeError(ingestionError));
    return { ok: false, error: ingestionError };
  }
}
