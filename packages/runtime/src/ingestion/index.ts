// Campaign file ingestion

export {
  loadCampaignTable,
  ingestCampaignFile,
  buildCampaignRecords,
  type LoadCampaignTableOptions,
  type IngestCampaignFileResult,
} from './load.js';

export {
  DEFAULT_ENCODING,
  sniffByteOrderMark,
  resolveEncoding,
  decodeBytes,
} from './encoding.js';

export {
  parseDelimitedTable,
  normalizeHeaders,
  type DelimitedTable,
  type ParseDelimitedTableOptions,
} from './table.js';

export {
  requiredColumns,
  findMissingColumns,
  checkRequiredColumns,
  type SchemaOptions,
} from './schema.js';

export { listCountries, listCategories } from './lookups.js';
