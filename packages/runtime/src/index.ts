// @campaign-demand/runtime
// Campaign ingestion, period filtering, and demand estimation

// Estimation pipeline (filter → select → estimate)
export {
  runEstimation,
  type EstimationRequest,
  type RunEstimationOptions,
  type PeriodOutcome,
  type EstimationResult,
} from './pipeline.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  SchemaError,
  IngestionError,
  isRuntimeError,
} from './errors.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createLevelLogger,
  createCapturingLogger,
  describeError,
  type Logger,
  type LogLevel,
  type LogEntry,
} from './logging.js';

// Ingestion
export {
  loadCampaignTable,
  ingestCampaignFile,
  buildCampaignRecords,
  DEFAULT_ENCODING,
  sniffByteOrderMark,
  resolveEncoding,
  decodeBytes,
  parseDelimitedTable,
  normalizeHeaders,
  requiredColumns,
  findMissingColumns,
  checkRequiredColumns,
  listCountries,
  listCategories,
  type LoadCampaignTableOptions,
  type IngestCampaignFileResult,
  type DelimitedTable,
  type ParseDelimitedTableOptions,
  type SchemaOptions,
} from './ingestion/index.js';

// Demand normalization
export { normalizeDemand, normalizeDemandColumn } from './normalize/index.js';

// Period filtering
export {
  filterPeriod,
  matchesCountry,
  matchesCategory,
  matchesKeyword,
  isWithinWindow,
  isAllCategories,
  parseDayFirstDate,
  expandTwoDigitYear,
} from './filter/index.js';

// Row selection
export {
  selectRows,
  deselectRows,
  selectionSummary,
  type SelectionSummary,
} from './selection/index.js';

// Estimation
export {
  estimate,
  estimateDemand,
  meanDemand,
  applyGrowth,
  describeEstimationWarning,
} from './estimate/index.js';

// Export
export {
  exportSelectedRows,
  arrangeColumnsForDisplay,
  type ExportSelectedRowsOptions,
  type ExportedRows,
} from './export/index.js';
