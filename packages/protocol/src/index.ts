// @campaign-demand/protocol
// Shared types, request schemas and text helpers for the demand estimator

export * from './types/index.js';

export {
  MIN_KEYWORD_LENGTH,
  ALL_CATEGORIES,
  DEFAULT_PERIOD_FILTER_OPTIONS,
  IsoDateSchema,
  DateWindowSchema,
  PeriodQuerySchema,
  CategoryMatchModeSchema,
  KeywordColumnSchema,
  PeriodFilterOptionsInputSchema,
  GrowthPercentSchema,
  resolvePeriodFilterOptions,
  isSearchableKeyword,
  type PeriodFilterOptionsInput,
} from './validation/requests.js';

export {
  daysInMonth,
  isValidCalendarDate,
  formatIsoDate,
  isIsoDate,
} from './validation/dates.js';

export {
  escapeDelimitedCell,
  stringifyDelimitedLine,
  stringifyDelimited,
  type DelimitedCell,
} from './delimited/text.js';
