// Period filter
//
// Selects the rows of one comparison period. Both periods run the same
// filter over the same table with their own parameters; every call builds
// fresh result objects, so nothing one period does can reach the other.

import {
  ALL_CATEGORIES,
  isIsoDate,
  resolvePeriodFilterOptions,
  type CampaignRecord,
  type CampaignTable,
  type DateWindow,
  type IsoDate,
  type PeriodFilterOptions,
  type PeriodFilterOptionsInput,
  type PeriodQuery,
  type PeriodRecord,
} from '@campaign-demand/protocol';
import { ValidationError } from '../errors.js';
import { parseDayFirstDate } from './dates.js';

function fold(text: string, caseSensitive: boolean): string {
  return caseSensitive ? text : text.toLowerCase();
}

function collapseWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

/**
 * Whether a category value places no restriction ("", whitespace, "All").
 */
export function isAllCategories(category: string | undefined): boolean {
  const trimmed = category?.trim() ?? '';
  return trimmed === '' || trimmed.toLowerCase() === ALL_CATEGORIES.toLowerCase();
}

/**
 * Country predicate: exact string equality.
 */
export function matchesCountry(record: CampaignRecord, country: string): boolean {
  return record.country === country;
}

/**
 * Category predicate.
 *
 * Both sides are trimmed and have inner whitespace collapsed, then
 * compared for equality (exact) or containment (substring).
 */
export function matchesCategory(
  record: CampaignRecord,
  category: string | undefined,
  options: Pick<PeriodFilterOptions, 'categoryMode' | 'caseSensitive'>
): boolean {
  if (category === undefined || isAllCategories(category)) {
    return true;
  }
  if (record.categoryName === null) {
    return false;
  }

  const wanted = fold(collapseWhitespace(category), options.caseSensitive);
  const actual = fold(collapseWhitespace(record.categoryName), options.caseSensitive);

  return options.categoryMode === 'exact' ? actual === wanted : actual.includes(wanted);
}

/**
 * Keyword predicate: literal substring of any configured text column.
 * An empty or blank keyword matches every record.
 */
export function matchesKeyword(
  record: CampaignRecord,
  keyword: string | undefined,
  options: Pick<PeriodFilterOptions, 'keywordColumns' | 'caseSensitive'>
): boolean {
  const trimmed = keyword?.trim() ?? '';
  if (trimmed === '') {
    return true;
  }

  const needle = fold(trimmed, options.caseSensitive);
  return options.keywordColumns.some((column) => {
    const value = record[column];
    return value !== null && fold(value, options.caseSensitive).includes(needle);
  });
}

/**
 * Date predicate: the campaign must lie entirely inside the window.
 * Both bounds are inclusive; unparsed dates never match.
 */
export function isWithinWindow(
  startDate: IsoDate | null,
  endDate: IsoDate | null,
  window: DateWindow
): boolean {
  if (startDate === null || endDate === null) {
    return false;
  }
  return startDate >= window.start && endDate <= window.end;
}

function assertWindow(window: DateWindow): void {
  for (const bound of ['start', 'end'] as const) {
    if (!isIsoDate(window[bound])) {
      throw new ValidationError(`window.${bound} must be a YYYY-MM-DD date`, {
        field: `window.${bound}`,
        details: { value: window[bound] },
      });
    }
  }
}

/**
 * Filter a campaign table down to one period.
 *
 * Predicates apply in order: country, category, keyword, date window.
 * No match is an empty array, not an error.
 *
 * @param source - The loaded table, or records already narrowed from it
 * @param query - Country, optional keyword/category, and the date window
 * @param options - Matching behavior; missing fields take the defaults
 * @returns New records carrying their parsed dates, in source order
 * @throws ValidationError if a window bound is not a YYYY-MM-DD date
 */
export function filterPeriod(
  source: CampaignTable | readonly CampaignRecord[],
  query: PeriodQuery,
  options: PeriodFilterOptionsInput = {}
): PeriodRecord[] {
  assertWindow(query.window);

  const resolved = resolvePeriodFilterOptions(options);
  const records = 'records' in source ? source.records : source;
  const result: PeriodRecord[] = [];

  for (const record of records) {
    if (!matchesCountry(record, query.country)) continue;
    if (!matchesCategory(record, query.category, resolved)) continue;
    if (!matchesKeyword(record, query.keyword, resolved)) continue;

    const startDate = parseDayFirstDate(record.dateStart);
    const endDate = parseDayFirstDate(record.dateEnd);
    if (startDate === null || endDate === null) continue;
    if (!isWithinWindow(startDate, endDate, query.window)) continue;

    result.push(Object.freeze({ ...record, startDate, endDate }));
  }

  return result;
}
