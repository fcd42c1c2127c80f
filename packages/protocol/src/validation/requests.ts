// Request schemas
//
// zod schemas for everything that crosses the engine boundary from a caller:
// period queries, filter options, growth targets.

import { z } from 'zod';
import type { PeriodFilterOptions } from '../types/periods.js';
import { isIsoDate } from './dates.js';

/**
 * Keywords shorter than this are not worth searching for.
 * Callers decide whether to filter at all based on it.
 */
export const MIN_KEYWORD_LENGTH = 3;

/**
 * Category value meaning "no category restriction".
 */
export const ALL_CATEGORIES = 'All';

/**
 * The most permissive matching: case-insensitive substring search
 * over Description and Campaign name.
 */
export const DEFAULT_PERIOD_FILTER_OPTIONS: Readonly<PeriodFilterOptions> = Object.freeze<PeriodFilterOptions>({
  categoryMode: 'substring',
  keywordColumns: ['description', 'campaignName'],
  caseSensitive: false,
});

export const IsoDateSchema = z
  .string()
  .refine(isIsoDate, { message: 'Expected a calendar date in YYYY-MM-DD form' });

export const DateWindowSchema = z.object({
  start: IsoDateSchema,
  end: IsoDateSchema,
});

export const PeriodQuerySchema = z.object({
  country: z.string(),
  keyword: z.string().optional(),
  category: z.string().optional(),
  window: DateWindowSchema,
});

export const CategoryMatchModeSchema = z.enum(['exact', 'substring']);

export const KeywordColumnSchema = z.enum(['description', 'campaignName']);

/**
 * Partial filter options as a caller sends them; missing fields take the defaults.
 */
export const PeriodFilterOptionsInputSchema = z.object({
  categoryMode: CategoryMatchModeSchema.optional(),
  keywordColumns: z.array(KeywordColumnSchema).min(1).optional(),
  caseSensitive: z.boolean().optional(),
});

export type PeriodFilterOptionsInput = z.infer<typeof PeriodFilterOptionsInputSchema>;

export const GrowthPercentSchema = z.number().finite();

/**
 * Fill in missing filter options with the defaults.
 */
export function resolvePeriodFilterOptions(
  input: PeriodFilterOptionsInput = {}
): PeriodFilterOptions {
  return {
    categoryMode: input.categoryMode ?? DEFAULT_PERIOD_FILTER_OPTIONS.categoryMode,
    keywordColumns: input.keywordColumns
      ? [...new Set(input.keywordColumns)]
      : [...DEFAULT_PERIOD_FILTER_OPTIONS.keywordColumns],
    caseSensitive: input.caseSensitive ?? DEFAULT_PERIOD_FILTER_OPTIONS.caseSensitive,
  };
}

/**
 * Check whether a keyword is long enough to search for.
 * Whitespace at either end does not count.
 */
export function isSearchableKeyword(keyword: string | undefined): boolean {
  return (keyword?.trim().length ?? 0) >= MIN_KEYWORD_LENGTH;
}
