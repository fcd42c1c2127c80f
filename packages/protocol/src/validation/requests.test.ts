// Tests for request schemas

import { describe, it, expect } from 'vitest';
import {
  PeriodQuerySchema,
  PeriodFilterOptionsInputSchema,
  GrowthPercentSchema,
  resolvePeriodFilterOptions,
  isSearchableKeyword,
} from './requests.js';
import { isIsoDate, isValidCalendarDate, formatIsoDate } from './dates.js';

describe('isIsoDate', () => {
  it('accepts real calendar days', () => {
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2023-12-31')).toBe(true);
  });

  it('rejects impossible days and other shapes', () => {
    expect(isIsoDate('2023-02-29')).toBe(false);
    expect(isIsoDate('2024-13-01')).toBe(false);
    expect(isIsoDate('01.02.2024')).toBe(false);
    expect(isIsoDate('2024-1-5')).toBe(false);
    expect(isIsoDate(20240105)).toBe(false);
  });
});

describe('isValidCalendarDate', () => {
  it('knows month lengths', () => {
    expect(isValidCalendarDate(2024, 4, 30)).toBe(true);
    expect(isValidCalendarDate(2024, 4, 31)).toBe(false);
    expect(isValidCalendarDate(2024, 0, 1)).toBe(false);
  });
});

describe('formatIsoDate', () => {
  it('zero-pads parts', () => {
    expect(formatIsoDate(2024, 3, 7)).toBe('2024-03-07');
  });
});

describe('PeriodQuerySchema', () => {
  it('parses a full query', () => {
    const query = PeriodQuerySchema.parse({
      country: 'DE',
      keyword: 'sale',
      window: { start: '2024-01-01', end: '2024-01-31' },
    });
    expect(query.window.end).toBe('2024-01-31');
    expect(query.category).toBeUndefined();
  });

  it('rejects malformed window bounds', () => {
    const result = PeriodQuerySchema.safeParse({
      country: 'DE',
      window: { start: '31.01.2024', end: '2024-02-01' },
    });
    expect(result.success).toBe(false);
  });
});

describe('PeriodFilterOptionsInputSchema', () => {
  it('rejects an empty keyword column list', () => {
    expect(PeriodFilterOptionsInputSchema.safeParse({ keywordColumns: [] }).success).toBe(false);
  });

  it('rejects unknown category modes', () => {
    expect(PeriodFilterOptionsInputSchema.safeParse({ categoryMode: 'regex' }).success).toBe(false);
  });
});

describe('GrowthPercentSchema', () => {
  it('accepts negative values and rejects non-finite ones', () => {
    expect(GrowthPercentSchema.parse(-50)).toBe(-50);
    expect(GrowthPercentSchema.safeParse(Number.POSITIVE_INFINITY).success).toBe(false);
  });
});

describe('resolvePeriodFilterOptions', () => {
  it('defaults to case-insensitive substring matching over both text columns', () => {
    expect(resolvePeriodFilterOptions()).toEqual({
      categoryMode: 'substring',
      keywordColumns: ['description', 'campaignName'],
      caseSensitive: false,
    });
  });

  it('keeps supplied values and drops duplicate columns', () => {
    expect(
      resolvePeriodFilterOptions({
        categoryMode: 'exact',
        keywordColumns: ['description', 'description'],
        caseSensitive: true,
      })
    ).toEqual({
      categoryMode: 'exact',
      keywordColumns: ['description'],
      caseSensitive: true,
    });
  });
});

describe('isSearchableKeyword', () => {
  it('requires three non-blank characters', () => {
    expect(isSearchableKeyword('sal')).toBe(true);
    expect(isSearchableKeyword('sa')).toBe(false);
    expect(isSearchableKeyword('  sa  ')).toBe(false);
    expect(isSearchableKeyword('')).toBe(false);
    expect(isSearchableKeyword(undefined)).toBe(false);
  });
});
