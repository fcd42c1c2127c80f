// Day-first date parsing for campaign date columns
//
// Campaign files write dates day-first ("31.01.2024", "31/01/24").
// Year-first ISO dates and English month names are accepted as well.
// A trailing time of day, with or without a zone, is ignored: period
// windows compare whole days as written.

import { formatIsoDate, isValidCalendarDate, type IsoDate } from '@campaign-demand/protocol';

const TIME_SUFFIX = String.raw`(?:[T\s]+\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:\s*(?:Z|[+-]\d{2}(?::?\d{2})?))?)?`;

const DAY_FIRST = new RegExp(String.raw`^(\d{1,2})([./-])(\d{1,2})\2(\d{4}|\d{2})${TIME_SUFFIX}$`);

const YEAR_FIRST = new RegExp(String.raw`^(\d{4})([./-])(\d{1,2})\2(\d{1,2})${TIME_SUFFIX}$`);

// "1 March 2024", "01-Mar-2024", "1. Mar 2024"
const NAMED_DAY_FIRST = new RegExp(
  String.raw`^(\d{1,2})\.?[\s/-]+([A-Za-z]+)\.?[\s/,-]+(\d{4}|\d{2})${TIME_SUFFIX}$`
);

// "March 1, 2024", "Mar 1 2024"
const NAMED_MONTH_FIRST = new RegExp(
  String.raw`^([A-Za-z]+)\.?[\s/-]+(\d{1,2}),?[\s/-]+(\d{4}|\d{2})${TIME_SUFFIX}$`
);

const MONTH_NAMES = [
  'january',
  'february',
  'march',
  'april',
  'may',
  'june',
  'july',
  'august',
  'september',
  'october',
  'november',
  'december',
];

type CalendarDay = { year: number; month: number; day: number };

/**
 * Expand a two-digit year: 00-68 → 2000-2068, 69-99 → 1969-1999.
 */
export function expandTwoDigitYear(year: number): number {
  return year < 69 ? 2000 + year : 1900 + year;
}

function parseYear(text: string): number {
  return text.length === 2 ? expandTwoDigitYear(Number(text)) : Number(text);
}

/**
 * Month number for an English month name or its three-letter
 * abbreviation ("Sept" included), or null.
 */
export function monthFromName(name: string): number | null {
  const lower = name.toLowerCase();
  const index = MONTH_NAMES.findIndex(
    (month) => month === lower || month.slice(0, 3) === lower || (lower === 'sept' && month === 'september')
  );
  return index === -1 ? null : index + 1;
}

function toIsoDate(candidate: CalendarDay): IsoDate | null {
  const { year, month, day } = candidate;
  return isValidCalendarDate(year, month, day) ? formatIsoDate(year, month, day) : null;
}

function parseNamedMonth(text: string): IsoDate | null {
  const dayFirst = NAMED_DAY_FIRST.exec(text);
  const monthFirst = dayFirst ? null : NAMED_MONTH_FIRST.exec(text);

  const parts = dayFirst
    ? { day: dayFirst[1], month: dayFirst[2], year: dayFirst[3] }
    : monthFirst
      ? { day: monthFirst[2], month: monthFirst[1], year: monthFirst[3] }
      : null;
  if (!parts) {
    return null;
  }

  const month = monthFromName(parts.month);
  if (month === null) {
    return null;
  }
  return toIsoDate({ year: parseYear(parts.year), month, day: Number(parts.day) });
}

/**
 * Parse a campaign date into an ISO calendar date.
 *
 * Numeric dates are read day first; when that names no real day and
 * month first does ("03/25/2024"), month first is used.
 *
 * @returns the date, or null when the text is empty, malformed, or names
 *   a day that does not exist either way (31.02.2024)
 */
export function parseDayFirstDate(raw: string | null | undefined): IsoDate | null {
  const text = raw?.trim();
  if (!text) {
    return null;
  }

  const yearFirst = YEAR_FIRST.exec(text);
  if (yearFirst) {
    return toIsoDate({
      year: Number(yearFirst[1]),
      month: Number(yearFirst[3]),
      day: Number(yearFirst[4]),
    });
  }

  const dayFirst = DAY_FIRST.exec(text);
  if (dayFirst) {
    const first = Number(dayFirst[1]);
    const second = Number(dayFirst[3]);
    const year = parseYear(dayFirst[4]);
    return (
      toIsoDate({ year, month: second, day: first }) ?? toIsoDate({ year, month: first, day: second })
    );
  }

  return parseNamedMonth(text);
}
