// Delimited table parsing
//
// Turns decoded text into named rows. Every cell stays text; typing
// happens later, per column, in the record builder.

import Papa from 'papaparse';
import { IngestionError } from '../errors.js';

/**
 * A parsed table: header names plus one cell map per data row.
 * Empty cells are null.
 */
export type DelimitedTable = {
  columns: string[];
  rows: Array<Record<string, string | null>>;
  /** True when malformed quoting made the parser read quote characters as text */
  quotesIgnored: boolean;
};

export type ParseDelimitedTableOptions = {
  /** Field delimiter (default: tab) */
  delimiter?: string;
};

/**
 * Make header names usable as keys: trim them, name blank headers after
 * their position and suffix repeats with ".1", ".2", ...
 */
export function normalizeHeaders(raw: readonly string[]): string[] {
  const seen = new Map<string, number>();

  return raw.map((header, index) => {
    const base = header.trim() || `Unnamed: ${index}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    return count === 0 ? base : `${base}.${count}`;
  });
}

const QUOTE_ERRORS = new Set(['MissingQuotes', 'InvalidQuotes']);

/**
 * A private-use character absent from `text`, used as a quote character
 * that never matches.
 */
function unusedCharacter(text: string): string {
  for (let code = 0xe000; code <= 0xf8ff; code++) {
    const candidate = String.fromCharCode(code);
    if (!text.includes(candidate)) {
      return candidate;
    }
  }
  throw new IngestionError('File uses every private-use character; cannot read it without quoting');
}

function parseRows(text: string, delimiter: string, quoteChar: string): Papa.ParseResult<string[]> {
  return Papa.parse<string[]>(text, {
    delimiter,
    quoteChar,
    header: false,
    dynamicTyping: false,
    skipEmptyLines: 'greedy',
  });
}

/**
 * Parse delimited text with a header row.
 *
 * Blank lines are skipped. Rows shorter than the header are padded with
 * nulls; rows with extra non-empty cells are rejected.
 *
 * Quoted fields are read as usual. When the quoting is malformed, e.g. a
 * free-text cell opening with a quoted word (`"Black Friday" sale`), the
 * text is parsed again with quote characters kept as plain text.
 *
 * @throws IngestionError on an over-long row or a file without a header
 */
export function parseDelimitedTable(
  text: string,
  options: ParseDelimitedTableOptions = {}
): DelimitedTable {
  const { delimiter = '\t' } = options;

  let result = parseRows(text, delimiter, '"');
  const quotesIgnored = result.errors.some((error) => QUOTE_ERRORS.has(error.code));
  if (quotesIgnored) {
    result = parseRows(text, delimiter, unusedCharacter(text));
  }

  const [headerRow, ...dataRows] = result.data;
  if (!headerRow || headerRow.every((cell) => cell.trim() === '')) {
    throw new IngestionError('File has no header row');
  }

  const columns = normalizeHeaders(headerRow);

  const rows = dataRows.map((cells, index) => {
    const extra = cells.slice(columns.length);
    if (extra.some((cell) => cell !== '')) {
      throw new IngestionError(
        `Row ${index + 1} has ${cells.length} fields, expected ${columns.length}`,
        { row: index + 1 }
      );
    }

    const row: Record<string, string | null> = {};
    columns.forEach((column, columnIndex) => {
      const cell = cells[columnIndex];
      row[column] = cell === undefined || cell === '' ? null : cell;
    });
    return row;
  });

  return { columns, rows, quotesIgnored };
}
