// Delimited text helpers
// Used for exporting selected campaign rows as CSV/TSV

export type DelimitedCell = string | number | null | undefined;

/**
 * Quote a cell when it contains the delimiter, a quote, or a line break.
 * Embedded quotes are doubled.
 */
export function escapeDelimitedCell(cell: DelimitedCell, delimiter = ','): string {
  if (cell === null || cell === undefined) {
    return '';
  }

  const text = String(cell);
  const needsQuotes =
    text.includes(delimiter) || text.includes('"') || text.includes('\n') || text.includes('\r');

  return needsQuotes ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Stringify a single row as a delimited line (without line terminator)
 */
export function stringifyDelimitedLine(cells: readonly DelimitedCell[], delimiter = ','): string {
  return cells.map((cell) => escapeDelimitedCell(cell, delimiter)).join(delimiter);
}

/**
 * Stringify a header and rows to delimited text.
 * Every line, the last included, ends with "\n".
 */
export function stringifyDelimited(
  header: readonly string[],
  rows: ReadonlyArray<readonly DelimitedCell[]>,
  delimiter = ','
): string {
  if (delimiter.length !== 1 || delimiter === '"' || delimiter === '\n' || delimiter === '\r') {
    throw new Error(`Invalid delimiter: ${JSON.stringify(delimiter)}`);
  }

  const lines = [header, ...rows].map((cells) => stringifyDelimitedLine(cells, delimiter));
  return lines.join('\n') + '\n';
}
