// Common types used across the protocol

/**
 * Calendar date in ISO 8601 form (YYYY-MM-DD).
 * Lexicographic order equals chronological order.
 */
export type IsoDate = string;

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Row identity within a loaded table: the 0-based position of the row in the source file.
 */
export type RowId = number;

/**
 * The two comparison periods of an estimate.
 */
export type PeriodName = 'earlier' | 'later';
