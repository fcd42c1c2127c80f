// Demand normalization
//
// Demand arrives as locale-formatted currency text ("1.234,56 €"):
// "." groups thousands and "," marks decimals.

import type { CampaignRecord } from '@campaign-demand/protocol';

// Currency symbols plus the space characters used as group separators
const STRIPPED_CHARACTERS = /[\p{Sc} \u00A0\u202F]/gu;

const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a locale-formatted demand value into a number.
 *
 * Numbers pass through unchanged, so normalizing an already normalized
 * value is a no-op. Anything that is not a decimal literal after stripping
 * becomes null; this never throws.
 */
export function normalizeDemand(raw: string | number | null | undefined): number | null {
  if (raw === null || raw === undefined) {
    return null;
  }

  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }

  const cleaned = raw.replace(STRIPPED_CHARACTERS, '').replace(/\./g, '').replace(/,/g, '.');

  if (!DECIMAL_LITERAL.test(cleaned)) {
    return null;
  }

  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

/**
 * Return records with `demand` recomputed from `demandRaw`.
 */
export function normalizeDemandColumn(records: readonly CampaignRecord[]): CampaignRecord[] {
  return records.map((record) =>
    Object.freeze({ ...record, demand: normalizeDemand(record.demandRaw) })
  );
}
