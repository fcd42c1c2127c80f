// Tests for demand normalization

import { describe, it, expect } from 'vitest';
import type { CampaignRecord } from '@campaign-demand/protocol';
import { normalizeDemand, normalizeDemandColumn } from './demand.js';

describe('normalizeDemand', () => {
  it('parses locale-formatted currency', () => {
    expect(normalizeDemand('1.234,56 €')).toBe(1234.56);
    expect(normalizeDemand('€ 99,90')).toBe(99.9);
  });

  it('parses plain decimal commas', () => {
    expect(normalizeDemand('0,5')).toBe(0.5);
  });

  it('removes every thousands separator', () => {
    expect(normalizeDemand('1.234.567,89 €')).toBe(1234567.89);
    expect(normalizeDemand('12.000')).toBe(12000);
  });

  it('strips non-breaking spaces used as group separators', () => {
    expect(normalizeDemand('1\u00A0234,50\u00A0€')).toBe(1234.5);
  });

  it('keeps a leading sign', () => {
    expect(normalizeDemand('-250,00 €')).toBe(-250);
  });

  it('returns null for missing and empty values', () => {
    expect(normalizeDemand(null)).toBeNull();
    expect(normalizeDemand(undefined)).toBeNull();
    expect(normalizeDemand('')).toBeNull();
    expect(normalizeDemand(' € ')).toBeNull();
  });

  it('returns null for garbage text', () => {
    expect(normalizeDemand('abc')).toBeNull();
    expect(normalizeDemand('12abc')).toBeNull();
    expect(normalizeDemand('n/a')).toBeNull();
  });

  it('rejects words that Number() would accept', () => {
    expect(normalizeDemand('Infinity')).toBeNull();
    expect(normalizeDemand('0x1A')).toBeNull();
  });

  it('leaves numbers untouched', () => {
    expect(normalizeDemand(1234.56)).toBe(1234.56);
    expect(normalizeDemand(Number.NaN)).toBeNull();
  });

  it('stays null when re-run on a null result', () => {
    expect(normalizeDemand(normalizeDemand('abc'))).toBeNull();
  });
});

describe('normalizeDemandColumn', () => {
  const record: CampaignRecord = {
    rowId: 0,
    country: 'DE',
    description: 'Spring sale',
    campaignName: 'Spring',
    categoryName: null,
    dateStart: '01.03.2024',
    dateEnd: '15.03.2024',
    demandRaw: '2.500,00 €',
    demand: null,
    cells: {},
  };

  it('sets demand from the raw text without touching the input', () => {
    const [normalized] = normalizeDemandColumn([record]);
    expect(normalized.demand).toBe(2500);
    expect(normalized.demandRaw).toBe('2.500,00 €');
    expect(record.demand).toBeNull();
  });

  it('gives the same result when applied twice', () => {
    const once = normalizeDemandColumn([record]);
    const twice = normalizeDemandColumn(once);
    expect(twice[0].demand).toBe(2500);
  });
});
