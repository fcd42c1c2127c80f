// Tests for row selection

import { describe, it, expect } from 'vitest';
import { selectRows, deselectRows, selectionSummary } from './rows.js';

const rows = [
  { rowId: 4, label: 'a' },
  { rowId: 7, label: 'b' },
  { rowId: 9, label: 'c' },
];

describe('selectRows', () => {
  it('keeps every row by default', () => {
    const selected = selectRows(rows);
    expect(selected).toEqual(rows);
    expect(selected).not.toBe(rows);
  });

  it('keeps retained rows in their original order', () => {
    expect(selectRows(rows, [9, 4]).map((row) => row.label)).toEqual(['a', 'c']);
  });

  it('ignores ids that are not in the rows', () => {
    expect(selectRows(rows, new Set([7, 100]))).toEqual([rows[1]]);
  });

  it('returns nothing for an empty retained set', () => {
    expect(selectRows(rows, [])).toEqual([]);
  });
});

describe('deselectRows', () => {
  it('drops the listed rows', () => {
    expect(deselectRows(rows, [7]).map((row) => row.rowId)).toEqual([4, 9]);
  });
});

describe('selectionSummary', () => {
  it('counts selected rows and lists the deselected ones', () => {
    expect(selectionSummary(rows, [4, 100])).toEqual({
      total: 3,
      selected: 1,
      deselectedRowIds: [7, 9],
    });
  });

  it('reports a full selection by default', () => {
    expect(selectionSummary(rows)).toEqual({ total: 3, selected: 3, deselectedRowIds: [] });
  });
});
