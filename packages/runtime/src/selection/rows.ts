// Row selection
//
// Callers prune a period's filtered rows by row identity. The retained
// ids are passed in explicitly; nothing here remembers a previous choice.

import type { RowId } from '@campaign-demand/protocol';

type Identified = { readonly rowId: RowId };

/**
 * Summary of a selection over one period's rows.
 */
export type SelectionSummary = {
  total: number;
  selected: number;
  deselectedRowIds: RowId[];
};

/**
 * Keep the rows whose id is retained, in their original order.
 *
 * @param rows - A period's filtered rows
 * @param retained - Ids to keep; undefined keeps every row
 */
export function selectRows<T extends Identified>(
  rows: readonly T[],
  retained?: Iterable<RowId>
): T[] {
  if (retained === undefined) {
    return [...rows];
  }

  const keep = new Set(retained);
  return rows.filter((row) => keep.has(row.rowId));
}

/**
 * Drop the rows whose id is listed, keeping the rest in order.
 */
export function deselectRows<T extends Identified>(
  rows: readonly T[],
  removed: Iterable<RowId>
): T[] {
  const drop = new Set(removed);
  return rows.filter((row) => !drop.has(row.rowId));
}

/**
 * Count selected rows and list the ones left out.
 * Retained ids that are not among the rows are ignored.
 */
export function selectionSummary(
  rows: readonly Identified[],
  retained?: Iterable<RowId>
): SelectionSummary {
  const selected = selectRows(rows, retained);
  const selectedIds = new Set(selected.map((row) => row.rowId));

  return {
    total: rows.length,
    selected: selected.length,
    deselectedRowIds: rows.map((row) => row.rowId).filter((id) => !selectedIds.has(id)),
  };
}
