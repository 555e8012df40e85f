// Aggregate-table sort — pure state machine.
//
// Clicking the sorted column flips its direction; clicking any other
// column sorts by it ascending. The sort is stable and is re-applied on
// every redraw, so it survives data refreshes.

import type { QuoteSnapshot } from "./domain.ts";

export const SORT_COLUMNS = [
  "visible",
  "ticker",
  "price",
  "open",
  "dailyChangePct",
  "dailyChangeAbs",
  "hourlyChangePct",
  "hourlyChangeAbs",
] as const;

export type SortColumn = (typeof SORT_COLUMNS)[number];

export type SortDirection = "asc" | "desc";

export interface SortState {
  readonly column: SortColumn;
  readonly direction: SortDirection;
}

export const initialSort: SortState = { column: "ticker", direction: "asc" };

// --- Transitions ---

export function clickColumn(state: SortState, column: SortColumn): SortState {
  if (state.column === column) {
    return { column, direction: state.direction === "asc" ? "desc" : "asc" };
  }
  return { column, direction: "asc" };
}

// --- Ordering ---

export interface SortableRow {
  readonly symbol: string;
  readonly visible: boolean;
  readonly snapshot: QuoteSnapshot | undefined;
}

export const VISIBLE_MARK = "✔";
export const HIDDEN_MARK = "✘";

/** Numeric columns read the snapshot; rows without figures count as 0. */
export function sortKey(row: SortableRow, column: SortColumn): number | string {
  switch (column) {
    case "visible":
      return row.visible ? VISIBLE_MARK : HIDDEN_MARK;
    case "ticker":
      return row.symbol.toLowerCase();
  }
  const snapshot = row.snapshot;
  if (snapshot === undefined || snapshot._tag === "Errored") return 0;
  switch (column) {
    case "price":
      return snapshot.price;
    case "open":
      return snapshot.open;
    case "dailyChangePct":
      return snapshot.metrics.dailyChangePct;
    case "dailyChangeAbs":
      return snapshot.metrics.dailyChangeAbs;
    case "hourlyChangePct":
      return snapshot.metrics.hourlyChangePct;
    case "hourlyChangeAbs":
      return snapshot.metrics.hourlyChangeAbs;
  }
}

function compareKeys(a: number | string, b: number | string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Stable in both directions: ties keep their incoming order. */
export function sortRows<R extends SortableRow>(
  rows: ReadonlyArray<R>,
  state: SortState,
): R[] {
  const sign = state.direction === "asc" ? 1 : -1;
  return [...rows].sort(
    (a, b) => sign * compareKeys(sortKey(a, state.column), sortKey(b, state.column)),
  );
}
