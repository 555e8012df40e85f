// Aggregate table — one row per tracked symbol, in the current sort order.

import { type AppState, isVisible } from "./app-state.ts";
import { trendOf } from "./domain.ts";
import {
  BOLD,
  formatChange,
  formatMoney,
  GREEN,
  NOT_AVAILABLE,
  RED,
  RESET,
} from "./format.ts";
import {
  HIDDEN_MARK,
  SORT_COLUMNS,
  type SortableRow,
  sortRows,
  type SortState,
  VISIBLE_MARK,
} from "./sort.ts";

export type RowTone = "gain" | "loss" | "error" | "pending";

export interface TableRow extends SortableRow {
  readonly tone: RowTone;
  readonly cells: readonly [
    mark: string,
    symbol: string,
    price: string,
    open: string,
    dailyPct: string,
    dailyAbs: string,
    hourlyPct: string,
    hourlyAbs: string,
  ];
}

export const HEADERS = [
  "Visible",
  "Symbol",
  "Price",
  "Open",
  "Daily %",
  "Daily $",
  "Hourly %",
  "Hourly $",
] as const;

export function buildRows(state: AppState): TableRow[] {
  const rows = state.symbols.map((symbol): TableRow => {
    const visible = isVisible(state, symbol);
    const snapshot = state.snapshots.get(symbol);
    const mark = visible ? VISIBLE_MARK : HIDDEN_MARK;
    if (snapshot === undefined || snapshot._tag === "Errored") {
      return {
        symbol,
        visible,
        snapshot,
        tone: snapshot === undefined ? "pending" : "error",
        cells: [
          mark,
          symbol,
          NOT_AVAILABLE,
          NOT_AVAILABLE,
          NOT_AVAILABLE,
          NOT_AVAILABLE,
          NOT_AVAILABLE,
          NOT_AVAILABLE,
        ],
      };
    }
    const m = snapshot.metrics;
    const [dailyPct, dailyAbs] = formatChange(m.dailyChangePct, m.dailyChangeAbs);
    const [hourlyPct, hourlyAbs] = formatChange(m.hourlyChangePct, m.hourlyChangeAbs);
    return {
      symbol,
      visible,
      snapshot,
      tone: trendOf(m.dailyChangeAbs),
      cells: [
        mark,
        symbol,
        formatMoney(snapshot.price),
        formatMoney(snapshot.open),
        dailyPct,
        dailyAbs,
        hourlyPct,
        hourlyAbs,
      ],
    };
  });
  return sortRows(rows, state.sort);
}

// --- Rendering ---

const toneColor: Record<RowTone, string> = {
  gain: GREEN,
  loss: RED,
  error: RED + BOLD,
  pending: "",
};

function sortIndicator(sort: SortState, index: number): string {
  if (SORT_COLUMNS[index] !== sort.column) return "";
  return sort.direction === "asc" ? " ▲" : " ▼";
}

/** Plain-text table; each data row is wrapped in its tone's colour. */
export function renderTable(rows: ReadonlyArray<TableRow>, sort: SortState): string[] {
  const headers = HEADERS.map((h, i) => h + sortIndicator(sort, i));
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...rows.map((row) => row.cells[i]?.length ?? 0)),
  );
  const line = (cells: ReadonlyArray<string>) =>
    cells.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join("  ").trimEnd();

  const out = [`${BOLD}${line(headers)}${RESET}`];
  for (const row of rows) {
    const color = toneColor[row.tone];
    out.push(color === "" ? line(row.cells) : `${color}${line(row.cells)}${RESET}`);
  }
  return out;
}
