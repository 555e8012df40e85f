// Application state — pure transitions.
//
// The refresh coordinator owns one AppState and applies these functions on
// its owner fiber. Nothing in this file performs I/O or reads the clock.

import { Either } from "effect";
import type { QuoteSnapshot } from "./domain.ts";
import { type Settings, settingsEqual } from "./settings.ts";
import { clickColumn, initialSort, type SortColumn, type SortState } from "./sort.ts";
import { canonicalSymbolList, normalizeSymbol } from "./symbols.ts";

// --- View ---

export type View =
  | { readonly _tag: "Main" }
  | { readonly _tag: "Detail"; readonly symbol: string };

export const MainView: View = { _tag: "Main" };
export const DetailView = (symbol: string): View => ({ _tag: "Detail", symbol });

// --- Status line ---

export type NoticeLevel = "info" | "warning" | "error";

export type Status =
  | { readonly _tag: "Ready"; readonly refreshSeconds: number }
  | { readonly _tag: "Fetching" }
  | { readonly _tag: "Loaded"; readonly at: number }
  | { readonly _tag: "BatchFailed" }
  | { readonly _tag: "NoSymbols" }
  | { readonly _tag: "Notice"; readonly level: NoticeLevel; readonly text: string };

const notice = (level: NoticeLevel, text: string): Status => ({
  _tag: "Notice",
  level,
  text,
});

// --- State ---

export interface AppState {
  readonly symbols: ReadonlyArray<string>;
  readonly visibility: ReadonlyMap<string, boolean>;
  readonly snapshots: ReadonlyMap<string, QuoteSnapshot>;
  readonly settings: Settings;
  readonly sort: SortState;
  readonly view: View;
  readonly status: Status;
  /** Batches started and not yet settled. */
  readonly inFlight: number;
  readonly refreshEnabled: boolean;
  /** Generation handed to the next batch. */
  readonly nextGeneration: number;
  /** Newest generation merged so far; 0 before the first merge. */
  readonly mergedGeneration: number;
}

export function initialAppState(
  symbols: ReadonlyArray<string>,
  settings: Settings,
  refreshSeconds: number,
): AppState {
  const tracked = canonicalSymbolList(symbols);
  return {
    symbols: tracked,
    visibility: new Map(tracked.map((symbol) => [symbol, true])),
    snapshots: new Map(),
    settings,
    sort: initialSort,
    view: MainView,
    status: { _tag: "Ready", refreshSeconds },
    inFlight: 0,
    refreshEnabled: true,
    nextGeneration: 1,
    mergedGeneration: 0,
  };
}

export function isVisible(state: AppState, symbol: string): boolean {
  return state.visibility.get(symbol) ?? true;
}

// --- Symbol set ---

export type AddResult =
  | { readonly _tag: "Added"; readonly symbol: string; readonly state: AppState }
  | { readonly _tag: "Duplicate"; readonly symbol: string; readonly state: AppState }
  | { readonly _tag: "Invalid"; readonly state: AppState };

export function addSymbol(state: AppState, input: string): AddResult {
  const normalized = normalizeSymbol(input);
  if (Either.isLeft(normalized)) {
    return {
      _tag: "Invalid",
      state: { ...state, status: notice("error", "Please enter a ticker symbol.") },
    };
  }
  const symbol = normalized.right;
  if (state.symbols.includes(symbol)) {
    return {
      _tag: "Duplicate",
      symbol,
      state: {
        ...state,
        status: notice("warning", `${symbol} is already being monitored.`),
      },
    };
  }
  const visibility = new Map(state.visibility);
  visibility.set(symbol, true);
  return {
    _tag: "Added",
    symbol,
    state: {
      ...state,
      symbols: canonicalSymbolList([...state.symbols, symbol]),
      visibility,
    },
  };
}

export type RemoveResult =
  | { readonly _tag: "Removed"; readonly symbol: string; readonly state: AppState }
  | { readonly _tag: "NotTracked"; readonly state: AppState };

export function removeSymbol(state: AppState, input: string): RemoveResult {
  const symbol = input.trim().toUpperCase();
  if (!state.symbols.includes(symbol)) {
    const text =
      symbol.length === 0
        ? "No share selected to remove."
        : `${symbol} is not being monitored.`;
    return { _tag: "NotTracked", state: { ...state, status: notice("error", text) } };
  }
  const visibility = new Map(state.visibility);
  visibility.delete(symbol);
  const snapshots = new Map(state.snapshots);
  snapshots.delete(symbol);
  const leavingView = state.view._tag === "Detail" && state.view.symbol === symbol;
  return {
    _tag: "Removed",
    symbol,
    state: {
      ...state,
      symbols: state.symbols.filter((s) => s !== symbol),
      visibility,
      snapshots,
      view: leavingView ? MainView : state.view,
      status: notice("info", `Removed ${symbol} successfully.`),
    },
  };
}

// --- Presentation toggles ---

export function toggleVisibility(state: AppState, input: string): AppState {
  const symbol = input.trim().toUpperCase();
  if (!state.symbols.includes(symbol)) {
    return { ...state, status: notice("error", `${symbol} is not being monitored.`) };
  }
  const visibility = new Map(state.visibility);
  visibility.set(symbol, !isVisible(state, symbol));
  return { ...state, visibility };
}

export function sortBy(state: AppState, column: SortColumn): AppState {
  return { ...state, sort: clickColumn(state.sort, column) };
}

export function selectView(state: AppState, view: View): AppState {
  if (view._tag === "Detail" && !state.symbols.includes(view.symbol)) {
    return { ...state, status: notice("error", `${view.symbol} is not being monitored.`) };
  }
  return { ...state, view };
}

export function applySettings(
  state: AppState,
  settings: Settings,
): { readonly changed: boolean; readonly state: AppState } {
  return {
    changed: !settingsEqual(state.settings, settings),
    state: { ...state, settings },
  };
}

export function setNotice(state: AppState, level: NoticeLevel, text: string): AppState {
  return { ...state, status: notice(level, text) };
}

// --- Fetch lifecycle ---

export function noSymbols(state: AppState): AppState {
  return { ...state, status: { _tag: "NoSymbols" } };
}

/** Hand out the next generation and mark a batch in flight. */
export function beginFetch(state: AppState): readonly [number, AppState] {
  const generation = state.nextGeneration;
  return [
    generation,
    {
      ...state,
      nextGeneration: generation + 1,
      inFlight: state.inFlight + 1,
      refreshEnabled: false,
      status: { _tag: "Fetching" },
    },
  ];
}

function settle(state: AppState): AppState {
  const inFlight = Math.max(0, state.inFlight - 1);
  return { ...state, inFlight, refreshEnabled: inFlight === 0 };
}

export type MergeOutcome = "applied" | "stale";

/** Merge a finished batch. A batch older than the newest merged one is
 *  discarded; symbols removed while it ran are skipped. */
export function mergeBatch(
  state: AppState,
  generation: number,
  snapshots: ReadonlyArray<QuoteSnapshot>,
  now: number,
): { readonly outcome: MergeOutcome; readonly state: AppState } {
  const settled = settle(state);
  if (generation < state.mergedGeneration) {
    return {
      outcome: "stale",
      state:
        settled.inFlight > 0 ? settled : { ...settled, status: { _tag: "Loaded", at: now } },
    };
  }
  const merged = new Map(state.snapshots);
  for (const snapshot of snapshots) {
    if (state.symbols.includes(snapshot.symbol)) {
      merged.set(snapshot.symbol, snapshot);
    }
  }
  return {
    outcome: "applied",
    state: {
      ...settled,
      snapshots: merged,
      mergedGeneration: generation,
      status: settled.inFlight > 0 ? { _tag: "Fetching" } : { _tag: "Loaded", at: now },
    },
  };
}

export function failBatch(state: AppState): AppState {
  return { ...settle(state), status: { _tag: "BatchFailed" } };
}
