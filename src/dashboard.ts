// Terminal dashboard — command parsing, screen rendering and the
// interactive loop over the refresh coordinator.

import { Terminal } from "@effect/platform";
import { Clock, Effect, Either, Stream, SubscriptionRef } from "effect";
import {
  type AppState,
  DetailView,
  MainView,
  type View,
} from "./app-state.ts";
import {
  COMBINED_CHART_ID,
  combinedChart,
  detailChart,
  fitViewport,
  GUTTER,
  renderChart,
} from "./chart.ts";
import { type QuoteSnapshot, trendOf } from "./domain.ts";
import {
  BOLD,
  DIM,
  formatChange,
  formatMoney,
  formatStatus,
  GREEN,
  NOT_AVAILABLE,
  RED,
  RESET,
} from "./format.ts";
import {
  hitTest,
  type HoverState,
  hoverFor,
  markerFor,
  moveCursor,
  tooltipLines,
} from "./hover.ts";
import { RefreshCoordinator } from "./refresh-coordinator.ts";
import {
  TIME_RANGE_LABELS,
  type TimeRangeLabel,
  type Timezone,
  TIMEZONES,
  timezoneCity,
} from "./settings.ts";
import { SORT_COLUMNS, type SortColumn } from "./sort.ts";
import { buildRows, renderTable } from "./table.ts";
import { normalizeSymbol } from "./symbols.ts";

// --- Commands ---

export type Command =
  | { readonly _tag: "Add"; readonly input: string }
  | { readonly _tag: "Remove"; readonly symbol: string | undefined }
  | { readonly _tag: "Refresh" }
  | { readonly _tag: "Range"; readonly range: TimeRangeLabel }
  | { readonly _tag: "Timezone"; readonly timezone: Timezone }
  | { readonly _tag: "Sort"; readonly column: SortColumn }
  | { readonly _tag: "Toggle"; readonly symbol: string }
  | { readonly _tag: "View"; readonly view: View }
  | { readonly _tag: "Hover"; readonly column: number | undefined }
  | { readonly _tag: "Help" }
  | { readonly _tag: "Quit" }
  | { readonly _tag: "Empty" }
  | { readonly _tag: "Invalid"; readonly message: string };

const invalid = (message: string): Command => ({ _tag: "Invalid", message });

/** Tickers typed at the prompt get the same normalization as `add`. */
function symbolArg(arg: string): string {
  return Either.getOrElse(normalizeSymbol(arg), () => arg.trim().toUpperCase());
}

function matchRange(arg: string): TimeRangeLabel | undefined {
  const wanted = arg.toLowerCase().replace(/\s+/g, " ");
  return TIME_RANGE_LABELS.find((label) => label.toLowerCase() === wanted);
}

function matchTimezone(arg: string): Timezone | undefined {
  const wanted = arg.toLowerCase();
  return TIMEZONES.find(
    (zone) =>
      zone.toLowerCase() === wanted || timezoneCity(zone).toLowerCase() === wanted,
  );
}

export function parseCommand(line: string): Command {
  const [word = "", ...rest] = line.trim().split(/\s+/);
  const arg = rest.join(" ");
  switch (word.toLowerCase()) {
    case "":
      return { _tag: "Empty" };
    case "add":
      return { _tag: "Add", input: arg };
    case "remove":
    case "rm":
      return { _tag: "Remove", symbol: arg === "" ? undefined : symbolArg(arg) };
    case "refresh":
    case "r":
      return { _tag: "Refresh" };
    case "range": {
      const range = matchRange(arg);
      return range !== undefined
        ? { _tag: "Range", range }
        : invalid(`Unknown range "${arg}". Choose one of: ${TIME_RANGE_LABELS.join(", ")}.`);
    }
    case "tz": {
      const timezone = matchTimezone(arg);
      return timezone !== undefined
        ? { _tag: "Timezone", timezone }
        : invalid(`Unknown timezone "${arg}". Choose one of: ${TIMEZONES.join(", ")}.`);
    }
    case "sort": {
      const column = SORT_COLUMNS.find((c) => c.toLowerCase() === arg.toLowerCase());
      return column !== undefined
        ? { _tag: "Sort", column }
        : invalid(`Unknown column "${arg}". Choose one of: ${SORT_COLUMNS.join(", ")}.`);
    }
    case "toggle":
      return arg === ""
        ? invalid("Usage: toggle <symbol>")
        : { _tag: "Toggle", symbol: symbolArg(arg) };
    case "view":
      if (arg === "") return invalid("Usage: view <symbol|main>");
      return {
        _tag: "View",
        view: arg.toLowerCase() === "main" ? MainView : DetailView(symbolArg(arg)),
      };
    case "hover": {
      if (arg.toLowerCase() === "off") return { _tag: "Hover", column: undefined };
      const column = Number(arg);
      return arg !== "" && Number.isInteger(column) && column >= 0
        ? { _tag: "Hover", column }
        : invalid("Usage: hover <column|off>");
    }
    case "help":
    case "?":
      return { _tag: "Help" };
    case "quit":
    case "exit":
    case "q":
      return { _tag: "Quit" };
    default:
      return invalid(`Unknown command "${word}". Type "help" for a list.`);
  }
}

export const HELP_LINES = [
  "add <symbol>          track a ticker (BHP becomes BHP.AX)",
  "remove [symbol]       stop tracking; defaults to the open detail view",
  "refresh               fetch now",
  `range <label>         ${TIME_RANGE_LABELS.join(" | ")}`,
  "tz <zone|city>        Sydney | Brisbane | Perth",
  "sort <column>         repeat to reverse the order",
  "toggle <symbol>       show or hide a line on the combined chart",
  "view <symbol|main>    open a detail view or return to the table",
  "hover <column|off>    move the chart cursor",
  "quit",
];

// --- Screen ---

export interface UiState {
  readonly hover: HoverState | undefined;
  readonly showHelp: boolean;
}

export const initialUi: UiState = { hover: undefined, showHelp: false };

export const CHART_HEIGHT = 12;

export function chartWidth(columns: number): number {
  return Math.max(20, columns - GUTTER - 2);
}

export function detailLines(snapshot: QuoteSnapshot | undefined): string[] {
  if (snapshot === undefined || snapshot._tag === "Errored") {
    const color = snapshot === undefined ? "" : RED;
    return [
      `${BOLD}${color}Current Price: ${NOT_AVAILABLE}${RESET}`,
      `${color}Daily Change %: ${snapshot === undefined ? NOT_AVAILABLE : "DATA ERROR"}${RESET}`,
      `${DIM}Daily Change $: ${NOT_AVAILABLE}${RESET}`,
      `${DIM}Hourly Change %: ${NOT_AVAILABLE}${RESET}`,
      `${DIM}Hourly Change $: ${NOT_AVAILABLE}${RESET}`,
      `${DIM}Open Price: ${NOT_AVAILABLE}${RESET}`,
    ];
  }
  const m = snapshot.metrics;
  const color = trendOf(m.dailyChangeAbs) === "gain" ? GREEN : RED;
  const [dailyPct, dailyAbs] = formatChange(m.dailyChangePct, m.dailyChangeAbs);
  const [hourlyPct, hourlyAbs] = formatChange(m.hourlyChangePct, m.hourlyChangeAbs);
  return [
    `${BOLD}${color}Current Price: ${formatMoney(snapshot.price)}${RESET}`,
    `${color}Daily Change %: ${dailyPct}${RESET}`,
    `${color}Daily Change $: ${dailyAbs}${RESET}`,
    `${color}Hourly Change %: ${hourlyPct}${RESET}`,
    `${color}Hourly Change $: ${hourlyAbs}${RESET}`,
    `${DIM}Open Price: ${formatMoney(snapshot.open)}${RESET}`,
  ];
}

export function renderScreen(
  state: AppState,
  ui: UiState,
  now: number,
  columns: number,
): string[] {
  const { timeRange, timezone } = state.settings;
  const lines = [
    `${BOLD}Share Monitor${RESET}  ${DIM}${timeRange} | ${timezoneCity(timezone)}${RESET}`,
    "",
  ];

  const view = state.view;
  if (view._tag === "Main") {
    lines.push(...renderTable(buildRows(state), state.sort), "");
  } else {
    lines.push(`${BOLD}${view.symbol}${RESET}`, ...detailLines(state.snapshots.get(view.symbol)), "");
  }

  const model =
    view._tag === "Main"
      ? combinedChart(state)
      : detailChart(state.snapshots.get(view.symbol), view.symbol, timezone);
  const width = chartWidth(columns);
  const hover = hoverFor(ui.hover, model.id);
  if (model._tag === "Plot") {
    const vp = fitViewport(model.series, width, CHART_HEIGHT);
    const hit = hitTest(hover, model.series, vp);
    const marker = hit === undefined ? undefined : markerFor(hit, vp);
    lines.push(...renderChart(model, width, CHART_HEIGHT, marker));
    if (hit !== undefined) lines.push("", ...tooltipLines(hit, state, now));
  } else {
    lines.push(...renderChart(model, width, CHART_HEIGHT));
  }

  if (ui.showHelp) lines.push("", ...HELP_LINES);
  lines.push("", formatStatus(state.status, timezone));
  return lines;
}

// --- Loop ---

export const CLEAR = "\x1b[2J\x1b[H";
export const PROMPT = "> ";

/** Apply one command. Resolves to false when the user asked to quit. */
export const execute = (
  command: Command,
  ui: SubscriptionRef.SubscriptionRef<UiState>,
): Effect.Effect<boolean, never, RefreshCoordinator> =>
  Effect.gen(function* () {
    const coordinator = yield* RefreshCoordinator;
    const state = yield* coordinator.current;
    yield* SubscriptionRef.update(ui, (u) => ({ ...u, showHelp: false }));

    switch (command._tag) {
      case "Quit":
        return false;
      case "Empty":
        return true;
      case "Add":
        yield* coordinator.addSymbol(command.input);
        return true;
      case "Remove": {
        const symbol =
          command.symbol ?? (state.view._tag === "Detail" ? state.view.symbol : "");
        yield* coordinator.removeSymbol(symbol);
        return true;
      }
      case "Refresh":
        if (!state.refreshEnabled) {
          yield* coordinator.notify("warning", "Refresh already in progress.");
        } else {
          yield* coordinator.fetchNow("manual");
        }
        return true;
      case "Range":
        yield* coordinator.applySettings({ ...state.settings, timeRange: command.range });
        return true;
      case "Timezone":
        yield* coordinator.applySettings({ ...state.settings, timezone: command.timezone });
        return true;
      case "Sort":
        yield* coordinator.sortBy(command.column);
        return true;
      case "Toggle":
        yield* coordinator.toggleVisibility(command.symbol);
        return true;
      case "View":
        yield* coordinator.selectView(command.view);
        return true;
      case "Hover":
        yield* SubscriptionRef.update(ui, (u) => {
          const chartId =
            state.view._tag === "Main" ? COMBINED_CHART_ID : state.view.symbol;
          return { ...u, hover: moveCursor(hoverFor(u.hover, chartId), command.column) };
        });
        return true;
      case "Help":
        yield* SubscriptionRef.update(ui, (u) => ({ ...u, showHelp: true }));
        return true;
      case "Invalid":
        yield* coordinator.notify("error", command.message);
        return true;
    }
  });

/** Redraw on every state change and read commands until `quit` or EOF. */
export const runDashboard: Effect.Effect<
  void,
  never,
  RefreshCoordinator | Terminal.Terminal
> = Effect.scoped(
  Effect.gen(function* () {
    const terminal = yield* Terminal.Terminal;
    const coordinator = yield* RefreshCoordinator;
    const ui = yield* SubscriptionRef.make(initialUi);

    const redraw = Effect.gen(function* () {
      const screen = renderScreen(
        yield* coordinator.current,
        yield* SubscriptionRef.get(ui),
        yield* Clock.currentTimeMillis,
        yield* terminal.columns,
      );
      yield* terminal.display(`${CLEAR}${screen.join("\n")}\n${PROMPT}`);
    }).pipe(
      Effect.catchAll((e) => Effect.logWarning(`[dashboard] redraw failed: ${e.message}`)),
    );

    yield* Stream.merge(coordinator.changes, ui.changes).pipe(
      Stream.debounce("30 millis"),
      Stream.runForEach(() => redraw),
      Effect.forkScoped,
    );

    yield* terminal.readLine.pipe(
      Effect.flatMap((line) => execute(parseCommand(line), ui)),
      Effect.catchTag("QuitException", () => Effect.succeed(false)),
      Effect.repeat({ while: (keepGoing) => keepGoing }),
    );
  }),
);
