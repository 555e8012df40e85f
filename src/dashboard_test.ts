import { Effect, Layer, SubscriptionRef, TestContext } from "effect";
import { expect, test } from "vitest";
import { DetailView, MainView } from "./app-state.ts";
import {
  chartWidth,
  detailLines,
  execute,
  initialUi,
  parseCommand,
} from "./dashboard.ts";
import { Errored, Loaded } from "./domain.ts";
import { BOLD, DIM, GREEN, RED, RESET } from "./format.ts";
import { MarketData } from "./market-data.ts";
import { make, RefreshCoordinator } from "./refresh-coordinator.ts";
import { defaultSettings } from "./settings.ts";
import { SettingsStore, SymbolStore } from "./storage.ts";

// --- parseCommand ---

test("parseCommand: blank lines and unknown words", () => {
  expect(parseCommand("   ")).toEqual({ _tag: "Empty" });
  expect(parseCommand("bogus 1")).toEqual({
    _tag: "Invalid",
    message: 'Unknown command "bogus". Type "help" for a list.',
  });
});

test("parseCommand: add keeps the raw input for normalization", () => {
  expect(parseCommand("  add cba ")).toEqual({ _tag: "Add", input: "cba" });
});

test("parseCommand: remove normalizes its symbol or defers to the view", () => {
  expect(parseCommand("rm bhp")).toEqual({ _tag: "Remove", symbol: "BHP.AX" });
  expect(parseCommand("remove")).toEqual({ _tag: "Remove", symbol: undefined });
});

test("parseCommand: ranges and timezones match case-insensitively", () => {
  expect(parseCommand("range 6 hrs")).toEqual({ _tag: "Range", range: "6 Hrs" });
  expect(parseCommand("range 10   MINS")).toEqual({ _tag: "Range", range: "10 Mins" });
  expect(parseCommand("range 1 year")._tag).toBe("Invalid");
  expect(parseCommand("tz perth")).toEqual({ _tag: "Timezone", timezone: "Australia/Perth" });
  expect(parseCommand("tz australia/brisbane")).toEqual({
    _tag: "Timezone",
    timezone: "Australia/Brisbane",
  });
});

test("parseCommand: sort, toggle and view", () => {
  expect(parseCommand("sort dailychangepct")).toEqual({
    _tag: "Sort",
    column: "dailyChangePct",
  });
  expect(parseCommand("toggle wes")).toEqual({ _tag: "Toggle", symbol: "WES.AX" });
  expect(parseCommand("toggle")).toEqual({
    _tag: "Invalid",
    message: "Usage: toggle <symbol>",
  });
  expect(parseCommand("view main")).toEqual({ _tag: "View", view: MainView });
  expect(parseCommand("view cba")).toEqual({ _tag: "View", view: DetailView("CBA.AX") });
});

test("parseCommand: hover takes a column or off", () => {
  expect(parseCommand("hover 12")).toEqual({ _tag: "Hover", column: 12 });
  expect(parseCommand("hover off")).toEqual({ _tag: "Hover", column: undefined });
  expect(parseCommand("hover -1")).toEqual({
    _tag: "Invalid",
    message: "Usage: hover <column|off>",
  });
});

test("parseCommand: aliases", () => {
  expect(parseCommand("r")).toEqual({ _tag: "Refresh" });
  expect(parseCommand("?")).toEqual({ _tag: "Help" });
  expect(parseCommand("Q")).toEqual({ _tag: "Quit" });
  expect(parseCommand("exit")).toEqual({ _tag: "Quit" });
});

// --- Detail panel ---

test("detailLines: loaded quote in the trend colour", () => {
  const snapshot = Loaded({
    symbol: "AAA.AX",
    price: 10.5,
    open: 10,
    history: [],
    shortHistory: [],
    metrics: {
      dailyChangeAbs: 0.5,
      dailyChangePct: 5,
      hourlyChangeAbs: 0,
      hourlyChangePct: 0,
    },
    rangeLabel: "30 Days",
    fetchedAt: 0,
  });
  expect(detailLines(snapshot)).toEqual([
    `${BOLD}${GREEN}Current Price: $10.50${RESET}`,
    `${GREEN}Daily Change %: +5.00% ↑${RESET}`,
    `${GREEN}Daily Change $: $+0.50 ↑${RESET}`,
    `${GREEN}Hourly Change %: +0.00% ↑${RESET}`,
    `${GREEN}Hourly Change $: $+0.00 ↑${RESET}`,
    `${DIM}Open Price: $10.00${RESET}`,
  ]);
});

test("detailLines: errored and pending quotes show N/A", () => {
  const errored = detailLines(Errored("AAA.AX", "HTTP 500", 0));
  expect(errored[0]).toBe(`${BOLD}${RED}Current Price: N/A${RESET}`);
  expect(errored[1]).toBe(`${RED}Daily Change %: DATA ERROR${RESET}`);

  const pending = detailLines(undefined);
  expect(pending[0]).toBe(`${BOLD}Current Price: N/A${RESET}`);
  expect(pending[1]).toBe(`Daily Change %: N/A${RESET}`);
  expect(pending[5]).toBe(`${DIM}Open Price: N/A${RESET}`);
});

test("chartWidth: leaves room for the gutter with a floor", () => {
  expect(chartWidth(80)).toBe(66);
  expect(chartWidth(10)).toBe(20);
});

// --- execute ---

const quiet = Layer.mergeAll(
  Layer.succeed(
    MarketData,
    MarketData.of({
      getInfo: () => Effect.succeed({ price: 10.5, open: 10 }),
      getHistory: () => Effect.succeed([]),
    }),
  ),
  Layer.succeed(
    SymbolStore,
    SymbolStore.of({ load: Effect.succeed(["AAA.AX"]), save: () => Effect.void }),
  ),
  Layer.succeed(
    SettingsStore,
    SettingsStore.of({ load: Effect.succeed(defaultSettings), save: () => Effect.void }),
  ),
);

function withCoordinator<A>(
  body: Effect.Effect<A, never, RefreshCoordinator>,
): Promise<A> {
  return Effect.runPromise(
    Effect.gen(function* () {
      const coordinator = yield* make({ refreshInterval: "30 seconds" });
      return yield* body.pipe(Effect.provideService(RefreshCoordinator, coordinator));
    }).pipe(Effect.provide(quiet), Effect.scoped, Effect.provide(TestContext.TestContext)),
  );
}

test("execute: quit ends the loop and everything else continues", async () => {
  const result = await withCoordinator(
    Effect.gen(function* () {
      const ui = yield* SubscriptionRef.make(initialUi);
      return {
        quit: yield* execute({ _tag: "Quit" }, ui),
        empty: yield* execute({ _tag: "Empty" }, ui),
      };
    }),
  );
  expect(result).toEqual({ quit: false, empty: true });
});

test("execute: invalid input is reported on the status line", async () => {
  const status = await withCoordinator(
    Effect.gen(function* () {
      const ui = yield* SubscriptionRef.make(initialUi);
      yield* execute(parseCommand("toggle"), ui);
      const coordinator = yield* RefreshCoordinator;
      return (yield* coordinator.current).status;
    }),
  );
  expect(status).toEqual({ _tag: "Notice", level: "error", text: "Usage: toggle <symbol>" });
});

test("execute: help and hover update the screen state", async () => {
  const ui = await withCoordinator(
    Effect.gen(function* () {
      const ref = yield* SubscriptionRef.make(initialUi);
      yield* execute({ _tag: "Hover", column: 7 }, ref);
      yield* execute({ _tag: "Help" }, ref);
      return yield* SubscriptionRef.get(ref);
    }),
  );
  expect(ui).toEqual({
    hover: { chartId: "main", cursorColumn: 7, tolerance: 2 },
    showHelp: true,
  });
});

test("execute: remove without a symbol uses the open detail view", async () => {
  const symbols = await withCoordinator(
    Effect.gen(function* () {
      const ui = yield* SubscriptionRef.make(initialUi);
      const coordinator = yield* RefreshCoordinator;
      yield* coordinator.selectView(DetailView("AAA.AX"));
      yield* execute({ _tag: "Remove", symbol: undefined }, ui);
      return (yield* coordinator.current).symbols;
    }),
  );
  expect(symbols).toEqual([]);
});
