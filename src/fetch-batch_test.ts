// Fetch batches against in-process MarketData fakes.

import {
  Effect,
  Either,
  Fiber,
  Layer,
  Logger,
  LogLevel,
  Ref,
  TestClock,
  TestContext,
} from "effect";
import { expect, test } from "vitest";
import { beginFetch, initialAppState, mergeBatch } from "./app-state.ts";
import type { PricePoint } from "./domain.ts";
import {
  describeFetchError,
  fetchQuote,
  fetchSnapshot,
  runFetchBatch,
} from "./fetch-batch.ts";
import {
  HttpError,
  MarketData,
  NetworkError,
  ParseError,
  SymbolNotFound,
} from "./market-data.ts";
import { defaultSettings, type HistoryQuery } from "./settings.ts";
import { buildRows } from "./table.ts";

// --- Helpers ---

function points(closes: ReadonlyArray<number>): PricePoint[] {
  return closes.map((close, i) => ({ time: i * 60_000, close }));
}

const AAA_HISTORY = points([9, 9.5, 10.2]);
const AAA_SHORT = points(Array.from({ length: 60 }, () => 10));

const isShort = (query: HistoryQuery) => query.interval === "1m";

/** AAA.AX quotes normally; every other symbol is unknown. */
const scenario = Layer.succeed(
  MarketData,
  MarketData.of({
    getInfo: (symbol) =>
      symbol === "AAA.AX"
        ? Effect.succeed({ price: 10.5, open: 10 })
        : Effect.fail(new SymbolNotFound({ symbol })),
    getHistory: (symbol, query) =>
      symbol === "AAA.AX"
        ? Effect.succeed(isShort(query) ? AAA_SHORT : AAA_HISTORY)
        : Effect.fail(new SymbolNotFound({ symbol })),
  }),
);

function run<A, E>(
  effect: Effect.Effect<A, E, MarketData>,
  market: Layer.Layer<MarketData> = scenario,
): Promise<A> {
  return Effect.runPromise(
    effect.pipe(Effect.provide(market), Effect.provide(TestContext.TestContext)),
  );
}

// --- Tests ---

test("runFetchBatch: one failing symbol does not stop the rest", async () => {
  const snapshots = await run(runFetchBatch(["AAA.AX", "BBB.AX"], "30 Days"));

  expect(snapshots).toHaveLength(2);
  const [aaa, bbb] = snapshots;
  if (aaa?._tag !== "Loaded") throw new Error("AAA.AX should have loaded");
  expect(aaa.price).toBe(10.5);
  expect(aaa.open).toBe(10);
  expect(aaa.metrics).toEqual({
    dailyChangeAbs: 0.5,
    dailyChangePct: 5,
    hourlyChangeAbs: 0.5,
    hourlyChangePct: 5,
  });
  expect(aaa.history).toEqual(AAA_HISTORY);
  expect(aaa.rangeLabel).toBe("30 Days");
  expect(bbb).toEqual({
    _tag: "Errored",
    symbol: "BBB.AX",
    message: "Symbol not found: BBB.AX",
    fetchedAt: 0,
  });
});

test("runFetchBatch: merged result shows N/A for the errored symbol", async () => {
  const snapshots = await run(runFetchBatch(["AAA.AX", "BBB.AX"], "30 Days"));
  const [generation, fetching] = beginFetch(
    initialAppState(["AAA.AX", "BBB.AX"], defaultSettings, 30),
  );
  const { state } = mergeBatch(fetching, generation, snapshots, 0);
  const rows = buildRows(state);

  expect(rows.map((r) => r.tone)).toEqual(["gain", "error"]);
  expect(rows[0]?.cells).toEqual([
    "✔",
    "AAA.AX",
    "$10.50",
    "$10.00",
    "+5.00% ↑",
    "$+0.50 ↑",
    "+5.00% ↑",
    "$+0.50 ↑",
  ]);
  expect(rows[1]?.cells).toEqual(["✔", "BBB.AX", "N/A", "N/A", "N/A", "N/A", "N/A", "N/A"]);
});

test("fetchQuote: queries the selected range and the 1-minute series", async () => {
  const queries: HistoryQuery[] = [];
  const recording = Layer.succeed(
    MarketData,
    MarketData.of({
      getInfo: () => Effect.succeed({ price: 10.5, open: 10 }),
      getHistory: (_, query) =>
        Effect.sync(() => {
          queries.push(query);
          return AAA_HISTORY;
        }),
    }),
  );
  await run(fetchQuote("AAA.AX", "6 Hrs"), recording);
  expect(queries).toEqual([
    { period: "1d", interval: "5m" },
    { period: "1d", interval: "1m" },
  ]);
});

test("fetchQuote: unavailable live info falls back to the history", async () => {
  const noInfo = Layer.succeed(
    MarketData,
    MarketData.of({
      getInfo: () => Effect.fail(new HttpError({ status: 503 })),
      getHistory: (_, query) => Effect.succeed(isShort(query) ? [] : AAA_HISTORY),
    }),
  );
  const quote = await run(fetchQuote("AAA.AX", "30 Days"), noInfo);
  expect(quote.price).toBe(10.2);
  expect(quote.open).toBe(9);
  expect(quote.metrics.hourlyChangeAbs).toBe(0);
});

test("fetchQuote: no live info and no history fails with NoPriceData", async () => {
  const empty = Layer.succeed(
    MarketData,
    MarketData.of({
      getInfo: () => Effect.succeed({ price: undefined, open: undefined }),
      getHistory: () => Effect.succeed([]),
    }),
  );
  const result = await run(Effect.either(fetchQuote("EMP.AX", "30 Days")), empty);
  if (Either.isRight(result)) throw new Error("Expected failure");
  expect(result.left._tag).toBe("NoPriceData");
  expect(result.left.message).toBe("No usable price data found for EMP.AX.");
});

test("fetchQuote: unknown symbols fail with the typed error", async () => {
  const result = await run(Effect.either(fetchQuote("BBB.AX", "30 Days")));
  if (Either.isRight(result)) throw new Error("Expected failure");
  expect(result.left._tag).toBe("SymbolNotFound");
  if (result.left._tag === "SymbolNotFound") expect(result.left.symbol).toBe("BBB.AX");
});

test("fetchQuote: network errors are retried with backoff", async () => {
  const result = await Effect.runPromise(
    Effect.gen(function* () {
      const calls = yield* Ref.make(0);
      const flaky = Layer.succeed(
        MarketData,
        MarketData.of({
          getInfo: () => Effect.succeed({ price: 10.5, open: 10 }),
          getHistory: (_, query) =>
            isShort(query)
              ? Effect.succeed(AAA_SHORT)
              : Ref.updateAndGet(calls, (n) => n + 1).pipe(
                  Effect.flatMap((n) =>
                    n < 3
                      ? Effect.fail(new NetworkError({ message: "connection reset" }))
                      : Effect.succeed(AAA_HISTORY),
                  ),
                ),
        }),
      );
      const fiber = yield* Effect.fork(
        fetchQuote("AAA.AX", "30 Days").pipe(Effect.provide(flaky)),
      );
      // Backoff waits 1s then 2s.
      yield* TestClock.adjust("3 seconds");
      const quote = yield* Fiber.join(fiber);
      return { quote, calls: yield* Ref.get(calls) };
    }).pipe(Effect.provide(TestContext.TestContext)),
  );
  expect(result.calls).toBe(3);
  expect(result.quote.history).toEqual(AAA_HISTORY);
});

test("fetchSnapshot: a failed symbol logs below the default Warning level", async () => {
  const levels: string[] = [];
  const capture = Logger.make(({ logLevel }) => {
    levels.push(logLevel.label);
  });
  const logged = (minimum: LogLevel.LogLevel) =>
    run(
      fetchSnapshot("BBB.AX", "30 Days").pipe(
        Effect.provide(Logger.replace(Logger.defaultLogger, capture)),
        Logger.withMinimumLogLevel(minimum),
      ),
    );

  const snapshot = await logged(LogLevel.Warning);
  expect(snapshot._tag).toBe("Errored");
  expect(levels).toEqual([]);

  await logged(LogLevel.Debug);
  expect(levels).toEqual(["DEBUG", "DEBUG", "DEBUG"]);
});

test("describeFetchError: one message per provider error", () => {
  expect(describeFetchError(new NetworkError({ message: "connection reset" }))).toBe(
    "Network error: connection reset",
  );
  expect(describeFetchError(new HttpError({ status: 503 }))).toBe("HTTP 503");
  expect(describeFetchError(new ParseError({ message: "Invalid response" }))).toBe(
    "Invalid response",
  );
  expect(describeFetchError(new SymbolNotFound({ symbol: "ZZZ.AX" }))).toBe(
    "Symbol not found: ZZZ.AX",
  );
});
