// Fetch batch — one provider round per symbol, symbols in sequence.
//
// Every failure is converted into an Errored snapshot for that symbol, so
// a batch never fails: one bad ticker cannot stop the rest.

import { Clock, Effect, Schedule } from "effect";
import { Errored, Loaded, type QuoteSnapshot } from "./domain.ts";
import {
  MarketData,
  type MarketDataError,
  NetworkError,
  type QuoteInfo,
} from "./market-data.ts";
import { deriveMetrics, type NoPriceData } from "./metrics.ts";
import {
  SHORT_HISTORY_QUERY,
  TIME_RANGES,
  type TimeRangeLabel,
} from "./settings.ts";

export type FetchError = MarketDataError | NoPriceData;

/** Per-symbol budget, retries included. */
const SYMBOL_TIMEOUT = "10 seconds";

const noInfo: QuoteInfo = { price: undefined, open: undefined };

export function describeFetchError(error: FetchError): string {
  switch (error._tag) {
    case "NetworkError":
      return `Network error: ${error.message}`;
    case "HttpError":
      return `HTTP ${error.status}`;
    case "ParseError":
      return error.message;
    case "SymbolNotFound":
      return `Symbol not found: ${error.symbol}`;
    case "NoPriceData":
      return error.message;
  }
}

const retryNetwork = <A>(
  effect: Effect.Effect<A, MarketDataError>,
): Effect.Effect<A, MarketDataError> =>
  effect.pipe(
    Effect.retry({
      while: (e) => e._tag === "NetworkError",
      schedule: Schedule.exponential("1 second").pipe(
        Schedule.compose(Schedule.recurs(2)),
      ),
    }),
  );

/** One symbol, failing with the typed cause. */
export function fetchQuote(
  symbol: string,
  range: TimeRangeLabel,
): Effect.Effect<Loaded, FetchError, MarketData> {
  return Effect.gen(function* () {
    const api = yield* MarketData;
    yield* Effect.logDebug(`[fetch] starting ${symbol}`);

    // Live price/open are optional: the history fallback covers them.
    const info = yield* api.getInfo(symbol).pipe(
      Effect.catchAll((e) =>
        Effect.logDebug(`[fetch] ${symbol}: no live info (${e._tag})`).pipe(
          Effect.as(noInfo),
        ),
      ),
    );
    const history = yield* retryNetwork(
      api.getHistory(symbol, TIME_RANGES[range]),
    );
    const shortHistory = yield* retryNetwork(
      api.getHistory(symbol, SHORT_HISTORY_QUERY),
    );
    const figures = yield* deriveMetrics({
      symbol,
      price: info.price,
      open: info.open,
      history,
      shortHistory,
    });
    const fetchedAt = yield* Clock.currentTimeMillis;

    yield* Effect.logDebug(`[fetch] completed ${symbol}`);
    return Loaded({
      symbol,
      ...figures,
      history,
      shortHistory,
      rangeLabel: range,
      fetchedAt,
    });
  }).pipe(
    Effect.timeoutFail({
      duration: SYMBOL_TIMEOUT,
      onTimeout: () =>
        new NetworkError({ message: `${symbol}: request timed out` }),
    }),
  );
}

/** One symbol inside a batch: any failure becomes an Errored snapshot. */
export function fetchSnapshot(
  symbol: string,
  range: TimeRangeLabel,
): Effect.Effect<QuoteSnapshot, never, MarketData> {
  return fetchQuote(symbol, range).pipe(
    Effect.catchAll((e) =>
      Effect.gen(function* () {
        const message = describeFetchError(e);
        // Debug only: the Errored row already shows it on screen.
        yield* Effect.logDebug(`[fetch] ${symbol} failed: ${message}`);
        return Errored(symbol, message, yield* Clock.currentTimeMillis);
      }),
    ),
  );
}

export function runFetchBatch(
  symbols: ReadonlyArray<string>,
  range: TimeRangeLabel,
): Effect.Effect<ReadonlyArray<QuoteSnapshot>, never, MarketData> {
  return Effect.forEach(symbols, (symbol) => fetchSnapshot(symbol, range));
}
