// Yahoo Finance — implementation of MarketData over the v8 chart endpoint.

import { HttpClient, HttpClientRequest } from "@effect/platform";
import { Config, Effect, Layer, Schema } from "effect";
import type { PricePoint } from "../domain.ts";
import {
  HttpError,
  MarketData,
  type MarketDataError,
  NetworkError,
  ParseError,
  type QuoteInfo,
  SymbolNotFound,
} from "../market-data.ts";

// --- Yahoo response schema ---

const NullableNumbers = Schema.Array(Schema.NullOr(Schema.Number));

const YahooMeta = Schema.Struct({
  symbol: Schema.String,
  regularMarketPrice: Schema.optional(Schema.Number),
});

const YahooResult = Schema.Struct({
  meta: YahooMeta,
  timestamp: Schema.optional(Schema.Array(Schema.Number)),
  indicators: Schema.Struct({
    quote: Schema.Array(
      Schema.Struct({
        open: Schema.optional(NullableNumbers),
        close: Schema.optional(NullableNumbers),
      }),
    ),
  }),
});

const YahooChartResponse = Schema.Struct({
  chart: Schema.Struct({
    result: Schema.NullOr(Schema.Array(YahooResult)),
    error: Schema.NullOr(
      Schema.Struct({
        description: Schema.optional(Schema.String),
      }),
    ),
  }),
});

type YahooResultType = typeof YahooResult.Type;

// --- Decode Yahoo response ---

function decodeChart(
  json: unknown,
  symbol: string,
): Effect.Effect<YahooResultType, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResponse)(json).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap(({ chart }): Effect.Effect<YahooResultType, SymbolNotFound> => {
      if (chart.error !== null) {
        return Effect.fail(new SymbolNotFound({ symbol }));
      }
      const first = chart.result?.[0];
      return first === undefined
        ? Effect.fail(new SymbolNotFound({ symbol }))
        : Effect.succeed(first);
    }),
  );
}

/** Pair each timestamp (epoch seconds) with its close, skipping gaps. */
export function decodeYahooHistory(
  json: unknown,
  symbol: string,
): Effect.Effect<ReadonlyArray<PricePoint>, ParseError | SymbolNotFound> {
  return decodeChart(json, symbol).pipe(
    Effect.map((result) => {
      const timestamps = result.timestamp ?? [];
      const closes = result.indicators.quote[0]?.close ?? [];
      const points: PricePoint[] = [];
      timestamps.forEach((seconds, i) => {
        const close = closes[i];
        if (close !== null && close !== undefined) {
          points.push({ time: seconds * 1000, close });
        }
      });
      return points;
    }),
  );
}

/** Live price from the chart meta; open from the first daily bar. */
export function decodeYahooInfo(
  json: unknown,
  symbol: string,
): Effect.Effect<QuoteInfo, ParseError | SymbolNotFound> {
  return decodeChart(json, symbol).pipe(
    Effect.map((result) => {
      const opens = result.indicators.quote[0]?.open ?? [];
      const open = opens.find((value): value is number => value !== null);
      return { price: result.meta.regularMarketPrice, open };
    }),
  );
}

// --- Yahoo Finance service ---

export const makeYahooFinanceApi = Effect.gen(function* () {
  const client = (yield* HttpClient.HttpClient).pipe(
    HttpClient.filterStatusOk,
    HttpClient.mapRequest(
      HttpClientRequest.setHeader("User-Agent", "Mozilla/5.0"),
    ),
  );
  const baseUrl = yield* Config.string("YAHOO_BASE_URL").pipe(
    Config.withDefault("https://query1.finance.yahoo.com/v8/finance/chart"),
  );

  const getChart = (
    symbol: string,
    params: Record<string, string>,
  ): Effect.Effect<unknown, MarketDataError> =>
    Effect.gen(function* () {
      const query = new URLSearchParams(params).toString();
      const response = yield* client.get(
        `${baseUrl}/${encodeURIComponent(symbol)}?${query}`,
      );
      return yield* response.json;
    }).pipe(
      Effect.catchTags({
        RequestError: (e) =>
          Effect.fail(new NetworkError({ message: e.message })),
        ResponseError: (e) =>
          e.reason === "StatusCode"
            ? e.response.status === 404
              ? Effect.fail(new SymbolNotFound({ symbol }))
              : Effect.fail(new HttpError({ status: e.response.status }))
            : Effect.fail(
                new ParseError({
                  message: `JSON parse failed: ${e.message}`,
                }),
              ),
      }),
    );

  return MarketData.of({
    getInfo: (symbol) =>
      getChart(symbol, { range: "1d", interval: "1d" }).pipe(
        Effect.flatMap((json) => decodeYahooInfo(json, symbol)),
      ),
    getHistory: (symbol, { period, interval }) =>
      getChart(symbol, { range: period, interval }).pipe(
        Effect.flatMap((json) => decodeYahooHistory(json, symbol)),
      ),
  });
});

export const YahooFinanceLive = Layer.effect(MarketData, makeYahooFinanceApi);
