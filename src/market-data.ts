// Market data API — service definition and domain errors.

import { Context, Data, Effect } from "effect";
import type { PricePoint } from "./domain.ts";
import type { HistoryQuery } from "./settings.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export type MarketDataError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound;

// --- Service ---

/** Live scalar fields. Either may be missing from a provider response. */
export interface QuoteInfo {
  readonly price: number | undefined;
  readonly open: number | undefined;
}

export class MarketData extends Context.Tag("MarketData")<
  MarketData,
  {
    readonly getInfo: (
      symbol: string,
    ) => Effect.Effect<QuoteInfo, MarketDataError>;

    /** Close prices in time order. Samples with no close are dropped. */
    readonly getHistory: (
      symbol: string,
      query: HistoryQuery,
    ) => Effect.Effect<ReadonlyArray<PricePoint>, MarketDataError>;
  }
>() {}
