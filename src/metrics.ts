// Metric calculator — pure functions, data in, data out.
//
// Daily change compares the live price with the session open. Hourly
// change compares it with the close 60 samples back in the short
// (1 day / 1 minute) series. The 60-sample lookback only measures an hour
// when that series really is sampled every minute; fetch-batch.ts always
// requests it with interval "1m".

import { Data, Either } from "effect";
import type { DerivedMetrics, PricePoint } from "./domain.ts";

export const HOURLY_LOOKBACK = 60;

export class NoPriceData extends Data.TaggedError("NoPriceData")<{
  readonly symbol: string;
  readonly message: string;
}> {}

export interface Change {
  readonly abs: number;
  readonly pct: number;
}

const noChange: Change = { abs: 0, pct: 0 };

export function dailyChange(price: number, open: number): Change {
  const abs = price - open;
  return { abs, pct: (abs / open) * 100 };
}

/** Zero unless there are at least 60 short samples and a positive price.
 *  A zero reference close still yields the absolute change; its percent
 *  is 0. */
export function hourlyChange(
  price: number,
  shortHistory: ReadonlyArray<PricePoint>,
): Change {
  if (shortHistory.length < HOURLY_LOOKBACK || !(price > 0)) return noChange;
  const reference = shortHistory[shortHistory.length - HOURLY_LOOKBACK].close;
  const abs = price - reference;
  return { abs, pct: reference === 0 ? 0 : (abs / reference) * 100 };
}

// --- Whole-quote derivation ---

export interface QuoteInputs {
  readonly symbol: string;
  readonly price: number | undefined;
  readonly open: number | undefined;
  readonly history: ReadonlyArray<PricePoint>;
  readonly shortHistory: ReadonlyArray<PricePoint>;
}

export interface PriceAndOpen {
  readonly price: number;
  readonly open: number;
}

/** Scalar price/open when the provider gave both; otherwise the last and
 *  first closes of the long history. */
export function resolvePriceAndOpen(
  inputs: QuoteInputs,
): Either.Either<PriceAndOpen, NoPriceData> {
  const { symbol, price, open, history } = inputs;
  if (price !== undefined && open !== undefined) {
    return Either.right({ price, open });
  }
  if (history.length === 0) {
    return Either.left(
      new NoPriceData({
        symbol,
        message: `No usable price data found for ${symbol}.`,
      }),
    );
  }
  return Either.right({
    price: history[history.length - 1].close,
    open: history[0].close,
  });
}

export interface QuoteFigures extends PriceAndOpen {
  readonly metrics: DerivedMetrics;
}

export function deriveMetrics(
  inputs: QuoteInputs,
): Either.Either<QuoteFigures, NoPriceData> {
  return Either.flatMap(
    resolvePriceAndOpen(inputs),
    ({ price, open }): Either.Either<QuoteFigures, NoPriceData> => {
      if (open === 0) {
        return Either.left(
          new NoPriceData({
            symbol: inputs.symbol,
            message: `Opening price for ${inputs.symbol} is zero.`,
          }),
        );
      }
      const daily = dailyChange(price, open);
      const hourly = hourlyChange(price, inputs.shortHistory);
      return Either.right({
        price,
        open,
        metrics: {
          dailyChangeAbs: daily.abs,
          dailyChangePct: daily.pct,
          hourlyChangeAbs: hourly.abs,
          hourlyChangePct: hourly.pct,
        },
      });
    },
  );
}
