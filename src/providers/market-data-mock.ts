// In-memory MarketData for demos and tests (STOCK_PROVIDER=test).
//
// Histories are synthetic: a straight walk from the open to the current
// price with a small ripple, ending at the current clock time so the
// charts look alive under both the live and the test clock.

import { Clock, Effect, Layer } from "effect";
import type { PricePoint } from "../domain.ts";
import type { HistoryQuery } from "../settings.ts";
import { MarketData, SymbolNotFound } from "../market-data.ts";

// --- Sample data ---

interface SampleQuote {
  readonly price: number;
  readonly open: number;
}

const quotes: Record<string, SampleQuote> = {
  "BHP.AX": { price: 45.12, open: 44.6 },
  "PL8.AX": { price: 1.625, open: 1.64 },
  "CBA.AX": { price: 152.3, open: 151.05 },
  "WES.AX": { price: 78.4, open: 79.02 },
};

// --- Query sizing ---

const MINUTE = 60_000;
const DAY = 24 * 60 * MINUTE;

const intervalMs: Record<string, number> = {
  "1m": MINUTE,
  "5m": 5 * MINUTE,
  "15m": 15 * MINUTE,
  "1h": 60 * MINUTE,
  "1d": DAY,
  "1wk": 7 * DAY,
};

const periodMs: Record<string, number> = {
  "1d": DAY,
  "7d": 7 * DAY,
  "30d": 30 * DAY,
  "6mo": 182 * DAY,
};

// A 1-day period covers one trading session, not 24 hours.
const SESSION_MS = 6 * 60 * MINUTE;
const MAX_SAMPLES = 400;

export function sampleCount(query: HistoryQuery): number {
  const step = intervalMs[query.interval] ?? DAY;
  const span = query.period === "1d" ? SESSION_MS : (periodMs[query.period] ?? DAY);
  return Math.max(1, Math.min(MAX_SAMPLES, Math.floor(span / step)));
}

export function syntheticHistory(
  quote: SampleQuote,
  query: HistoryQuery,
  endTime: number,
): PricePoint[] {
  const count = sampleCount(query);
  const step = intervalMs[query.interval] ?? DAY;
  const amplitude = quote.open * 0.004;
  return Array.from({ length: count }, (_, i) => {
    const t = count === 1 ? 1 : i / (count - 1);
    const ripple = i === 0 || i === count - 1 ? 0 : Math.sin(i / 3) * amplitude;
    const close = quote.open + (quote.price - quote.open) * t + ripple;
    return {
      time: endTime - (count - 1 - i) * step,
      close: Math.round(close * 1000) / 1000,
    };
  });
}

// --- Mock layer ---

const lookup = (
  symbol: string,
): Effect.Effect<SampleQuote, SymbolNotFound> => {
  const quote = quotes[symbol.toUpperCase()];
  return quote !== undefined
    ? Effect.succeed(quote)
    : Effect.fail(new SymbolNotFound({ symbol }));
};

export const MarketDataTestLive = Layer.succeed(
  MarketData,
  MarketData.of({
    getInfo: (symbol) =>
      lookup(symbol).pipe(
        Effect.map(({ price, open }) => ({ price, open })),
      ),
    getHistory: (symbol, query) =>
      Effect.zipWith(lookup(symbol), Clock.currentTimeMillis, (quote, now) =>
        syntheticHistory(quote, query, now),
      ),
  }),
);
