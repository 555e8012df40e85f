// Pure domain types — no framework dependency, no I/O.

import type { TimeRangeLabel } from "./settings.ts";

export interface PricePoint {
  readonly time: number; // epoch ms
  readonly close: number;
}

export interface DerivedMetrics {
  readonly dailyChangeAbs: number;
  readonly dailyChangePct: number;
  readonly hourlyChangeAbs: number;
  readonly hourlyChangePct: number;
}

// --- Snapshot ---
//
// A snapshot is replaced wholesale on every merged fetch. An errored
// snapshot carries no price fields at all, so nothing stale can leak into
// the display.

export type Loaded = {
  readonly _tag: "Loaded";
  readonly symbol: string;
  readonly price: number;
  readonly open: number;
  readonly history: ReadonlyArray<PricePoint>;
  readonly shortHistory: ReadonlyArray<PricePoint>;
  readonly metrics: DerivedMetrics;
  readonly rangeLabel: TimeRangeLabel;
  readonly fetchedAt: number;
};

export type Errored = {
  readonly _tag: "Errored";
  readonly symbol: string;
  readonly message: string;
  readonly fetchedAt: number;
};

export type QuoteSnapshot = Loaded | Errored;

export const Loaded = (fields: Omit<Loaded, "_tag">): Loaded => ({
  _tag: "Loaded",
  ...fields,
});

export const Errored = (
  symbol: string,
  message: string,
  fetchedAt: number,
): Errored => ({
  _tag: "Errored",
  symbol,
  message,
  fetchedAt,
});

// --- Gain / loss ---

export type Trend = "gain" | "loss";

/** Zero counts as a gain. */
export function trendOf(changeAbs: number): Trend {
  return changeAbs >= 0 ? "gain" : "loss";
}
