// Ticker normalization and the persisted symbol-list format.

import { Data, Either } from "effect";

export const EXCHANGE_SUFFIX = ".AX";

export const DEFAULT_SYMBOLS: ReadonlyArray<string> = ["BHP.AX", "PL8.AX"];

export class InvalidSymbol extends Data.TaggedError("InvalidSymbol")<{
  readonly input: string;
}> {}

/** Uppercase, append the exchange suffix when no marker is present, then
 *  strip stray dots at either end. */
export function normalizeSymbol(input: string): Either.Either<string, InvalidSymbol> {
  let ticker = input.trim().toUpperCase();
  if (ticker.length > 0 && !ticker.includes(".")) {
    ticker += EXCHANGE_SUFFIX;
  }
  ticker = ticker.replace(/^\.+|\.+$/g, "");
  return ticker.length === 0
    ? Either.left(new InvalidSymbol({ input }))
    : Either.right(ticker);
}

/** Trimmed, uppercased, deduplicated and sorted. Blank entries are dropped.
 *  No exchange suffix is added here: the list stores what was saved. */
export function canonicalSymbolList(symbols: Iterable<string>): string[] {
  const unique = new Set<string>();
  for (const symbol of symbols) {
    const ticker = symbol.trim().toUpperCase();
    if (ticker.length > 0) unique.add(ticker);
  }
  return [...unique].sort();
}

export function parseSymbolList(text: string): string[] {
  return canonicalSymbolList(text.split(/\r?\n/));
}

export function serializeSymbolList(symbols: Iterable<string>): string {
  return canonicalSymbolList(symbols).join("\n");
}
