import { Either } from "effect";
import { expect, test } from "vitest";
import {
  canonicalSymbolList,
  normalizeSymbol,
  parseSymbolList,
  serializeSymbolList,
} from "./symbols.ts";

function normalized(input: string): string | undefined {
  return Either.getOrUndefined(normalizeSymbol(input));
}

// --- normalizeSymbol ---

test("normalizeSymbol: bare tickers get the exchange suffix", () => {
  expect(normalized("bhp")).toBe("BHP.AX");
  expect(normalized("  pl8 ")).toBe("PL8.AX");
});

test("normalizeSymbol: qualified tickers are only uppercased", () => {
  expect(normalized("cba.ax")).toBe("CBA.AX");
  expect(normalized("BRK.B")).toBe("BRK.B");
});

test("normalizeSymbol: stray dots at either end are stripped", () => {
  expect(normalized(".wes.ax.")).toBe("WES.AX");
  expect(normalized("abc.")).toBe("ABC");
});

test("normalizeSymbol: blank input is rejected", () => {
  for (const input of ["", "   ", "..."]) {
    const result = normalizeSymbol(input);
    if (Either.isRight(result)) throw new Error(`Expected failure for "${input}"`);
    expect(result.left._tag).toBe("InvalidSymbol");
    expect(result.left.input).toBe(input);
  }
});

// --- Persisted list ---

test("canonicalSymbolList: case, duplicates and order collapse to one sorted set", () => {
  expect(canonicalSymbolList(["bhp.ax", "BHP.AX", "pl8.ax"])).toEqual(["BHP.AX", "PL8.AX"]);
  expect(canonicalSymbolList(["pl8.ax", "bhp.ax", " BHP.AX "])).toEqual(["BHP.AX", "PL8.AX"]);
});

test("serializeSymbolList: newline separated with no trailing newline", () => {
  expect(serializeSymbolList(["wes.ax", "BHP.AX", "wes.ax"])).toBe("BHP.AX\nWES.AX");
});

test("parseSymbolList: blank lines and CRLF endings are ignored", () => {
  expect(parseSymbolList("PL8.AX\r\n\r\nbhp.ax\n")).toEqual(["BHP.AX", "PL8.AX"]);
});

test("symbol list: saving then loading yields the same set", () => {
  const inputs = [
    ["bhp.ax", "BHP.AX", "pl8.ax"],
    ["PL8.AX", "bhp.ax"],
    ["pl8.ax", "pl8.ax", "BHP.AX", "bhp.ax"],
  ];
  for (const input of inputs) {
    expect(parseSymbolList(serializeSymbolList(input))).toEqual(["BHP.AX", "PL8.AX"]);
  }
});
