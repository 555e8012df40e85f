// Pure formatting functions — no I/O.

import type { PlatformError } from "@effect/platform/Error";
import type { Status } from "./app-state.ts";
import type { HttpError, MarketDataError } from "./market-data.ts";
import type { NoPriceData } from "./metrics.ts";
import type { Timezone } from "./settings.ts";
import type { InvalidSymbol } from "./symbols.ts";

// --- ANSI escape codes ---

export const GREEN = "\x1b[32m";
export const RED = "\x1b[31m";
export const YELLOW = "\x1b[33m";
export const BOLD = "\x1b[1m";
export const DIM = "\x1b[2m";
export const RESET = "\x1b[0m";

export const NOT_AVAILABLE = "N/A";

// --- Numbers ---

/** `$1,234.50` */
export function formatMoney(value: number): string {
  return `$${value.toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;
}

function signed(value: number): string {
  return `${value >= 0 ? "+" : ""}${value.toFixed(2)}`;
}

/** Percent and absolute change, both arrowed by the sign of the percent:
 *  `["+1.23% ↑", "$+0.05 ↑"]`. */
export function formatChange(
  pct: number,
  abs: number,
): readonly [string, string] {
  const arrow = pct >= 0 ? " ↑" : " ↓";
  return [`${signed(pct)}%${arrow}`, `$${signed(abs)}${arrow}`];
}

// --- Time ---

interface ZonedParts {
  readonly year: string;
  readonly month: string;
  readonly day: string;
  readonly hour: string;
  readonly minute: string;
  readonly second: string;
}

const formatters = new Map<Timezone, Intl.DateTimeFormat>();

function zonedParts(epochMs: number, timezone: Timezone): ZonedParts {
  let formatter = formatters.get(timezone);
  if (formatter === undefined) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timezone, formatter);
  }
  const parts = formatter.formatToParts(new Date(epochMs));
  const part = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "00";
  return {
    year: part("year"),
    month: part("month"),
    day: part("day"),
    hour: part("hour"),
    minute: part("minute"),
    second: part("second"),
  };
}

/** `HH:MM:SS` */
export function formatClock(epochMs: number, timezone: Timezone): string {
  const p = zonedParts(epochMs, timezone);
  return `${p.hour}:${p.minute}:${p.second}`;
}

/** `HH:MM` */
export function formatHourMinute(epochMs: number, timezone: Timezone): string {
  const p = zonedParts(epochMs, timezone);
  return `${p.hour}:${p.minute}`;
}

/** `YYYY-MM-DD` */
export function formatDate(epochMs: number, timezone: Timezone): string {
  const p = zonedParts(epochMs, timezone);
  return `${p.year}-${p.month}-${p.day}`;
}

/** `YYYY-MM-DD HH:MM:SS` */
export function formatDateTime(epochMs: number, timezone: Timezone): string {
  return `${formatDate(epochMs, timezone)} ${formatClock(epochMs, timezone)}`;
}

// --- Status line ---

export function statusText(status: Status, timezone: Timezone): string {
  switch (status._tag) {
    case "Ready":
      return `Ready | Auto-Refresh: ${status.refreshSeconds}s`;
    case "Fetching":
      return "Fetching data...";
    case "Loaded":
      return `Data loaded successfully | Last update: ${formatClock(status.at, timezone)}`;
    case "BatchFailed":
      return "Critical error during data process.";
    case "NoSymbols":
      return "No stocks to monitor.";
    case "Notice":
      return status.text;
  }
}

function statusColor(status: Status): string {
  switch (status._tag) {
    case "Fetching":
      return YELLOW;
    case "BatchFailed":
      return RED;
    case "Notice":
      return status.level === "error" ? RED : YELLOW;
    default:
      return "";
  }
}

export function formatStatus(status: Status, timezone: Timezone): string {
  const color = statusColor(status);
  const text = `Status: ${statusText(status, timezone)}`;
  return color === "" ? text : `${color}${text}${RESET}`;
}

// --- Error formatting ---

export type CliError =
  | MarketDataError
  | NoPriceData
  | InvalidSymbol
  | PlatformError;

export function formatError(error: CliError): string {
  const friendly = classifyError(error);
  return [
    "",
    `${RED}${BOLD}  ✗ ${friendly.title}${RESET}`,
    `  ${DIM}${friendly.hint}${RESET}`,
    "",
  ].join("\n");
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

const symbolHint =
  "Double-check the ticker symbol and try again (e.g. BHP, CBA, WES.AX).";

export function classifyError(error: CliError): ClassifiedError {
  switch (error._tag) {
    case "NetworkError":
      return {
        title: "Network error",
        hint: "Could not reach Yahoo Finance. Check your internet connection.",
      };
    case "HttpError":
      return classifyHttpError(error);
    case "SymbolNotFound":
      return { title: "Symbol not found", hint: symbolHint };
    case "ParseError":
      return {
        title: "Unexpected response",
        hint: "Yahoo Finance returned data in an unexpected format.",
      };
    case "NoPriceData":
      return { title: "No price data", hint: error.message };
    case "InvalidSymbol":
      return { title: "Invalid symbol", hint: "Please enter a ticker symbol." };
    case "SystemError":
    case "BadArgument":
      return { title: "Storage error", hint: error.message };
  }
}

function classifyHttpError(error: HttpError): ClassifiedError {
  if (error.status === 404) {
    return { title: "Symbol not found", hint: symbolHint };
  }
  if (error.status === 429) {
    return {
      title: "Rate limited",
      hint: "Too many requests. Wait a moment and try again.",
    };
  }
  if (error.status >= 500 && error.status < 600) {
    return {
      title: "Server error",
      hint: "Yahoo Finance is having issues. Try again in a few minutes.",
    };
  }
  return { title: "HTTP error", hint: `HTTP ${error.status}` };
}
