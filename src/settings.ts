// Chart ranges, display timezones and the settings file format.
//
// Pure data and functions — no I/O. Reading and writing the file lives in
// storage.ts.

// --- Provider queries ---

export interface HistoryQuery {
  readonly period: string;
  readonly interval: string;
}

export const TIME_RANGE_LABELS = [
  "6 Months",
  "30 Days",
  "7 Days",
  "24 Hrs",
  "6 Hrs",
  "10 Mins",
] as const;

export type TimeRangeLabel = (typeof TIME_RANGE_LABELS)[number];

// Long ranges use weekly/daily bars so the chart stays readable.
export const TIME_RANGES: Readonly<Record<TimeRangeLabel, HistoryQuery>> = {
  "6 Months": { period: "6mo", interval: "1wk" },
  "30 Days": { period: "30d", interval: "1d" },
  "7 Days": { period: "7d", interval: "1h" },
  "24 Hrs": { period: "1d", interval: "15m" },
  "6 Hrs": { period: "1d", interval: "5m" },
  "10 Mins": { period: "1d", interval: "1m" },
};

/** Fixed 1-day/1-minute query used only for the hourly change. */
export const SHORT_HISTORY_QUERY: HistoryQuery = { period: "1d", interval: "1m" };

export const DEFAULT_TIME_RANGE: TimeRangeLabel = "30 Days";

export function isTimeRangeLabel(value: string): value is TimeRangeLabel {
  return TIME_RANGE_LABELS.some((label) => label === value);
}

/** Ranges whose chart ticks show clock time instead of dates. */
export function isIntradayRange(range: TimeRangeLabel): boolean {
  return range === "24 Hrs" || range === "6 Hrs" || range === "10 Mins";
}

// --- Timezones ---

export const TIMEZONES = [
  "Australia/Sydney",
  "Australia/Brisbane",
  "Australia/Perth",
] as const;

export type Timezone = (typeof TIMEZONES)[number];

export const DEFAULT_TIMEZONE: Timezone = "Australia/Sydney";

export function isTimezone(value: string): value is Timezone {
  return TIMEZONES.some((zone) => zone === value);
}

/** "Australia/Perth" → "Perth" */
export function timezoneCity(zone: Timezone): string {
  return zone.split("/").at(-1) ?? zone;
}

// --- Settings ---

export interface Settings {
  readonly timeRange: TimeRangeLabel;
  readonly timezone: Timezone;
}

export const defaultSettings: Settings = {
  timeRange: DEFAULT_TIME_RANGE,
  timezone: DEFAULT_TIMEZONE,
};

/** Parse `key=value` lines. Unknown keys, unrecognized values and lines
 *  without `=` are skipped, leaving the default in place. */
export function parseSettings(text: string): Settings {
  let settings = defaultSettings;
  for (const line of text.split(/\r?\n/)) {
    const eq = line.indexOf("=");
    if (eq === -1) continue;
    const key = line.slice(0, eq).trim();
    const value = line.slice(eq + 1).trim();
    if (key === "time_range" && isTimeRangeLabel(value)) {
      settings = { ...settings, timeRange: value };
    } else if (key === "timezone" && isTimezone(value)) {
      settings = { ...settings, timezone: value };
    }
  }
  return settings;
}

export function serializeSettings(settings: Settings): string {
  return `time_range=${settings.timeRange}\ntimezone=${settings.timezone}\n`;
}

export function settingsEqual(a: Settings, b: Settings): boolean {
  return a.timeRange === b.timeRange && a.timezone === b.timezone;
}
