// Text price charts — model, viewport maths and a character-grid renderer.

import { type AppState, isVisible } from "./app-state.ts";
import { type PricePoint, type QuoteSnapshot, trendOf } from "./domain.ts";
import {
  BOLD,
  DIM,
  formatDate,
  formatHourMinute,
  formatMoney,
  GREEN,
  RED,
  RESET,
} from "./format.ts";
import {
  isIntradayRange,
  type Timezone,
  timezoneCity,
} from "./settings.ts";

// --- Model ---

export interface ChartSeries {
  readonly symbol: string;
  readonly points: ReadonlyArray<PricePoint>;
  readonly color: string;
}

export type ChartModel =
  | {
      readonly _tag: "Plot";
      readonly id: string;
      readonly title: string;
      readonly yLabel: string;
      readonly xLabel: string;
      readonly intraday: boolean;
      readonly timezone: Timezone;
      readonly series: ReadonlyArray<ChartSeries>;
    }
  | {
      readonly _tag: "Placeholder";
      readonly id: string;
      readonly message: string;
    };

export const COMBINED_CHART_ID = "main";
export const EMPTY_COMBINED = "ADD STOCKS TO VIEW COMBINED CHART";
export const DATA_ERROR = "DATA ERROR";
export const NO_DATA = "NO DATA";
export const Y_LABEL = "Price (AUD)";

const PALETTE = [
  "\x1b[36m", // cyan
  "\x1b[35m", // magenta
  "\x1b[33m", // yellow
  "\x1b[34m", // blue
  GREEN,
  RED,
];

export function xAxisLabel(intraday: boolean, timezone: Timezone): string {
  const city = timezoneCity(timezone);
  return intraday ? `Time (${city})` : `Time/Date (${city})`;
}

/** Every visible symbol with history, in tracked order. */
export function combinedChart(state: AppState): ChartModel {
  const { timeRange, timezone } = state.settings;
  const series: ChartSeries[] = [];
  for (const symbol of state.symbols) {
    const snapshot = state.snapshots.get(symbol);
    if (!isVisible(state, symbol) || snapshot?._tag !== "Loaded") continue;
    if (snapshot.history.length === 0) continue;
    series.push({
      symbol,
      points: snapshot.history,
      color: PALETTE[series.length % PALETTE.length] ?? "",
    });
  }
  if (series.length === 0) {
    return { _tag: "Placeholder", id: COMBINED_CHART_ID, message: EMPTY_COMBINED };
  }
  const intraday = isIntradayRange(timeRange);
  return {
    _tag: "Plot",
    id: COMBINED_CHART_ID,
    title: `Closing Price Chart (${timeRange})`,
    yLabel: Y_LABEL,
    xLabel: xAxisLabel(intraday, timezone),
    intraday,
    timezone,
    series,
  };
}

export function detailChart(
  snapshot: QuoteSnapshot | undefined,
  symbol: string,
  timezone: Timezone,
): ChartModel {
  if (snapshot?._tag === "Errored") {
    return { _tag: "Placeholder", id: symbol, message: DATA_ERROR };
  }
  if (snapshot === undefined || snapshot.history.length === 0) {
    return { _tag: "Placeholder", id: symbol, message: NO_DATA };
  }
  const intraday = isIntradayRange(snapshot.rangeLabel);
  return {
    _tag: "Plot",
    id: symbol,
    title: `${snapshot.rangeLabel} Closing Price`,
    yLabel: Y_LABEL,
    xLabel: xAxisLabel(intraday, timezone),
    intraday,
    timezone,
    series: [
      {
        symbol,
        points: snapshot.history,
        color: trendOf(snapshot.metrics.dailyChangeAbs) === "gain" ? GREEN : RED,
      },
    ],
  };
}

// --- Viewport ---

/** Fraction of the time span added on each side of the x axis. */
export const X_PADDING = 0.005;

export interface Viewport {
  readonly xMin: number;
  readonly xMax: number;
  readonly yMin: number;
  readonly yMax: number;
  readonly width: number;
  readonly height: number;
}

export function fitViewport(
  series: ReadonlyArray<ChartSeries>,
  width: number,
  height: number,
): Viewport {
  const points = series.flatMap((s) => s.points);
  const times = points.map((p) => p.time);
  const closes = points.map((p) => p.close);
  let xMin = Math.min(...times);
  let xMax = Math.max(...times);
  let yMin = Math.min(...closes);
  let yMax = Math.max(...closes);

  const xPad = xMax > xMin ? (xMax - xMin) * X_PADDING : 60_000;
  xMin -= xPad;
  xMax += xPad;
  if (yMax === yMin) {
    const yPad = Math.abs(yMin) * 0.01 || 1;
    yMin -= yPad;
    yMax += yPad;
  }
  return { xMin, xMax, yMin, yMax, width, height };
}

export function toColumn(time: number, vp: Viewport): number {
  return Math.round(((time - vp.xMin) / (vp.xMax - vp.xMin)) * (vp.width - 1));
}

/** Row 0 is the top of the plot. */
export function toRow(close: number, vp: Viewport): number {
  return Math.round(((vp.yMax - close) / (vp.yMax - vp.yMin)) * (vp.height - 1));
}

export function columnToTime(column: number, vp: Viewport): number {
  return vp.xMin + (column / (vp.width - 1)) * (vp.xMax - vp.xMin);
}

// --- Ticks ---

export interface Tick {
  readonly column: number;
  readonly label: string;
}

export function tickLabel(time: number, intraday: boolean, timezone: Timezone): string {
  return intraday ? formatHourMinute(time, timezone) : formatDate(time, timezone);
}

/** `count` evenly spaced ticks from the first to the last column. */
export function ticks(
  vp: Viewport,
  intraday: boolean,
  timezone: Timezone,
  count = 5,
): Tick[] {
  const out: Tick[] = [];
  for (let i = 0; i < count; i++) {
    const column = Math.round((i / (count - 1)) * (vp.width - 1));
    out.push({
      column,
      label: tickLabel(columnToTime(column, vp), intraday, timezone),
    });
  }
  return out;
}

// --- Rendering ---

export interface ChartMarker {
  readonly column: number;
  readonly row: number;
}

interface Cell {
  readonly char: string;
  readonly color: string;
}

const blank: Cell = { char: " ", color: "" };

function plotSeries(grid: Cell[][], s: ChartSeries, vp: Viewport): void {
  const put = (column: number, row: number) => {
    const line = grid[row];
    if (line !== undefined && column >= 0 && column < vp.width) {
      line[column] = { char: "•", color: s.color };
    }
  };
  let previous: { column: number; row: number } | undefined;
  for (const point of s.points) {
    const column = toColumn(point.time, vp);
    const row = toRow(point.close, vp);
    if (previous !== undefined && column - previous.column > 1) {
      // Join sparse samples with a straight run of dots.
      const span = column - previous.column;
      for (let c = previous.column + 1; c < column; c++) {
        const t = (c - previous.column) / span;
        put(c, Math.round(previous.row + (row - previous.row) * t));
      }
    }
    put(column, row);
    previous = { column, row };
  }
}

function cellsToText(cells: ReadonlyArray<Cell>): string {
  return cells
    .map((cell) => (cell.color === "" ? cell.char : `${cell.color}${cell.char}${RESET}`))
    .join("");
}

/** Columns reserved left of the plot for price labels. */
export const GUTTER = 12;

/** Render a model into `height + 5` lines (title, plot, axis, ticks,
 *  label, legend), or a centred message for a placeholder. */
export function renderChart(
  model: ChartModel,
  width: number,
  height: number,
  marker?: ChartMarker,
): string[] {
  if (model._tag === "Placeholder") {
    const pad = Math.max(0, Math.floor((width + GUTTER - model.message.length) / 2));
    return ["", `${BOLD}${" ".repeat(pad)}${model.message}${RESET}`, ""];
  }

  const vp = fitViewport(model.series, width, height);
  const grid: Cell[][] = Array.from({ length: height }, () =>
    Array.from({ length: width }, () => blank),
  );
  if (marker !== undefined) {
    for (const line of grid) line[marker.column] = { char: "│", color: DIM };
  }
  for (const s of model.series) plotSeries(grid, s, vp);
  if (marker !== undefined) {
    const line = grid[marker.row];
    if (line !== undefined) line[marker.column] = { char: "◆", color: BOLD };
  }

  const yLabels = new Map<number, string>([
    [0, formatMoney(vp.yMax)],
    [Math.floor((height - 1) / 2), formatMoney((vp.yMax + vp.yMin) / 2)],
    [height - 1, formatMoney(vp.yMin)],
  ]);

  const lines = [`${BOLD}${model.title}${RESET}  ${DIM}${model.yLabel}${RESET}`];
  grid.forEach((cells, row) => {
    const label = (yLabels.get(row) ?? "").padStart(GUTTER - 2);
    lines.push(`${label} ┤${cellsToText(cells)}`);
  });
  lines.push(`${" ".repeat(GUTTER - 2)} └${"─".repeat(width)}`);

  const tickLine = Array.from({ length: width + GUTTER }, () => " ");
  for (const tick of ticks(vp, model.intraday, model.timezone)) {
    const start = Math.min(
      GUTTER + tick.column - Math.floor(tick.label.length / 2),
      width + GUTTER - tick.label.length,
    );
    for (let i = 0; i < tick.label.length; i++) {
      tickLine[Math.max(0, start) + i] = tick.label[i] ?? " ";
    }
  }
  lines.push(tickLine.join("").trimEnd());

  const labelPad = Math.max(0, GUTTER + Math.floor((width - model.xLabel.length) / 2));
  lines.push(`${" ".repeat(labelPad)}${DIM}${model.xLabel}${RESET}`);
  lines.push(
    " ".repeat(GUTTER) +
      model.series.map((s) => `${s.color}■${RESET} ${s.symbol}`).join("   "),
  );
  return lines;
}
