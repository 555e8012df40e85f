// Chart hover — explicit per-chart cursor state and nearest-point lookup.
//
// A HoverState is created together with the chart it belongs to and is
// discarded when that chart goes away; nothing is attached to the chart
// model itself.

import type { AppState } from "./app-state.ts";
import {
  type ChartMarker,
  type ChartSeries,
  columnToTime,
  toColumn,
  toRow,
  type Viewport,
} from "./chart.ts";
import type { PricePoint } from "./domain.ts";
import {
  BOLD,
  formatChange,
  formatDate,
  formatDateTime,
  formatMoney,
  RESET,
} from "./format.ts";
import { type Timezone, timezoneCity } from "./settings.ts";

/** Horizontal distance, in columns, within which a sample is picked up. */
export const DEFAULT_TOLERANCE = 2;

/** Samples newer than this are shown with their time of day. */
export const RECENT_WINDOW_MS = 1.5 * 24 * 60 * 60 * 1000;

export interface HoverState {
  readonly chartId: string;
  readonly cursorColumn: number | undefined;
  readonly tolerance: number;
}

export function createHover(chartId: string, tolerance = DEFAULT_TOLERANCE): HoverState {
  return { chartId, cursorColumn: undefined, tolerance };
}

export function moveCursor(hover: HoverState, column: number | undefined): HoverState {
  return { ...hover, cursorColumn: column };
}

/** Keep the hover record while the same chart is on screen; start a fresh
 *  one when the chart changes. */
export function hoverFor(current: HoverState | undefined, chartId: string): HoverState {
  return current !== undefined && current.chartId === chartId
    ? current
    : createHover(chartId);
}

// --- Hit test ---

export interface HoverHit {
  readonly symbol: string;
  readonly point: PricePoint;
  readonly column: number;
  readonly distance: number;
}

function nearestByTime(
  points: ReadonlyArray<PricePoint>,
  time: number,
): PricePoint | undefined {
  let best: PricePoint | undefined;
  for (const point of points) {
    if (best === undefined || Math.abs(point.time - time) < Math.abs(best.time - time)) {
      best = point;
    }
  }
  return best;
}

/** For each series take the sample nearest the cursor in time, then keep
 *  the series whose sample lands closest in columns, if within tolerance. */
export function hitTest(
  hover: HoverState,
  series: ReadonlyArray<ChartSeries>,
  vp: Viewport,
): HoverHit | undefined {
  const cursor = hover.cursorColumn;
  if (cursor === undefined) return undefined;
  const time = columnToTime(cursor, vp);

  let best: HoverHit | undefined;
  for (const s of series) {
    const point = nearestByTime(s.points, time);
    if (point === undefined) continue;
    const column = toColumn(point.time, vp);
    const distance = Math.abs(column - cursor);
    if (distance <= hover.tolerance && (best === undefined || distance < best.distance)) {
      best = { symbol: s.symbol, point, column, distance };
    }
  }
  return best;
}

export function markerFor(hit: HoverHit, vp: Viewport): ChartMarker {
  return { column: hit.column, row: toRow(hit.point.close, vp) };
}

// --- Tooltip ---

export function tooltipTime(time: number, now: number, timezone: Timezone): string {
  return time > now - RECENT_WINDOW_MS
    ? formatDateTime(time, timezone)
    : formatDate(time, timezone);
}

export function tooltipLines(
  hit: HoverHit,
  state: AppState,
  now: number,
): string[] {
  const { timezone } = state.settings;
  const snapshot = state.snapshots.get(hit.symbol);
  const m =
    snapshot?._tag === "Loaded"
      ? snapshot.metrics
      : { dailyChangePct: 0, dailyChangeAbs: 0, hourlyChangePct: 0, hourlyChangeAbs: 0 };
  const [dailyPct, dailyAbs] = formatChange(m.dailyChangePct, m.dailyChangeAbs);
  const [hourlyPct, hourlyAbs] = formatChange(m.hourlyChangePct, m.hourlyChangeAbs);
  return [
    `${BOLD}${hit.symbol}${RESET}`,
    `Price: ${formatMoney(hit.point.close)}`,
    `Time (${timezoneCity(timezone)}): ${tooltipTime(hit.point.time, now, timezone)}`,
    "",
    `Daily %: ${dailyPct}`,
    `Daily $: ${dailyAbs}`,
    `Hourly %: ${hourlyPct}`,
    `Hourly $: ${hourlyAbs}`,
  ];
}
