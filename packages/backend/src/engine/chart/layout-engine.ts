import {
  DateOutOfRangeError,
  InsufficientItemsError,
  MissingAnchorError,
  ResourceOutOfRangeError,
} from '../../lib/errors.js';
import {
  addDays,
  daysInMonth,
  diffInDays,
  endOfMonth,
  monthName,
  nextMonth,
  skipWeekend,
  startOfMonth,
  weekendShift,
} from './calendar.js';
import { assignResourceStyles } from './color.js';
import type {
  Chart,
  ChartLayout,
  ChartLog,
  ColumnLayout,
  Gutter,
  LayoutOptions,
  RandomSource,
  RowLayout,
} from './types.js';

// ─── Fixed geometry ──────────────────────────────────────────────────────────

export const CHART_GUTTER: Gutter = Object.freeze({ left: 10, top: 80, right: 10, bottom: 10 });
export const ROW_GUTTER: Gutter = Object.freeze({ left: 5, top: 5, right: 5, bottom: 5 });
export const RESOURCE_GUTTER: Gutter = Object.freeze({ left: 10, top: 10, right: 10, bottom: 10 });
export const BAR_HEIGHT = 20;
export const RECT_CORNER_RADIUS = 3;

/** Days in the longest month; a month of this length gets the full column width. */
const LONGEST_MONTH_DAYS = 31;

export function gutterWidth(gutter: Gutter): number {
  return gutter.left + gutter.right;
}

export function gutterHeight(gutter: Gutter): number {
  return gutter.top + gutter.bottom;
}

export const silentLog: ChartLog = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export interface LayoutDependencies {
  random?: RandomSource;
  log?: ChartLog;
}

// ─── Validation ──────────────────────────────────────────────────────────────

interface Anchor {
  startDate: Date;
  resourceIndex: number;
}

/**
 * Check the schedule invariants and return the values that seed both passes.
 * Items are checked in order, so the first offending item decides the error.
 */
export function validateChart(chart: Chart): Anchor {
  if (chart.items.length < 2) {
    throw new InsufficientItemsError(chart.items.length);
  }

  const first = chart.items[0];
  if (first.startDate === undefined) {
    throw new MissingAnchorError('startDate');
  }

  if (first.resource === undefined) {
    throw new MissingAnchorError('resource');
  }

  chart.items.forEach((item, i) => {
    if (
      item.resource !== undefined &&
      (!Number.isInteger(item.resource) ||
        item.resource < 0 ||
        item.resource >= chart.resources.length)
    ) {
      throw new ResourceOutOfRangeError(i, item.resource, chart.resources.length);
    }
  });

  return { startDate: first.startDate, resourceIndex: first.resource };
}

// ─── Pass 1: project span ────────────────────────────────────────────────────

export interface ProjectSpan {
  /** First weekday any item starts on (not yet snapped to the month). */
  startDate: Date;
  /** Furthest the cursor reaches. */
  endDate: Date;
  /** Per item: nominal duration stretched so the end avoids a weekend. Absent for milestones. */
  shadowDurations: Array<number | undefined>;
}

interface SpanState extends ProjectSpan {
  cursor: Date;
}

/**
 * Days to render for a task starting at `start`: the nominal duration, plus
 * whatever it takes to move the end date off a Saturday or Sunday.
 */
export function shadowDuration(start: Date, days: number): number {
  return days + weekendShift(addDays(start, days));
}

/**
 * Throws DateOutOfRangeError once an item's start or end leaves the range a
 * Date can hold.
 */
export function computeProjectSpan(chart: Chart, anchor: Anchor): ProjectSpan {
  const initial: SpanState = {
    cursor: anchor.startDate,
    startDate: skipWeekend(anchor.startDate),
    endDate: anchor.startDate,
    shadowDurations: [],
  };

  const { startDate, endDate, shadowDurations } = chart.items.reduce<SpanState>((state, item, i) => {
    let { cursor, startDate } = state;

    if (item.startDate !== undefined) {
      cursor = item.startDate;
      if (item.startDate < startDate) {
        startDate = skipWeekend(item.startDate);
      }
    }

    let shadow: number | undefined;
    if (item.duration !== undefined) {
      shadow = shadowDuration(cursor, item.duration);
      cursor = addDays(cursor, shadow);
    }

    // The month containing the cursor must still fit in a Date once snapped
    if (Number.isNaN(endOfMonth(cursor).getTime())) {
      throw new DateOutOfRangeError(i);
    }

    return {
      cursor,
      startDate,
      endDate: cursor > state.endDate ? cursor : state.endDate,
      shadowDurations: [...state.shadowDurations, shadow],
    };
  }, initial);

  return { startDate, endDate, shadowDurations };
}

// ─── Columns ─────────────────────────────────────────────────────────────────

export interface ColumnSet {
  columns: ColumnLayout[];
  totalDays: number;
  totalWidth: number;
}

/**
 * One column per calendar month from `startDate` to `endDate` inclusive.
 * A column's width is proportional to its month's length.
 */
export function computeColumns(startDate: Date, endDate: Date, maxMonthWidth: number): ColumnSet {
  const columns: ColumnLayout[] = [];
  let totalDays = 0;
  let totalWidth = 0;

  for (let month = startOfMonth(startDate); month <= endDate; month = nextMonth(month)) {
    const days = daysInMonth(month.getUTCFullYear(), month.getUTCMonth() + 1);
    const width = (maxMonthWidth * days) / LONGEST_MONTH_DAYS;

    totalDays += days;
    totalWidth += width;
    columns.push(Object.freeze({ width, monthName: monthName(month) }));
  }

  return { columns, totalDays, totalWidth };
}

// ─── Pass 2: rows ────────────────────────────────────────────────────────────

interface RowState {
  cursor: Date;
  resourceIndex: number;
  rows: RowLayout[];
}

function computeRows(
  chart: Chart,
  span: ProjectSpan,
  origin: Date,
  anchor: Anchor,
  offsetOf: (date: Date) => number,
  lengthOf: (days: number) => number,
): RowLayout[] {
  const initial: RowState = { cursor: origin, resourceIndex: anchor.resourceIndex, rows: [] };

  return chart.items.reduce<RowState>((state, item, i) => {
    let cursor = item.startDate ?? state.cursor;
    const offset = offsetOf(cursor);
    const shadow = span.shadowDurations[i];

    let length: number | undefined;
    if (shadow !== undefined) {
      cursor = addDays(cursor, shadow);
      length = lengthOf(shadow);
    }

    const resourceIndex = item.resource ?? state.resourceIndex;
    const row: RowLayout = Object.freeze({
      title: item.title,
      resourceIndex,
      offset,
      ...(length !== undefined ? { length } : {}),
      open: item.open ?? false,
    });

    return { cursor, resourceIndex, rows: [...state.rows, row] };
  }, initial).rows;
}

// ─── Entry point ─────────────────────────────────────────────────────────────

/**
 * Lay out a schedule: validate it, find the months it spans, and place every
 * task bar and milestone. The result is frozen.
 *
 * Throws a ChartValidationError when the schedule cannot be laid out.
 */
export function computeLayout(
  chart: Chart,
  options: LayoutOptions,
  deps: LayoutDependencies = {},
): ChartLayout {
  const log = deps.log ?? silentLog;
  const random = deps.random ?? Math.random;

  const anchor = validateChart(chart);
  const span = computeProjectSpan(chart, anchor);

  const startDate = startOfMonth(span.startDate);
  const endDate = endOfMonth(span.endDate);
  const { columns, totalDays, totalWidth } = computeColumns(
    startDate,
    endDate,
    options.maxMonthWidth,
  );

  const offsetOf = (date: Date): number =>
    options.titleWidth +
    CHART_GUTTER.left +
    (diffInDays(date, startDate) / totalDays) * totalWidth;
  const lengthOf = (days: number): number => (days / totalDays) * totalWidth;

  const rows = computeRows(chart, span, startDate, anchor, offsetOf, lengthOf);
  const markedDateOffset =
    chart.markedDate !== undefined ? offsetOf(chart.markedDate) : undefined;

  if (chart.markedDate !== undefined && (chart.markedDate < startDate || chart.markedDate > endDate)) {
    log.warn(`Marked date ${isoDate(chart.markedDate)} lies outside the chart span`);
  }

  const resourceStyles = assignResourceStyles(chart.resources.length, random);

  log.info(
    `Laid out ${rows.length} rows over ${columns.length} months (${isoDate(startDate)} to ${isoDate(endDate)})`,
  );

  return Object.freeze({
    title: chart.title,
    gutter: CHART_GUTTER,
    rowGutter: ROW_GUTTER,
    rowHeight: gutterHeight(ROW_GUTTER) + BAR_HEIGHT,
    resourceGutter: RESOURCE_GUTTER,
    resourceHeight: gutterHeight(RESOURCE_GUTTER) + BAR_HEIGHT,
    ...(markedDateOffset !== undefined ? { markedDateOffset } : {}),
    titleWidth: options.titleWidth,
    maxMonthWidth: options.maxMonthWidth,
    rectCornerRadius: RECT_CORNER_RADIUS,
    startDate,
    endDate,
    totalDays,
    totalWidth,
    columns: Object.freeze(columns),
    rows: Object.freeze(rows),
    resources: Object.freeze([...chart.resources]),
    resourceStyles: Object.freeze(resourceStyles),
  });
}

function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}
