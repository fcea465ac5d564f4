import { addUtcDays, dayStart, daysBetween, isIsoDay, parseNaiveTimestamp, startOfUtcDay, toIsoDay } from "@shared/utils";

import { ParseFailureError } from "./errors";
import { logger as rootLogger, type StructuredLogger } from "./observability/logger";

export const DEFAULT_WINDOW_DAYS = 7;

/**
 * Half-open `[start, endExclusive)` interval every aggregation is scoped to.
 * `endDay` is the last calendar day included.
 */
export interface TimeWindow {
  start: Date;
  endExclusive: Date;
  startDay: string;
  endDay: string;
  defaulted: boolean;
}

export type WindowBound = string | Date | null | undefined;

export interface NormalizeOptions {
  now?: Date;
  logger?: StructuredLogger;
}

const DATE_TIME = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}):(\d{2})(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/;

function parseBound(value: WindowBound, bound: "start" | "end"): Date | undefined {
  if (value === null || value === undefined) {
    return undefined;
  }

  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new ParseFailureError(`Invalid ${bound} date`, value);
    }
    return new Date(value.getTime());
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return undefined;
  }

  if (isIsoDay(trimmed)) {
    return dayStart(trimmed);
  }

  const match = DATE_TIME.exec(trimmed);
  if (!match || !isIsoDay(match[1])) {
    throw new ParseFailureError(`Invalid ${bound} date: expected YYYY-MM-DD or an ISO date-time`, value);
  }

  const parsed = parseNaiveTimestamp(trimmed.replace(" ", "T"));
  if (Number.isNaN(parsed.getTime())) {
    throw new ParseFailureError(`Invalid ${bound} date`, value);
  }
  return parsed;
}

function isMissing(value: WindowBound): boolean {
  return value === null || value === undefined || (typeof value === "string" && value.trim().length === 0);
}

function buildWindow(start: Date, end: Date, defaulted: boolean): TimeWindow {
  let windowStart = start;
  let endExclusive = addUtcDays(startOfUtcDay(end), 1);

  // start after end: swap the days so the interval stays non-empty
  if (windowStart.getTime() >= endExclusive.getTime()) {
    windowStart = startOfUtcDay(end);
    endExclusive = addUtcDays(startOfUtcDay(start), 1);
  }

  return {
    start: windowStart,
    endExclusive,
    startDay: toIsoDay(windowStart),
    endDay: toIsoDay(addUtcDays(endExclusive, -1)),
    defaulted,
  };
}

export function defaultTimeWindow(now: Date = new Date()): TimeWindow {
  return buildWindow(addUtcDays(now, -DEFAULT_WINDOW_DAYS), now, true);
}

/**
 * Turns caller-supplied bounds into a window. Missing bounds default to the last seven
 * days; an unparseable bound replaces the whole window with that default.
 */
export function normalizeTimeWindow(
  start: WindowBound,
  end: WindowBound,
  options: NormalizeOptions = {},
): TimeWindow {
  const now = options.now ?? new Date();

  try {
    const parsedStart = parseBound(start, "start") ?? addUtcDays(now, -DEFAULT_WINDOW_DAYS);
    const parsedEnd = parseBound(end, "end") ?? now;
    return buildWindow(parsedStart, parsedEnd, isMissing(start) && isMissing(end));
  } catch (error) {
    if (!(error instanceof ParseFailureError)) {
      throw error;
    }
    (options.logger ?? rootLogger).warn(
      "Unparseable window bound, using the default window",
      { event: "window.parse_failure", context: { start: String(start), end: String(end) } },
      error,
    );
    return defaultTimeWindow(now);
  }
}

export function dayWindow(day: string): TimeWindow {
  const start = dayStart(day);
  return {
    start,
    endExclusive: addUtcDays(start, 1),
    startDay: day,
    endDay: day,
    defaulted: false,
  };
}

export function inclusiveDayCount(window: TimeWindow): number {
  return daysBetween(window.startDay, window.endDay) + 1;
}

export function describeWindow(window: TimeWindow): string {
  if (window.defaulted) {
    return `Last ${DEFAULT_WINDOW_DAYS} days`;
  }
  return window.startDay === window.endDay ? window.startDay : `${window.startDay} to ${window.endDay}`;
}

export function serializeWindow(window: TimeWindow) {
  return {
    start: window.start.toISOString(),
    endExclusive: window.endExclusive.toISOString(),
    startDay: window.startDay,
    endDay: window.endDay,
  };
}
