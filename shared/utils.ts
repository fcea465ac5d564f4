// Date helpers shared by the engine and the dashboard (ISO YYYY-MM-DD, UTC)

export const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Converts a Date into its UTC calendar day (YYYY-MM-DD)
 */
export function toIsoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Midnight (UTC) of the day the given instant falls on
 */
export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export function addUtcDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Checks that a YYYY-MM-DD string names a real calendar day
 */
export function isIsoDay(value: string): boolean {
  const match = ISO_DAY.exec(value);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return toIsoDay(date) === value;
}

/**
 * Midnight (UTC) of a YYYY-MM-DD day
 */
export function dayStart(day: string): Date {
  if (!isIsoDay(day)) {
    throw new Error(`Invalid day: ${day}. Use YYYY-MM-DD`);
  }
  return new Date(`${day}T00:00:00.000Z`);
}

/**
 * Whole days from `fromDay` to `toDay` (negative when `toDay` comes first)
 */
export function daysBetween(fromDay: string, toDay: string): number {
  return Math.round((dayStart(toDay).getTime() - dayStart(fromDay).getTime()) / DAY_MS);
}

/**
 * Reads a timestamp rendered without offset (plant tables store UTC wall clock)
 */
export function parseNaiveTimestamp(value: string): Date {
  const hasOffset = /(Z|[+-]\d{2}:?\d{2})$/.test(value);
  return new Date(hasOffset ? value : `${value}Z`);
}
