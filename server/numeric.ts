/**
 * Decodes a numeric cell (pg returns NUMERIC and bigint aggregates as strings).
 * Anything that does not parse to a finite number reads as 0.
 */
export function coerceNumber(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (trimmed.length === 0) {
      return 0;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export function coerceInteger(value: unknown): number {
  return Math.trunc(coerceNumber(value));
}

export function safeRatio(numerator: number, denominator: number): number {
  if (denominator === 0) {
    return 0;
  }
  const ratio = numerator / denominator;
  return Number.isFinite(ratio) ? ratio : 0;
}

export function roundTo(value: number, decimals: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  const factor = 10 ** decimals;
  const rounded = Math.round((value + Number.EPSILON) * factor) / factor;
  return rounded === 0 ? 0 : rounded;
}
