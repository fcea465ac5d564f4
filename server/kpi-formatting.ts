import type { CurrentDayKpiKey, KpiBundle, PeriodKpiKey, TodayKpiKey } from "@shared/schema";

import { roundTo } from "./numeric";

export interface MetricFormat {
  decimals: number;
  unit?: string;
  // rendered as 1.2M from one million up
  abbreviate?: boolean;
}

const KG: MetricFormat = { decimals: 0, unit: "kg" };
const LITERS: MetricFormat = { decimals: 0, unit: "L", abbreviate: true };
const ML: MetricFormat = { decimals: 0, unit: "ml" };
const COUNT: MetricFormat = { decimals: 0 };
const KG_PER_CYCLE: MetricFormat = { decimals: 2, unit: "kg" };
const LITERS_PER_KG: MetricFormat = { decimals: 2, unit: "L/kg" };
const ML_PER_KG: MetricFormat = { decimals: 3, unit: "ml/kg" };

export const todayFormats: Record<TodayKpiKey, MetricFormat> = {
  washed_kg: KG,
  cycles: COUNT,
  water_l: LITERS,
  weight_per_cycle: KG_PER_CYCLE,
  water_per_kg: LITERS_PER_KG,
  chemical_ml: ML,
  chemical_per_kg: ML_PER_KG,
};

export const currentDayFormats: Record<CurrentDayKpiKey, MetricFormat> = {
  kg: KG,
  loads: COUNT,
  water_l: LITERS,
  water_per_kg: LITERS_PER_KG,
  weight_per_load: KG_PER_CYCLE,
};

export const periodFormats: Record<PeriodKpiKey, MetricFormat> = {
  production_kg: KG,
  loads: COUNT,
  weight_per_cycle: KG_PER_CYCLE,
  daily_avg_kg: KG,
  water_l: LITERS,
  water_per_kg: LITERS_PER_KG,
  chemical_ml: ML,
  chemical_per_kg: ML_PER_KG,
  efficiency: { decimals: 1, unit: "%" },
  consolidated_kg: KG,
  consolidated_water_l: LITERS,
  alarms_total: COUNT,
  alarms_critical_high: COUNT,
  avg_resolution_min: { decimals: 1, unit: "min" },
};

const ABBREVIATION_THRESHOLD = 1_000_000;

/**
 * 1234 -> "1.2k", 2500000 -> "2.5M", 3100000000 -> "3.1B"; below 1000 the value is
 * printed without decimals.
 */
export function abbreviateNumber(value: number): string {
  if (!Number.isFinite(value) || value === 0) {
    return "0";
  }

  const magnitude = Math.abs(value);
  if (magnitude >= 1_000_000_000) {
    return `${(value / 1_000_000_000).toFixed(1)}B`;
  }
  if (magnitude >= 1_000_000) {
    return `${(value / 1_000_000).toFixed(1)}M`;
  }
  if (magnitude >= 1_000) {
    return `${(value / 1_000).toFixed(1)}k`;
  }
  return value.toFixed(0);
}

const formatterCache = new Map<string, Intl.NumberFormat>();

function numberFormatter(locale: string, decimals: number): Intl.NumberFormat {
  const key = `${locale}:${decimals}`;
  let formatter = formatterCache.get(key);
  if (!formatter) {
    formatter = new Intl.NumberFormat(locale, {
      minimumFractionDigits: decimals,
      maximumFractionDigits: decimals,
    });
    formatterCache.set(key, formatter);
  }
  return formatter;
}

export function formatMetric(value: number, format: MetricFormat, locale: string): string {
  const rounded = roundTo(value, format.decimals);
  const text =
    format.abbreviate && Math.abs(rounded) >= ABBREVIATION_THRESHOLD
      ? abbreviateNumber(rounded)
      : numberFormatter(locale, format.decimals).format(rounded);
  return format.unit ? `${text} ${format.unit}` : text;
}

function isComplete<K extends string, V>(record: Partial<Record<K, V>>, keys: readonly K[]): record is Record<K, V> {
  return keys.every(key => record[key] !== undefined);
}

export function buildBundle<K extends string>(
  label: string,
  keys: readonly K[],
  raw: Record<K, number>,
  formats: Record<K, MetricFormat>,
  locale: string,
): KpiBundle<K> {
  const values: Partial<Record<K, number>> = {};
  const display: Partial<Record<K, string>> = {};

  for (const key of keys) {
    values[key] = roundTo(raw[key], formats[key].decimals);
    display[key] = formatMetric(raw[key], formats[key], locale);
  }

  if (!isComplete(values, keys) || !isComplete(display, keys)) {
    throw new Error(`KPI bundle "${label}" is missing metrics`);
  }

  return { label, values, display };
}

/**
 * Elapsed time of an alarm, e.g. "2h 5m" or "45m".
 */
export function formatDuration(totalMinutes: number): string {
  const minutes = Math.max(0, Math.floor(totalMinutes));
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return hours > 0 ? `${hours}h ${rest}m` : `${rest}m`;
}
