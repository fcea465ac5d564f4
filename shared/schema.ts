import { z } from "zod";

// Request inputs

// Dates stay as free text: the time window normalizer decides what is usable
export const kpiQuerySchema = z.object({
  start: z.string().optional(),
  end: z.string().optional(),
  // `?clientId=` means no filter rather than client 0
  clientId: z.preprocess(
    value => (typeof value === "string" && value.trim() === "" ? undefined : value),
    z.coerce.number().int().nonnegative().optional(),
  ),
});

export type KpiQuery = z.infer<typeof kpiQuerySchema>;

export const reportQuerySchema = z.object({
  start: z.string().optional(),
  end: z.string().optional(),
});

export type ReportQuery = z.infer<typeof reportQuerySchema>;

export const activeAlarmsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export const clientIdParamSchema = z.object({
  clientId: z.coerce.number().int().nonnegative(),
});

export const clientAliasBodySchema = z.object({
  alias: z.string().trim().min(1, "Alias is required").max(100, "Alias must have at most 100 characters"),
});

export type ClientAliasBody = z.infer<typeof clientAliasBodySchema>;

// KPI bundles

export const todayKpiKeys = [
  "washed_kg",
  "cycles",
  "water_l",
  "weight_per_cycle",
  "water_per_kg",
  "chemical_ml",
  "chemical_per_kg",
] as const;

export const currentDayKpiKeys = ["kg", "loads", "water_l", "water_per_kg", "weight_per_load"] as const;

export const periodKpiKeys = [
  "production_kg",
  "loads",
  "weight_per_cycle",
  "daily_avg_kg",
  "water_l",
  "water_per_kg",
  "chemical_ml",
  "chemical_per_kg",
  "efficiency",
  "consolidated_kg",
  "consolidated_water_l",
  "alarms_total",
  "alarms_critical_high",
  "avg_resolution_min",
] as const;

export type TodayKpiKey = (typeof todayKpiKeys)[number];
export type CurrentDayKpiKey = (typeof currentDayKpiKeys)[number];
export type PeriodKpiKey = (typeof periodKpiKeys)[number];

/**
 * `display` is what the dashboard cards render; `values` keeps the rounded numbers.
 */
export interface KpiBundle<K extends string> {
  label: string;
  values: Record<K, number>;
  display: Record<K, string>;
}

export const statusDayStates = ["HAS_TODAY_DATA", "FALLBACK_TO_LATEST"] as const;

export const statusDayResolutionSchema = z.object({
  state: z.enum(statusDayStates),
  day: z.string(), // YYYY-MM-DD used for cumulative-status KPIs
  today: z.string(), // literal calendar day
});

export type StatusDayResolution = z.infer<typeof statusDayResolutionSchema>;

// Alarms

export const alarmPriorityLabels = {
  1: "Critical",
  2: "High",
  3: "Medium",
  4: "Low",
  5: "Info",
} as const;

export const alarmOccurrenceSchema = z.object({
  tag: z.string(),
  message: z.string(),
  occurrences: z.number().int(),
  lastOccurrence: z.string().nullable(), // YYYY-MM-DDTHH:mm:ss
});

export type AlarmOccurrence = z.infer<typeof alarmOccurrenceSchema>;

export const activeAlarmSchema = z.object({
  id: z.number().int(),
  tag: z.string(),
  message: z.string(),
  area: z.string().nullable(),
  priority: z.number().int(),
  priorityLabel: z.string(),
  startedAt: z.string(),
  durationMinutes: z.number(),
  duration: z.string(), // "1h 5m" / "12m"
});

export type ActiveAlarm = z.infer<typeof activeAlarmSchema>;

export interface KpiMisc {
  activeAlarmsToday: number;
  topAlarmsToday: AlarmOccurrence[];
  topAlarmsPeriod: AlarmOccurrence[];
  statusDay: StatusDayResolution;
  window: { start: string; endExclusive: string; startDay: string; endDay: string };
  periodDays: number;
  generatedAt: string;
}

export interface ComposedKpis {
  today: KpiBundle<TodayKpiKey>;
  currentDay: KpiBundle<CurrentDayKpiKey>;
  period: KpiBundle<PeriodKpiKey>;
  misc: KpiMisc;
}

// Report dataset tables

export const productionByClientRowSchema = z.object({
  clientId: z.number().int(),
  client: z.string(),
  totalKg: z.number(),
  totalLoads: z.number().int(),
  avgWeightKg: z.number(),
});

export const dailyProductionRowSchema = z.object({
  day: z.string(),
  loads: z.number().int(),
  kg: z.number(),
});

export const waterChemicalsDailyRowSchema = z.object({
  day: z.string(),
  kg: z.number(),
  waterLiters: z.number(),
  chemicalMl: z.number(),
  waterPerKg: z.number(),
  chemicalPerKg: z.number(),
});

export const alarmsDailyRowSchema = z.object({
  day: z.string(),
  alarms: z.number().int(),
  critical: z.number().int(), // priority 1 and 2
});

export const efficiencyDailyRowSchema = z.object({
  day: z.string(),
  productionMinutes: z.number(),
  downtimeMinutes: z.number(),
  efficiency: z.number(),
  kg: z.number(),
});

export const productionByProgramRowSchema = z.object({
  programId: z.number().int().nullable(),
  program: z.string(),
  loads: z.number().int(),
  kg: z.number(),
});

export const alarmsByPriorityRowSchema = z.object({
  priority: z.number().int(),
  label: z.string(),
  alarms: z.number().int(),
});

export type ProductionByClientRow = z.infer<typeof productionByClientRowSchema>;
export type DailyProductionRow = z.infer<typeof dailyProductionRowSchema>;
export type WaterChemicalsDailyRow = z.infer<typeof waterChemicalsDailyRowSchema>;
export type AlarmsDailyRow = z.infer<typeof alarmsDailyRowSchema>;
export type EfficiencyDailyRow = z.infer<typeof efficiencyDailyRowSchema>;
export type ProductionByProgramRow = z.infer<typeof productionByProgramRowSchema>;
export type AlarmsByPriorityRow = z.infer<typeof alarmsByPriorityRowSchema>;

export interface ReportSummary extends KpiBundle<PeriodKpiKey> {
  periodDays: number;
  generatedAt: string;
  window: KpiMisc["window"];
  activeAlarmsToday: number;
}

export interface ReportDataset {
  summary: ReportSummary;
  productionByClient: ProductionByClientRow[];
  dailyProduction: DailyProductionRow[];
  waterChemicalsDaily: WaterChemicalsDailyRow[];
  alarmsDaily: AlarmsDailyRow[];
  efficiencyDaily: EfficiencyDailyRow[];
  productionByProgram: ProductionByProgramRow[];
  alarmsByPriority: AlarmsByPriorityRow[];
}

export interface ClientCatalogEntry {
  clientId: number;
  alias: string | null;
  display: string;
}
