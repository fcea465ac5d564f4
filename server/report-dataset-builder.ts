import {
  periodKpiKeys,
  type AlarmsByPriorityRow,
  type AlarmsDailyRow,
  type DailyProductionRow,
  type EfficiencyDailyRow,
  type PeriodKpiKey,
  type ProductionByClientRow,
  type ProductionByProgramRow,
  type ReportDataset,
  type ReportSummary,
  type WaterChemicalsDailyRow,
} from "@shared/schema";

import {
  ChemicalAggregator,
  ProductionAggregator,
  WaterAggregator,
  priorityLabel,
  type EngineAggregators,
} from "./aggregators";
import type { AliasSnapshot, ClientAliasResolver } from "./client-alias-resolver";
import type { KpiComposer } from "./kpi-composer";
import { buildBundle, periodFormats } from "./kpi-formatting";
import { roundTo, safeRatio } from "./numeric";
import type { StructuredLogger } from "./observability/logger";
import type { ChemicalDayRecord, DailyLoadRecord, ProgramLoadRecord } from "./record-source";
import { describeWindow, inclusiveDayCount, serializeWindow, type TimeWindow } from "./time-window";

export interface ReportBuilderSettings {
  locale: string;
  clock: () => Date;
  logger: StructuredLogger;
}

// Quantities keep two decimals in the tables; ratios follow the KPI precision
const QUANTITY_DECIMALS = 2;

function emptyPeriodValues(): Record<PeriodKpiKey, number> {
  return {
    production_kg: 0,
    loads: 0,
    weight_per_cycle: 0,
    daily_avg_kg: 0,
    water_l: 0,
    water_per_kg: 0,
    chemical_ml: 0,
    chemical_per_kg: 0,
    efficiency: 0,
    consolidated_kg: 0,
    consolidated_water_l: 0,
    alarms_total: 0,
    alarms_critical_high: 0,
    avg_resolution_min: 0,
  };
}

export function mergeWaterAndChemicals(
  loads: DailyLoadRecord[],
  chemicals: ChemicalDayRecord[],
): WaterChemicalsDailyRow[] {
  const byDay = new Map<string, { kg: number; waterVolume: number; chemicalMl: number }>();

  for (const row of loads) {
    byDay.set(row.day, { kg: row.kg, waterVolume: row.waterVolume, chemicalMl: 0 });
  }
  for (const row of chemicals) {
    const existing = byDay.get(row.day);
    if (existing) {
      existing.chemicalMl += row.ml;
    } else {
      byDay.set(row.day, { kg: 0, waterVolume: 0, chemicalMl: row.ml });
    }
  }

  return Array.from(byDay.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([day, totals]) => ({
      day,
      kg: roundTo(totals.kg, QUANTITY_DECIMALS),
      waterLiters: roundTo(WaterAggregator.liters(totals.waterVolume), QUANTITY_DECIMALS),
      chemicalMl: roundTo(totals.chemicalMl, QUANTITY_DECIMALS),
      waterPerKg: roundTo(WaterAggregator.litersPerKg(totals.waterVolume, totals.kg), 2),
      chemicalPerKg: roundTo(ChemicalAggregator.perKg(totals.chemicalMl, totals.kg), 3),
    }));
}

function programName(row: ProgramLoadRecord): string {
  if (row.programName) {
    return row.programName;
  }
  return row.programId === null ? "Unassigned" : `Program ${row.programId}`;
}

/**
 * Assembles the export dataset for a window: the period summary plus the per-day,
 * per-client and per-program tables. Never rejects; a failure leaves empty tables
 * and a zeroed summary.
 */
export class ReportDatasetBuilder {
  constructor(
    private readonly aggregators: EngineAggregators,
    private readonly composer: KpiComposer,
    private readonly aliases: ClientAliasResolver,
    private readonly settings: ReportBuilderSettings,
  ) {}

  async build(window: TimeWindow): Promise<ReportDataset> {
    try {
      const snapshot = await this.aliases.snapshot();
      return await this.assemble(window, snapshot);
    } catch (error) {
      this.settings.logger.error(
        "Report dataset build failed, returning empty tables",
        { event: "report.failed", context: serializeWindow(window) },
        error,
      );
      return this.emptyDataset(window);
    }
  }

  private async assemble(window: TimeWindow, snapshot: AliasSnapshot): Promise<ReportDataset> {
    const { production, water, chemical, alarm } = this.aggregators;

    const composed = await this.composer.compose(window);
    const summary: ReportSummary = {
      ...composed.period,
      periodDays: composed.misc.periodDays,
      generatedAt: composed.misc.generatedAt,
      window: composed.misc.window,
      activeAlarmsToday: composed.misc.activeAlarmsToday,
    };

    const productionByClient: ProductionByClientRow[] = (await production.loadsByClient(window)).map(row => ({
      clientId: row.clientId,
      client: snapshot.resolve(row.clientId),
      totalKg: roundTo(row.kg, QUANTITY_DECIMALS),
      totalLoads: row.loads,
      avgWeightKg: roundTo(safeRatio(row.kg, row.loads), 2),
    }));

    const dailyProduction: DailyProductionRow[] = (await production.loadsByDay(window)).map(row => ({
      day: row.day,
      loads: row.loads,
      kg: roundTo(row.kg, QUANTITY_DECIMALS),
    }));

    const waterChemicalsDaily = mergeWaterAndChemicals(
      await water.loadWaterByDay(window),
      await chemical.byDay(window),
    );

    const alarmsDaily: AlarmsDailyRow[] = (await alarm.byDay(window)).map(row => ({
      day: row.day,
      alarms: row.alarms,
      critical: row.critical,
    }));

    const efficiencyDaily: EfficiencyDailyRow[] = (await production.consolidatedByDay(window)).map(row => ({
      day: row.day,
      productionMinutes: roundTo(row.productionMinutes, QUANTITY_DECIMALS),
      downtimeMinutes: roundTo(row.downtimeMinutes, QUANTITY_DECIMALS),
      efficiency: roundTo(ProductionAggregator.efficiency(row), 1),
      kg: roundTo(row.kg, QUANTITY_DECIMALS),
    }));

    const productionByProgram: ProductionByProgramRow[] = (await production.loadsByProgram(window)).map(row => ({
      programId: row.programId,
      program: programName(row),
      loads: row.loads,
      kg: roundTo(row.kg, QUANTITY_DECIMALS),
    }));

    const alarmsByPriority: AlarmsByPriorityRow[] = (await alarm.byPriority(window)).map(row => ({
      priority: row.priority,
      label: priorityLabel(row.priority),
      alarms: row.alarms,
    }));

    this.settings.logger.info("Report dataset built", {
      event: "report.built",
      context: {
        ...serializeWindow(window),
        clients: productionByClient.length,
        days: dailyProduction.length,
        aliases: snapshot.size,
      },
    });

    return {
      summary,
      productionByClient,
      dailyProduction,
      waterChemicalsDaily,
      alarmsDaily,
      efficiencyDaily,
      productionByProgram,
      alarmsByPriority,
    };
  }

  private emptyDataset(window: TimeWindow): ReportDataset {
    const bundle = buildBundle<PeriodKpiKey>(
      describeWindow(window),
      periodKpiKeys,
      emptyPeriodValues(),
      periodFormats,
      this.settings.locale,
    );

    return {
      summary: {
        ...bundle,
        periodDays: inclusiveDayCount(window),
        generatedAt: this.settings.clock().toISOString(),
        window: serializeWindow(window),
        activeAlarmsToday: 0,
      },
      productionByClient: [],
      dailyProduction: [],
      waterChemicalsDaily: [],
      alarmsDaily: [],
      efficiencyDaily: [],
      productionByProgram: [],
      alarmsByPriority: [],
    };
  }
}
