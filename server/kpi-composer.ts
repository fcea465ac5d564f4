import {
  currentDayKpiKeys,
  periodKpiKeys,
  todayKpiKeys,
  type ComposedKpis,
  type CurrentDayKpiKey,
  type PeriodKpiKey,
  type StatusDayResolution,
  type TodayKpiKey,
} from "@shared/schema";
import { toIsoDay } from "@shared/utils";

import { ChemicalAggregator, ProductionAggregator, WaterAggregator, type EngineAggregators } from "./aggregators";
import type { AliasSnapshot } from "./client-alias-resolver";
import { buildBundle, currentDayFormats, periodFormats, todayFormats } from "./kpi-formatting";
import { safeRatio } from "./numeric";
import type { StructuredLogger } from "./observability/logger";
import { dayWindow, describeWindow, inclusiveDayCount, serializeWindow, type TimeWindow } from "./time-window";

export interface ComposerSettings {
  locale: string;
  topAlarmsLimit: number;
  clock: () => Date;
  logger: StructuredLogger;
}

export interface ComposeOptions {
  clientId?: number;
  // used to name the filtered client in the period label
  aliases?: AliasSnapshot;
}

function todayLabel(resolution: StatusDayResolution): string {
  return resolution.state === "HAS_TODAY_DATA" ? "Today" : `Latest day with data (${resolution.day})`;
}

/**
 * Builds the three KPI bundles shown on the dashboard:
 * - `today`: last cumulative status row of the resolved day (today, or the latest day with data)
 * - `currentDay`: load ledger for the literal calendar day
 * - `period`: the selected window, optionally filtered by client
 */
export class KpiComposer {
  constructor(
    private readonly aggregators: EngineAggregators,
    private readonly settings: ComposerSettings,
  ) {}

  async compose(window: TimeWindow, options: ComposeOptions = {}): Promise<ComposedKpis> {
    const now = this.settings.clock();
    const todayWindow = dayWindow(toIsoDay(now));
    const { production, water, chemical, alarm, statusDay } = this.aggregators;

    // Cumulative status source, resolved day
    const resolution = await statusDay.resolve(now);
    const snapshot = await statusDay.readSnapshot(resolution.day);
    const statusChemicals = await chemical.total(dayWindow(resolution.day));

    const today = buildBundle<TodayKpiKey>(
      todayLabel(resolution),
      todayKpiKeys,
      {
        washed_kg: snapshot.washedKg,
        cycles: snapshot.cycles,
        water_l: WaterAggregator.liters(snapshot.waterVolume),
        weight_per_cycle: safeRatio(snapshot.washedKg, snapshot.cycles),
        water_per_kg: WaterAggregator.litersPerKg(snapshot.waterVolume, snapshot.washedKg),
        chemical_ml: statusChemicals,
        chemical_per_kg: ChemicalAggregator.perKg(statusChemicals, snapshot.washedKg),
      },
      todayFormats,
      this.settings.locale,
    );

    // Load ledger, literal calendar day
    const todayLoads = await production.loadTotals(todayWindow);
    const todayWater = await water.loadWater(todayWindow);

    const currentDay = buildBundle<CurrentDayKpiKey>(
      `Loads on ${todayWindow.startDay}`,
      currentDayKpiKeys,
      {
        kg: todayLoads.kg,
        loads: todayLoads.loads,
        water_l: WaterAggregator.liters(todayWater),
        water_per_kg: WaterAggregator.litersPerKg(todayWater, todayLoads.kg),
        weight_per_load: ProductionAggregator.weightPerLoad(todayLoads),
      },
      currentDayFormats,
      this.settings.locale,
    );

    // Selected period
    const loads = await production.loadTotals(window, options.clientId);
    const loadWater = await water.loadWater(window, options.clientId);
    const chemicals = await chemical.total(window);
    // Dosing is not recorded per client, so the ratio stays plant-wide under a filter
    const plantLoads = options.clientId === undefined ? loads : await production.loadTotals(window);
    const consolidated = await production.consolidatedTotals(window, options.clientId);
    const consolidatedWater = await water.consolidatedWater(window, options.clientId);
    const alarmsStarted = await alarm.countStarted(window);
    const alarmsByPriority = await alarm.byPriority(window);
    const resolutionMinutes = await alarm.averageResolutionMinutes(window);
    const periodDays = inclusiveDayCount(window);

    const criticalHigh = alarmsByPriority
      .filter(row => row.priority <= 2)
      .reduce((total, row) => total + row.alarms, 0);

    let periodLabel = describeWindow(window);
    if (options.clientId !== undefined && options.aliases) {
      periodLabel = `${periodLabel} (${options.aliases.resolve(options.clientId)})`;
    }

    const period = buildBundle<PeriodKpiKey>(
      periodLabel,
      periodKpiKeys,
      {
        production_kg: loads.kg,
        loads: loads.loads,
        weight_per_cycle: ProductionAggregator.weightPerLoad(loads),
        daily_avg_kg: safeRatio(loads.kg, periodDays),
        water_l: WaterAggregator.liters(loadWater),
        water_per_kg: WaterAggregator.litersPerKg(loadWater, loads.kg),
        chemical_ml: chemicals,
        chemical_per_kg: ChemicalAggregator.perKg(chemicals, plantLoads.kg),
        efficiency: ProductionAggregator.efficiency(consolidated),
        consolidated_kg: consolidated.kg,
        consolidated_water_l: WaterAggregator.liters(consolidatedWater),
        alarms_total: alarmsStarted,
        alarms_critical_high: criticalHigh,
        avg_resolution_min: resolutionMinutes,
      },
      periodFormats,
      this.settings.locale,
    );

    // Alarm lists for the dashboard
    const activeAlarmsToday = await alarm.countActive(todayWindow);
    const topAlarmsToday = await alarm.topClosedSince(todayWindow.start, this.settings.topAlarmsLimit);
    const topAlarmsPeriod = await alarm.topClosedInPeriod(window, this.settings.topAlarmsLimit);

    this.settings.logger.debug("KPIs composed", {
      event: "kpi.composed",
      clientId: options.clientId,
      context: { statusDay: resolution.day, state: resolution.state, periodDays },
    });

    return {
      today,
      currentDay,
      period,
      misc: {
        activeAlarmsToday,
        topAlarmsToday,
        topAlarmsPeriod,
        statusDay: resolution,
        window: serializeWindow(window),
        periodDays,
        generatedAt: now.toISOString(),
      },
    };
  }
}
