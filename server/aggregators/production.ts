import { safeRatio } from "../numeric";
import type {
  ClientLoadRecord,
  ConsolidatedDayRecord,
  ConsolidatedTotals,
  DailyLoadRecord,
  LoadTotals,
  ProgramLoadRecord,
  TimeRange,
} from "../record-source";
import { SourceAggregator } from "./base";

const CONSOLIDATED_SOURCE = "daily_records";

const EMPTY_CONSOLIDATED: ConsolidatedTotals = { kg: 0, productionMinutes: 0, downtimeMinutes: 0, records: 0 };

/**
 * Production figures from the per-load ledger (Rel_Carga) and the consolidated
 * daily table (Rel_Diario).
 */
export class ProductionAggregator extends SourceAggregator {
  protected readonly sourceName = "load_records";

  loadTotals(range: TimeRange, clientId?: number): Promise<LoadTotals> {
    return this.read("load_totals", { kg: 0, loads: 0 }, source => source.sumLoads(range, clientId));
  }

  loadsByDay(range: TimeRange): Promise<DailyLoadRecord[]> {
    return this.read("loads_by_day", [], source => source.loadsByDay(range));
  }

  loadsByClient(range: TimeRange): Promise<ClientLoadRecord[]> {
    return this.read("loads_by_client", [], source => source.loadsByClient(range));
  }

  loadsByProgram(range: TimeRange): Promise<ProgramLoadRecord[]> {
    return this.read("loads_by_program", [], source => source.loadsByProgram(range));
  }

  clientIds(): Promise<number[]> {
    return this.read("client_ids", [], source => source.listLoadClientIds());
  }

  consolidatedTotals(range: TimeRange, clientId?: number): Promise<ConsolidatedTotals> {
    return this.read(
      "consolidated_totals",
      { ...EMPTY_CONSOLIDATED },
      source => source.sumConsolidated(range, clientId),
      CONSOLIDATED_SOURCE,
    );
  }

  consolidatedByDay(range: TimeRange): Promise<ConsolidatedDayRecord[]> {
    return this.read("consolidated_by_day", [], source => source.consolidatedByDay(range), CONSOLIDATED_SOURCE);
  }

  /**
   * Σproduction / Σ(production + downtime), in percent.
   */
  static efficiency(totals: Pick<ConsolidatedTotals, "productionMinutes" | "downtimeMinutes">): number {
    return safeRatio(totals.productionMinutes, totals.productionMinutes + totals.downtimeMinutes) * 100;
  }

  static weightPerLoad(totals: LoadTotals): number {
    return safeRatio(totals.kg, totals.loads);
  }
}
