import { safeRatio } from "../numeric";
import type { DailyLoadRecord, TimeRange } from "../record-source";
import { SourceAggregator } from "./base";

export const LITERS_PER_CUBIC_METER = 1000;

// Volumes are stored in m³
export class WaterAggregator extends SourceAggregator {
  protected readonly sourceName = "load_records";

  loadWater(range: TimeRange, clientId?: number): Promise<number> {
    return this.read("load_water", 0, source => source.sumLoadWater(range, clientId));
  }

  loadWaterByDay(range: TimeRange): Promise<DailyLoadRecord[]> {
    return this.read("load_water_by_day", [], source => source.loadsByDay(range));
  }

  consolidatedWater(range: TimeRange, clientId?: number): Promise<number> {
    return this.read(
      "consolidated_water",
      0,
      source => source.sumConsolidatedWater(range, clientId),
      "daily_records",
    );
  }

  static liters(volume: number): number {
    return volume * LITERS_PER_CUBIC_METER;
  }

  static litersPerKg(volume: number, kg: number): number {
    return safeRatio(WaterAggregator.liters(volume), kg);
  }
}
