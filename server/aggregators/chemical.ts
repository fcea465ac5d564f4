import { safeRatio } from "../numeric";
import type { ChemicalDayRecord, TimeRange } from "../record-source";
import { SourceAggregator } from "./base";

/**
 * Dosed chemicals: Q1..Q9 summed per row, then across rows (ml).
 */
export class ChemicalAggregator extends SourceAggregator {
  protected readonly sourceName = "chemical_records";

  total(range: TimeRange): Promise<number> {
    return this.read("chemical_total", 0, source => source.sumChemicals(range));
  }

  byDay(range: TimeRange): Promise<ChemicalDayRecord[]> {
    return this.read("chemical_by_day", [], source => source.chemicalsByDay(range));
  }

  static perKg(ml: number, kg: number): number {
    return safeRatio(ml, kg);
  }
}
