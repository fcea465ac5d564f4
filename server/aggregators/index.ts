import { StatusDayResolver } from "../status-day-resolver";
import { AlarmAggregator } from "./alarm";
import type { AggregatorContext } from "./base";
import { ChemicalAggregator } from "./chemical";
import { ProductionAggregator } from "./production";
import { WaterAggregator } from "./water";

export type { AggregatorContext } from "./base";
export { AlarmAggregator, priorityLabel } from "./alarm";
export { ChemicalAggregator } from "./chemical";
export { ProductionAggregator } from "./production";
export { WaterAggregator } from "./water";

export interface EngineAggregators {
  production: ProductionAggregator;
  water: WaterAggregator;
  chemical: ChemicalAggregator;
  alarm: AlarmAggregator;
  statusDay: StatusDayResolver;
}

export function createAggregators(context: AggregatorContext): EngineAggregators {
  return {
    production: new ProductionAggregator(context),
    water: new WaterAggregator(context),
    chemical: new ChemicalAggregator(context),
    alarm: new AlarmAggregator(context),
    statusDay: new StatusDayResolver(context),
  };
}
