import type { ActiveAlarm, ClientCatalogEntry, ComposedKpis, ReportDataset } from "@shared/schema";
import { addUtcDays } from "@shared/utils";

import { createAggregators, type EngineAggregators } from "./aggregators";
import type { AliasStore } from "./alias-store";
import { buildClientCatalog, ClientAliasResolver } from "./client-alias-resolver";
import { KpiComposer } from "./kpi-composer";
import type { StructuredLogger } from "./observability/logger";
import type { RecordSource } from "./record-source";
import { ReportDatasetBuilder } from "./report-dataset-builder";
import { normalizeTimeWindow, type WindowBound } from "./time-window";

export const ACTIVE_ALARM_LOOKBACK_DAYS = 7;

export interface EngineSettings {
  queryTimeoutMs: number;
  locale: string;
  topAlarmsLimit: number;
}

export interface EngineDependencies extends EngineSettings {
  source: RecordSource;
  aliasStore: AliasStore;
  logger: StructuredLogger;
  clock?: () => Date;
}

export interface KpiRequest {
  start?: WindowBound;
  end?: WindowBound;
  clientId?: number;
}

/**
 * Request-scoped facade wiring the aggregators, the composer and the report builder
 * to one record source, one logger and one clock.
 */
export class MetricsEngine {
  readonly aggregators: EngineAggregators;
  readonly aliases: ClientAliasResolver;
  readonly composer: KpiComposer;
  readonly reports: ReportDatasetBuilder;
  private readonly clock: () => Date;
  private readonly logger: StructuredLogger;

  constructor(dependencies: EngineDependencies) {
    this.clock = dependencies.clock ?? (() => new Date());
    this.logger = dependencies.logger;
    this.aggregators = createAggregators({
      source: dependencies.source,
      logger: dependencies.logger,
      queryTimeoutMs: dependencies.queryTimeoutMs,
    });
    this.aliases = new ClientAliasResolver(dependencies.aliasStore, dependencies.logger);
    this.composer = new KpiComposer(this.aggregators, {
      locale: dependencies.locale,
      topAlarmsLimit: dependencies.topAlarmsLimit,
      clock: this.clock,
      logger: dependencies.logger,
    });
    this.reports = new ReportDatasetBuilder(this.aggregators, this.composer, this.aliases, {
      locale: dependencies.locale,
      clock: this.clock,
      logger: dependencies.logger,
    });
  }

  async composeKpis(request: KpiRequest = {}): Promise<ComposedKpis> {
    const window = normalizeTimeWindow(request.start, request.end, { now: this.clock(), logger: this.logger });
    const aliases = request.clientId === undefined ? undefined : await this.aliases.snapshot();
    return this.composer.compose(window, { clientId: request.clientId, aliases });
  }

  async buildReport(request: Omit<KpiRequest, "clientId"> = {}): Promise<ReportDataset> {
    const window = normalizeTimeWindow(request.start, request.end, { now: this.clock(), logger: this.logger });
    return this.reports.build(window);
  }

  async listActiveAlarms(limit: number): Promise<ActiveAlarm[]> {
    const now = this.clock();
    return this.aggregators.alarm.listActive(addUtcDays(now, -ACTIVE_ALARM_LOOKBACK_DAYS), limit, now);
  }

  async clientCatalog(): Promise<ClientCatalogEntry[]> {
    const clientIds = await this.aggregators.production.clientIds();
    const snapshot = await this.aliases.snapshot();
    return buildClientCatalog(clientIds, snapshot);
  }
}

export function createMetricsEngine(dependencies: EngineDependencies): MetricsEngine {
  return new MetricsEngine(dependencies);
}
