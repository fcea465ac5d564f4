import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from "prom-client";

const SERVICE_NAME = process.env.SERVICE_NAME || "washline-metrics-api";

export const metricsRegistry = new Registry();

collectDefaultMetrics({
  register: metricsRegistry,
  labels: { service: SERVICE_NAME },
});

const UNKNOWN_LABEL_VALUE = "unknown";

function normalizeLabel(value?: string) {
  if (!value) {
    return UNKNOWN_LABEL_VALUE;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : UNKNOWN_LABEL_VALUE;
}

export type SourceQueryStatus = "success" | "error" | "timeout";

export const sourceQueryDuration = new Histogram({
  name: "source_query_duration_seconds",
  help: "Duration of record source queries issued by the metrics engine",
  labelNames: ["source", "status"],
  registers: [metricsRegistry],
  buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
});

export const sourceQueryFailures = new Counter({
  name: "source_query_failures_total",
  help: "Record source queries that degraded to an empty result",
  labelNames: ["source", "reason"],
  registers: [metricsRegistry],
});

export const sourceQueriesActive = new Gauge({
  name: "source_queries_active",
  help: "Record source queries in flight",
  labelNames: ["source"],
  registers: [metricsRegistry],
});

export interface SourceQueryTimer {
  startedAt: bigint;
  source: string;
}

export function startSourceQueryTimer(source: string): SourceQueryTimer {
  const normalizedSource = normalizeLabel(source);
  sourceQueriesActive.inc({ source: normalizedSource });
  return { startedAt: process.hrtime.bigint(), source: normalizedSource };
}

/**
 * Closes a timer opened by {@link startSourceQueryTimer} and returns the elapsed milliseconds.
 */
export function recordSourceQueryDuration(timer: SourceQueryTimer, status: SourceQueryStatus) {
  const elapsedNs = process.hrtime.bigint() - timer.startedAt;
  const elapsedSeconds = Number(elapsedNs) / 1_000_000_000;
  sourceQueryDuration.observe({ source: timer.source, status }, elapsedSeconds);
  sourceQueriesActive.dec({ source: timer.source });
  return elapsedSeconds * 1000;
}

export function incrementSourceQueryFailure(source: string, reason: Exclude<SourceQueryStatus, "success">) {
  sourceQueryFailures.inc({ source: normalizeLabel(source), reason });
}
