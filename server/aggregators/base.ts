import type { StructuredLogger } from "../observability/logger";
import type { RecordSource } from "../record-source";
import { runSourceQuery } from "../source-query";

export interface AggregatorContext {
  source: RecordSource;
  logger: StructuredLogger;
  queryTimeoutMs: number;
}

/**
 * Shared plumbing for the per-table aggregators: every read is bounded by the query
 * deadline and degrades to its empty value instead of rejecting.
 */
export abstract class SourceAggregator {
  protected abstract readonly sourceName: string;

  constructor(protected readonly context: AggregatorContext) {}

  protected read<T>(
    operation: string,
    fallback: T,
    run: (source: RecordSource) => Promise<T>,
    sourceName: string = this.sourceName,
  ): Promise<T> {
    return runSourceQuery(() => run(this.context.source), {
      source: sourceName,
      operation,
      fallback,
      timeoutMs: this.context.queryTimeoutMs,
      logger: this.context.logger,
    });
  }
}
