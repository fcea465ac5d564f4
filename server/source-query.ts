import { SourceUnavailableError, TimeoutError } from "./errors";
import { incrementSourceQueryFailure, recordSourceQueryDuration, startSourceQueryTimer } from "./observability/metrics";
import type { StructuredLogger } from "./observability/logger";

export interface SourceQueryOptions<T> {
  source: string;
  operation: string;
  fallback: T;
  timeoutMs: number;
  logger: StructuredLogger;
}

function withDeadline<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, deadline]).finally(() => {
    if (timer) {
      clearTimeout(timer);
    }
  });
}

/**
 * Runs one record source query. A rejection or an expired deadline is logged as
 * `source.degraded` and resolves to `fallback`; this never rejects.
 */
export async function runSourceQuery<T>(run: () => Promise<T>, options: SourceQueryOptions<T>): Promise<T> {
  const timer = startSourceQueryTimer(options.source);
  let pending: Promise<T>;
  try {
    pending = run();
  } catch (error) {
    pending = Promise.reject(error);
  }

  try {
    const result = await withDeadline(pending, options.timeoutMs);
    recordSourceQueryDuration(timer, "success");
    return result;
  } catch (error) {
    const reason = error instanceof TimeoutError ? "timeout" : "error";
    const durationMs = recordSourceQueryDuration(timer, reason);
    incrementSourceQueryFailure(options.source, reason);

    const failure = new SourceUnavailableError(options.source, reason, { cause: error });
    options.logger.warn(
      "Record source query degraded to empty result",
      {
        event: "source.degraded",
        source: options.source,
        context: { operation: options.operation, reason, durationMs },
      },
      failure,
    );
    return options.fallback;
  }
}
