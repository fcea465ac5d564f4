export type SourceFailureReason = "error" | "timeout";

/**
 * A record source could not answer (connection failure, query error or deadline expiry).
 * Aggregators absorb it and fall back to the empty value of the query.
 */
export class SourceUnavailableError extends Error {
  readonly reason: SourceFailureReason;
  readonly source: string;

  constructor(source: string, reason: SourceFailureReason, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(
      reason === "timeout" ? `Source ${source} timed out${detail}` : `Source ${source} unavailable${detail}`,
      options?.cause === undefined ? undefined : { cause: options.cause },
    );
    this.name = "SourceUnavailableError";
    this.source = source;
    this.reason = reason;
  }
}

export class ParseFailureError extends Error {
  readonly input: unknown;

  constructor(message: string, input: unknown) {
    super(message);
    this.name = "ParseFailureError";
    this.input = input;
  }
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Query exceeded ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}
