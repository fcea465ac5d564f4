import { randomUUID } from "crypto";
import type { Request, Response, NextFunction } from "express";

const SERVICE_NAME = process.env.SERVICE_NAME || "washline-metrics-api";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function resolveLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
}

export interface LoggerContext {
  requestId?: string;
  event?: string;
  source?: string;
  clientId?: number;
  context?: Record<string, unknown>;
}

interface LogPayload extends LoggerContext {
  errorMessage?: string | null;
  errorStack?: string | null;
}

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
}

export class StructuredLogger {
  private level: LogLevel;
  private readonly write: (line: string) => void;

  constructor(
    private readonly baseContext: LoggerContext = {},
    options: LoggerOptions = {},
  ) {
    this.level = options.level ?? resolveLevel(process.env.LOG_LEVEL);
    this.write = options.write ?? ((line) => console.log(line));
  }

  child(context: LoggerContext) {
    return new StructuredLogger(
      { ...this.baseContext, ...context },
      { level: this.level, write: this.write },
    );
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[this.level];
  }

  private emit(level: LogLevel, message: string, context: LoggerContext = {}, error?: unknown) {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const merged = { ...this.baseContext, ...context } satisfies LoggerContext;

    const payload: LogPayload = {
      requestId: merged.requestId,
      event: merged.event,
      source: merged.source,
      clientId: merged.clientId,
      context: merged.context,
      errorMessage: null,
      errorStack: null,
    };

    if (error instanceof Error) {
      payload.errorMessage = error.message;
      payload.errorStack = error.stack ?? null;
    } else if (typeof error === "string") {
      payload.errorMessage = error;
    } else if (error) {
      payload.errorMessage = JSON.stringify(error);
    }

    const logLine = {
      timestamp: new Date().toISOString(),
      level,
      service: SERVICE_NAME,
      message,
      ...payload,
    };

    this.write(JSON.stringify(logLine));
  }

  debug(message: string, context?: LoggerContext) {
    this.emit("debug", message, context);
  }

  info(message: string, context?: LoggerContext) {
    this.emit("info", message, context);
  }

  warn(message: string, context?: LoggerContext, error?: unknown) {
    this.emit("warn", message, context, error);
  }

  error(message: string, context?: LoggerContext, error?: unknown) {
    this.emit("error", message, context, error);
  }
}

export const logger = new StructuredLogger();

export function createRequestLogger(requestId?: string) {
  return logger.child({ requestId: requestId ?? randomUUID() });
}

export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction) {
  const header = req.headers["x-request-id"];
  const incoming = Array.isArray(header) ? header[0] : header;
  const requestId = incoming && incoming.length > 0 ? incoming : randomUUID();
  const requestLogger = createRequestLogger(requestId);

  req.requestId = requestId;
  req.logger = requestLogger;
  res.setHeader("X-Request-Id", requestId);

  const start = process.hrtime.bigint();

  res.on("finish", () => {
    if (!req.path.startsWith("/api")) {
      return;
    }

    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    requestLogger.info("HTTP request completed", {
      event: "http.response",
      requestId,
      context: {
        method: req.method,
        path: req.path,
        query: req.query,
        statusCode: res.statusCode,
        durationMs,
      },
    });
  });

  next();
}

export function getLogger(req?: Request) {
  return req?.logger ?? logger;
}

export type RequestLogger = StructuredLogger;
