import { z } from "zod";

import type { LogLevel } from "./observability/logger";

export interface AppConfig {
  databaseUrl: string | undefined;
  port: number;
  serviceName: string;
  sourceQueryTimeoutMs: number;
  kpiLocale: string;
  topAlarmsLimit: number;
  logLevel: LogLevel;
}

export interface LoadedConfig {
  config: AppConfig;
  invalidKeys: string[];
}

function isSupportedLocale(locale: string): boolean {
  try {
    return Intl.NumberFormat.supportedLocalesOf([locale]).length > 0;
  } catch {
    return false;
  }
}

/**
 * Reads the service configuration from the environment. A value that does not
 * validate falls back to its default and its key is reported in `invalidKeys`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const invalidKeys: string[] = [];
  const fallback =
    <T>(key: string, value: T) =>
    ({ input }: { input: unknown }): T => {
      if (input !== undefined && input !== "") {
        invalidKeys.push(key);
      }
      return value;
    };

  const schema = z.object({
    DATABASE_URL: z.string().trim().min(1).optional().catch(fallback("DATABASE_URL", undefined)),
    PORT: z.coerce.number().int().min(1).max(65535).catch(fallback("PORT", 5000)),
    SERVICE_NAME: z.string().trim().min(1).catch(fallback("SERVICE_NAME", "washline-metrics-api")),
    SOURCE_QUERY_TIMEOUT_MS: z.coerce
      .number()
      .int()
      .min(100)
      .max(60_000)
      .catch(fallback("SOURCE_QUERY_TIMEOUT_MS", 5000)),
    KPI_LOCALE: z.string().trim().refine(isSupportedLocale).catch(fallback("KPI_LOCALE", "en-US")),
    TOP_ALARMS_LIMIT: z.coerce.number().int().min(1).max(50).catch(fallback("TOP_ALARMS_LIMIT", 5)),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).catch(fallback<LogLevel>("LOG_LEVEL", "info")),
  });

  const parsed = schema.parse(env);

  return {
    config: {
      databaseUrl: parsed.DATABASE_URL,
      port: parsed.PORT,
      serviceName: parsed.SERVICE_NAME,
      sourceQueryTimeoutMs: parsed.SOURCE_QUERY_TIMEOUT_MS,
      kpiLocale: parsed.KPI_LOCALE,
      topAlarmsLimit: parsed.TOP_ALARMS_LIMIT,
      logLevel: parsed.LOG_LEVEL,
    },
    invalidKeys,
  };
}

let cachedConfig: LoadedConfig | undefined;

export function getConfig(): AppConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig.config;
}

export function getConfigIssues(): string[] {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return [...cachedConfig.invalidKeys];
}

export function resetConfig(): void {
  cachedConfig = undefined;
}
