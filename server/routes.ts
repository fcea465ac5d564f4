import type { Express, Request, Response } from "express";
import { createServer, type Server } from "http";
import { z } from "zod";

import {
  activeAlarmsQuerySchema,
  clientAliasBodySchema,
  clientIdParamSchema,
  kpiQuerySchema,
  reportQuerySchema,
} from "@shared/schema";
import { DrizzleAliasStore, type AliasStore } from "./alias-store";
import { getConfig, getConfigIssues, type AppConfig } from "./config";
import { getDb, type Database } from "./db/client";
import { createMetricsEngine, type MetricsEngine } from "./metrics-engine";
import { getLogger } from "./observability/logger";
import { metricsRegistry } from "./observability/metrics";
import { evaluateReadinessDependencies } from "./observability/readiness";
import { DrizzleRecordSource, type RecordSource } from "./record-source";

export type RouteDependencies = {
  db?: Database;
  source?: RecordSource;
  aliasStore?: AliasStore;
  config?: AppConfig;
  clock?: () => Date;
};

function describeZodError(error: z.ZodError): string {
  return error.errors.map(err => `${err.path.join(".")}: ${err.message}`).join(", ");
}

export async function registerRoutes(
  app: Express,
  dependencies: RouteDependencies = {},
): Promise<Server> {
  const config = dependencies.config ?? getConfig();

  let source: RecordSource | undefined = dependencies.source;
  let aliasStore: AliasStore | undefined = dependencies.aliasStore;
  const resolveDatabase = (): Database => dependencies.db ?? getDb();
  const resolveSource = (): RecordSource => {
    source ??= new DrizzleRecordSource(resolveDatabase);
    return source;
  };
  const resolveAliasStore = (): AliasStore => {
    aliasStore ??= new DrizzleAliasStore(resolveDatabase);
    return aliasStore;
  };
  const databaseConfigured =
    dependencies.db !== undefined || dependencies.source !== undefined || Boolean(config.databaseUrl);

  const engineFor = (req: Request): MetricsEngine =>
    createMetricsEngine({
      source: resolveSource(),
      aliasStore: resolveAliasStore(),
      logger: getLogger(req),
      clock: dependencies.clock,
      queryTimeoutMs: config.sourceQueryTimeoutMs,
      locale: config.kpiLocale,
      topAlarmsLimit: config.topAlarmsLimit,
    });

  const handleRouteError = (req: Request, res: Response, error: unknown, event: string) => {
    if (error instanceof z.ZodError) {
      return res.status(400).json({ error: describeZodError(error) });
    }
    getLogger(req).error("Request failed", { event }, error);
    return res.status(500).json({ error: error instanceof Error ? error.message : "Internal Server Error" });
  };

  app.get("/healthz", (_req, res) => {
    res.status(200).json({
      status: "ok",
      service: config.serviceName,
      commit: process.env.GIT_COMMIT_SHA ?? null,
      buildTime: process.env.BUILD_TIMESTAMP ?? null,
    });
  });

  app.get("/readyz", async (_req, res) => {
    const { healthy, dependencies: probes } = await evaluateReadinessDependencies({
      databaseConfigured,
      configIssues: dependencies.config ? [] : getConfigIssues(),
      checkRecordSource: () => resolveSource().checkHealth(),
      checkAliasStore: () => resolveAliasStore().checkHealth(),
    });

    res.status(healthy ? 200 : 503).json({
      status: healthy ? "ok" : "error",
      dependencies: probes,
    });
  });

  app.get("/api/internal/metrics", async (_req, res) => {
    res.set("Content-Type", metricsRegistry.contentType);
    res.send(await metricsRegistry.metrics());
  });

  // GET /api/kpis?start=YYYY-MM-DD&end=YYYY-MM-DD&clientId=7
  app.get("/api/kpis", async (req, res) => {
    try {
      const query = kpiQuerySchema.parse(req.query);
      const kpis = await engineFor(req).composeKpis(query);
      res.json(kpis);
    } catch (error) {
      handleRouteError(req, res, error, "kpi.compose");
    }
  });

  // GET /api/reports/dataset?start=YYYY-MM-DD&end=YYYY-MM-DD
  app.get("/api/reports/dataset", async (req, res) => {
    try {
      const query = reportQuerySchema.parse(req.query);
      const dataset = await engineFor(req).buildReport(query);
      res.json(dataset);
    } catch (error) {
      handleRouteError(req, res, error, "report.build");
    }
  });

  // GET /api/alarms/active?limit=20 - open alarms started in the last 7 days
  app.get("/api/alarms/active", async (req, res) => {
    try {
      const { limit } = activeAlarmsQuerySchema.parse(req.query);
      const alarms = await engineFor(req).listActiveAlarms(limit);
      res.json({ alarms });
    } catch (error) {
      handleRouteError(req, res, error, "alarms.active");
    }
  });

  // GET /api/clients - client ids seen in the load ledger with their aliases
  app.get("/api/clients", async (req, res) => {
    try {
      const clients = await engineFor(req).clientCatalog();
      res.json({ clients });
    } catch (error) {
      handleRouteError(req, res, error, "clients.catalog");
    }
  });

  // PUT /api/clients/:clientId/alias
  app.put("/api/clients/:clientId/alias", async (req, res) => {
    try {
      const { clientId } = clientIdParamSchema.parse(req.params);
      const { alias } = clientAliasBodySchema.parse(req.body);

      await resolveAliasStore().upsert(clientId, alias);
      getLogger(req).info("Client alias saved", {
        event: "alias.upsert",
        clientId,
      });

      res.json({ clientId, alias, display: alias });
    } catch (error) {
      handleRouteError(req, res, error, "alias.upsert");
    }
  });

  // DELETE /api/clients/:clientId/alias
  app.delete("/api/clients/:clientId/alias", async (req, res) => {
    try {
      const { clientId } = clientIdParamSchema.parse(req.params);
      const removed = await resolveAliasStore().delete(clientId);
      if (!removed) {
        return res.status(404).json({ error: "Alias not found" });
      }

      getLogger(req).info("Client alias removed", {
        event: "alias.delete",
        clientId,
      });
      res.status(204).end();
    } catch (error) {
      handleRouteError(req, res, error, "alias.delete");
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}
