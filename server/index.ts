import "dotenv/config";
import express, { type Request, Response, NextFunction } from "express";

import { DrizzleAliasStore } from "./alias-store";
import { getConfig, getConfigIssues } from "./config";
import { closeDb, initDb } from "./db/client";
import { registerRoutes } from "./routes";
import { requestLoggingMiddleware, getLogger, logger } from "./observability/logger";

const config = getConfig();
logger.setLevel(config.logLevel);
const app = express();

for (const key of getConfigIssues()) {
  logger.warn("Invalid configuration value, using default", {
    event: "config.invalid",
    context: { key },
  });
}

const shutdownSignals: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
for (const signal of shutdownSignals) {
  process.once(signal, () => {
    logger.info("Shutdown signal received", {
      event: "server.shutdown",
      context: { signal },
    });

    closeDb()
      .catch(error => {
        logger.error("Failed to close database connection", undefined, error);
      })
      .finally(() => {
        process.exit(0);
      });
  });
}

app.use(express.json());
app.use(express.urlencoded({ extended: false }));
app.use(requestLoggingMiddleware);

async function prepareAliasTable() {
  if (!config.databaseUrl) {
    logger.warn("DATABASE_URL is not configured; KPI endpoints will report degraded results", {
      event: "server.config",
    });
    return;
  }

  const db = initDb();
  try {
    const migrated = await new DrizzleAliasStore(db).ensureSchema();
    logger.info("Client alias table ready", {
      event: "alias.bootstrap",
      context: { migrated },
    });
  } catch (error) {
    logger.error("Could not prepare the client alias table", { event: "alias.bootstrap" }, error);
  }
}

(async () => {
  await prepareAliasTable();
  const server = await registerRoutes(app, { config });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const status =
      typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" ? err.status : 500;
    const message = err instanceof Error ? err.message : "Internal Server Error";

    res.status(status).json({ error: message });
    getLogger(req).error("Unhandled error", { event: "http.error" }, err);
  });

  server.listen(
    {
      port: config.port,
      host: "0.0.0.0",
    },
    () => {
      logger.info("Server started", {
        event: "server.start",
        context: { port: config.port, service: config.serviceName },
      });
    },
  );
})().catch(error => {
  logger.error("Server failed to start", { event: "server.start" }, error);
  process.exit(1);
});
