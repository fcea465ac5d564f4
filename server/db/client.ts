import { drizzle } from "drizzle-orm/node-postgres";
import type { PgDatabase, PgQueryResultHKT } from "drizzle-orm/pg-core";
import pg from "pg";

import { getConfig } from "../config";
import { logger, type StructuredLogger } from "../observability/logger";

// Queries go through the select builder with explicit tables, so no relational schema is bound
export type Database = PgDatabase<PgQueryResultHKT>;

// A bound database or a provider resolved on each query
export type DatabaseHandle = Database | (() => Database);

type InitOptions = {
  connectionString?: string;
  statementTimeoutMs?: number;
};

let dbInstance: Database | undefined;
let disposeInstance: (() => Promise<void>) | undefined;
let rememberedOptions: InitOptions | undefined;

type PoolOptions = {
  connectionString: string;
  timeoutMs: number;
};

export function createPool(options: PoolOptions, log: StructuredLogger = logger): pg.Pool {
  const pool = new pg.Pool({
    connectionString: options.connectionString,
    statement_timeout: options.timeoutMs,
    connectionTimeoutMillis: options.timeoutMs,
  });
  // Idle clients report server restarts and dropped sockets here
  pool.on("error", error => {
    log.error("Idle database client error", { event: "db.pool_error" }, error);
  });
  return pool;
}

function createDb(options?: InitOptions): Database {
  const config = getConfig();
  const connectionString = options?.connectionString ?? config.databaseUrl;
  if (!connectionString) {
    throw new Error("DATABASE_URL is not configured");
  }

  const timeoutMs = options?.statementTimeoutMs ?? config.sourceQueryTimeoutMs;
  const pool = createPool({ connectionString, timeoutMs });
  disposeInstance = async () => {
    await pool.end();
  };
  dbInstance = drizzle(pool);
  return dbInstance;
}

export function initDb(options?: InitOptions): Database {
  rememberedOptions = options ?? rememberedOptions;
  if (dbInstance) {
    return dbInstance;
  }
  return createDb(rememberedOptions);
}

export function getDb(): Database {
  if (!dbInstance) {
    return initDb();
  }
  return dbInstance;
}

export async function closeDb(): Promise<void> {
  const dispose = disposeInstance;
  disposeInstance = undefined;
  dbInstance = undefined;
  if (dispose) {
    await dispose();
  }
}
