import { asc, eq, sql } from "drizzle-orm";

import { getDb, type Database, type DatabaseHandle } from "./db/client";
import { clientAliases } from "./db/schema";
import { coerceInteger } from "./numeric";

export interface AliasStore {
  getAllAliases(): Promise<Map<number, string>>;
  upsert(clientId: number, alias: string): Promise<void>;
  delete(clientId: number): Promise<boolean>;
  checkHealth(): Promise<void>;
}

export class DrizzleAliasStore implements AliasStore {
  private readonly resolveDb: () => Database;

  constructor(db: DatabaseHandle = getDb) {
    if (typeof db === "function") {
      this.resolveDb = db;
    } else {
      const bound: Database = db;
      this.resolveDb = () => bound;
    }
  }

  private get db(): Database {
    return this.resolveDb();
  }

  async getAllAliases(): Promise<Map<number, string>> {
    const rows = await this.db
      .select({ clientId: clientAliases.clientId, alias: clientAliases.alias })
      .from(clientAliases)
      .where(sql`coalesce(${clientAliases.active}, true)`)
      .orderBy(asc(clientAliases.clientId));

    return new Map(rows.map(row => [row.clientId, row.alias]));
  }

  async upsert(clientId: number, alias: string): Promise<void> {
    await this.db
      .insert(clientAliases)
      .values({ clientId, alias })
      .onConflictDoUpdate({
        target: clientAliases.clientId,
        set: { alias, active: true },
      });
  }

  async delete(clientId: number): Promise<boolean> {
    const removed = await this.db
      .delete(clientAliases)
      .where(eq(clientAliases.clientId, clientId))
      .returning({ clientId: clientAliases.clientId });

    return removed.length > 0;
  }

  async checkHealth(): Promise<void> {
    await this.db.select({ clientId: clientAliases.clientId }).from(clientAliases).limit(1);
  }

  /**
   * Creates `app.client_alias` when missing and copies names from the legacy
   * `public.clientes` table without overwriting existing aliases. Returns the number
   * of migrated rows.
   */
  async ensureSchema(): Promise<number> {
    await this.db.execute(sql`CREATE SCHEMA IF NOT EXISTS app`);
    await this.db.execute(sql`
      CREATE TABLE IF NOT EXISTS app.client_alias (
        client_id INTEGER PRIMARY KEY,
        alias VARCHAR(100) NOT NULL,
        description TEXT,
        active BOOLEAN DEFAULT TRUE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    const [legacy] = await this.db.select({
      present: sql<unknown>`to_regclass('public.clientes') is not null`,
    }).from(sql`(select 1) as probe`);

    if (legacy?.present !== true) {
      return 0;
    }

    const migrated = await this.db.execute(sql`
      INSERT INTO app.client_alias (client_id, alias)
      SELECT c.client_id, c.client_name
      FROM public.clientes c
      WHERE c.client_id IS NOT NULL AND c.client_name IS NOT NULL
      ON CONFLICT (client_id) DO NOTHING
    `);

    return coerceInteger(readRowCount(migrated));
  }
}

function readRowCount(result: unknown): unknown {
  if (typeof result === "object" && result !== null) {
    if ("rowCount" in result) {
      return result.rowCount;
    }
    if ("affectedRows" in result) {
      return result.affectedRows;
    }
  }
  return 0;
}
