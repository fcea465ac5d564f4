import type { ClientCatalogEntry } from "@shared/schema";

import type { AliasStore } from "./alias-store";
import { logger as rootLogger, type StructuredLogger } from "./observability/logger";

export function fallbackClientName(clientId: number): string {
  return `Client ${clientId}`;
}

/**
 * Alias mapping frozen at one point in time, so every row of a report uses the same names.
 */
export class AliasSnapshot {
  private readonly aliases: ReadonlyMap<number, string>;

  constructor(aliases: ReadonlyMap<number, string> = new Map()) {
    const cleaned = new Map<number, string>();
    for (const [clientId, alias] of aliases) {
      const trimmed = alias.trim();
      if (trimmed.length > 0) {
        cleaned.set(clientId, trimmed);
      }
    }
    this.aliases = cleaned;
  }

  get size(): number {
    return this.aliases.size;
  }

  aliasOf(clientId: number): string | null {
    return this.aliases.get(clientId) ?? null;
  }

  resolve(clientId: number): string {
    return this.aliasOf(clientId) ?? fallbackClientName(clientId);
  }
}

export class ClientAliasResolver {
  constructor(
    private readonly store: AliasStore,
    private readonly logger: StructuredLogger = rootLogger,
  ) {}

  /**
   * Reads the store once. A failing store yields an empty snapshot (every id falls back).
   */
  async snapshot(): Promise<AliasSnapshot> {
    try {
      return new AliasSnapshot(await this.store.getAllAliases());
    } catch (error) {
      this.logger.warn(
        "Alias store unavailable, falling back to client ids",
        { event: "alias.degraded", source: "client_alias" },
        error,
      );
      return new AliasSnapshot();
    }
  }

  async resolve(clientId: number): Promise<string> {
    const snapshot = await this.snapshot();
    return snapshot.resolve(clientId);
  }
}

export function buildClientCatalog(clientIds: Iterable<number>, snapshot: AliasSnapshot): ClientCatalogEntry[] {
  const unique = Array.from(new Set(clientIds)).sort((a, b) => a - b);
  return unique.map(clientId => ({
    clientId,
    alias: snapshot.aliasOf(clientId),
    display: snapshot.resolve(clientId),
  }));
}
