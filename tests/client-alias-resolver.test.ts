import { after, before, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";

import { DrizzleAliasStore } from "../server/alias-store";
import {
  AliasSnapshot,
  buildClientCatalog,
  ClientAliasResolver,
  fallbackClientName,
} from "../server/client-alias-resolver";
import { captureLogger, createPlantDb, resetPlantDb, type PlantDb } from "./helpers/plant-db";
import { InMemoryAliasStore } from "./helpers/record-sources";

class BrokenAliasStore extends InMemoryAliasStore {
  override async getAllAliases(): Promise<Map<number, string>> {
    throw new Error("relation app.client_alias does not exist");
  }
}

describe("ClientAliasResolver", () => {
  it("falls back to the client id when no alias exists", async () => {
    const resolver = new ClientAliasResolver(new InMemoryAliasStore(), captureLogger().logger);

    assert.equal(await resolver.resolve(42), "Client 42");
    assert.equal(fallbackClientName(0), "Client 0");
  });

  it("reads aliases from the store on every resolve", async () => {
    const store = new InMemoryAliasStore();
    const resolver = new ClientAliasResolver(store, captureLogger().logger);

    await store.upsert(7, "North Hospital");
    assert.equal(await resolver.resolve(7), "North Hospital");

    await store.upsert(7, "North Hospital West");
    assert.equal(await resolver.resolve(7), "North Hospital West");
    assert.equal(store.reads, 2);
  });

  it("keeps a snapshot stable after the store changes", async () => {
    const store = new InMemoryAliasStore();
    await store.upsert(3, "City Gym");
    const resolver = new ClientAliasResolver(store, captureLogger().logger);

    const snapshot = await resolver.snapshot();
    await store.delete(3);

    assert.equal(snapshot.resolve(3), "City Gym");
    assert.equal(await resolver.resolve(3), "Client 3");
  });

  it("ignores blank aliases", () => {
    const snapshot = new AliasSnapshot(new Map([[5, "   "], [6, " Harbor Hotel "]]));

    assert.equal(snapshot.size, 1);
    assert.equal(snapshot.aliasOf(5), null);
    assert.equal(snapshot.resolve(5), "Client 5");
    assert.equal(snapshot.resolve(6), "Harbor Hotel");
  });

  it("degrades to fallbacks when the store fails", async () => {
    const { logger, lines } = captureLogger();
    const resolver = new ClientAliasResolver(new BrokenAliasStore(), logger);

    const snapshot = await resolver.snapshot();

    assert.equal(snapshot.size, 0);
    assert.equal(snapshot.resolve(9), "Client 9");
    assert.equal(lines.length, 1);
    assert.equal(lines[0].event, "alias.degraded");
    assert.equal(lines[0].errorMessage, "relation app.client_alias does not exist");
  });
});

describe("buildClientCatalog", () => {
  it("lists each client once, sorted, with alias and display name", () => {
    const snapshot = new AliasSnapshot(new Map([[3, "City Gym"]]));

    assert.deepEqual(buildClientCatalog([7, 3, 7], snapshot), [
      { clientId: 3, alias: "City Gym", display: "City Gym" },
      { clientId: 7, alias: null, display: "Client 7" },
    ]);
  });
});

describe("DrizzleAliasStore", () => {
  let plant: PlantDb;
  let store: DrizzleAliasStore;

  before(async () => {
    plant = await createPlantDb();
    store = new DrizzleAliasStore(plant.db);
  });

  after(async () => {
    await plant.pg.close();
  });

  beforeEach(async () => {
    await resetPlantDb(plant.pg);
  });

  it("upserts, lists and deletes aliases", async () => {
    await store.upsert(2, "Harbor Hotel");
    await store.upsert(1, "North Hospital");
    await store.upsert(2, "Harbor Hotel Annex");

    assert.deepEqual(
      Array.from(await store.getAllAliases()),
      [
        [1, "North Hospital"],
        [2, "Harbor Hotel Annex"],
      ],
    );

    assert.equal(await store.delete(1), true);
    assert.equal(await store.delete(1), false);
    assert.deepEqual(Array.from(await store.getAllAliases()), [[2, "Harbor Hotel Annex"]]);
  });

  it("skips inactive aliases", async () => {
    await store.upsert(4, "Old Client");
    await plant.pg.query(`UPDATE app.client_alias SET active = false WHERE client_id = 4`);

    assert.equal((await store.getAllAliases()).size, 0);
  });

  it("migrates legacy client names without overwriting existing aliases", async () => {
    await plant.pg.exec(`
      CREATE TABLE public.clientes (client_id INTEGER, client_name VARCHAR(100));
      INSERT INTO public.clientes VALUES (1, 'Legacy Hospital'), (2, 'Harbor Hotel'), (NULL, 'Orphan');
    `);
    await store.upsert(1, "North Hospital");

    try {
      const migrated = await store.ensureSchema();

      assert.equal(migrated, 1);
      assert.deepEqual(
        Array.from(await store.getAllAliases()),
        [
          [1, "North Hospital"],
          [2, "Harbor Hotel"],
        ],
      );
    } finally {
      await plant.pg.exec(`DROP TABLE public.clientes`);
    }
  });

  it("reports zero migrated rows when there is no legacy table", async () => {
    assert.equal(await store.ensureSchema(), 0);
  });
});
