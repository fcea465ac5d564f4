import { after, before, beforeEach, describe, it } from "node:test";
import assert from "node:assert/strict";

import { DrizzleRecordSource } from "../server/record-source";
import { StatusDayResolver } from "../server/status-day-resolver";
import { captureLogger, createPlantDb, insertStatus, resetPlantDb, type PlantDb } from "./helpers/plant-db";
import { FailingRecordSource } from "./helpers/record-sources";

const NOW = new Date("2024-01-07T10:00:00.000Z");

describe("StatusDayResolver", () => {
  let plant: PlantDb;
  let resolver: StatusDayResolver;

  before(async () => {
    plant = await createPlantDb();
    resolver = new StatusDayResolver({
      source: new DrizzleRecordSource(plant.db),
      logger: captureLogger().logger,
      queryTimeoutMs: 2000,
    });
  });

  after(async () => {
    await plant.pg.close();
  });

  beforeEach(async () => {
    await resetPlantDb(plant.pg);
  });

  it("falls back to the latest day with status rows", async () => {
    await insertStatus(plant.pg, [
      { at: "2024-01-03 22:00:00", water: 0.5, cycles: 3, kg: 250 },
      { at: "2024-01-04 08:00:00", water: 1.0, cycles: 5, kg: 400 },
      { at: "2024-01-04 18:00:00", water: 2.5, cycles: 12, kg: 1100, clientId: 3 },
    ]);

    assert.deepEqual(await resolver.resolve(NOW), {
      state: "FALLBACK_TO_LATEST",
      day: "2024-01-04",
      today: "2024-01-07",
    });
    assert.deepEqual(await resolver.readSnapshot("2024-01-04"), {
      timeStamp: "2024-01-04T18:00:00",
      waterVolume: 2.5,
      cycles: 12,
      washedKg: 1100,
      clientId: 3,
    });
  });

  it("uses today once today has a status row", async () => {
    await insertStatus(plant.pg, [
      { at: "2024-01-04 18:00:00", water: 2.5, cycles: 12, kg: 1100 },
      { at: "2024-01-07 06:00:00", water: 0.2, cycles: 1, kg: 90 },
    ]);

    assert.deepEqual(await resolver.resolve(NOW), {
      state: "HAS_TODAY_DATA",
      day: "2024-01-07",
      today: "2024-01-07",
    });
  });

  it("stays on today when the table is empty", async () => {
    assert.deepEqual(await resolver.resolve(NOW), {
      state: "FALLBACK_TO_LATEST",
      day: "2024-01-07",
      today: "2024-01-07",
    });
    assert.deepEqual(await resolver.readSnapshot("2024-01-07"), {
      timeStamp: "2024-01-07T00:00:00",
      waterVolume: 0,
      cycles: 0,
      washedKg: 0,
      clientId: null,
    });
  });
});

describe("StatusDayResolver without a database", () => {
  it("reports today as a fallback and logs the failure", async () => {
    const { logger, lines } = captureLogger();
    const resolver = new StatusDayResolver({ source: new FailingRecordSource(), logger, queryTimeoutMs: 2000 });

    assert.deepEqual(await resolver.resolve(NOW), {
      state: "FALLBACK_TO_LATEST",
      day: "2024-01-07",
      today: "2024-01-07",
    });
    assert.equal(lines.length, 1);
    assert.equal(lines[0].source, "status_records");
  });
});
