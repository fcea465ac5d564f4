import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";

import { DrizzleRecordSource, type TimeRange } from "../server/record-source";
import {
  createPlantDb,
  insertAlarms,
  insertChemicals,
  insertDaily,
  insertLoads,
  insertPrograms,
  insertStatus,
  resetPlantDb,
  type PlantDb,
} from "./helpers/plant-db";

const WEEK: TimeRange = {
  start: new Date("2024-01-01T00:00:00.000Z"),
  endExclusive: new Date("2024-01-08T00:00:00.000Z"),
};

const JAN_4: TimeRange = {
  start: new Date("2024-01-04T00:00:00.000Z"),
  endExclusive: new Date("2024-01-05T00:00:00.000Z"),
};

let plant: PlantDb;
let source: DrizzleRecordSource;

before(async () => {
  plant = await createPlantDb();
  source = new DrizzleRecordSource(plant.db);

  await insertPrograms(plant.pg, [
    [1, "Standard"],
    [2, "Heavy"],
  ]);
  await insertLoads(plant.pg, [
    { at: "2024-01-01 08:00:00", programId: 1, clientId: 7, kg: 100, water: 0.05 },
    { at: "2024-01-01 09:00:00", programId: 2, clientId: 3, kg: 40.5, water: 0.02 },
    { at: "2024-01-02 12:00:00", programId: null, clientId: null, kg: 5, water: 0 },
    { at: "2024-01-03 10:00:00", programId: 1, clientId: 7, kg: 200, water: 0.08 },
    { at: "2024-01-07 23:59:59", programId: 9, clientId: 3, kg: 10, water: 0.01 },
    // outside the week on both sides
    { at: "2023-12-31 23:59:59", clientId: 3, kg: 888, water: 1 },
    { at: "2024-01-08 00:00:00", clientId: 7, kg: 999, water: 1 },
  ]);
  await insertDaily(plant.pg, [
    { at: "2024-01-02 23:00:00", downtime: 10, production: 90, water: 1.5, kg: 500 },
    { at: "2024-01-05 23:00:00", downtime: 90, production: 10, water: 2.5, kg: 300, clientId: 7 },
  ]);
  await insertChemicals(plant.pg, [
    { at: "2024-01-02 08:00:00", q: [1, 2, 3, 4, 6] },
    { at: "2024-01-04 09:00:00", q: [10, null, null, null, null, null, null, null, 10] },
    { at: "2024-01-09 08:00:00", q: [100] },
  ]);
  await insertAlarms(plant.pg, [
    { tag: "A", start: "2024-01-02 10:00:00", norm: "2024-01-02 10:30:00", priority: 1 },
    { tag: "A", start: "2024-01-03 11:00:00", norm: "2024-01-03 11:10:00", priority: 1 },
    { tag: "B", start: "2024-01-03 12:00:00", norm: null, priority: 3 },
    { tag: "C", start: "2024-01-07 23:00:00", norm: "2024-01-08 01:00:00", priority: null },
    { tag: "D", start: "2024-01-05 08:00:00", norm: "2024-01-05 08:20:00", priority: 4 },
  ]);
  await insertStatus(plant.pg, [
    { at: "2024-01-04 08:00:00", water: 1.0, cycles: 5, kg: 400 },
    { at: "2024-01-04 18:00:00", water: 2.5, cycles: 12, kg: 1100, clientId: 3 },
    { at: "2024-01-06 10:00:00", water: 0.4, cycles: 2, kg: 150 },
  ]);
});

after(async () => {
  await plant.pg.close();
});

describe("load ledger", () => {
  it("sums kg and counts loads inside the half-open window", async () => {
    assert.deepEqual(await source.sumLoads(WEEK), { kg: 355.5, loads: 5 });
    assert.deepEqual(await source.sumLoads(WEEK, 7), { kg: 300, loads: 2 });
    assert.equal(await source.sumLoadWater(WEEK), 0.16);
    assert.equal(await source.sumLoadWater(WEEK, 3), 0.03);
  });

  it("groups loads by calendar day", async () => {
    assert.deepEqual(await source.loadsByDay(WEEK), [
      { day: "2024-01-01", loads: 2, kg: 140.5, waterVolume: 0.07 },
      { day: "2024-01-02", loads: 1, kg: 5, waterVolume: 0 },
      { day: "2024-01-03", loads: 1, kg: 200, waterVolume: 0.08 },
      { day: "2024-01-07", loads: 1, kg: 10, waterVolume: 0.01 },
    ]);
  });

  it("ranks clients by kg and skips loads without a client", async () => {
    assert.deepEqual(await source.loadsByClient(WEEK), [
      { clientId: 7, kg: 300, loads: 2 },
      { clientId: 3, kg: 50.5, loads: 2 },
    ]);
  });

  it("joins program names and keeps unknown programs", async () => {
    assert.deepEqual(await source.loadsByProgram(WEEK), [
      { programId: 1, programName: "Standard", loads: 2, kg: 300 },
      { programId: 2, programName: "Heavy", loads: 1, kg: 40.5 },
      { programId: 9, programName: null, loads: 1, kg: 10 },
      { programId: null, programName: null, loads: 1, kg: 5 },
    ]);
  });

  it("lists every client id in the ledger", async () => {
    assert.deepEqual(await source.listLoadClientIds(), [3, 7]);
  });
});

describe("consolidated daily table", () => {
  it("sums production, downtime and kg", async () => {
    assert.deepEqual(await source.sumConsolidated(WEEK), {
      kg: 800,
      productionMinutes: 100,
      downtimeMinutes: 100,
      records: 2,
    });
    assert.deepEqual(await source.sumConsolidated(WEEK, 7), {
      kg: 300,
      productionMinutes: 10,
      downtimeMinutes: 90,
      records: 1,
    });
    assert.equal(await source.sumConsolidatedWater(WEEK), 4);
    assert.equal(await source.sumConsolidatedWater(WEEK, 7), 2.5);
  });

  it("groups by day", async () => {
    assert.deepEqual(await source.consolidatedByDay(WEEK), [
      { day: "2024-01-02", kg: 500, productionMinutes: 90, downtimeMinutes: 10, waterVolume: 1.5 },
      { day: "2024-01-05", kg: 300, productionMinutes: 10, downtimeMinutes: 90, waterVolume: 2.5 },
    ]);
  });
});

describe("chemical dosing", () => {
  it("adds the nine dosing channels, reading nulls as zero", async () => {
    assert.equal(await source.sumChemicals(WEEK), 36);
    assert.deepEqual(await source.chemicalsByDay(WEEK), [
      { day: "2024-01-02", ml: 16 },
      { day: "2024-01-04", ml: 20 },
    ]);
  });
});

describe("alarm history", () => {
  it("counts alarms started in the window", async () => {
    assert.equal(await source.countAlarms(WEEK, { activeOnly: false }), 5);
    assert.equal(await source.countAlarms(WEEK, { activeOnly: true }), 1);
  });

  it("ranks alarms that started and cleared inside the window", async () => {
    assert.deepEqual(await source.topClosedAlarms({ kind: "period", range: WEEK }, 5), [
      { tag: "A", message: "A alarm", occurrences: 2, lastOccurrence: "2024-01-03T11:00:00" },
      { tag: "D", message: "D alarm", occurrences: 1, lastOccurrence: "2024-01-05T08:00:00" },
    ]);
  });

  it("ranks alarms that started and cleared after an instant", async () => {
    const since = new Date("2024-01-03T00:00:00.000Z");

    assert.deepEqual(await source.topClosedAlarms({ kind: "since", since }, 2), [
      { tag: "A", message: "A alarm", occurrences: 1, lastOccurrence: "2024-01-03T11:00:00" },
      { tag: "C", message: "C alarm", occurrences: 1, lastOccurrence: "2024-01-07T23:00:00" },
    ]);
  });

  it("breaks alarms down by day and priority, treating a missing priority as 5", async () => {
    assert.deepEqual(await source.alarmsByDay(WEEK), [
      { day: "2024-01-02", alarms: 1, critical: 1 },
      { day: "2024-01-03", alarms: 2, critical: 1 },
      { day: "2024-01-05", alarms: 1, critical: 0 },
      { day: "2024-01-07", alarms: 1, critical: 0 },
    ]);
    assert.deepEqual(await source.alarmsByPriority(WEEK), [
      { priority: 1, alarms: 2 },
      { priority: 3, alarms: 1 },
      { priority: 4, alarms: 1 },
      { priority: 5, alarms: 1 },
    ]);
  });

  it("averages resolution time over cleared alarms", async () => {
    // 30, 10, 120 and 20 minutes
    assert.equal(await source.averageResolutionMinutes(WEEK), 45);
  });

  it("lists open alarms", async () => {
    assert.deepEqual(await source.listActiveAlarms(WEEK.start, 10), [
      { id: 3, tag: "B", message: "B alarm", area: null, priority: 3, startedAt: "2024-01-03T12:00:00" },
    ]);
    assert.deepEqual(await source.listActiveAlarms(new Date("2024-01-04T00:00:00.000Z"), 10), []);
  });
});

describe("cumulative status", () => {
  it("counts status rows and finds the latest day", async () => {
    assert.equal(await source.countStatusRecords(JAN_4), 2);
    assert.equal(await source.latestStatusDay(), "2024-01-06");
  });

  it("returns the last row of a day", async () => {
    assert.deepEqual(await source.lastStatusOnDay(JAN_4), {
      timeStamp: "2024-01-04T18:00:00",
      waterVolume: 2.5,
      cycles: 12,
      washedKg: 1100,
      clientId: 3,
    });
  });

  it("answers the health check", async () => {
    await source.checkHealth();
  });
});

describe("empty tables", () => {
  before(async () => {
    await resetPlantDb(plant.pg);
  });

  it("reads as zeros, empty lists and nulls", async () => {
    assert.deepEqual(await source.sumLoads(WEEK), { kg: 0, loads: 0 });
    assert.deepEqual(await source.loadsByDay(WEEK), []);
    assert.equal(await source.sumChemicals(WEEK), 0);
    assert.equal(await source.averageResolutionMinutes(WEEK), 0);
    assert.deepEqual(await source.topClosedAlarms({ kind: "period", range: WEEK }, 5), []);
    assert.equal(await source.latestStatusDay(), null);
    assert.equal(await source.lastStatusOnDay(JAN_4), null);
  });
});

describe("alarm window edges", () => {
  before(async () => {
    await resetPlantDb(plant.pg);
    await insertAlarms(plant.pg, [
      { tag: "E", start: "2024-01-03 00:00:00", norm: "2024-01-03 00:05:00", priority: 2 },
      { tag: "F", start: "2024-01-03 01:00:00", norm: "2024-01-03 01:30:00", priority: 2 },
      { tag: "G", start: "2024-01-01 00:00:00", norm: "2024-01-01 00:10:00", priority: 2 },
      { tag: "H", start: "2024-01-07 23:00:00", norm: "2024-01-08 00:00:00", priority: 2 },
      { tag: "J", start: "2024-01-08 00:00:00", norm: "2024-01-08 00:20:00", priority: 2 },
    ]);
  });

  it("includes the window start and excludes the window end", async () => {
    assert.equal(await source.countAlarms(WEEK, { activeOnly: false }), 4);
    assert.deepEqual(await source.topClosedAlarms({ kind: "period", range: WEEK }, 10), [
      { tag: "E", message: "E alarm", occurrences: 1, lastOccurrence: "2024-01-03T00:00:00" },
      { tag: "F", message: "F alarm", occurrences: 1, lastOccurrence: "2024-01-03T01:00:00" },
      { tag: "G", message: "G alarm", occurrences: 1, lastOccurrence: "2024-01-01T00:00:00" },
    ]);
  });

  it("excludes an alarm that starts exactly at the instant", async () => {
    const since = new Date("2024-01-03T00:00:00.000Z");

    assert.deepEqual(await source.topClosedAlarms({ kind: "since", since }, 10), [
      { tag: "F", message: "F alarm", occurrences: 1, lastOccurrence: "2024-01-03T01:00:00" },
      { tag: "H", message: "H alarm", occurrences: 1, lastOccurrence: "2024-01-07T23:00:00" },
      { tag: "J", message: "J alarm", occurrences: 1, lastOccurrence: "2024-01-08T00:00:00" },
    ]);
  });
});
