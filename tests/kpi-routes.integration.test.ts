import { describe, before, after, beforeEach, it } from "node:test";
import assert from "node:assert/strict";
import type { Server } from "http";
import express from "express";
import request from "supertest";

import { requestLoggingMiddleware } from "../server/observability/logger";
import { registerRoutes } from "../server/routes";
import { createPlantDb, fixedClock, insertAlarms, insertLoads, testConfig, type PlantDb } from "./helpers/plant-db";

describe("KPI and report routes", () => {
  let plant: PlantDb;
  let appServer: Server;

  before(async () => {
    plant = await createPlantDb();

    const app = express();
    app.use(express.json());
    app.use(requestLoggingMiddleware);
    appServer = await registerRoutes(app, {
      db: plant.db,
      config: testConfig,
      clock: fixedClock("2024-01-07T12:00:00.000Z"),
    });

    await insertLoads(plant.pg, [
      { at: "2024-01-02 08:00:00", clientId: 7, kg: 100, water: 0.05 },
      { at: "2024-01-03 09:00:00", clientId: 7, kg: 200, water: 0.08 },
      { at: "2024-01-04 10:00:00", clientId: 3, kg: 50, water: 0.02 },
    ]);
    await insertAlarms(plant.pg, [
      { tag: "WASHER_01.DOOR", message: "Door open during cycle", start: "2024-01-06 09:00:00", priority: 2, area: "Washers" },
      { tag: "DRYER_02.TEMP", start: "2024-01-05 09:00:00", norm: "2024-01-05 09:40:00", priority: 1 },
    ]);
  });

  after(async () => {
    await plant.pg.close();
  });

  beforeEach(async () => {
    await plant.pg.exec("TRUNCATE app.client_alias");
  });

  it("composes KPIs for a client filter", async () => {
    const response = await request(appServer)
      .get("/api/kpis")
      .query({ start: "2024-01-01", end: "2024-01-07", clientId: "7" })
      .expect(200);

    assert.equal(response.body.period.label, "2024-01-01 to 2024-01-07 (Client 7)");
    assert.equal(response.body.period.values.production_kg, 300);
    assert.equal(response.body.period.values.loads, 2);
    assert.equal(response.body.period.display.production_kg, "300 kg");
    assert.equal(response.body.misc.periodDays, 7);
    assert.equal(response.body.misc.generatedAt, "2024-01-07T12:00:00.000Z");
  });

  it("treats an empty client id as no filter", async () => {
    const response = await request(appServer)
      .get("/api/kpis?start=2024-01-01&end=2024-01-07&clientId=")
      .expect(200);

    assert.equal(response.body.period.label, "2024-01-01 to 2024-01-07");
    assert.equal(response.body.period.values.production_kg, 350);
    assert.equal(response.body.period.values.loads, 3);
  });

  it("rejects a non-numeric client id", async () => {
    const response = await request(appServer).get("/api/kpis?clientId=abc").expect(400);

    assert.match(response.body.error, /^clientId: /);
  });

  it("falls back to the default window for an unparseable start", async () => {
    const response = await request(appServer).get("/api/kpis?start=last-week").expect(200);

    assert.equal(response.body.period.label, "Last 7 days");
    assert.equal(response.body.misc.window.startDay, "2023-12-31");
    assert.equal(response.body.misc.window.endDay, "2024-01-07");
    assert.equal(response.body.misc.periodDays, 8);
    assert.equal(response.body.period.values.production_kg, 350);
  });

  it("builds the report dataset", async () => {
    const response = await request(appServer)
      .get("/api/reports/dataset?start=2024-01-01&end=2024-01-07")
      .expect(200);

    assert.deepEqual(response.body.productionByClient, [
      { clientId: 7, client: "Client 7", totalKg: 300, totalLoads: 2, avgWeightKg: 150 },
      { clientId: 3, client: "Client 3", totalKg: 50, totalLoads: 1, avgWeightKg: 50 },
    ]);
    assert.deepEqual(response.body.alarmsByPriority, [
      { priority: 1, label: "Critical", alarms: 1 },
      { priority: 2, label: "High", alarms: 1 },
    ]);
    assert.equal(response.body.summary.values.alarms_critical_high, 2);
  });

  it("lists open alarms with their elapsed time", async () => {
    const response = await request(appServer).get("/api/alarms/active").expect(200);

    assert.deepEqual(response.body, {
      alarms: [
        {
          id: 1,
          tag: "WASHER_01.DOOR",
          message: "Door open during cycle",
          area: "Washers",
          priority: 2,
          priorityLabel: "High",
          startedAt: "2024-01-06T09:00:00",
          durationMinutes: 1620,
          duration: "27h 0m",
        },
      ],
    });
  });

  it("rejects an out-of-range alarm limit", async () => {
    const response = await request(appServer).get("/api/alarms/active?limit=0").expect(400);

    assert.match(response.body.error, /^limit: /);
  });

  it("saves, lists and removes client aliases", async () => {
    const saved = await request(appServer)
      .put("/api/clients/7/alias")
      .send({ alias: "  North Hospital " })
      .expect(200);
    assert.deepEqual(saved.body, { clientId: 7, alias: "North Hospital", display: "North Hospital" });

    const catalog = await request(appServer).get("/api/clients").expect(200);
    assert.deepEqual(catalog.body, {
      clients: [
        { clientId: 3, alias: null, display: "Client 3" },
        { clientId: 7, alias: "North Hospital", display: "North Hospital" },
      ],
    });

    const kpis = await request(appServer).get("/api/kpis?start=2024-01-01&end=2024-01-07&clientId=7").expect(200);
    assert.equal(kpis.body.period.label, "2024-01-01 to 2024-01-07 (North Hospital)");

    await request(appServer).delete("/api/clients/7/alias").expect(204);
    const missing = await request(appServer).delete("/api/clients/7/alias").expect(404);
    assert.deepEqual(missing.body, { error: "Alias not found" });
  });

  it("rejects a blank alias", async () => {
    const response = await request(appServer).put("/api/clients/7/alias").send({ alias: "   " }).expect(400);

    assert.deepEqual(response.body, { error: "alias: Alias is required" });
  });
});
