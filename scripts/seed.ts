import "dotenv/config";

import { sql } from "drizzle-orm";

import { addUtcDays, startOfUtcDay } from "@shared/utils";
import { DrizzleAliasStore } from "../server/alias-store";
import { closeDb, initDb, type Database } from "../server/db/client";
import { readPlantTablesDdl } from "../server/db/plant-tables";
import {
  alarmHistory,
  chemicalRecords,
  dailyRecords,
  loadRecords,
  programs,
  statusRecords,
} from "../server/db/schema";

const DEMO_DAYS = 14;

const PROGRAMS = [
  { programId: 1, programName: "Standard wash", description: "Default wash program" },
  { programId: 2, programName: "Heavy soil", description: "Intensive wash for heavy soil" },
  { programId: 3, programName: "Eco", description: "Reduced water and chemicals" },
  { programId: 4, programName: "Delicate", description: "Low agitation for delicate items" },
  { programId: 5, programName: "Express", description: "Short cycle" },
];

const CLIENT_ALIASES: Array<[number, string]> = [
  [1, "North Hospital"],
  [2, "Harbor Hotel"],
  [3, "City Gym"],
];

const ALARM_TAGS = [
  { tag: "WASHER_01.DOOR", message: "Door open during cycle", priority: 2, area: "Washers" },
  { tag: "DRYER_02.TEMP", message: "Dryer over temperature", priority: 1, area: "Dryers" },
  { tag: "DOSING.Q3.LEVEL", message: "Chemical tank low", priority: 3, area: "Dosing" },
  { tag: "TUNNEL.BELT", message: "Tunnel belt slip", priority: 4, area: "Tunnel" },
  { tag: "PLC.COMM", message: "PLC communication retry", priority: 5, area: "Control" },
];

function log(message: string) {
  console.log(`➡️  ${message}`);
}

// Deterministic pseudo-random numbers so reseeding gives the same demo
function createRandom(seed: number) {
  let state = seed;
  return () => {
    state = (state * 1_103_515_245 + 12_345) % 2_147_483_648;
    return state / 2_147_483_648;
  };
}

function round(value: number, decimals = 2) {
  return (Math.round(value * 10 ** decimals) / 10 ** decimals).toFixed(decimals);
}

async function seedReferenceData(db: Database): Promise<void> {
  await db.execute(sql.raw(readPlantTablesDdl()));
  await db.insert(programs).values(PROGRAMS).onConflictDoNothing();

  const aliasStore = new DrizzleAliasStore(db);
  await aliasStore.ensureSchema();
  for (const [clientId, alias] of CLIENT_ALIASES) {
    await aliasStore.upsert(clientId, alias);
  }
  log(`Programs and ${CLIENT_ALIASES.length} client aliases ready`);
}

async function seedDay(db: Database, day: Date, random: () => number): Promise<void> {
  const loadsPerDay = 18 + Math.floor(random() * 10);
  let washedKg = 0;
  let waterVolume = 0;
  let cycles = 0;

  for (let index = 0; index < loadsPerDay; index += 1) {
    const at = new Date(day.getTime() + (6 * 60 + index * 35) * 60_000);
    const kg = 60 + random() * 60;
    const volume = kg * (0.008 + random() * 0.004);
    washedKg += kg;
    waterVolume += volume;
    cycles += 1;

    await db
      .insert(loadRecords)
      .values({
        timeStamp: at,
        programId: 1 + Math.floor(random() * PROGRAMS.length),
        // client 4 has no alias on purpose
        clientId: 1 + Math.floor(random() * 4),
        kg: round(kg),
        waterVolume: round(volume, 3),
      })
      .onConflictDoNothing();

    await db
      .insert(chemicalRecords)
      .values({
        timeStamp: at,
        q1: round(kg * 2.1),
        q2: round(kg * 1.4),
        q3: round(kg * 0.6),
        q4: round(random() * 20),
      })
      .onConflictDoNothing();

    // one cumulative status poll per load
    await db
      .insert(statusRecords)
      .values({
        timeStamp: new Date(at.getTime() + 60_000),
        waterVolume: round(waterVolume, 3),
        cycles: String(cycles),
        washedKg: round(washedKg),
        currentClientId: 1,
      })
      .onConflictDoNothing();
  }

  const productionMinutes = 540 + random() * 120;
  await db
    .insert(dailyRecords)
    .values({
      timeStamp: new Date(day.getTime() + 23 * 60 * 60_000),
      downtimeMinutes: round(30 + random() * 90),
      productionMinutes: round(productionMinutes),
      waterVolume: round(waterVolume, 3),
      kg: round(washedKg),
      clientId: 0,
    })
    .onConflictDoNothing();

  const alarms = Math.floor(random() * 6);
  for (let index = 0; index < alarms; index += 1) {
    const definition = ALARM_TAGS[Math.floor(random() * ALARM_TAGS.length)];
    const start = new Date(day.getTime() + (7 * 60 + Math.floor(random() * 600)) * 60_000);
    const stillActive = random() < 0.15;
    await db.insert(alarmHistory).values({
      tag: definition.tag,
      message: definition.message,
      priority: definition.priority,
      area: definition.area,
      startTime: start,
      normTime: stillActive ? null : new Date(start.getTime() + (2 + Math.floor(random() * 45)) * 60_000),
    });
  }
}

async function main(): Promise<void> {
  const db = initDb();
  const random = createRandom(42);

  try {
    await seedReferenceData(db);

    const today = startOfUtcDay(new Date());
    for (let offset = DEMO_DAYS - 1; offset >= 0; offset -= 1) {
      await seedDay(db, addUtcDays(today, -offset), random);
    }

    log(`Demo plant data seeded for the last ${DEMO_DAYS} days`);
  } catch (error) {
    console.error("❌ Seed failed:", error);
    process.exitCode = 1;
  } finally {
    await closeDb().catch(err => {
      console.error("Failed to close the database connection", err);
    });
  }
}

main().catch(error => {
  console.error("❌ Unexpected error:", error);
  process.exit(1);
});
