import { index, integer, numeric, pgTable, timestamp } from "drizzle-orm/pg-core";

export const dailyRecords = pgTable(
  "Rel_Diario",
  {
    timeStamp: timestamp("Time_Stamp", { mode: "date" }).primaryKey(),
    downtimeMinutes: numeric("C0").default("0"),
    productionMinutes: numeric("C1").default("0"),
    waterVolume: numeric("C2").default("0"), // m³
    reserved: numeric("C3").default("0"),
    kg: numeric("C4").default("0"),
    clientId: integer("C5").default(0),
  },
  table => [index("idx_rel_diario_timestamp").on(table.timeStamp)],
);
