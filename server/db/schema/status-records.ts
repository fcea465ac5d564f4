import { index, integer, numeric, pgTable, timestamp } from "drizzle-orm/pg-core";

// Cumulative per-day counters polled from the PLC; they reset at midnight
export const statusRecords = pgTable(
  "Sts_Dados",
  {
    timeStamp: timestamp("Time_Stamp", { mode: "date" }).primaryKey(),
    waterVolume: numeric("D1").default("0"), // m³
    cycles: numeric("D2").default("0"),
    washedKg: numeric("D3").default("0"),
    reserved: numeric("D4").default("0"),
    currentClientId: integer("D5").default(0),
  },
  table => [index("idx_sts_dados_timestamp").on(table.timeStamp)],
);
