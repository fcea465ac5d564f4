import { index, integer, numeric, pgTable, timestamp } from "drizzle-orm/pg-core";

export const loadRecords = pgTable(
  "Rel_Carga",
  {
    timeStamp: timestamp("Time_Stamp", { mode: "date" }).primaryKey(),
    programId: integer("C0").default(0),
    clientId: integer("C1").default(0),
    kg: numeric("C2").default("0"),
    waterVolume: numeric("C3").default("0"), // m³
  },
  table => [
    index("idx_rel_carga_timestamp").on(table.timeStamp),
    index("idx_rel_carga_client").on(table.clientId),
  ],
);
