import { boolean, integer, pgTable, text, timestamp, varchar } from "drizzle-orm/pg-core";

export const programs = pgTable("programas", {
  programId: integer("program_id").primaryKey(),
  programName: varchar("program_name", { length: 100 }).notNull(),
  description: text("description"),
  active: boolean("active").default(true),
  createdAt: timestamp("created_at", { mode: "string" }).defaultNow(),
});
