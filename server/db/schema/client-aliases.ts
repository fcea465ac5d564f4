import { boolean, integer, pgSchema, text, timestamp, varchar } from "drizzle-orm/pg-core";

export const appSchema = pgSchema("app");

export const clientAliases = appSchema.table("client_alias", {
  clientId: integer("client_id").primaryKey(),
  alias: varchar("alias", { length: 100 }).notNull(),
  description: text("description"),
  active: boolean("active").default(true),
  createdAt: timestamp("created_at", { mode: "string" }).defaultNow(),
});
