import { defineConfig } from "drizzle-kit";

if (!process.env.DATABASE_URL) {
  throw new Error("DATABASE_URL must be set to run drizzle-kit");
}

// Only the alias table is owned by this service; plant tables belong to the SCADA mirror
export default defineConfig({
  out: "./migrations",
  schema: ["./server/db/schema/client-aliases.ts"],
  schemaFilter: ["app"],
  dialect: "postgresql",
  dbCredentials: {
    url: process.env.DATABASE_URL,
  },
});
