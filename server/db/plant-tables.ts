import fs from "node:fs";
import { fileURLToPath } from "node:url";

const PLANT_TABLES_SQL = fileURLToPath(new URL("./plant-tables.sql", import.meta.url));

/**
 * DDL of the plant tables as the SCADA mirror creates them. Used to provision
 * demo and test databases; production tables are owned by the mirror.
 */
export function readPlantTablesDdl(): string {
  return fs.readFileSync(PLANT_TABLES_SQL, "utf8");
}
