import { numeric, pgTable, timestamp } from "drizzle-orm/pg-core";

// Dosed volumes in ml, one column per product
export const chemicalRecords = pgTable("Rel_Quimico", {
  timeStamp: timestamp("Time_Stamp", { mode: "date" }).primaryKey(),
  q1: numeric("Q1").default("0"),
  q2: numeric("Q2").default("0"),
  q3: numeric("Q3").default("0"),
  q4: numeric("Q4").default("0"),
  q5: numeric("Q5").default("0"),
  q6: numeric("Q6").default("0"),
  q7: numeric("Q7").default("0"),
  q8: numeric("Q8").default("0"),
  q9: numeric("Q9").default("0"),
});
