import { index, integer, numeric, pgTable, serial, text, timestamp, varchar } from "drizzle-orm/pg-core";

export const alarmHistory = pgTable(
  "ALARMHISTORY",
  {
    id: serial("Al_ID").primaryKey(),
    tag: varchar("Al_Tag", { length: 100 }).notNull(),
    message: text("Al_Message"),
    startTime: timestamp("Al_Start_Time", { mode: "date" }),
    normTime: timestamp("Al_Norm_Time", { mode: "date" }), // null while the alarm is active
    priority: integer("Al_Priority").default(5), // 1=critical .. 5=info
    area: varchar("Al_Selection", { length: 50 }),
    value: numeric("Al_Value"),
    limit: numeric("Al_Limit"),
  },
  table => [
    index("idx_alarmhistory_start_time").on(table.startTime),
    index("idx_alarmhistory_norm_time").on(table.normTime),
    index("idx_alarmhistory_tag").on(table.tag),
    index("idx_alarmhistory_priority").on(table.priority),
  ],
);
