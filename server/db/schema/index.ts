// Plant record sources (written by the SCADA mirror, read-only here)
export { statusRecords } from "./status-records";
export { loadRecords } from "./load-records";
export { dailyRecords } from "./daily-records";
export { chemicalRecords } from "./chemical-records";
export { alarmHistory } from "./alarm-history";
export { programs } from "./programs";

// Owned by this service
export { appSchema, clientAliases } from "./client-aliases";
