import { and, asc, desc, eq, gt, gte, isNotNull, isNull, lt, sql, type SQL } from "drizzle-orm";

import { getDb, type Database, type DatabaseHandle } from "./db/client";
import { alarmHistory, chemicalRecords, dailyRecords, loadRecords, programs, statusRecords } from "./db/schema";
import { coerceInteger, coerceNumber } from "./numeric";

export interface TimeRange {
  start: Date;
  endExclusive: Date;
}

export interface LoadTotals {
  kg: number;
  loads: number;
}

export interface DailyLoadRecord {
  day: string;
  loads: number;
  kg: number;
  waterVolume: number;
}

export interface ClientLoadRecord {
  clientId: number;
  kg: number;
  loads: number;
}

export interface ProgramLoadRecord {
  programId: number | null;
  programName: string | null;
  loads: number;
  kg: number;
}

export interface ConsolidatedTotals {
  kg: number;
  productionMinutes: number;
  downtimeMinutes: number;
  records: number;
}

export interface ConsolidatedDayRecord {
  day: string;
  kg: number;
  productionMinutes: number;
  downtimeMinutes: number;
  waterVolume: number;
}

export interface ChemicalDayRecord {
  day: string;
  ml: number;
}

export type ClosedAlarmCriteria =
  // start and normalization both inside the window
  | { kind: "period"; range: TimeRange }
  // start and normalization strictly after the instant, no upper bound
  | { kind: "since"; since: Date };

export interface AlarmOccurrenceRecord {
  tag: string;
  message: string;
  occurrences: number;
  lastOccurrence: string | null;
}

export interface AlarmDayRecord {
  day: string;
  alarms: number;
  critical: number;
}

export interface AlarmPriorityRecord {
  priority: number;
  alarms: number;
}

export interface ActiveAlarmRecord {
  id: number;
  tag: string;
  message: string;
  area: string | null;
  priority: number;
  startedAt: string;
}

export interface StatusSnapshotRecord {
  timeStamp: string;
  waterVolume: number;
  cycles: number;
  washedKg: number;
  clientId: number | null;
}

/**
 * Typed read access to the plant tables. Every window filter is `ts >= start AND ts < endExclusive`.
 */
export interface RecordSource {
  checkHealth(): Promise<void>;

  sumLoads(range: TimeRange, clientId?: number): Promise<LoadTotals>;
  sumLoadWater(range: TimeRange, clientId?: number): Promise<number>;
  loadsByDay(range: TimeRange): Promise<DailyLoadRecord[]>;
  loadsByClient(range: TimeRange): Promise<ClientLoadRecord[]>;
  loadsByProgram(range: TimeRange): Promise<ProgramLoadRecord[]>;
  listLoadClientIds(): Promise<number[]>;

  sumConsolidated(range: TimeRange, clientId?: number): Promise<ConsolidatedTotals>;
  sumConsolidatedWater(range: TimeRange, clientId?: number): Promise<number>;
  consolidatedByDay(range: TimeRange): Promise<ConsolidatedDayRecord[]>;

  sumChemicals(range: TimeRange): Promise<number>;
  chemicalsByDay(range: TimeRange): Promise<ChemicalDayRecord[]>;

  countAlarms(range: TimeRange, options: { activeOnly: boolean }): Promise<number>;
  topClosedAlarms(criteria: ClosedAlarmCriteria, limit: number): Promise<AlarmOccurrenceRecord[]>;
  alarmsByDay(range: TimeRange): Promise<AlarmDayRecord[]>;
  alarmsByPriority(range: TimeRange): Promise<AlarmPriorityRecord[]>;
  averageResolutionMinutes(range: TimeRange): Promise<number>;
  listActiveAlarms(since: Date, limit: number): Promise<ActiveAlarmRecord[]>;

  countStatusRecords(range: TimeRange): Promise<number>;
  latestStatusDay(): Promise<string | null>;
  lastStatusOnDay(range: TimeRange): Promise<StatusSnapshotRecord | null>;
}

type TimestampColumn =
  | typeof loadRecords.timeStamp
  | typeof dailyRecords.timeStamp
  | typeof chemicalRecords.timeStamp
  | typeof statusRecords.timeStamp
  | typeof alarmHistory.startTime
  | typeof alarmHistory.normTime;

function within(column: TimestampColumn, range: TimeRange): SQL | undefined {
  return and(gte(column, range.start), lt(column, range.endExclusive));
}

function isoDay(column: TimestampColumn) {
  return sql<string>`to_char(${column}, 'YYYY-MM-DD')`;
}

function isoTimestamp(column: TimestampColumn | SQL) {
  return sql<string | null>`to_char(${column}, 'YYYY-MM-DD"T"HH24:MI:SS')`;
}

function decodeText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

function decodeNullableText(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

const chemicalTotalPerRow = sql.join(
  [
    chemicalRecords.q1,
    chemicalRecords.q2,
    chemicalRecords.q3,
    chemicalRecords.q4,
    chemicalRecords.q5,
    chemicalRecords.q6,
    chemicalRecords.q7,
    chemicalRecords.q8,
    chemicalRecords.q9,
  ].map(column => sql`coalesce(${column}, 0)`),
  sql` + `,
);

const alarmPriority = sql<unknown>`coalesce(${alarmHistory.priority}, 5)`;

export class DrizzleRecordSource implements RecordSource {
  private readonly resolveDb: () => Database;

  // A provider is resolved per query, so a missing connection surfaces as a rejected query
  constructor(db: DatabaseHandle = getDb) {
    if (typeof db === "function") {
      this.resolveDb = db;
    } else {
      const bound: Database = db;
      this.resolveDb = () => bound;
    }
  }

  private get db(): Database {
    return this.resolveDb();
  }

  async checkHealth(): Promise<void> {
    await this.db.execute(sql`select 1`);
  }

  // Load ledger (Rel_Carga)

  async sumLoads(range: TimeRange, clientId?: number): Promise<LoadTotals> {
    const [row] = await this.db
      .select({
        kg: sql<unknown>`coalesce(sum(${loadRecords.kg}), 0)`,
        loads: sql<unknown>`count(*)`,
      })
      .from(loadRecords)
      .where(
        and(
          within(loadRecords.timeStamp, range),
          clientId === undefined ? undefined : eq(loadRecords.clientId, clientId),
        ),
      );

    return { kg: coerceNumber(row?.kg), loads: coerceInteger(row?.loads) };
  }

  async sumLoadWater(range: TimeRange, clientId?: number): Promise<number> {
    const [row] = await this.db
      .select({ volume: sql<unknown>`coalesce(sum(${loadRecords.waterVolume}), 0)` })
      .from(loadRecords)
      .where(
        and(
          within(loadRecords.timeStamp, range),
          clientId === undefined ? undefined : eq(loadRecords.clientId, clientId),
        ),
      );

    return coerceNumber(row?.volume);
  }

  async loadsByDay(range: TimeRange): Promise<DailyLoadRecord[]> {
    const day = isoDay(loadRecords.timeStamp);
    const rows = await this.db
      .select({
        day,
        loads: sql<unknown>`count(*)`,
        kg: sql<unknown>`coalesce(sum(${loadRecords.kg}), 0)`,
        waterVolume: sql<unknown>`coalesce(sum(${loadRecords.waterVolume}), 0)`,
      })
      .from(loadRecords)
      .where(within(loadRecords.timeStamp, range))
      .groupBy(day)
      .orderBy(day);

    return rows.map(row => ({
      day: row.day,
      loads: coerceInteger(row.loads),
      kg: coerceNumber(row.kg),
      waterVolume: coerceNumber(row.waterVolume),
    }));
  }

  async loadsByClient(range: TimeRange): Promise<ClientLoadRecord[]> {
    const kg = sql<unknown>`coalesce(sum(${loadRecords.kg}), 0)`;
    const rows = await this.db
      .select({
        clientId: loadRecords.clientId,
        kg,
        loads: sql<unknown>`count(*)`,
      })
      .from(loadRecords)
      .where(and(within(loadRecords.timeStamp, range), isNotNull(loadRecords.clientId)))
      .groupBy(loadRecords.clientId)
      .orderBy(desc(kg), asc(loadRecords.clientId));

    const result: ClientLoadRecord[] = [];
    for (const row of rows) {
      if (row.clientId === null) {
        continue;
      }
      result.push({ clientId: row.clientId, kg: coerceNumber(row.kg), loads: coerceInteger(row.loads) });
    }
    return result;
  }

  async loadsByProgram(range: TimeRange): Promise<ProgramLoadRecord[]> {
    const kg = sql<unknown>`coalesce(sum(${loadRecords.kg}), 0)`;
    const rows = await this.db
      .select({
        programId: loadRecords.programId,
        programName: programs.programName,
        loads: sql<unknown>`count(*)`,
        kg,
      })
      .from(loadRecords)
      .leftJoin(programs, eq(programs.programId, loadRecords.programId))
      .where(within(loadRecords.timeStamp, range))
      .groupBy(loadRecords.programId, programs.programName)
      .orderBy(desc(kg), asc(loadRecords.programId));

    return rows.map(row => ({
      programId: row.programId,
      programName: row.programName,
      loads: coerceInteger(row.loads),
      kg: coerceNumber(row.kg),
    }));
  }

  async listLoadClientIds(): Promise<number[]> {
    const rows = await this.db
      .selectDistinct({ clientId: loadRecords.clientId })
      .from(loadRecords)
      .where(isNotNull(loadRecords.clientId))
      .orderBy(asc(loadRecords.clientId));

    return rows.flatMap(row => (row.clientId === null ? [] : [row.clientId]));
  }

  // Consolidated daily table (Rel_Diario)

  async sumConsolidated(range: TimeRange, clientId?: number): Promise<ConsolidatedTotals> {
    const [row] = await this.db
      .select({
        kg: sql<unknown>`coalesce(sum(${dailyRecords.kg}), 0)`,
        productionMinutes: sql<unknown>`coalesce(sum(${dailyRecords.productionMinutes}), 0)`,
        downtimeMinutes: sql<unknown>`coalesce(sum(${dailyRecords.downtimeMinutes}), 0)`,
        records: sql<unknown>`count(*)`,
      })
      .from(dailyRecords)
      .where(
        and(
          within(dailyRecords.timeStamp, range),
          clientId === undefined ? undefined : eq(dailyRecords.clientId, clientId),
        ),
      );

    return {
      kg: coerceNumber(row?.kg),
      productionMinutes: coerceNumber(row?.productionMinutes),
      downtimeMinutes: coerceNumber(row?.downtimeMinutes),
      records: coerceInteger(row?.records),
    };
  }

  async sumConsolidatedWater(range: TimeRange, clientId?: number): Promise<number> {
    const [row] = await this.db
      .select({ volume: sql<unknown>`coalesce(sum(${dailyRecords.waterVolume}), 0)` })
      .from(dailyRecords)
      .where(
        and(
          within(dailyRecords.timeStamp, range),
          clientId === undefined ? undefined : eq(dailyRecords.clientId, clientId),
        ),
      );

    return coerceNumber(row?.volume);
  }

  async consolidatedByDay(range: TimeRange): Promise<ConsolidatedDayRecord[]> {
    const day = isoDay(dailyRecords.timeStamp);
    const rows = await this.db
      .select({
        day,
        kg: sql<unknown>`coalesce(sum(${dailyRecords.kg}), 0)`,
        productionMinutes: sql<unknown>`coalesce(sum(${dailyRecords.productionMinutes}), 0)`,
        downtimeMinutes: sql<unknown>`coalesce(sum(${dailyRecords.downtimeMinutes}), 0)`,
        waterVolume: sql<unknown>`coalesce(sum(${dailyRecords.waterVolume}), 0)`,
      })
      .from(dailyRecords)
      .where(within(dailyRecords.timeStamp, range))
      .groupBy(day)
      .orderBy(day);

    return rows.map(row => ({
      day: row.day,
      kg: coerceNumber(row.kg),
      productionMinutes: coerceNumber(row.productionMinutes),
      downtimeMinutes: coerceNumber(row.downtimeMinutes),
      waterVolume: coerceNumber(row.waterVolume),
    }));
  }

  // Chemical dosing (Rel_Quimico)

  async sumChemicals(range: TimeRange): Promise<number> {
    const [row] = await this.db
      .select({ ml: sql<unknown>`coalesce(sum(${chemicalTotalPerRow}), 0)` })
      .from(chemicalRecords)
      .where(within(chemicalRecords.timeStamp, range));

    return coerceNumber(row?.ml);
  }

  async chemicalsByDay(range: TimeRange): Promise<ChemicalDayRecord[]> {
    const day = isoDay(chemicalRecords.timeStamp);
    const rows = await this.db
      .select({ day, ml: sql<unknown>`coalesce(sum(${chemicalTotalPerRow}), 0)` })
      .from(chemicalRecords)
      .where(within(chemicalRecords.timeStamp, range))
      .groupBy(day)
      .orderBy(day);

    return rows.map(row => ({ day: row.day, ml: coerceNumber(row.ml) }));
  }

  // Alarm history (ALARMHISTORY)

  async countAlarms(range: TimeRange, options: { activeOnly: boolean }): Promise<number> {
    const [row] = await this.db
      .select({ alarms: sql<unknown>`count(*)` })
      .from(alarmHistory)
      .where(
        and(
          within(alarmHistory.startTime, range),
          options.activeOnly ? isNull(alarmHistory.normTime) : undefined,
        ),
      );

    return coerceInteger(row?.alarms);
  }

  async topClosedAlarms(criteria: ClosedAlarmCriteria, limit: number): Promise<AlarmOccurrenceRecord[]> {
    const filter =
      criteria.kind === "period"
        ? and(within(alarmHistory.startTime, criteria.range), within(alarmHistory.normTime, criteria.range))
        : and(gt(alarmHistory.startTime, criteria.since), gt(alarmHistory.normTime, criteria.since));

    const occurrences = sql<unknown>`count(*)`;
    const rows = await this.db
      .select({
        tag: alarmHistory.tag,
        message: sql<unknown>`coalesce(${alarmHistory.message}, '')`,
        occurrences,
        lastOccurrence: isoTimestamp(sql`max(${alarmHistory.startTime})`),
      })
      .from(alarmHistory)
      .where(filter)
      .groupBy(alarmHistory.tag, alarmHistory.message)
      .orderBy(desc(occurrences), asc(alarmHistory.tag))
      .limit(limit);

    return rows.map(row => ({
      tag: row.tag,
      message: decodeText(row.message),
      occurrences: coerceInteger(row.occurrences),
      lastOccurrence: decodeNullableText(row.lastOccurrence),
    }));
  }

  async alarmsByDay(range: TimeRange): Promise<AlarmDayRecord[]> {
    const day = isoDay(alarmHistory.startTime);
    const rows = await this.db
      .select({
        day,
        alarms: sql<unknown>`count(*)`,
        critical: sql<unknown>`count(*) filter (where ${alarmPriority} <= 2)`,
      })
      .from(alarmHistory)
      .where(within(alarmHistory.startTime, range))
      .groupBy(day)
      .orderBy(day);

    return rows.map(row => ({
      day: row.day,
      alarms: coerceInteger(row.alarms),
      critical: coerceInteger(row.critical),
    }));
  }

  async alarmsByPriority(range: TimeRange): Promise<AlarmPriorityRecord[]> {
    const rows = await this.db
      .select({ priority: alarmPriority, alarms: sql<unknown>`count(*)` })
      .from(alarmHistory)
      .where(within(alarmHistory.startTime, range))
      .groupBy(alarmPriority)
      .orderBy(alarmPriority);

    return rows.map(row => ({ priority: coerceInteger(row.priority), alarms: coerceInteger(row.alarms) }));
  }

  async averageResolutionMinutes(range: TimeRange): Promise<number> {
    const [row] = await this.db
      .select({
        minutes: sql<unknown>`avg(extract(epoch from (${alarmHistory.normTime} - ${alarmHistory.startTime})) / 60)`,
      })
      .from(alarmHistory)
      .where(
        and(
          within(alarmHistory.startTime, range),
          isNotNull(alarmHistory.normTime),
          gt(alarmHistory.normTime, alarmHistory.startTime),
        ),
      );

    return coerceNumber(row?.minutes);
  }

  async listActiveAlarms(since: Date, limit: number): Promise<ActiveAlarmRecord[]> {
    const rows = await this.db
      .select({
        id: alarmHistory.id,
        tag: alarmHistory.tag,
        message: alarmHistory.message,
        area: alarmHistory.area,
        priority: alarmPriority,
        startedAt: isoTimestamp(alarmHistory.startTime),
      })
      .from(alarmHistory)
      .where(and(isNull(alarmHistory.normTime), gte(alarmHistory.startTime, since)))
      .orderBy(asc(alarmPriority), desc(alarmHistory.startTime))
      .limit(limit);

    return rows.map(row => ({
      id: row.id,
      tag: row.tag,
      message: row.message ?? "",
      area: row.area,
      priority: coerceInteger(row.priority),
      startedAt: decodeText(row.startedAt),
    }));
  }

  // Cumulative status (Sts_Dados)

  async countStatusRecords(range: TimeRange): Promise<number> {
    const [row] = await this.db
      .select({ records: sql<unknown>`count(*)` })
      .from(statusRecords)
      .where(within(statusRecords.timeStamp, range));

    return coerceInteger(row?.records);
  }

  async latestStatusDay(): Promise<string | null> {
    const [row] = await this.db
      .select({ day: sql<unknown>`to_char(max(${statusRecords.timeStamp}), 'YYYY-MM-DD')` })
      .from(statusRecords);

    return decodeNullableText(row?.day);
  }

  async lastStatusOnDay(range: TimeRange): Promise<StatusSnapshotRecord | null> {
    const [row] = await this.db
      .select({
        timeStamp: isoTimestamp(statusRecords.timeStamp),
        waterVolume: statusRecords.waterVolume,
        cycles: statusRecords.cycles,
        washedKg: statusRecords.washedKg,
        clientId: statusRecords.currentClientId,
      })
      .from(statusRecords)
      .where(within(statusRecords.timeStamp, range))
      .orderBy(desc(statusRecords.timeStamp))
      .limit(1);

    if (!row) {
      return null;
    }

    return {
      timeStamp: decodeText(row.timeStamp),
      waterVolume: coerceNumber(row.waterVolume),
      cycles: coerceNumber(row.cycles),
      washedKg: coerceNumber(row.washedKg),
      clientId: row.clientId,
    };
  }
}
