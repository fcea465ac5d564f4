import type { StatusDayResolution } from "@shared/schema";
import { toIsoDay } from "@shared/utils";

import { SourceAggregator } from "./aggregators/base";
import type { StatusSnapshotRecord } from "./record-source";
import { dayWindow } from "./time-window";

const EMPTY_SNAPSHOT: Omit<StatusSnapshotRecord, "timeStamp"> = {
  waterVolume: 0,
  cycles: 0,
  washedKg: 0,
  clientId: null,
};

/**
 * Picks the day the cumulative status KPIs are read from: literal today when the
 * status table already has rows for it, otherwise the most recent day that has any.
 */
export class StatusDayResolver extends SourceAggregator {
  protected readonly sourceName = "status_records";

  async resolve(now: Date): Promise<StatusDayResolution> {
    const today = toIsoDay(now);

    const todayRows = await this.read<number | null>("count_today", null, source =>
      source.countStatusRecords(dayWindow(today)),
    );
    if (todayRows === null) {
      return { state: "FALLBACK_TO_LATEST", day: today, today };
    }
    if (todayRows > 0) {
      return { state: "HAS_TODAY_DATA", day: today, today };
    }

    const latest = await this.read<string | null>("latest_day", null, source => source.latestStatusDay());
    return { state: "FALLBACK_TO_LATEST", day: latest ?? today, today };
  }

  /**
   * Last row of the day; the counters are cumulative so it already holds the day totals.
   */
  async readSnapshot(day: string): Promise<StatusSnapshotRecord> {
    const snapshot = await this.read<StatusSnapshotRecord | null>("last_on_day", null, source =>
      source.lastStatusOnDay(dayWindow(day)),
    );
    return snapshot ?? { timeStamp: `${day}T00:00:00`, ...EMPTY_SNAPSHOT };
  }
}
