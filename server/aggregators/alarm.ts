import { alarmPriorityLabels, type ActiveAlarm } from "@shared/schema";
import { parseNaiveTimestamp } from "@shared/utils";

import { formatDuration } from "../kpi-formatting";
import type {
  AlarmDayRecord,
  AlarmOccurrenceRecord,
  AlarmPriorityRecord,
  TimeRange,
} from "../record-source";
import { SourceAggregator } from "./base";

type KnownPriority = keyof typeof alarmPriorityLabels;

function isKnownPriority(priority: number): priority is KnownPriority {
  return Object.prototype.hasOwnProperty.call(alarmPriorityLabels, priority);
}

export function priorityLabel(priority: number): string {
  return isKnownPriority(priority) ? alarmPriorityLabels[priority] : `Priority ${priority}`;
}

export class AlarmAggregator extends SourceAggregator {
  protected readonly sourceName = "alarm_history";

  /** Started in the window and not yet normalized. */
  countActive(range: TimeRange): Promise<number> {
    return this.read("count_active", 0, source => source.countAlarms(range, { activeOnly: true }));
  }

  countStarted(range: TimeRange): Promise<number> {
    return this.read("count_started", 0, source => source.countAlarms(range, { activeOnly: false }));
  }

  topClosedInPeriod(range: TimeRange, limit: number): Promise<AlarmOccurrenceRecord[]> {
    return this.read("top_closed_period", [], source => source.topClosedAlarms({ kind: "period", range }, limit));
  }

  // strict > against midnight on both times, unlike the period variant
  topClosedSince(since: Date, limit: number): Promise<AlarmOccurrenceRecord[]> {
    return this.read("top_closed_since", [], source => source.topClosedAlarms({ kind: "since", since }, limit));
  }

  byDay(range: TimeRange): Promise<AlarmDayRecord[]> {
    return this.read("alarms_by_day", [], source => source.alarmsByDay(range));
  }

  byPriority(range: TimeRange): Promise<AlarmPriorityRecord[]> {
    return this.read("alarms_by_priority", [], source => source.alarmsByPriority(range));
  }

  averageResolutionMinutes(range: TimeRange): Promise<number> {
    return this.read("avg_resolution", 0, source => source.averageResolutionMinutes(range));
  }

  async listActive(since: Date, limit: number, now: Date): Promise<ActiveAlarm[]> {
    const records = await this.read("list_active", [], source => source.listActiveAlarms(since, limit));

    return records.map(record => {
      const started = parseNaiveTimestamp(record.startedAt);
      const elapsedMs = Number.isNaN(started.getTime()) ? 0 : now.getTime() - started.getTime();
      const durationMinutes = Math.max(0, Math.floor(elapsedMs / 60_000));
      return {
        id: record.id,
        tag: record.tag,
        message: record.message,
        area: record.area,
        priority: record.priority,
        priorityLabel: priorityLabel(record.priority),
        startedAt: record.startedAt,
        durationMinutes,
        duration: formatDuration(durationMinutes),
      };
    });
  }
}
