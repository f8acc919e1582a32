import type { AttendanceRecord, AttendanceStats } from "@/entities/attendance";
import { roundTo, safeDivide } from "@/shared/lib/math";
import type { AttendanceLedger } from "./attendance-ledger";

const CSV_COLUMNS = ["label", "date", "time", "timestamp", "weekday", "status", "entry_kind"] as const;

const increment = (counts: Map<string, number>, key: string) => {
  counts.set(key, (counts.get(key) ?? 0) + 1);
};

const escapeCsv = (value: string): string => {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
};

/** Pure aggregation over an already collected list of records. */
export const computeAttendanceStats = (
  records: AttendanceRecord[],
  range: { start: string; end: string },
  topN: number,
): AttendanceStats => {
  const daily = new Map<string, number>();
  const perIdentity = new Map<string, number>();
  const weekdays = new Map<string, number>();

  for (const record of records) {
    increment(daily, record.date);
    increment(perIdentity, record.label);
    increment(weekdays, record.weekday || "Unknown");
  }

  const numberOfDays = daily.size;

  // Array.prototype.sort is stable, so equal counts keep first-seen order
  const topIdentities = [...perIdentity.entries()].sort((a, b) => b[1] - a[1]).slice(0, topN);

  return {
    dateRange: `${range.start} to ${range.end}`,
    totalRecords: records.length,
    uniqueIdentities: perIdentity.size,
    dailyCounts: Object.fromEntries(daily),
    numberOfDays,
    averageDailyAttendance: roundTo(safeDivide(records.length, numberOfDays), 2),
    perIdentityCounts: Object.fromEntries(perIdentity),
    topIdentities,
    weekdayDistribution: Object.fromEntries(weekdays),
  };
};

export const recordsToCsv = (records: AttendanceRecord[]): string => {
  const lines = [CSV_COLUMNS.join(",")];
  for (const record of records) {
    lines.push(
      [record.label, record.date, record.time, record.timestamp, record.weekday, record.status, record.entryKind]
        .map(escapeCsv)
        .join(","),
    );
  }
  return `${lines.join("\n")}\n`;
};

/** Read-only reporting over the ledger's date partitions. */
export class ReportAggregator {
  constructor(
    private readonly ledger: AttendanceLedger,
    private readonly topN = 10,
  ) {}

  /**
   * Every record dated within [start, end], in date order and then
   * insertion order. Days without activity contribute nothing, and a
   * range whose start is after its end is empty.
   */
  range(start: string, end: string): Promise<AttendanceRecord[]> {
    return this.ledger.range(start, end);
  }

  async statistics(start: string, end: string): Promise<AttendanceStats> {
    const records = await this.range(start, end);
    return computeAttendanceStats(records, { start, end }, this.topN);
  }

  async exportCsv(start: string, end: string): Promise<string> {
    return recordsToCsv(await this.range(start, end));
  }
}
