import {
  cloneRecord,
  DEFAULT_ATTENDANCE_STATUS,
  type AttendanceRecord,
  type AttendanceRecordListener,
  type AttendanceStatus,
  type MarkResult,
  type SessionStatistics,
} from "@/entities/attendance";
import type { AttendanceRepository } from "@/shared/repositories/attendance-repository";
import {
  addDays,
  formatLocalTimestamp,
  formatTime,
  isDateKey,
  normalizeTime,
  parseDateKey,
  systemClock,
  toDateKey,
  weekdayName,
  type Clock,
} from "@/shared/lib/datetime";
import { InvalidInputError, withPersistence } from "@/shared/lib/errors";
import { KeyedLock } from "@/shared/lib/keyed-lock";
import type { Logger } from "@/shared/lib/logger";
import { roundTo } from "@/shared/lib/math";

export interface AttendanceLedgerOptions {
  clock?: Clock;
  logger?: Logger;
  historyDays?: number;
}

// One calendar day: its records in append order plus the labels that
// already have an automatic record (the daily mark set)
interface DayPartition {
  records: AttendanceRecord[];
  marked: Map<string, AttendanceRecord>;
}

const buildPartition = (records: AttendanceRecord[]): DayPartition => {
  const marked = new Map<string, AttendanceRecord>();
  for (const record of records) {
    if (record.entryKind === "automatic" && !marked.has(record.label)) {
      marked.set(record.label, record);
    }
  }
  return { records, marked };
};

const assertLabel = (label: string) => {
  if (!label.trim()) {
    throw new InvalidInputError("Identity label must not be empty");
  }
};

const withExtra = (record: AttendanceRecord, extra?: Record<string, string>): AttendanceRecord => {
  if (!extra || Object.keys(extra).length === 0) return record;
  if (Object.keys(extra).some((key) => !key.trim())) {
    throw new InvalidInputError("Extra field names must not be empty");
  }
  return { ...record, extra: { ...extra } };
};

/**
 * Date-partitioned, append-only attendance log.
 *
 * Automatic marks are deduplicated per (label, calendar day): the first mark
 * wins and later ones return `already_marked`. All appends to one day run
 * under that day's lock, and the in-memory partition changes only after the
 * repository confirmed the append.
 *
 * Only today's partition is kept in memory, plus any day whose lock is held.
 * Other days are read from the repository on demand.
 */
export class AttendanceLedger {
  private readonly partitions = new Map<string, DayPartition>();
  private readonly locks = new KeyedLock<string>();
  private readonly listeners = new Set<AttendanceRecordListener>();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly historyDays: number;
  private readonly sessionStart: Date;
  private counters = { totalCheckIns: 0, duplicateAttempts: 0, manualEntries: 0 };

  private constructor(
    private readonly repository: AttendanceRepository,
    options: AttendanceLedgerOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? console;
    this.historyDays = options.historyDays ?? 30;
    this.sessionStart = this.clock();
  }

  /**
   * Open the ledger and rebuild today's mark set from storage, so a restart
   * never allows a second automatic mark on the same day.
   */
  static async open(repository: AttendanceRepository, options: AttendanceLedgerOptions = {}): Promise<AttendanceLedger> {
    const ledger = new AttendanceLedger(repository, options);
    const today = ledger.today();
    await ledger.withDay(today, async () => undefined);
    return ledger;
  }

  today(): string {
    return toDateKey(this.clock());
  }

  async mark(label: string, timestamp: Date = this.clock(), extra?: Record<string, string>): Promise<MarkResult> {
    assertLabel(label);
    if (Number.isNaN(timestamp.getTime())) {
      throw new InvalidInputError("Invalid timestamp");
    }

    const date = toDateKey(timestamp);
    const record = withExtra(
      {
        label,
        date,
        time: formatTime(timestamp),
        timestamp: formatLocalTimestamp(timestamp),
        weekday: weekdayName(timestamp),
        status: DEFAULT_ATTENDANCE_STATUS,
        entryKind: "automatic",
      },
      extra,
    );

    return this.withDay(date, async (partition): Promise<MarkResult> => {
      const existing = partition.marked.get(label);
      if (existing) {
        this.counters.duplicateAttempts += 1;
        this.logger.warn(`[ledger] ${label} already marked on ${date} at ${existing.time}`);
        return { status: "already_marked", label, firstCheckInTime: existing.time };
      }

      await withPersistence("appendRecord", () => this.repository.appendRecord(date, record));

      partition.records.push(record);
      partition.marked.set(label, record);
      this.counters.totalCheckIns += 1;
      this.logger.info(`[ledger] Attendance marked for ${label} at ${record.timestamp}`);
      this.notify(record);

      return { status: "success", label, record: cloneRecord(record), totalMarkedToday: partition.marked.size };
    });
  }

  /**
   * Operator correction. Always appends a manual record and never reads or
   * changes the daily mark set.
   */
  async manualEntry(
    label: string,
    date: string,
    time: string,
    status: AttendanceStatus = DEFAULT_ATTENDANCE_STATUS,
    extra?: Record<string, string>,
  ): Promise<AttendanceRecord> {
    assertLabel(label);
    const day = parseDateKey(date);
    if (!day) {
      throw new InvalidInputError(`Invalid date "${date}", expected YYYY-MM-DD`);
    }
    const normalizedTime = normalizeTime(time);
    if (!normalizedTime) {
      throw new InvalidInputError(`Invalid time "${time}", expected HH:MM or HH:MM:SS`);
    }
    if (!status.trim()) {
      throw new InvalidInputError("Status must not be empty");
    }

    const record = withExtra(
      {
        label,
        date,
        time: normalizedTime,
        timestamp: `${date}T${normalizedTime}`,
        weekday: weekdayName(day),
        status,
        entryKind: "manual",
      },
      extra,
    );

    return this.withDay(date, async (partition) => {
      await withPersistence("appendRecord", () => this.repository.appendRecord(date, record));

      partition.records.push(record);
      this.counters.manualEntries += 1;
      this.logger.info(`[ledger] Manual ${status} entry for ${label} on ${date}`);
      this.notify(record);
      return cloneRecord(record);
    });
  }

  /** Records of one calendar day in insertion order. */
  async partition(date: string): Promise<AttendanceRecord[]> {
    if (!isDateKey(date)) {
      throw new InvalidInputError(`Invalid date "${date}", expected YYYY-MM-DD`);
    }
    const cached = this.partitions.get(date);
    if (cached) {
      return cached.records.map(cloneRecord);
    }
    if (date === this.today()) {
      return this.withDay(date, async (partition) => partition.records.map(cloneRecord));
    }
    return withPersistence("readPartition", () => this.repository.readPartition(date));
  }

  /**
   * Records dated within [start, end] in date order, then insertion order,
   * read from the repository in one call. Empty when start is after end.
   */
  async range(start: string, end: string): Promise<AttendanceRecord[]> {
    if (!isDateKey(start) || !isDateKey(end)) {
      throw new InvalidInputError(`Invalid date range "${start}".."${end}", expected YYYY-MM-DD`);
    }
    if (start > end) return [];
    return withPersistence("readRange", () => this.repository.readRange(start, end));
  }

  async todayRecords(): Promise<AttendanceRecord[]> {
    return this.partition(this.today());
  }

  /**
   * Records of `label` (case-insensitive) from `daysBack` days ago through
   * today, oldest first.
   */
  async history(label: string, daysBack: number = this.historyDays): Promise<AttendanceRecord[]> {
    if (!Number.isInteger(daysBack) || daysBack < 0) {
      throw new InvalidInputError(`daysBack must be a non-negative integer, got ${daysBack}`);
    }

    const wanted = label.toLowerCase();
    const end = this.today();
    const records = await this.range(addDays(end, -daysBack), end);
    return records.filter((record) => record.label.toLowerCase() === wanted);
  }

  /** Labels with an automatic record on `date`. */
  async markedOn(date: string): Promise<string[]> {
    const partition = this.partitions.get(date) ?? buildPartition(await this.partition(date));
    return [...partition.marked.keys()];
  }

  subscribe(listener: AttendanceRecordListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  sessionStats(): SessionStatistics {
    const now = this.clock();
    const todayPartition = this.partitions.get(toDateKey(now));

    return {
      sessionStart: formatLocalTimestamp(this.sessionStart),
      sessionDurationMinutes: roundTo((now.getTime() - this.sessionStart.getTime()) / 60_000, 2),
      totalCheckIns: this.counters.totalCheckIns,
      duplicateAttempts: this.counters.duplicateAttempts,
      manualEntries: this.counters.manualEntries,
      todayTotalAttendees: todayPartition?.marked.size ?? 0,
    };
  }

  /**
   * Run `task` under the lock for `date` with that day's partition loaded.
   * Past and future days leave the cache once their last queued task ends.
   */
  private withDay<T>(date: string, task: (partition: DayPartition) => Promise<T>): Promise<T> {
    return this.locks.run(date, async () => {
      try {
        return await task(await this.loadPartition(date));
      } finally {
        this.evictIdle(date);
      }
    });
  }

  // Callers hold the lock for `date`
  private async loadPartition(date: string): Promise<DayPartition> {
    const cached = this.partitions.get(date);
    if (cached) return cached;

    const records = await withPersistence("readPartition", () => this.repository.readPartition(date));
    const partition = buildPartition(records);
    this.partitions.set(date, partition);
    return partition;
  }

  private evictIdle(current: string): void {
    const today = this.today();
    for (const date of this.partitions.keys()) {
      if (date === today) continue;
      // `current` is still locked by the caller; evict it unless more work is queued behind
      if (date === current ? this.locks.hasWaiters(date) : this.locks.isLocked(date)) continue;
      this.partitions.delete(date);
    }
  }

  private notify(record: AttendanceRecord): void {
    for (const listener of this.listeners) {
      try {
        listener(cloneRecord(record));
      } catch (err) {
        this.logger.error("[ledger] Attendance listener failed:", err);
      }
    }
  }
}
