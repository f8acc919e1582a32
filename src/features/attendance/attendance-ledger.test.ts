import { describe, expect, it, vi } from "vitest";
import type { AttendanceRecord } from "@/entities/attendance";
import { InvalidInputError, PersistenceError } from "@/shared/lib/errors";
import { silentLogger } from "@/shared/lib/logger";
import { createManualClock } from "@/shared/mocks/embeddings";
import { InMemoryAttendanceRepository } from "@/shared/repositories/attendance-repository";
import { AttendanceLedger } from "./attendance-ledger";

class SlowRepository extends InMemoryAttendanceRepository {
  async appendRecord(date: string, record: AttendanceRecord): Promise<void> {
    await new Promise((resolve) => setTimeout(resolve, 5));
    return super.appendRecord(date, record);
  }
}

class FlakyRepository extends InMemoryAttendanceRepository {
  failAppends = true;

  async appendRecord(date: string, record: AttendanceRecord): Promise<void> {
    if (this.failAppends) {
      throw new Error("disk full");
    }
    return super.appendRecord(date, record);
  }
}

class CountingRepository extends InMemoryAttendanceRepository {
  partitionReads = 0;
  rangeReads = 0;

  async readPartition(date: string): Promise<AttendanceRecord[]> {
    this.partitionReads += 1;
    return super.readPartition(date);
  }

  async readRange(start: string, end: string): Promise<AttendanceRecord[]> {
    this.rangeReads += 1;
    return super.readRange(start, end);
  }
}

const at = (day: number, hours: number, minutes = 0) => new Date(2024, 0, day, hours, minutes);

const openLedger = async (repository = new InMemoryAttendanceRepository(), now = at(1, 8)) => {
  const manual = createManualClock(now);
  const ledger = await AttendanceLedger.open(repository, { clock: manual.clock, logger: silentLogger });
  return { ledger, repository, manual };
};

describe("AttendanceLedger.mark", () => {
  it("marks once per day and reports the first check-in time afterwards", async () => {
    const { ledger, repository } = await openLedger();

    const first = await ledger.mark("Alice", at(1, 9));
    expect(first).toEqual({
      status: "success",
      label: "Alice",
      totalMarkedToday: 1,
      record: {
        label: "Alice",
        date: "2024-01-01",
        time: "09:00:00",
        timestamp: "2024-01-01T09:00:00",
        weekday: "Monday",
        status: "Present",
        entryKind: "automatic",
      },
    });

    const second = await ledger.mark("Alice", at(1, 9, 30));
    expect(second).toEqual({ status: "already_marked", label: "Alice", firstCheckInTime: "09:00:00" });

    expect(await repository.readPartition("2024-01-01")).toHaveLength(1);
  });

  it("counts distinct identities marked on the day", async () => {
    const { ledger } = await openLedger();

    await ledger.mark("Alice", at(1, 9));
    const bob = await ledger.mark("Bob", at(1, 9, 5));

    expect(bob.status === "success" && bob.totalMarkedToday).toBe(2);
    expect(await ledger.markedOn("2024-01-01")).toEqual(["Alice", "Bob"]);
  });

  it("lets concurrent marks for the same identity write only one record", async () => {
    const { ledger, repository } = await openLedger(new SlowRepository());

    const results = await Promise.all(
      [0, 1, 2, 3, 4].map((minute) => ledger.mark("Alice", at(1, 9, minute))),
    );

    expect(results.filter((result) => result.status === "success")).toHaveLength(1);
    expect(results.filter((result) => result.status === "already_marked")).toHaveLength(4);
    expect(results[0].status).toBe("success");
    expect(results[4]).toEqual({ status: "already_marked", label: "Alice", firstCheckInTime: "09:00:00" });
    expect(await repository.readPartition("2024-01-01")).toHaveLength(1);
  });

  it("starts a fresh mark set on a new calendar day", async () => {
    const { ledger } = await openLedger();

    expect((await ledger.mark("Alice", at(1, 9))).status).toBe("success");
    expect((await ledger.mark("Alice", at(2, 9))).status).toBe("success");
  });

  it("rebuilds today's mark set when reopened over the same storage", async () => {
    const repository = new InMemoryAttendanceRepository();
    const { ledger } = await openLedger(repository);
    await ledger.mark("Alice", at(1, 9));
    await ledger.manualEntry("Bob", "2024-01-01", "08:45", "Late");

    const { ledger: reopened } = await openLedger(repository, at(1, 12));

    expect(await reopened.markedOn("2024-01-01")).toEqual(["Alice"]);
    expect(await reopened.mark("Alice", at(1, 12, 30))).toEqual({
      status: "already_marked",
      label: "Alice",
      firstCheckInTime: "09:00:00",
    });
    expect((await reopened.mark("Bob", at(1, 12, 31))).status).toBe("success");
  });

  it("leaves memory untouched when the append fails", async () => {
    const repository = new FlakyRepository();
    const { ledger } = await openLedger(repository);

    await expect(ledger.mark("Alice", at(1, 9))).rejects.toBeInstanceOf(PersistenceError);
    expect(await ledger.partition("2024-01-01")).toEqual([]);
    expect(await ledger.markedOn("2024-01-01")).toEqual([]);

    repository.failAppends = false;
    const retry = await ledger.mark("Alice", at(1, 9, 1));
    expect(retry.status === "success" && retry.totalMarkedToday).toBe(1);
  });

  it("rejects an empty label and an invalid timestamp", async () => {
    const { ledger } = await openLedger();

    await expect(ledger.mark("", at(1, 9))).rejects.toBeInstanceOf(InvalidInputError);
    await expect(ledger.mark("Alice", new Date(Number.NaN))).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("stores extra fields with the record", async () => {
    const { ledger, repository } = await openLedger();

    const result = await ledger.mark("Alice", at(1, 9), { device: "kiosk-1", camera: "front" });

    expect(result.status === "success" && result.record.extra).toEqual({ device: "kiosk-1", camera: "front" });
    expect((await repository.readPartition("2024-01-01"))[0].extra).toEqual({ device: "kiosk-1", camera: "front" });
  });

  it("leaves out an empty extra map and rejects blank field names", async () => {
    const { ledger } = await openLedger();

    const result = await ledger.mark("Alice", at(1, 9), {});
    expect(result.status).toBe("success");
    expect(result.status === "success" && "extra" in result.record).toBe(false);

    await expect(ledger.mark("Bob", at(1, 9), { " ": "x" })).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("deduplicates concurrent marks on a past day", async () => {
    const { ledger, repository } = await openLedger(new SlowRepository(), at(5, 8));

    const results = await Promise.all([0, 1, 2].map((minute) => ledger.mark("Alice", at(2, 9, minute))));

    expect(results.map((result) => result.status)).toEqual(["success", "already_marked", "already_marked"]);
    expect(await repository.readPartition("2024-01-02")).toHaveLength(1);
  });

  it("reads past days from storage instead of holding them in memory", async () => {
    const { ledger, repository } = await openLedger(new InMemoryAttendanceRepository(), at(5, 8));
    await ledger.mark("Alice", at(2, 9));

    // Written by another process sharing the storage
    await repository.appendRecord("2024-01-02", {
      label: "Bob",
      date: "2024-01-02",
      time: "09:30:00",
      timestamp: "2024-01-02T09:30:00",
      weekday: "Tuesday",
      status: "Present",
      entryKind: "automatic",
    });

    expect(await ledger.markedOn("2024-01-02")).toEqual(["Alice", "Bob"]);
    expect(await ledger.mark("Bob", at(2, 10))).toEqual({
      status: "already_marked",
      label: "Bob",
      firstCheckInTime: "09:30:00",
    });
  });

  it("uses the clock when no timestamp is given", async () => {
    const { ledger, manual } = await openLedger();
    manual.set(at(1, 7, 15));

    const result = await ledger.mark("Alice");

    expect(result.status === "success" && result.record.timestamp).toBe("2024-01-01T07:15:00");
  });
});

describe("AttendanceLedger.manualEntry", () => {
  it("records a manual entry that does not block the automatic mark", async () => {
    const { ledger } = await openLedger();

    const manual = await ledger.manualEntry("Bob", "2024-01-01", "10:00", "Late");
    expect(manual).toEqual({
      label: "Bob",
      date: "2024-01-01",
      time: "10:00:00",
      timestamp: "2024-01-01T10:00:00",
      weekday: "Monday",
      status: "Late",
      entryKind: "manual",
    });
    expect(await ledger.markedOn("2024-01-01")).toEqual([]);

    const automatic = await ledger.mark("Bob", at(1, 11));
    expect(automatic.status === "success" && automatic.totalMarkedToday).toBe(1);
  });

  it("always appends, even after an automatic mark", async () => {
    const { ledger } = await openLedger();
    await ledger.mark("Alice", at(1, 9));

    await ledger.manualEntry("Alice", "2024-01-01", "17:30:00", "Present");
    await ledger.manualEntry("Alice", "2024-01-01", "17:45:00", "Present");

    const records = await ledger.partition("2024-01-01");
    expect(records.map((record) => record.entryKind)).toEqual(["automatic", "manual", "manual"]);
    expect(await ledger.markedOn("2024-01-01")).toEqual(["Alice"]);
    expect(await ledger.mark("Alice", at(1, 18))).toEqual({
      status: "already_marked",
      label: "Alice",
      firstCheckInTime: "09:00:00",
    });
  });

  it("stores extra fields on manual entries", async () => {
    const { ledger, repository } = await openLedger();

    const record = await ledger.manualEntry("Bob", "2024-01-01", "10:00", "Late", { reason: "train delay" });

    expect(record.extra).toEqual({ reason: "train delay" });
    expect((await repository.readPartition("2024-01-01"))[0].extra).toEqual({ reason: "train delay" });
  });

  it("defaults the status to Present", async () => {
    const { ledger } = await openLedger();
    const record = await ledger.manualEntry("Carol", "2024-01-03", "08:00");
    expect(record.status).toBe("Present");
    expect(record.weekday).toBe("Wednesday");
  });

  it("validates date, time and status", async () => {
    const { ledger } = await openLedger();

    await expect(ledger.manualEntry("Bob", "2024-13-01", "10:00")).rejects.toBeInstanceOf(InvalidInputError);
    await expect(ledger.manualEntry("Bob", "2024-01-01", "25:00")).rejects.toBeInstanceOf(InvalidInputError);
    await expect(ledger.manualEntry("Bob", "2024-01-01", "10:00", " ")).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe("AttendanceLedger reads", () => {
  it("returns today's records in insertion order", async () => {
    const { ledger } = await openLedger();
    await ledger.mark("Alice", at(1, 9));
    await ledger.manualEntry("Bob", "2024-01-01", "08:00", "Late");
    await ledger.mark("Carol", at(2, 9));

    const today = await ledger.todayRecords();
    expect(today.map((record) => `${record.label}/${record.entryKind}`)).toEqual([
      "Alice/automatic",
      "Bob/manual",
    ]);
  });

  it("returns an identity's history across the trailing window, oldest first", async () => {
    const { ledger } = await openLedger(new InMemoryAttendanceRepository(), at(10, 12));
    await ledger.manualEntry("Alice", "2024-01-01", "09:00");
    await ledger.mark("Alice", at(8, 9));
    await ledger.mark("Bob", at(8, 9, 5));
    await ledger.mark("Alice", at(6, 9));

    const history = await ledger.history("alice", 5);

    expect(history.map((record) => record.date)).toEqual(["2024-01-06", "2024-01-08"]);
    expect(await ledger.history("Nobody", 5)).toEqual([]);
    expect(await ledger.history("Alice", 9)).toHaveLength(3);
  });

  it("reads a range with a single repository call", async () => {
    const repository = new CountingRepository();
    const { ledger } = await openLedger(repository, at(10, 12));
    await ledger.mark("Alice", at(10, 9));
    await ledger.manualEntry("Bob", "2023-06-01", "09:00");
    const partitionReads = repository.partitionReads;

    const records = await ledger.range("2020-01-01", "2024-12-31");

    expect(records.map((record) => record.date)).toEqual(["2023-06-01", "2024-01-10"]);
    expect(repository.rangeReads).toBe(1);
    expect(repository.partitionReads).toBe(partitionReads);
  });

  it("returns nothing for a reversed range and rejects malformed dates", async () => {
    const { ledger } = await openLedger();
    await ledger.mark("Alice", at(1, 9));

    expect(await ledger.range("2024-01-03", "2024-01-01")).toEqual([]);
    await expect(ledger.range("2024-1-1", "2024-01-03")).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("rejects a negative history window", async () => {
    const { ledger } = await openLedger();
    await expect(ledger.history("Alice", -1)).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe("AttendanceLedger listeners and session stats", () => {
  it("notifies subscribers after each append", async () => {
    const { ledger } = await openLedger();
    const listener = vi.fn();
    const unsubscribe = ledger.subscribe(listener);

    await ledger.mark("Alice", at(1, 9));
    await ledger.mark("Alice", at(1, 9, 10));
    await ledger.manualEntry("Bob", "2024-01-01", "10:00");
    unsubscribe();
    await ledger.mark("Carol", at(1, 11));

    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener.mock.calls.map(([record]) => record.label)).toEqual(["Alice", "Bob"]);
  });

  it("logs a failing listener without failing the mark", async () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const ledger = await AttendanceLedger.open(new InMemoryAttendanceRepository(), {
      clock: createManualClock(at(1, 8)).clock,
      logger,
    });
    ledger.subscribe(() => {
      throw new Error("listener down");
    });

    const result = await ledger.mark("Alice", at(1, 9));

    expect(result.status).toBe("success");
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error.mock.calls[0][0]).toBe("[ledger] Attendance listener failed:");
  });

  it("summarizes the session", async () => {
    const { ledger, manual } = await openLedger();
    await ledger.mark("Alice", at(1, 9));
    await ledger.mark("Alice", at(1, 9, 1));
    await ledger.manualEntry("Bob", "2024-01-01", "09:30");
    manual.advanceMinutes(90);

    expect(ledger.sessionStats()).toEqual({
      sessionStart: "2024-01-01T08:00:00",
      sessionDurationMinutes: 90,
      totalCheckIns: 1,
      duplicateAttempts: 1,
      manualEntries: 1,
      todayTotalAttendees: 1,
    });
  });
});
