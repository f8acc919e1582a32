import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { SessionStatistics } from "@/entities/attendance";
import { silentLogger } from "@/shared/lib/logger";
import { createManualClock } from "@/shared/mocks/embeddings";
import {
  FileAttendanceRepository,
  InMemoryAttendanceRepository,
} from "@/shared/repositories/attendance-repository";
import { BACKUP_METADATA_FILE, backupDirectoryName, writeAttendanceBackup } from "./attendance-backup";
import { AttendanceLedger } from "./attendance-ledger";

const sessionStats: SessionStatistics = {
  sessionStart: "2024-01-03T08:00:00",
  sessionDurationMinutes: 60,
  totalCheckIns: 2,
  duplicateAttempts: 0,
  manualEntries: 1,
  todayTotalAttendees: 1,
};

describe("backupDirectoryName", () => {
  it("stamps the local date and time", () => {
    expect(backupDirectoryName(new Date(2024, 0, 3, 8, 5, 9))).toBe("backup_20240103_080509");
  });
});

describe("writeAttendanceBackup", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), "attendance-backup-"));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it("writes one file per day plus a manifest", async () => {
    const repository = new InMemoryAttendanceRepository();
    const ledger = await AttendanceLedger.open(repository, {
      clock: createManualClock(new Date(2024, 0, 3, 8)).clock,
      logger: silentLogger,
    });
    await ledger.mark("Alice", new Date(2024, 0, 1, 9));
    await ledger.manualEntry("Bob", "2024-01-01", "10:00", "Late");
    await ledger.mark("Alice", new Date(2024, 0, 3, 9));
    const target = path.join(workDir, "backup");

    const manifest = await writeAttendanceBackup(repository, target, {
      at: new Date(2024, 0, 3, 9, 30),
      sessionStats,
    });

    expect(manifest).toEqual({
      backupDate: "2024-01-03T09:30:00",
      source: "memory",
      partitions: ["2024-01-01", "2024-01-03"],
      filesBackedUp: 2,
      totalRecords: 3,
      sessionStats,
    });
    expect((await fs.readdir(target)).sort()).toEqual(["2024-01-01.jsonl", "2024-01-03.jsonl", BACKUP_METADATA_FILE]);

    const metadata: unknown = JSON.parse(await fs.readFile(path.join(target, BACKUP_METADATA_FILE), "utf8"));
    expect(metadata).toEqual(manifest);
  });

  it("writes day files the file repository can read back", async () => {
    const repository = new InMemoryAttendanceRepository();
    const ledger = await AttendanceLedger.open(repository, {
      clock: createManualClock(new Date(2024, 0, 1, 8)).clock,
      logger: silentLogger,
    });
    await ledger.mark("Alice", new Date(2024, 0, 1, 9), { device: "kiosk-1" });
    const target = path.join(workDir, "restore", "attendance");

    await writeAttendanceBackup(repository, target, { at: new Date(2024, 0, 1, 12), sessionStats });

    const restored = new FileAttendanceRepository(path.join(workDir, "restore"));
    expect(await restored.readPartition("2024-01-01")).toEqual(await repository.readPartition("2024-01-01"));
  });

  it("writes only the manifest when there are no records", async () => {
    const target = path.join(workDir, "empty");

    const manifest = await writeAttendanceBackup(new InMemoryAttendanceRepository(), target, {
      at: new Date(2024, 0, 1, 12),
      sessionStats,
    });

    expect(manifest.filesBackedUp).toBe(0);
    expect(manifest.totalRecords).toBe(0);
    expect(await fs.readdir(target)).toEqual([BACKUP_METADATA_FILE]);
  });
});
