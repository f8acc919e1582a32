import { promises as fs } from "fs";
import path from "path";
import type { SessionStatistics } from "@/entities/attendance";
import type { RepositoryKind } from "@/shared/config/system-config";
import { formatLocalTimestamp, formatTime, toDateKey } from "@/shared/lib/datetime";
import type { AttendanceRepository } from "@/shared/repositories/attendance-repository";

export const BACKUP_METADATA_FILE = "backup_metadata.json";

export interface AttendanceBackupManifest {
  backupDate: string;
  source: RepositoryKind;
  partitions: string[];
  filesBackedUp: number;
  totalRecords: number;
  sessionStats: SessionStatistics;
}

/** `backup_YYYYMMDD_HHMMSS` for the given moment, in local time. */
export const backupDirectoryName = (at: Date): string =>
  `backup_${toDateKey(at).replace(/-/g, "")}_${formatTime(at).replace(/:/g, "")}`;

/**
 * Copy every attendance partition into `targetDir` as `<date>.jsonl`, the
 * layout the file repository reads, and write a manifest beside them.
 */
export const writeAttendanceBackup = async (
  repository: AttendanceRepository,
  targetDir: string,
  context: { at: Date; sessionStats: SessionStatistics },
): Promise<AttendanceBackupManifest> => {
  const partitions = await repository.partitionDates();
  await fs.mkdir(targetDir, { recursive: true });

  let totalRecords = 0;
  for (const date of partitions) {
    const records = await repository.readPartition(date);
    totalRecords += records.length;
    const lines = records.map((record) => `${JSON.stringify(record)}\n`).join("");
    await fs.writeFile(path.join(targetDir, `${date}.jsonl`), lines, "utf8");
  }

  const manifest: AttendanceBackupManifest = {
    backupDate: formatLocalTimestamp(context.at),
    source: repository.kind,
    partitions,
    filesBackedUp: partitions.length,
    totalRecords,
    sessionStats: context.sessionStats,
  };
  await fs.writeFile(path.join(targetDir, BACKUP_METADATA_FILE), JSON.stringify(manifest, null, 2), "utf8");

  return manifest;
};
