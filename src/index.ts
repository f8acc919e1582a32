export * from "@/entities/attendance";
export * from "@/entities/face-gallery";
export {
  BACKUP_METADATA_FILE,
  backupDirectoryName,
  writeAttendanceBackup,
  type AttendanceBackupManifest,
} from "@/features/attendance/attendance-backup";
export { AttendanceLedger, type AttendanceLedgerOptions } from "@/features/attendance/attendance-ledger";
export { ReportAggregator, computeAttendanceStats, recordsToCsv } from "@/features/attendance/report-aggregator";
export { EmbeddingGallery } from "@/features/recognition/embedding-gallery";
export { RecognitionStats, recognize, recognizeBatch } from "@/features/recognition/matcher";
export * from "@/features/face-attendance/face-attendance-service";
export * from "@/shared/config/system-config";
export * from "@/shared/lib/errors";
export { systemClock, type Clock } from "@/shared/lib/datetime";
export { silentLogger, type Logger } from "@/shared/lib/logger";
export * from "@/shared/repositories/attendance-repository";
