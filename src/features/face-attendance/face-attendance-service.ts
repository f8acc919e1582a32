import path from "path";
import type {
  AttendanceRecord,
  AttendanceStats,
  AttendanceStatus,
  MarkResult,
  SessionStatistics,
} from "@/entities/attendance";
import {
  UNKNOWN_LABEL,
  type GalleryEntry,
  type GalleryStats,
  type GalleryValidationReport,
  type RecognitionResult,
  type RecognitionStatistics,
} from "@/entities/face-gallery";
import {
  backupDirectoryName,
  writeAttendanceBackup,
  type AttendanceBackupManifest,
} from "@/features/attendance/attendance-backup";
import { AttendanceLedger } from "@/features/attendance/attendance-ledger";
import { ReportAggregator } from "@/features/attendance/report-aggregator";
import { EmbeddingGallery } from "@/features/recognition/embedding-gallery";
import { RecognitionStats, recognize, recognizeBatch } from "@/features/recognition/matcher";
import { parseSystemConfig, type SystemConfig, type SystemConfigInput } from "@/shared/config/system-config";
import { systemClock, type Clock } from "@/shared/lib/datetime";
import { toErrorResult, withPersistence, type ErrorResult } from "@/shared/lib/errors";
import { KeyedLock } from "@/shared/lib/keyed-lock";
import type { Logger } from "@/shared/lib/logger";
import {
  createAttendanceRepository,
  type AttendanceRepository,
} from "@/shared/repositories/attendance-repository";

export type AddIdentityResult = { status: "success"; label: string; added: number; total: number } | ErrorResult;

export type RemoveIdentityResult =
  | { status: "success"; label: string; removed: number }
  | { status: "not_found"; label: string; removed: 0 }
  | ErrorResult;

export type OptimizeGalleryResult = { status: "success"; before: number; after: number } | ErrorResult;

export type MarkAttendanceResult = MarkResult | ErrorResult;

export type ManualAttendanceResult = { status: "success"; record: AttendanceRecord } | ErrorResult;

export type BackupAttendanceResult =
  | { status: "success"; directory: string; manifest: AttendanceBackupManifest }
  | ErrorResult;

export type ExtraFields = Record<string, string>;

export interface RecognizeAndMarkResult {
  recognition: RecognitionResult;
  attendance: MarkAttendanceResult | null; // null for unknown faces
}

export interface FaceAttendanceServiceOptions {
  repository?: AttendanceRepository;
  clock?: Clock;
  logger?: Logger;
}

const GALLERY_LOCK = "gallery";

/**
 * The handle every caller goes through: one gallery, one ledger and the
 * repository behind them. Build it once with `create` and share it.
 *
 * Mutations return tagged results, so an unknown identity, a duplicate mark
 * or a storage failure are all values the caller has to look at. Queries
 * throw the typed errors from `@/shared/lib/errors`.
 */
export class FaceAttendanceService {
  private readonly galleryLock = new KeyedLock<string>();
  private readonly recognitionStats = new RecognitionStats();
  private readonly reports: ReportAggregator;

  private constructor(
    readonly config: SystemConfig,
    private readonly repository: AttendanceRepository,
    private readonly gallery: EmbeddingGallery,
    private readonly ledger: AttendanceLedger,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {
    this.reports = new ReportAggregator(ledger, config.topN);
  }

  static async create(
    input: SystemConfigInput | SystemConfig = {},
    options: FaceAttendanceServiceOptions = {},
  ): Promise<FaceAttendanceService> {
    const config = parseSystemConfig(input);
    const logger = options.logger ?? console;
    const clock = options.clock ?? systemClock;
    const repository = options.repository ?? createAttendanceRepository(config, logger);

    const snapshot = await withPersistence("loadGallery", () => repository.loadGallery());
    const gallery = EmbeddingGallery.fromSnapshot(snapshot, config.embeddingDimension);
    const ledger = await AttendanceLedger.open(repository, { clock, logger, historyDays: config.historyDays });

    logger.info(
      `[gallery] Loaded ${gallery.size} embeddings for ${gallery.labels().length} identities (${repository.kind})`,
    );

    return new FaceAttendanceService(config, repository, gallery, ledger, clock, logger);
  }

  get repositoryKind() {
    return this.repository.kind;
  }

  async addIdentity(label: string, embeddings: number[][]): Promise<AddIdentityResult> {
    try {
      await this.writeGallery("addIdentity", () => this.gallery.planAdd(label, embeddings));
      const total = this.gallery.countFor(label);
      this.logger.info(`[gallery] Added ${embeddings.length} embeddings for ${label}`);
      return { status: "success", label, added: embeddings.length, total };
    } catch (error) {
      return this.failed(`addIdentity(${label})`, error);
    }
  }

  async removeIdentity(label: string): Promise<RemoveIdentityResult> {
    try {
      let removed = 0;
      await this.writeGallery("removeIdentity", () => {
        const next = this.gallery.planRemove(label);
        removed = this.gallery.size - next.length;
        return removed > 0 ? next : null;
      });

      if (removed === 0) {
        return { status: "not_found", label, removed: 0 };
      }
      this.logger.info(`[gallery] Removed ${removed} embeddings for ${label}`);
      return { status: "success", label, removed };
    } catch (error) {
      return this.failed(`removeIdentity(${label})`, error);
    }
  }

  async optimizeGallery(maxPerIdentity: number = this.config.maxEmbeddingsPerIdentity): Promise<OptimizeGalleryResult> {
    try {
      let before = 0;
      const next = await this.writeGallery("optimizeGallery", () => {
        before = this.gallery.size;
        const planned = this.gallery.planOptimize(maxPerIdentity);
        return planned.length === before ? null : planned;
      });
      const after = next?.length ?? before;
      this.logger.info(`[gallery] Optimized embeddings: ${before} -> ${after}`);
      return { status: "success", before, after };
    } catch (error) {
      return this.failed("optimizeGallery", error);
    }
  }

  validateGallery(): GalleryValidationReport {
    return this.gallery.validate();
  }

  getGalleryStats(): GalleryStats {
    return this.gallery.stats();
  }

  // Lookups against an empty gallery are not counted
  recognize(embedding: number[], tolerance: number = this.config.tolerance): RecognitionResult {
    const result = recognize(this.gallery, embedding, tolerance);
    if (this.gallery.size > 0) {
      this.recognitionStats.record(result);
    }
    return result;
  }

  recognizeBatch(embeddings: number[][], tolerance: number = this.config.tolerance): RecognitionResult[] {
    const results = recognizeBatch(this.gallery, embeddings, tolerance);
    if (this.gallery.size > 0) {
      results.forEach((result) => this.recognitionStats.record(result));
    }
    return results;
  }

  getRecognitionStats(): RecognitionStatistics {
    return {
      ...this.recognitionStats.snapshot(),
      registeredIdentities: this.gallery.labels().length,
      totalEmbeddings: this.gallery.size,
    };
  }

  async markAttendance(
    label: string,
    timestamp: Date = this.clock(),
    extra?: ExtraFields,
  ): Promise<MarkAttendanceResult> {
    try {
      return await this.ledger.mark(label, timestamp, extra);
    } catch (error) {
      return this.failed(`markAttendance(${label})`, error);
    }
  }

  /** Recognize a face and, when it resolves to a known identity, mark it. */
  async recognizeAndMark(
    embedding: number[],
    timestamp: Date = this.clock(),
    extra?: ExtraFields,
  ): Promise<RecognizeAndMarkResult> {
    const recognition = this.recognize(embedding);
    if (recognition.label === UNKNOWN_LABEL) {
      return { recognition, attendance: null };
    }
    return { recognition, attendance: await this.markAttendance(recognition.label, timestamp, extra) };
  }

  async manualAttendance(
    label: string,
    date: string,
    time: string,
    status?: AttendanceStatus,
    extra?: ExtraFields,
  ): Promise<ManualAttendanceResult> {
    try {
      const record = await this.ledger.manualEntry(label, date, time, status, extra);
      return { status: "success", record };
    } catch (error) {
      return this.failed(`manualAttendance(${label})`, error);
    }
  }

  getTodayAttendance(): Promise<AttendanceRecord[]> {
    return this.ledger.todayRecords();
  }

  getHistory(label: string, daysBack?: number): Promise<AttendanceRecord[]> {
    return this.ledger.history(label, daysBack);
  }

  getReport(start: string, end: string): Promise<AttendanceRecord[]> {
    return this.reports.range(start, end);
  }

  getStatistics(start: string, end: string): Promise<AttendanceStats> {
    return this.reports.statistics(start, end);
  }

  exportReportCsv(start: string, end: string): Promise<string> {
    return this.reports.exportCsv(start, end);
  }

  getSessionStats(): SessionStatistics {
    return this.ledger.sessionStats();
  }

  subscribeToAttendance(listener: (record: AttendanceRecord) => void): () => void {
    return this.ledger.subscribe(listener);
  }

  /**
   * Copy every attendance partition plus a metadata file into `targetDir`,
   * by default `<dataDir>/backup_YYYYMMDD_HHMMSS`.
   */
  async backupAttendance(targetDir?: string): Promise<BackupAttendanceResult> {
    const at = this.clock();
    const directory = targetDir ?? path.join(this.config.dataDir, backupDirectoryName(at));
    try {
      const manifest = await withPersistence("backupAttendance", () =>
        writeAttendanceBackup(this.repository, directory, { at, sessionStats: this.ledger.sessionStats() }),
      );
      this.logger.info(`[ledger] Attendance data backed up to ${directory}`);
      return { status: "success", directory, manifest };
    } catch (error) {
      return this.failed("backupAttendance", error);
    }
  }

  /**
   * Single-writer section for the gallery: plan the change, persist the new
   * snapshot, then swap it in. A failed save leaves memory untouched.
   * `plan` returns null when there is nothing to write.
   */
  private writeGallery(
    operation: string,
    plan: () => readonly GalleryEntry[] | null,
  ): Promise<readonly GalleryEntry[] | null> {
    return this.galleryLock.run(GALLERY_LOCK, async () => {
      const next = plan();
      if (!next) return null;

      await withPersistence(operation, () => this.repository.saveGallery(this.gallery.snapshot(next)));
      this.gallery.commit(next);
      return next;
    });
  }

  private failed(operation: string, error: unknown): ErrorResult {
    const result = toErrorResult(error);
    if (result.kind === "PersistenceFailure") {
      this.logger.error(`[repository] ${operation}: ${result.message}`);
    } else {
      this.logger.warn(`[attendance] ${operation} rejected: ${result.message}`);
    }
    return result;
  }
}
