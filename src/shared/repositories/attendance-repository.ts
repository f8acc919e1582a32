import { promises as fs } from "fs";
import path from "path";
import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { cloneRecord, type AttendanceRecord } from "@/entities/attendance";
import type { GallerySnapshot } from "@/entities/face-gallery";
import type { RepositoryKind, SystemConfig } from "@/shared/config/system-config";
import type { Logger } from "@/shared/lib/logger";
import { createSupabaseClient } from "@/shared/services/supabase-client";

export const attendanceRecordSchema = z.object({
  label: z.string().min(1),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  time: z.string().regex(/^\d{2}:\d{2}:\d{2}$/),
  timestamp: z.string(),
  weekday: z.string(),
  status: z.string().min(1),
  entryKind: z.enum(["automatic", "manual"]),
  extra: z.record(z.string()).optional(),
});

const galleryEntrySchema = z.object({
  label: z.string().min(1),
  vector: z.array(z.number()),
});

export const gallerySnapshotSchema = z.object({
  version: z.literal("gallery-v1"),
  entries: z.array(galleryEntrySchema),
  savedAt: z.string(),
});

const embeddingRowSchema = z.object({
  label: z.string().min(1),
  position: z.number().int(),
  vector: z.array(z.number()),
});

const attendanceRowSchema = z.object({
  label: z.string().min(1),
  date: z.string(),
  time: z.string(),
  timestamp: z.string(),
  weekday: z.string(),
  status: z.string(),
  entry_kind: z.enum(["automatic", "manual"]),
  extra: z.record(z.string()).nullish(),
});

type AttendanceRow = z.infer<typeof attendanceRowSchema>;

const ATTENDANCE_COLUMNS = "label, date, time, timestamp, weekday, status, entry_kind, extra";

const DATE_FILE_PATTERN = /^(\d{4}-\d{2}-\d{2})\.jsonl$/;

const toRecord = (row: AttendanceRow): AttendanceRecord => ({
  label: row.label,
  date: row.date,
  time: row.time,
  timestamp: row.timestamp,
  weekday: row.weekday,
  status: row.status,
  entryKind: row.entry_kind,
  ...(row.extra ? { extra: row.extra } : {}),
});

const emptySnapshot = (): GallerySnapshot => ({
  version: "gallery-v1",
  entries: [],
  savedAt: new Date(0).toISOString(),
});

/**
 * Storage contract for the two persisted collections: the gallery snapshot
 * and the date-partitioned attendance log. Implementations throw plain
 * errors; callers wrap them into PersistenceError.
 *
 * `saveGallery` replaces the stored gallery as a whole or not at all.
 */
export interface AttendanceRepository {
  kind: RepositoryKind;
  loadGallery(): Promise<GallerySnapshot>;
  saveGallery(snapshot: GallerySnapshot): Promise<void>;
  appendRecord(date: string, record: AttendanceRecord): Promise<void>;
  readPartition(date: string): Promise<AttendanceRecord[]>;
  /** Records dated within [start, end], date order then insertion order. */
  readRange(start: string, end: string): Promise<AttendanceRecord[]>;
  /** Dates that have at least one record, ascending. */
  partitionDates(): Promise<string[]>;
}

export class InMemoryAttendanceRepository implements AttendanceRepository {
  kind: RepositoryKind = "memory";
  private gallery: GallerySnapshot = emptySnapshot();
  private partitions = new Map<string, AttendanceRecord[]>();

  async loadGallery(): Promise<GallerySnapshot> {
    return {
      ...this.gallery,
      entries: this.gallery.entries.map((entry) => ({ label: entry.label, vector: [...entry.vector] })),
    };
  }

  async saveGallery(snapshot: GallerySnapshot): Promise<void> {
    this.gallery = gallerySnapshotSchema.parse(snapshot);
  }

  async appendRecord(date: string, record: AttendanceRecord): Promise<void> {
    const partition = this.partitions.get(date) ?? [];
    partition.push(cloneRecord(record));
    this.partitions.set(date, partition);
  }

  async readPartition(date: string): Promise<AttendanceRecord[]> {
    return (this.partitions.get(date) ?? []).map(cloneRecord);
  }

  async readRange(start: string, end: string): Promise<AttendanceRecord[]> {
    const dates = (await this.partitionDates()).filter((date) => date >= start && date <= end);
    return dates.flatMap((date) => (this.partitions.get(date) ?? []).map(cloneRecord));
  }

  async partitionDates(): Promise<string[]> {
    return [...this.partitions.keys()].filter((date) => this.partitions.get(date)?.length).sort();
  }
}

const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * JSON files under dataDir: gallery.json holds the snapshot, and each
 * calendar date gets attendance/<date>.jsonl with one record per line.
 */
export class FileAttendanceRepository implements AttendanceRepository {
  kind: RepositoryKind = "file";
  private readonly galleryFile: string;
  private readonly attendanceDir: string;

  constructor(private readonly dataDir: string) {
    this.galleryFile = path.join(dataDir, "gallery.json");
    this.attendanceDir = path.join(dataDir, "attendance");
  }

  private partitionFile(date: string): string {
    return path.join(this.attendanceDir, `${date}.jsonl`);
  }

  async loadGallery(): Promise<GallerySnapshot> {
    let raw: string;
    try {
      raw = await fs.readFile(this.galleryFile, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return emptySnapshot();
      throw error;
    }
    return gallerySnapshotSchema.parse(JSON.parse(raw));
  }

  async saveGallery(snapshot: GallerySnapshot): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    // Write then rename so a crash never leaves a half-written gallery
    const tmpFile = `${this.galleryFile}.tmp`;
    await fs.writeFile(tmpFile, JSON.stringify(snapshot, null, 2), "utf8");
    await fs.rename(tmpFile, this.galleryFile);
  }

  async appendRecord(date: string, record: AttendanceRecord): Promise<void> {
    await fs.mkdir(this.attendanceDir, { recursive: true });
    await fs.appendFile(this.partitionFile(date), `${JSON.stringify(record)}\n`, "utf8");
  }

  async readPartition(date: string): Promise<AttendanceRecord[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.partitionFile(date), "utf8");
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    return raw
      .split("\n")
      .filter((line) => line.trim().length > 0)
      .map((line) => attendanceRecordSchema.parse(JSON.parse(line)));
  }

  async readRange(start: string, end: string): Promise<AttendanceRecord[]> {
    const dates = (await this.partitionDates()).filter((date) => date >= start && date <= end);
    const records: AttendanceRecord[] = [];
    for (const date of dates) {
      records.push(...(await this.readPartition(date)));
    }
    return records;
  }

  async partitionDates(): Promise<string[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.attendanceDir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    return files
      .map((file) => DATE_FILE_PATTERN.exec(file)?.[1])
      .filter((date): date is string => date !== undefined)
      .sort();
  }
}

export class SupabaseAttendanceRepository implements AttendanceRepository {
  kind: RepositoryKind = "supabase";

  constructor(private readonly client: SupabaseClient) {}

  async loadGallery(): Promise<GallerySnapshot> {
    const { data, error } = await this.client
      .from("face_embeddings")
      .select("label, position, vector")
      .order("position", { ascending: true });

    if (error) {
      throw new Error(error.message);
    }

    const rows = z.array(embeddingRowSchema).parse(data ?? []);

    return {
      version: "gallery-v1",
      entries: rows.map((row) => ({ label: row.label, vector: row.vector })),
      savedAt: new Date().toISOString(),
    };
  }

  // replace_face_embeddings (supabase/schema.sql) deletes and inserts in one transaction
  async saveGallery(snapshot: GallerySnapshot): Promise<void> {
    const { error } = await this.client.rpc("replace_face_embeddings", {
      entries: snapshot.entries.map((entry, position) => ({
        label: entry.label,
        position,
        vector: entry.vector,
      })),
    });

    if (error) {
      throw new Error(error.message);
    }
  }

  async appendRecord(date: string, record: AttendanceRecord): Promise<void> {
    const { error } = await this.client.from("attendance_records").insert({
      label: record.label,
      date,
      time: record.time,
      timestamp: record.timestamp,
      weekday: record.weekday,
      status: record.status,
      entry_kind: record.entryKind,
      extra: record.extra ?? null,
    });

    if (error) {
      throw new Error(error.message);
    }
  }

  async readPartition(date: string): Promise<AttendanceRecord[]> {
    const { data, error } = await this.client
      .from("attendance_records")
      .select(ATTENDANCE_COLUMNS)
      .eq("date", date)
      .order("id", { ascending: true });

    if (error) {
      throw new Error(error.message);
    }

    return z.array(attendanceRowSchema).parse(data ?? []).map(toRecord);
  }

  async readRange(start: string, end: string): Promise<AttendanceRecord[]> {
    const { data, error } = await this.client
      .from("attendance_records")
      .select(ATTENDANCE_COLUMNS)
      .gte("date", start)
      .lte("date", end)
      .order("date", { ascending: true })
      .order("id", { ascending: true });

    if (error) {
      throw new Error(error.message);
    }

    return z.array(attendanceRowSchema).parse(data ?? []).map(toRecord);
  }

  async partitionDates(): Promise<string[]> {
    const { data, error } = await this.client
      .from("attendance_records")
      .select("date")
      .order("date", { ascending: true });

    if (error) {
      throw new Error(error.message);
    }

    const rows = z.array(z.object({ date: z.string() })).parse(data ?? []);
    return [...new Set(rows.map((row) => row.date))];
  }
}

export const createAttendanceRepository = (config: SystemConfig, logger: Logger = console): AttendanceRepository => {
  switch (config.repository) {
    case "supabase": {
      const client = createSupabaseClient(config);
      if (!client) {
        logger.warn("[repository] Supabase is not configured, falling back to in-memory storage");
        return new InMemoryAttendanceRepository();
      }
      return new SupabaseAttendanceRepository(client);
    }
    case "file":
      return new FileAttendanceRepository(config.dataDir);
    case "memory":
      return new InMemoryAttendanceRepository();
  }
};
