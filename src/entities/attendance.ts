export type EntryKind = "automatic" | "manual";

// Present/Late/Absent are the built-in statuses, operators may record others
export type AttendanceStatus = "Present" | "Late" | "Absent" | (string & {});

export interface AttendanceRecord {
  label: string;
  date: string; // YYYY-MM-DD (local calendar date)
  time: string; // HH:MM:SS
  timestamp: string; // YYYY-MM-DDTHH:MM:SS (local)
  weekday: string; // Monday..Sunday
  status: AttendanceStatus;
  entryKind: EntryKind;
  extra?: Record<string, string>; // caller-supplied fields stored with the record
}

export type MarkResult =
  | {
      status: "success";
      label: string;
      record: AttendanceRecord;
      totalMarkedToday: number;
    }
  | {
      status: "already_marked";
      label: string;
      firstCheckInTime: string;
    };

export interface AttendanceStats {
  dateRange: string;
  totalRecords: number;
  uniqueIdentities: number;
  dailyCounts: Record<string, number>;
  numberOfDays: number;
  averageDailyAttendance: number;
  perIdentityCounts: Record<string, number>;
  topIdentities: Array<[label: string, count: number]>;
  weekdayDistribution: Record<string, number>;
}

export interface SessionStatistics {
  sessionStart: string;
  sessionDurationMinutes: number;
  totalCheckIns: number;
  duplicateAttempts: number;
  manualEntries: number;
  todayTotalAttendees: number;
}

export type AttendanceRecordListener = (record: AttendanceRecord) => void;

export const DEFAULT_ATTENDANCE_STATUS: AttendanceStatus = "Present";

export const cloneRecord = (record: AttendanceRecord): AttendanceRecord =>
  record.extra ? { ...record, extra: { ...record.extra } } : { ...record };
