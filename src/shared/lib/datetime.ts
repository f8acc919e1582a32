export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

const DATE_KEY_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

const pad = (value: number, length = 2) => String(value).padStart(length, "0");

/** Local calendar date as YYYY-MM-DD. */
export const toDateKey = (date: Date): string =>
  `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

export const formatTime = (date: Date): string =>
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const formatLocalTimestamp = (date: Date): string => `${toDateKey(date)}T${formatTime(date)}`;

export const weekdayName = (date: Date): string => WEEKDAYS[date.getDay()];

export const isDateKey = (value: string): boolean => parseDateKey(value) !== null;

/**
 * Parse YYYY-MM-DD into a local-midnight Date. Returns null for malformed
 * or impossible dates such as 2024-02-30.
 */
export const parseDateKey = (value: string): Date | null => {
  const match = DATE_KEY_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]) - 1;
  const day = Number(match[3]);
  const date = new Date(year, month, day);

  if (date.getFullYear() !== year || date.getMonth() !== month || date.getDate() !== day) {
    return null;
  }
  return date;
};

/** Accepts HH:MM or HH:MM:SS and returns HH:MM:SS, or null. */
export const normalizeTime = (value: string): string | null => {
  const match = TIME_PATTERN.exec(value);
  if (!match) return null;
  return `${match[1]}:${match[2]}:${match[3] ?? "00"}`;
};

export const addDays = (dateKey: string, days: number): string => {
  const date = parseDateKey(dateKey);
  if (!date) {
    throw new RangeError(`Invalid date key: ${dateKey}`);
  }
  date.setDate(date.getDate() + days);
  return toDateKey(date);
};
