import { isValid, parse, parseISO } from "date-fns";

export const DEFAULT_UTC_OFFSET = "+08:00";

const OFFSET_PATTERN = /^([+-])(\d{2}):?(\d{2})$/;
const ZONED_PATTERN = /(?:Z|[+-]\d{2}:?\d{2}|\bGMT|\bUTC)$/i;
const CJK_DATE_PATTERN = /(\d{4})\s*年\s*(\d{1,2})\s*月\s*(\d{1,2})\s*日(?:\s*(\d{1,2})[:：](\d{2}))?/;
const LOOSE_DATE_PATTERN = /^(\d{4})[-/.](\d{1,2})[-/.](\d{1,2})(?:[ T](\d{1,2}):(\d{2})(?::(\d{2}))?)?$/;

export type DateParseOptions = {
  format?: string | null;
  utcOffset?: string | null;
};

export const parseUtcOffset = (value: string): number | null => {
  const match = OFFSET_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }
  const sign = match[1] === "-" ? -1 : 1;
  const hours = Number(match[2]);
  const minutes = Number(match[3]);
  if (hours > 14 || minutes > 59) {
    return null;
  }
  return sign * (hours * 60 + minutes);
};

// date-fns parses into local wall-clock time; reinterpret that wall clock at the source offset.
const wallClockToUtc = (local: Date, offsetMinutes: number) =>
  new Date(
    Date.UTC(
      local.getFullYear(),
      local.getMonth(),
      local.getDate(),
      local.getHours(),
      local.getMinutes(),
      local.getSeconds(),
      local.getMilliseconds(),
    ) -
      offsetMinutes * 60_000,
  );

const fromEpoch = (value: number): Date | null => {
  if (!Number.isFinite(value) || value <= 0) {
    return null;
  }
  const millis = value >= 1e12 ? value : value * 1000;
  const date = new Date(millis);
  return isValid(date) ? date : null;
};

export const parseDateValue = (value: unknown, options: DateParseOptions = {}): Date | null => {
  const offsetMinutes = parseUtcOffset(options.utcOffset ?? DEFAULT_UTC_OFFSET) ?? 0;

  if (value instanceof Date) {
    return isValid(value) ? value : null;
  }
  if (typeof value === "number") {
    return fromEpoch(value);
  }
  if (typeof value !== "string") {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }
  if (/^\d{10}$|^\d{13}$/.test(trimmed)) {
    return fromEpoch(Number(trimmed));
  }

  if (options.format) {
    const parsed = parse(trimmed, options.format, new Date(2000, 0, 1));
    if (isValid(parsed)) {
      return wallClockToUtc(parsed, offsetMinutes);
    }
  }

  const parts = CJK_DATE_PATTERN.exec(trimmed) ?? LOOSE_DATE_PATTERN.exec(trimmed);
  if (parts) {
    const local = new Date(
      Number(parts[1]),
      Number(parts[2]) - 1,
      Number(parts[3]),
      parts[4] ? Number(parts[4]) : 0,
      parts[5] ? Number(parts[5]) : 0,
      parts[6] ? Number(parts[6]) : 0,
    );
    return isValid(local) ? wallClockToUtc(local, offsetMinutes) : null;
  }

  if (ZONED_PATTERN.test(trimmed)) {
    const zoned = new Date(trimmed);
    return isValid(zoned) ? zoned : null;
  }

  const iso = parseISO(trimmed);
  if (isValid(iso)) {
    return wallClockToUtc(iso, offsetMinutes);
  }
  return null;
};
