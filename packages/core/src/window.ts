import { WindowError } from "./errors.js";
import type { ResolvedWindow, TimeWindow } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const IANA_PATTERN = /^[A-Za-z]+(?:[_-][A-Za-z]+)*(?:\/[A-Za-z0-9_+-]+)+$/;

export const DEFAULT_MAX_SPAN_DAYS = 200;

export interface DateWindowInput {
  fromDate: string;
  toDate: string;
  timezone?: string;
}

export interface DateWindowOptions {
  now?: Date;
  maxSpanDays?: number;
}

interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

interface WallClock {
  hour: number;
  minute: number;
  second: number;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function formatCalendarDate(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

function dayNumber(date: CalendarDate): number {
  return Date.UTC(date.year, date.month - 1, date.day) / DAY_MS;
}

function parseCalendarDate(value: string, field: string): CalendarDate {
  const match = value.trim().match(DATE_PATTERN);
  if (!match) {
    throw new WindowError("INVALID_DATE_FORMAT", `Invalid ${field}: expected YYYY-MM-DD, got "${value}"`);
  }

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (
    probe.getUTCFullYear() !== year ||
    probe.getUTCMonth() !== month - 1 ||
    probe.getUTCDate() !== day
  ) {
    throw new WindowError("INVALID_DATE_FORMAT", `Invalid ${field}: ${value} is not a calendar date`);
  }

  return { year, month, day };
}

export function isValidTimeZone(timezone: string): boolean {
  if (timezone === "UTC") {
    return true;
  }
  // Abbreviations such as PST or EST are accepted by Intl but are ambiguous.
  if (!IANA_PATTERN.test(timezone)) {
    return false;
  }
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

export function formatDateInTimeZone(date: Date, timezone: string): string {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  });
  const parts = formatter.formatToParts(date);
  const year = parts.find((part) => part.type === "year")?.value ?? "1970";
  const month = parts.find((part) => part.type === "month")?.value ?? "01";
  const day = parts.find((part) => part.type === "day")?.value ?? "01";
  return `${year}-${month}-${day}`;
}

function timeZoneOffsetMs(instant: Date, timezone: string): number {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    hourCycle: "h23",
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit"
  });
  const parts = formatter.formatToParts(instant);
  const read = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((part) => part.type === type)?.value ?? "0");

  const asUtc = Date.UTC(
    read("year"),
    read("month") - 1,
    read("day"),
    read("hour"),
    read("minute"),
    read("second")
  );
  const wholeSeconds = instant.getTime() - instant.getUTCMilliseconds();
  return asUtc - wholeSeconds;
}

/**
 * Converts a wall-clock time in `timezone` to the matching UTC instant.
 * Repeated times resolve to their first occurrence; times skipped by a
 * daylight saving gap resolve to the first instant after the gap.
 */
export function zonedDateTimeToUtc(date: CalendarDate, clock: WallClock, timezone: string): Date {
  const guess = Date.UTC(date.year, date.month - 1, date.day, clock.hour, clock.minute, clock.second);
  const firstOffset = timeZoneOffsetMs(new Date(guess), timezone);
  const secondOffset = timeZoneOffsetMs(new Date(guess - firstOffset), timezone);
  const candidates = [guess - firstOffset, guess - secondOffset];
  const exact = candidates.filter((candidate) => candidate + timeZoneOffsetMs(new Date(candidate), timezone) === guess);
  return new Date(exact.length > 0 ? Math.min(...exact) : Math.max(...candidates));
}

export function toIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

export function assertWindow(window: TimeWindow): void {
  if (window.from.getTime() > window.to.getTime()) {
    throw new WindowError("INVALID_DATE_RANGE", "Window start must be on or before window end");
  }
}

export function isWithinWindow(timestamp: string | null | undefined, window: TimeWindow): boolean {
  if (!timestamp) {
    return false;
  }
  const ts = new Date(timestamp).getTime();
  if (!Number.isFinite(ts)) {
    return false;
  }
  return ts >= window.from.getTime() && ts <= window.to.getTime();
}

export function isBeforeWindow(timestamp: string | null | undefined, window: TimeWindow): boolean {
  if (!timestamp) {
    return false;
  }
  const ts = new Date(timestamp).getTime();
  return Number.isFinite(ts) && ts < window.from.getTime();
}

export function resolveDateWindow(
  input: DateWindowInput,
  options: DateWindowOptions = {}
): ResolvedWindow {
  const now = options.now ?? new Date();
  const maxSpanDays = options.maxSpanDays ?? DEFAULT_MAX_SPAN_DAYS;
  const timezone = input.timezone?.trim() || "UTC";

  if (!isValidTimeZone(timezone)) {
    throw new WindowError(
      "INVALID_TIMEZONE",
      `Invalid timezone "${timezone}". Use an IANA timezone name such as America/Los_Angeles.`
    );
  }

  const from = parseCalendarDate(input.fromDate, "from_date");
  const to = parseCalendarDate(input.toDate, "to_date");
  const fromDay = dayNumber(from);
  const toDay = dayNumber(to);

  if (fromDay > toDay) {
    throw new WindowError("INVALID_DATE_RANGE", "from_date must be on or before to_date");
  }

  const todayDay = dayNumber(parseCalendarDate(formatDateInTimeZone(now, timezone), "today"));
  if (fromDay > todayDay) {
    throw new WindowError("FUTURE_DATE", "from_date cannot be in the future");
  }
  if (toDay > todayDay) {
    throw new WindowError("FUTURE_DATE", "to_date cannot be in the future");
  }

  if (toDay - fromDay > maxSpanDays) {
    throw new WindowError("DATE_RANGE_TOO_LARGE", `Date range cannot exceed ${maxSpanDays} days`);
  }

  const start = zonedDateTimeToUtc(from, { hour: 0, minute: 0, second: 0 }, timezone);
  const endOfDay = zonedDateTimeToUtc(to, { hour: 23, minute: 59, second: 59 }, timezone);
  const end = endOfDay.getTime() > now.getTime() ? new Date(now.getTime()) : endOfDay;

  return {
    from: start,
    to: end,
    fromDate: formatCalendarDate(from),
    toDate: formatCalendarDate(to),
    timezone,
    days: toDay - fromDay + 1
  };
}

export function windowFromDaysBack(days: number, now: Date = new Date()): TimeWindow {
  if (!Number.isInteger(days) || days < 1) {
    throw new WindowError("INVALID_DATE_RANGE", `days must be a positive integer, got ${days}`);
  }
  return {
    from: new Date(now.getTime() - days * DAY_MS),
    to: new Date(now.getTime())
  };
}

export function resolveDaysBackWindow(
  days: number,
  options: { now?: Date; timezone?: string } = {}
): ResolvedWindow {
  const now = options.now ?? new Date();
  const timezone = options.timezone?.trim() || "UTC";
  if (!isValidTimeZone(timezone)) {
    throw new WindowError(
      "INVALID_TIMEZONE",
      `Invalid timezone "${timezone}". Use an IANA timezone name such as America/Los_Angeles.`
    );
  }

  const window = windowFromDaysBack(days, now);
  return {
    ...window,
    fromDate: formatDateInTimeZone(window.from, timezone),
    toDate: formatDateInTimeZone(window.to, timezone),
    timezone,
    days
  };
}
