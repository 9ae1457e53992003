/** Calendar date in YYYY-MM-DD form. Compares correctly as a string. */
export type CalendarDate = string;

export interface DateRange {
  start?: CalendarDate;
  end?: CalendarDate;
}

export interface LocalDateTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-CA", {
      timeZone,
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      hourCycle: "h23",
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    formatterFor(timeZone);
    return true;
  } catch {
    return false;
  }
}

export function toCalendarDate(year: number, month: number, day: number): CalendarDate | null {
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Parse a YYYY-M-D date (month and day may have one or two digits).
 * Returns null for anything that is not a real calendar date.
 */
export function parseLooseDate(value: string): CalendarDate | null {
  const match = value.trim().match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
  if (!match) return null;
  return toCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

export function isWithinRange(date: CalendarDate, range: DateRange): boolean {
  if (range.start && date < range.start) return false;
  if (range.end && date > range.end) return false;
  return true;
}

export function localDateTime(epochMs: number, timeZone: string): LocalDateTime {
  const parts: Record<string, number> = {};
  for (const part of formatterFor(timeZone).formatToParts(new Date(epochMs))) {
    if (part.type !== "literal") parts[part.type] = Number(part.value);
  }
  return {
    year: parts.year ?? 0,
    month: parts.month ?? 0,
    day: parts.day ?? 0,
    hour: parts.hour ?? 0,
    minute: parts.minute ?? 0,
    second: parts.second ?? 0,
  };
}

export function localCalendarDate(epochMs: number, timeZone: string): CalendarDate {
  const t = localDateTime(epochMs, timeZone);
  return `${pad(t.year, 4)}-${pad(t.month)}-${pad(t.day)}`;
}

export function formatLocalDateTime(t: LocalDateTime): string {
  return `${pad(t.year, 4)}-${pad(t.month)}-${pad(t.day)} ${pad(t.hour)}:${pad(t.minute)}:${pad(t.second)}`;
}

export function formatCompactTimestamp(t: LocalDateTime): string {
  return `${pad(t.year, 4)}${pad(t.month)}${pad(t.day)}${pad(t.hour)}${pad(t.minute)}${pad(t.second)}`;
}

/** Parse Fitbit's "MM/DD/YY HH:MM:SS" (UTC) into epoch milliseconds. */
export function parseFitbitDateTime(value: string): number | null {
  const match = value.match(/^(\d{2})\/(\d{2})\/(\d{2})\s+(\d{2}):(\d{2}):(\d{2})$/);
  if (!match) return null;
  const [, mm, dd, yy, hh, mi, ss] = match.map(Number);
  if (toCalendarDate(2000 + yy, mm, dd) === null || hh > 23 || mi > 59 || ss > 59) return null;
  return Date.UTC(2000 + yy, mm - 1, dd, hh, mi, ss);
}

/** Parse "YYYY-MM-DDTHH:MM:SSZ" (UTC) into epoch milliseconds. */
export function parseUtcTimestamp(value: string): number | null {
  const match = value.match(/^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/);
  if (!match) return null;
  const [, yyyy, mm, dd, hh, mi, ss] = match.map(Number);
  if (toCalendarDate(yyyy, mm, dd) === null || hh > 23 || mi > 59 || ss > 59) return null;
  return Date.UTC(yyyy, mm - 1, dd, hh, mi, ss);
}

/** Render fractional minutes as HH:MM:SS. */
export function minutesToTime(minutes: number): string {
  const whole = Math.floor(minutes);
  const seconds = Math.floor((minutes - whole) * 60);
  return `${pad(Math.floor(whole / 60))}:${pad(whole % 60)}:${pad(seconds)}`;
}
