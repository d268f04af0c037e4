export interface CalendarDate {
  year: number;
  month: number;
  day: number;
}

/** Wall-clock date and time as printed on the rate sheet, plus the offset it is expressed in. */
export interface PublicationTimestamp extends CalendarDate {
  hour: number;
  minute: number;
  utcOffset: string;
}

export type ParseResult<T> = { ok: true; value: T } | { ok: false; reason: string };

export interface TimestampParseOptions {
  utcOffset: string;
  /** Breaks the tie when a numeric date reads validly both day-first and month-first. */
  creationDate?: CalendarDate;
}

const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
] as const;

const NUMERIC_DATE = /(\d{1,2})[-/.](\d{1,2})[-/.](\d{4})/;
const DAY_MONTH_NAME_DATE = /(\d{1,2})(?:st|nd|rd|th)?[\s-]+([A-Za-z]{3,9})\.?,?[\s-]+(\d{4})/;
const MONTH_NAME_DAY_DATE = /([A-Za-z]{3,9})\.?\s+(\d{1,2})(?:st|nd|rd|th)?,?\s+(\d{4})/;
const TIME = /(\d{1,2}):(\d{2})(?::(\d{2}))?\s*(?:([ap])\.?\s?m\b\.?)?/i;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function isValidDate(date: CalendarDate): boolean {
  if (date.year < 1900 || date.year > 2999 || date.month < 1 || date.month > 12 || date.day < 1) {
    return false;
  }
  const probe = new Date(Date.UTC(date.year, date.month - 1, date.day));
  return probe.getUTCFullYear() === date.year && probe.getUTCMonth() === date.month - 1 && probe.getUTCDate() === date.day;
}

function sameDate(a: CalendarDate, b: CalendarDate): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

function monthFromName(word: string): number | undefined {
  const normalized = word.toLowerCase();
  if (normalized.length < 3) {
    return undefined;
  }
  const index = MONTHS.findIndex((month) => month.startsWith(normalized) || (normalized === "sept" && month === "september"));
  return index === -1 ? undefined : index + 1;
}

function parseNumericDate(source: string, creationDate?: CalendarDate): ParseResult<CalendarDate> | undefined {
  const match = source.match(NUMERIC_DATE);
  if (!match) {
    return undefined;
  }

  const first = Number.parseInt(match[1], 10);
  const second = Number.parseInt(match[2], 10);
  const year = Number.parseInt(match[3], 10);
  const dayFirst: CalendarDate = { year, month: second, day: first };
  const monthFirst: CalendarDate = { year, month: first, day: second };
  const dayFirstValid = isValidDate(dayFirst);
  const monthFirstValid = isValidDate(monthFirst);

  if (dayFirstValid && monthFirstValid && first !== second) {
    if (creationDate && sameDate(creationDate, monthFirst)) {
      return { ok: true, value: monthFirst };
    }
    return { ok: true, value: dayFirst };
  }
  if (dayFirstValid) {
    return { ok: true, value: dayFirst };
  }
  if (monthFirstValid) {
    return { ok: true, value: monthFirst };
  }
  return { ok: false, reason: `date out of range: ${match[0]}` };
}

function parseMonthNameDate(source: string): ParseResult<CalendarDate> | undefined {
  const dayFirst = source.match(DAY_MONTH_NAME_DATE);
  if (dayFirst) {
    const month = monthFromName(dayFirst[2]);
    if (month !== undefined) {
      const date = { year: Number.parseInt(dayFirst[3], 10), month, day: Number.parseInt(dayFirst[1], 10) };
      return isValidDate(date) ? { ok: true, value: date } : { ok: false, reason: `date out of range: ${dayFirst[0]}` };
    }
  }

  const monthFirst = source.match(MONTH_NAME_DAY_DATE);
  if (monthFirst) {
    const month = monthFromName(monthFirst[1]);
    if (month !== undefined) {
      const date = { year: Number.parseInt(monthFirst[3], 10), month, day: Number.parseInt(monthFirst[2], 10) };
      return isValidDate(date) ? { ok: true, value: date } : { ok: false, reason: `date out of range: ${monthFirst[0]}` };
    }
  }

  return undefined;
}

function parseDateIn(source: string, creationDate?: CalendarDate): ParseResult<CalendarDate> | undefined {
  return parseNumericDate(source, creationDate) ?? parseMonthNameDate(source);
}

function parseTimeIn(source: string): ParseResult<{ hour: number; minute: number }> | undefined {
  const match = source.match(TIME);
  if (!match) {
    return undefined;
  }

  let hour = Number.parseInt(match[1], 10);
  const minute = Number.parseInt(match[2], 10);
  const meridiem = match[4]?.toLowerCase();

  if (minute > 59) {
    return { ok: false, reason: `time out of range: ${match[0].trim()}` };
  }
  if (meridiem) {
    if (hour < 1 || hour > 12) {
      return { ok: false, reason: `time out of range: ${match[0].trim()}` };
    }
    if (meridiem === "a") {
      hour = hour === 12 ? 0 : hour;
    } else {
      hour = hour === 12 ? 12 : hour + 12;
    }
  } else if (hour > 23) {
    return { ok: false, reason: `time out of range: ${match[0].trim()}` };
  }

  return { ok: true, value: { hour, minute } };
}

function labelledLines(lines: string[], label: string): string[] {
  return lines.filter((line) => line.toLowerCase().startsWith(label));
}

/**
 * Finds the publication date and time printed on the sheet. Lines labelled
 * "Date"/"Time" win; otherwise the first date or time token in the text is used.
 */
export function parsePublicationTimestamp(text: string, options: TimestampParseOptions): ParseResult<PublicationTimestamp> {
  const lines = text.split(/\r?\n/).map((line) => line.trim());

  let date: ParseResult<CalendarDate> | undefined;
  for (const line of labelledLines(lines, "date")) {
    date = parseDateIn(line, options.creationDate);
    if (date) {
      break;
    }
  }
  date = date ?? parseDateIn(text, options.creationDate);

  let time: ParseResult<{ hour: number; minute: number }> | undefined;
  for (const line of labelledLines(lines, "time")) {
    time = parseTimeIn(line);
    if (time) {
      break;
    }
  }
  time = time ?? parseTimeIn(text);

  if (!date) {
    return { ok: false, reason: "no publication date found in document text" };
  }
  if (!date.ok) {
    return date;
  }
  if (!time) {
    return { ok: false, reason: "no publication time found in document text" };
  }
  if (!time.ok) {
    return time;
  }

  return {
    ok: true,
    value: { ...date.value, ...time.value, utcOffset: options.utcOffset },
  };
}

function offsetMinutes(utcOffset: string): number {
  const sign = utcOffset.startsWith("-") ? -1 : 1;
  const [hours, minutes] = utcOffset.slice(1).split(":");
  return sign * (Number.parseInt(hours, 10) * 60 + Number.parseInt(minutes, 10));
}

/** Expresses an instant as wall-clock time at the given offset. */
export function timestampFromInstant(instant: Date, utcOffset: string): PublicationTimestamp {
  const shifted = new Date(instant.getTime() + offsetMinutes(utcOffset) * 60_000);
  return {
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate(),
    hour: shifted.getUTCHours(),
    minute: shifted.getUTCMinutes(),
    utcOffset,
  };
}

export function timestampToEpochMs(timestamp: PublicationTimestamp): number {
  const wallClock = Date.UTC(timestamp.year, timestamp.month - 1, timestamp.day, timestamp.hour, timestamp.minute);
  return wallClock - offsetMinutes(timestamp.utcOffset) * 60_000;
}

/** 2026-10-19T10:30:00+05:30 */
export function formatIsoTimestamp(timestamp: PublicationTimestamp): string {
  return `${formatDatePart(timestamp)}T${pad(timestamp.hour)}:${pad(timestamp.minute)}:00${timestamp.utcOffset}`;
}

/** 2026-10-19_1030, sorts chronologically as text. */
export function formatFileStamp(timestamp: PublicationTimestamp): string {
  return `${formatDatePart(timestamp)}_${pad(timestamp.hour)}${pad(timestamp.minute)}`;
}

/** 2026-10-19 10:30 */
export function formatCsvDate(timestamp: PublicationTimestamp): string {
  return `${formatDatePart(timestamp)} ${pad(timestamp.hour)}:${pad(timestamp.minute)}`;
}

function formatDatePart(date: CalendarDate): string {
  return `${pad(date.year, 4)}-${pad(date.month)}-${pad(date.day)}`;
}

const ISO_WITH_OFFSET = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::\d{2})?([+-]\d{2}:\d{2})$/;

/** Inverse of formatIsoTimestamp, used for records read back from the store. */
export function parseIsoTimestamp(value: string): PublicationTimestamp | undefined {
  const match = value.match(ISO_WITH_OFFSET);
  if (!match) {
    return undefined;
  }
  const timestamp: PublicationTimestamp = {
    year: Number.parseInt(match[1], 10),
    month: Number.parseInt(match[2], 10),
    day: Number.parseInt(match[3], 10),
    hour: Number.parseInt(match[4], 10),
    minute: Number.parseInt(match[5], 10),
    utcOffset: match[6],
  };
  if (!isValidDate(timestamp) || timestamp.hour > 23 || timestamp.minute > 59) {
    return undefined;
  }
  return timestamp;
}

/** PDF info dates look like D:20261019103000+05'30'. */
export function parsePdfDate(value: unknown): CalendarDate | undefined {
  if (value instanceof Date && !Number.isNaN(value.getTime())) {
    return { year: value.getUTCFullYear(), month: value.getUTCMonth() + 1, day: value.getUTCDate() };
  }
  if (typeof value !== "string") {
    return undefined;
  }
  const match = value.match(/^(?:D:)?(\d{4})(\d{2})(\d{2})/);
  if (!match) {
    return undefined;
  }
  const date = {
    year: Number.parseInt(match[1], 10),
    month: Number.parseInt(match[2], 10),
    day: Number.parseInt(match[3], 10),
  };
  return isValidDate(date) ? date : undefined;
}
